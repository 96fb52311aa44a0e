import { isArmatureObject } from '../armature';
import type { BakeChannel } from '../armature/types';
import { customBake } from '../spaceSwitching/bake';
import { framesFromProps, inPoseMode, sceneFrameDefaults, selectedPoseBones } from './context';
import { FINISHED, type FrameRangeProps, type Operator } from './types';

export interface BakePoseProps extends FrameRangeProps {
    doLocation: boolean;
    doRotation: boolean;
    doScale: boolean;
}

export const bakePoseOperator: Operator<BakePoseProps> = {
    id: 'space_switching.bake_pose',
    label: 'Bake Pose',
    description: 'Bake the visual transform of the selected bones into keyframes',

    defaults: (context) => ({
        ...sceneFrameDefaults(context),
        doLocation: true,
        doRotation: true,
        doScale: false,
    }),

    /** Bones selected in pose mode, and an action on the active object to bake into. */
    poll: (context) => {
        const active = context.scene.activeObject;
        return inPoseMode(context)
            && selectedPoseBones(context).length > 0
            && isArmatureObject(active)
            && active.action !== null;
    },

    execute: (context, props) => {
        const channels: BakeChannel[] = [];
        if (props.doLocation) channels.push('location');
        if (props.doRotation) channels.push('rotation');
        if (props.doScale) channels.push('scale');

        customBake(context.scene, framesFromProps(props), selectedPoseBones(context), channels);
        return FINISHED;
    },
};
