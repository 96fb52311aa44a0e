import { buildTwoBoneIk } from '../spaceSwitching/twoBoneIk';
import {
    framesFromProps,
    hasUnconstrainedSelection,
    preferencesOf,
    sceneFrameDefaults,
    selectedPoseBones,
} from './context';
import { CANCELLED, FINISHED, type FrameRangeProps, type Operator } from './types';

export interface BuildTwoBoneIkProps extends FrameRangeProps {
    /** Length of the target bones. */
    length: number;
    /** Pole rotation offset in radians. */
    poleAngle: number;
}

export const buildTwoBoneIkOperator: Operator<BuildTwoBoneIkProps> = {
    id: 'space_switching.build_two_bone_ik',
    label: 'Build Two-Bone IK (WIP)',
    description: 'Bake IK and pole targets in world space and add a two-bone IK constraint',

    defaults: (context) => ({
        ...sceneFrameDefaults(context),
        length: 1,
        poleAngle: 0,
    }),

    poll: (context) => hasUnconstrainedSelection(context, 1) && selectedPoseBones(context).length === 1,

    execute: (context, props) => {
        const [source] = selectedPoseBones(context);
        if (!source) return CANCELLED;

        buildTwoBoneIk(context.scene, {
            source,
            length: props.length,
            poleAngle: props.poleAngle,
            frames: framesFromProps(props),
            preferences: preferencesOf(context),
        });
        return FINISHED;
    },
};
