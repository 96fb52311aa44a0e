/**
 * Operators that create or remove temporary bones directly.
 */

import { addEmpty } from '../spaceSwitching/addEmpty';
import { removeTemporaries } from '../spaceSwitching/removeBones';
import {
    framesFromProps,
    inPoseMode,
    preferencesOf,
    sceneFrameDefaults,
    selectedPoseBones,
} from './context';
import { FINISHED, type FrameRangeProps, type Operator } from './types';

export interface AddEmptyProps {
    length: number;
}

export const addEmptyOperator: Operator<AddEmptyProps> = {
    id: 'space_switching.add_empty',
    label: 'Add Empty',
    description:
        'Add a bone at the 3D cursor. Unlike an empty object it can be selected without leaving pose mode',

    defaults: () => ({ length: 1 }),

    poll: inPoseMode,

    execute: (context, props) => {
        addEmpty(context.scene, { length: props.length, preferences: preferencesOf(context) });
        return FINISHED;
    },
};

// ============================================================================
// REMOVAL
// ============================================================================

export const deleteBoneOperator: Operator<Record<string, never>> = {
    id: 'space_switching.delete_bone',
    label: 'Delete Bone',
    description: 'Delete temporary bones without baking the bones constrained to them',

    defaults: () => ({}),

    /** Only when every selected bone would be deleted. */
    poll: (context) => {
        if (!inPoseMode(context)) return false;
        const selected = selectedPoseBones(context);
        return selected.length > 0 && selected.every((poseBone) => poseBone.bone.tag !== 'NONE');
    },

    execute: (context) => {
        const { scene } = context;
        removeTemporaries(scene, {
            selected: scene.selectedPoseBones,
            activePoseBone: scene.activePoseBone,
            apply: false,
            frames: [],
            preferences: preferencesOf(context),
        });
        return FINISHED;
    },
};

export const applyBoneOperator: Operator<FrameRangeProps> = {
    id: 'space_switching.apply_bone',
    label: 'Apply Bone',
    description: 'Remove temporary bones after baking the bones constrained to them',

    defaults: sceneFrameDefaults,

    /** Only when every selected bone is a copy, so everything selected gets baked. */
    poll: (context) => {
        if (!inPoseMode(context)) return false;
        const selected = selectedPoseBones(context);
        return selected.length > 0 && selected.every((poseBone) => poseBone.bone.tag === 'COPY');
    },

    execute: (context, props) => {
        const { scene } = context;
        const frames = framesFromProps(props);
        removeTemporaries(scene, {
            selected: scene.selectedPoseBones,
            activePoseBone: scene.activePoseBone,
            apply: true,
            frames,
            preferences: preferencesOf(context),
        });
        return FINISHED;
    },
};
