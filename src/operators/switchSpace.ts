/**
 * Space switching operators
 *
 * All three move the selected, unconstrained bones into a new space through
 * temporary copies; they differ in where that space comes from.
 */

import { isArmatureObject, type PoseBone } from '../armature';
import { UserPreconditionFailed } from '../lib/errors';
import { spaceSwitch } from '../spaceSwitching/spaceSwitch';
import {
    framesFromProps,
    hasUnconstrainedSelection,
    preferencesOf,
    sceneFrameDefaults,
} from './context';
import { FINISHED, type FrameRangeProps, type Operator, type OperatorContext } from './types';

function switchSelection(context: OperatorContext, dest: PoseBone | null, props: FrameRangeProps): void {
    const { scene } = context;
    const frames = framesFromProps(props);
    spaceSwitch(scene, {
        sources: scene.selectedPoseBones,
        dest,
        activePoseBone: scene.activePoseBone,
        frames,
        preferences: preferencesOf(context),
    });
}

export const selectionToWorldOperator: Operator<FrameRangeProps> = {
    id: 'space_switching.selection_to_world',
    label: 'Switch to World',
    description: 'Switch selected bones to world space',

    defaults: sceneFrameDefaults,
    poll: (context) => hasUnconstrainedSelection(context, 1),

    execute: (context, props) => {
        switchSelection(context, null, props);
        return FINISHED;
    },
};

export const selectionToActiveOperator: Operator<FrameRangeProps> = {
    id: 'space_switching.selection_to_active',
    label: 'Switch to Active',
    description: 'Switch selected bones to the space of the active bone',

    defaults: sceneFrameDefaults,
    // The active bone is the destination, so it takes two.
    poll: (context) => hasUnconstrainedSelection(context, 2),

    execute: (context, props) => {
        switchSelection(context, context.scene.activePoseBone, props);
        return FINISHED;
    },
};

// ============================================================================
// SWITCH TO TARGET
// ============================================================================

export interface SelectionToTargetProps extends FrameRangeProps {
    /** Armature object name. */
    target: string;
    /** Bone name on `target`. */
    subtarget: string;
}

export const selectionToTargetOperator: Operator<SelectionToTargetProps> = {
    id: 'space_switching.selection_to_target',
    label: 'Switch to Target',
    description: 'Switch selected bones to the space of a named bone',

    defaults: (context) => ({
        ...sceneFrameDefaults(context),
        target: context.scene.activeObject?.name ?? '',
        subtarget: context.scene.activePoseBone?.name ?? '',
    }),

    poll: (context) => hasUnconstrainedSelection(context, 1),

    execute: (context, props) => {
        if (!props.target) {
            throw new UserPreconditionFailed('Cannot switch because Target was not set.');
        }
        if (!props.subtarget) {
            throw new UserPreconditionFailed('Cannot switch because Bone was not set.');
        }

        const target = context.scene.getObject(props.target);
        if (!isArmatureObject(target)) {
            throw new UserPreconditionFailed(`Cannot switch because Target ${props.target} is not an armature.`);
        }
        const dest = target.pose.get(props.subtarget);
        if (!dest) {
            throw new UserPreconditionFailed(
                `Cannot switch because Bone ${props.subtarget} does not exist in ${props.target}.`
            );
        }

        switchSelection(context, dest, props);
        return FINISHED;
    },
};
