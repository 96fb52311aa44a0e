import { bakePoseOperator, type BakePoseProps } from './bakePose';
import { makeLocalArmatureOperator } from './makeLocalArmature';
import { runOperator } from './runOperator';
import {
    selectionToActiveOperator,
    selectionToTargetOperator,
    selectionToWorldOperator,
    type SelectionToTargetProps,
} from './switchSpace';
import {
    addEmptyOperator,
    applyBoneOperator,
    deleteBoneOperator,
    type AddEmptyProps,
} from './temporaryBones';
import { buildTwoBoneIkOperator, type BuildTwoBoneIkProps } from './twoBoneIk';
import type { FrameRangeProps, Operator, OperatorContext, OperatorResult } from './types';

export interface OperatorPropsById {
    'space_switching.bake_pose': BakePoseProps;
    'space_switching.add_empty': AddEmptyProps;
    'space_switching.delete_bone': Record<string, never>;
    'space_switching.apply_bone': FrameRangeProps;
    'space_switching.selection_to_world': FrameRangeProps;
    'space_switching.selection_to_active': FrameRangeProps;
    'space_switching.selection_to_target': SelectionToTargetProps;
    'space_switching.build_two_bone_ik': BuildTwoBoneIkProps;
    'space_switching.make_local_armature': FrameRangeProps;
}

export type OperatorId = keyof OperatorPropsById;

type OperatorRegistry = { [I in OperatorId]: Operator<OperatorPropsById[I]> };

export const OPERATORS: OperatorRegistry = {
    'space_switching.bake_pose': bakePoseOperator,
    'space_switching.add_empty': addEmptyOperator,
    'space_switching.delete_bone': deleteBoneOperator,
    'space_switching.apply_bone': applyBoneOperator,
    'space_switching.selection_to_world': selectionToWorldOperator,
    'space_switching.selection_to_active': selectionToActiveOperator,
    'space_switching.selection_to_target': selectionToTargetOperator,
    'space_switching.build_two_bone_ik': buildTwoBoneIkOperator,
    'space_switching.make_local_armature': makeLocalArmatureOperator,
};

export function getOperator<I extends OperatorId>(id: I): Operator<OperatorPropsById[I]> {
    return OPERATORS[id];
}

/** Whether the operator is available in the current state. */
export function pollOperator(id: OperatorId, context: OperatorContext): boolean {
    return OPERATORS[id].poll(context);
}

export function runOperatorById<I extends OperatorId>(
    id: I,
    context: OperatorContext,
    props?: Partial<OperatorPropsById[I]>
): OperatorResult {
    return runOperator(getOperator(id), context, props);
}
