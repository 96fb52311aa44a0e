/**
 * Two-Bone IK Builder (work in progress)
 * ======================================
 *
 * Bakes an IK target at the tail of a bone and a pole target at its head,
 * both in world space, then drives the bone and its parent with an IK
 * constraint on those targets.
 *
 * The pole angle is whatever the caller passes; nothing estimates it.
 *
 * @module twoBoneIk
 */

import type { IKConstraint, PoseBone, Scene } from '../armature';
import { InvalidArgument } from '../lib/errors';
import { switchLog } from '../lib/logger';
import type { SpaceSwitchingPreferences } from '../store/preferencesStore';
import { customBake } from './bake';
import { withStructuralEdit } from './HierarchyEditSession';
import { getSpaceSwitchingArmatureObject } from './tempArmature';

export const IK_TARGET_NAME = 'ik_target';
export const IK_POLE_TARGET_NAME = 'ik_pole_target';

export interface TwoBoneIkRequest {
    /** Tip bone of the chain. */
    source: PoseBone;
    /** Length of the target bones. */
    length: number;
    /** Radians. */
    poleAngle: number;
    frames: readonly number[];
    preferences: SpaceSwitchingPreferences;
}

export interface TwoBoneIkResult {
    target: PoseBone;
    poleTarget: PoseBone;
    constraint: IKConstraint;
}

export function buildTwoBoneIk(scene: Scene, request: TwoBoneIkRequest): TwoBoneIkResult {
    const { source, length, poleAngle, frames, preferences } = request;
    if (!(length >= 0)) {
        throw new InvalidArgument(`Length must be zero or more, got ${length}`);
    }

    const originalObjects = scene.objectsInMode;
    for (const poseBone of scene.selectedPoseBones) {
        poseBone.bone.select = false;
    }

    const tempObject = getSpaceSwitchingArmatureObject(scene, preferences);
    const [targetName, poleName] = withStructuralEdit(scene, tempObject, originalObjects, (editBones) =>
        [IK_TARGET_NAME, IK_POLE_TARGET_NAME].map((name) => {
            const editBone = editBones.new(name);
            editBone.head.set(0, 0, 0);
            editBone.tail.set(0, length, 0);
            editBone.useDeform = false;
            return editBone.name;
        })
    );

    const target = tempObject.pose.require(targetName);
    const poleTarget = tempObject.pose.require(poleName);
    for (const poseBone of [target, poleTarget]) {
        poseBone.bone.select = true;
        poseBone.bone.tag = 'EMPTY';
    }

    const tailBinding = target.constraints.new('COPY_LOCATION');
    tailBinding.target = source.object;
    tailBinding.subtarget = source.name;
    tailBinding.headTail = 1;

    const headBinding = poleTarget.constraints.new('COPY_LOCATION');
    headBinding.target = source.object;
    headBinding.subtarget = source.name;

    customBake(scene, frames, [target, poleTarget], ['location']);

    target.constraints.remove(tailBinding);
    poleTarget.constraints.remove(headBinding);

    const constraint = source.constraints.new('IK');
    constraint.target = tempObject;
    constraint.subtarget = target.name;
    constraint.poleTarget = tempObject;
    constraint.poleSubtarget = poleTarget.name;
    constraint.chainCount = 2;
    constraint.poleAngle = poleAngle;

    scene.update();
    switchLog.debug(`Built two-bone IK on "${source.name}" with targets "${target.name}" and "${poleTarget.name}"`);
    return { target, poleTarget, constraint };
}
