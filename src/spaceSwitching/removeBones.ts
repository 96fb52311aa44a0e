/**
 * Removal / Apply
 * ===============
 *
 * Tears down temporary bones. With `apply`, every bone constrained to one of
 * them is baked first, so the motion edited through the copy stays on the
 * source. Without it the temporary bones are simply discarded.
 *
 * @module removeBones
 */

import { poseBonePath, type ArmatureObject, type PoseBone, type Scene } from '../armature';
import { switchLog } from '../lib/logger';
import type { SpaceSwitchingPreferences } from '../store/preferencesStore';
import { ALL_CHANNELS, customBake } from './bake';
import { findBonesConstrainedTo, isConstrainedTo } from './constraintDiscovery';
import { withStructuralEdit } from './HierarchyEditSession';
import { getSpaceSwitchingArmatureObject } from './tempArmature';

export interface RemoveTemporariesRequest {
    /** Selected temporary bones. */
    selected: readonly PoseBone[];
    activePoseBone: PoseBone | null;
    apply: boolean;
    /** Frames to bake when applying. */
    frames: readonly number[];
    preferences: SpaceSwitchingPreferences;
}

/** A source bone, by name, on its object. Pose bone handles are looked up again after the edit. */
interface BoneRef {
    object: ArmatureObject;
    name: string;
}

export interface RemoveTemporariesResult {
    /** Source bones that were unhidden and selected. */
    reselected: PoseBone[];
    /** Source bone made active, when the active bone was removed. */
    activated: PoseBone | null;
}

/** The bone plus up to two anchors above it. */
function structuralRelatives(poseBone: PoseBone): string[] {
    const names = [poseBone.name];
    const parent = poseBone.parent;
    if (parent) {
        names.push(parent.name);
        const grandparent = parent.parent;
        if (grandparent) {
            names.push(grandparent.name);
        }
    }
    return names;
}

export function removeTemporaries(scene: Scene, request: RemoveTemporariesRequest): RemoveTemporariesResult {
    const { selected, activePoseBone, apply, frames, preferences } = request;
    const originalObjects = scene.objectsInMode;
    const armatureObjects = scene.armatureObjects;

    if (apply) {
        const toBake: PoseBone[] = [];
        for (const temp of selected) {
            toBake.push(...findBonesConstrainedTo(armatureObjects, temp));
        }
        if (toBake.length > 0) {
            customBake(scene, frames, toBake, ALL_CHANNELS);
        } else {
            switchLog.debug('Nothing constrained to the selection, discarding without baking');
        }
    }

    const namesToRemove = new Set<string>();
    const toSelect: BoneRef[] = [];
    let toActivate: BoneRef | null = null;

    for (const temp of selected) {
        for (const name of structuralRelatives(temp)) {
            namesToRemove.add(name);
            // Curves outlive their bones otherwise.
            temp.object.action?.removeByPrefix(poseBonePath(name));
        }

        for (const object of armatureObjects) {
            for (const source of object.pose.bones) {
                let wasConstrained = false;
                for (const constraint of source.constraints.toArray()) {
                    if (isConstrainedTo(constraint, temp)) {
                        source.constraints.remove(constraint);
                        wasConstrained = true;
                    }
                }
                if (!wasConstrained) continue;

                source.bone.hide = false;
                toSelect.push({ object, name: source.name });
                if (temp === activePoseBone) {
                    toActivate = { object, name: source.name };
                }
            }
        }
    }

    const tempObject = getSpaceSwitchingArmatureObject(scene, preferences);
    withStructuralEdit(scene, tempObject, originalObjects, (editBones) => {
        for (const name of namesToRemove) {
            const editBone = editBones.get(name);
            if (editBone) {
                editBones.remove(editBone);
            } else {
                switchLog.debug(`Temporary bone "${name}" was already removed`);
            }
        }
    });

    const reselected: PoseBone[] = [];
    for (const ref of toSelect) {
        const poseBone = ref.object.pose.get(ref.name);
        if (!poseBone) continue;
        poseBone.bone.select = true;
        reselected.push(poseBone);
    }

    let activated: PoseBone | null = null;
    if (toActivate) {
        const poseBone = toActivate.object.pose.get(toActivate.name);
        if (poseBone) {
            scene.activeObject = toActivate.object;
            toActivate.object.armature.activeBoneName = poseBone.name;
            activated = poseBone;
        }
    }

    scene.update();
    switchLog.debug(
        `Removed ${namesToRemove.size} temporary bone(s)${apply ? ' after applying' : ''}, reselected ${reselected.length}`
    );

    return { reselected, activated };
}
