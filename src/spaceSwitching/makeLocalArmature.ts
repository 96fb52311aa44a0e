/**
 * Make Local Armature
 * ===================
 *
 * Linked rigs cannot be edited structurally, and their bone flags do not
 * survive undo. This workflow puts a local duplicate in front of the rig:
 * the duplicate gets the rig's animation and the rig is constrained to it.
 *
 * Running it again (after the linked file changed, say) bakes the old
 * duplicate's animation back onto the rig, throws the old duplicate away
 * and builds a fresh one, so no animation is lost.
 *
 * @module makeLocalArmature
 */

import type { ArmatureObject, Constraint, PoseBone, Scene } from '../armature';
import { UserPreconditionFailed } from '../lib/errors';
import { switchLog } from '../lib/logger';
import { formatTemplate, type ObjectNameKeys } from '../lib/naming';
import type { SpaceSwitchingPreferences } from '../store/preferencesStore';
import { ALL_CHANNELS, customBake } from './bake';

export interface MakeLocalArmatureRequest {
    source: ArmatureObject;
    frames: readonly number[];
    preferences: SpaceSwitchingPreferences;
}

export interface MakeLocalArmatureResult {
    duplicate: ArmatureObject;
    /** Previous duplicate that was baked down and removed. */
    replaced: ArmatureObject | null;
}

interface ExistingLink {
    previous: ArmatureObject | null;
    constraints: [PoseBone, Constraint][];
}

/** Find the duplicate the source is already bound to, if any. */
function findExistingLink(source: ArmatureObject): ExistingLink {
    let previous: ArmatureObject | null = null;
    const constraints: [PoseBone, Constraint][] = [];

    for (const poseBone of source.pose.bones) {
        if (poseBone.constraints.length > 1) {
            throw new UserPreconditionFailed(
                `Unable to determine existing local object because bone ${poseBone.name} has more than one constraint.`
            );
        }
        const constraint = poseBone.constraints.at(0);
        if (!constraint) continue;

        if (previous === null) {
            previous = constraint.target;
        } else if (constraint.target !== null && constraint.target !== previous) {
            throw new UserPreconditionFailed(
                `Unable to determine existing local object because ${source.name} is constrained to more than one target.`
            );
        }
        constraints.push([poseBone, constraint]);
    }

    return { previous, constraints };
}

export function makeLocalArmature(scene: Scene, request: MakeLocalArmatureRequest): MakeLocalArmatureResult {
    const { source, frames, preferences } = request;

    // A refreshed duplicate must not inherit a hidden source.
    source.hideViewport = false;

    const { previous, constraints } = findExistingLink(source);

    let replaced: ArmatureObject | null = null;
    if (previous) {
        customBake(scene, frames, source.pose.bones, ALL_CHANNELS);
        // The user may have deleted it already.
        if (scene.getObject(previous.name) === previous) {
            scene.removeObject(previous);
            replaced = previous;
        }
    }

    for (const [poseBone, constraint] of constraints) {
        poseBone.constraints.remove(constraint);
    }

    const duplicate = scene.duplicateObject(source);
    if (!duplicate || duplicate === source) {
        throw new UserPreconditionFailed('Failed to duplicate source object.');
    }

    const nameKeys: ObjectNameKeys = { object: source.name, armature: source.armature.name };
    scene.renameObject(duplicate, formatTemplate(preferences.localArmatureObjectName, nameKeys));

    const bindings: [PoseBone, Constraint][] = [];
    for (const poseBone of duplicate.pose.bones) {
        const copyTransforms = poseBone.constraints.new('COPY_TRANSFORMS');
        copyTransforms.target = source;
        copyTransforms.subtarget = poseBone.name;
        bindings.push([poseBone, copyTransforms]);
    }

    customBake(scene, frames, duplicate.pose.bones, ALL_CHANNELS);

    for (const [poseBone, constraint] of bindings) {
        poseBone.constraints.remove(constraint);
    }

    for (const poseBone of source.pose.bones) {
        const copyTransforms = poseBone.constraints.new('COPY_TRANSFORMS');
        copyTransforms.target = duplicate;
        copyTransforms.subtarget = poseBone.name;
    }

    source.hideViewport = true;
    scene.update();

    switchLog.info(
        replaced
            ? `Replaced local duplicate of "${source.name}" with "${duplicate.name}"`
            : `Created local duplicate "${duplicate.name}" of "${source.name}"`
    );
    return { duplicate, replaced };
}
