import { isArmatureObject, type ArmatureObject, type PoseBone, type Scene } from '../armature';
import { HostStateError } from '../lib/errors';
import { switchLog } from '../lib/logger';
import type { BoneNameKeys } from '../lib/naming';
import type { SpaceSwitchingPreferences } from '../store/preferencesStore';

/**
 * The armature object that holds every temporary bone, created on first use.
 * Temporary bones live here instead of in the (possibly linked) source rigs.
 */
export function getSpaceSwitchingArmatureObject(
    scene: Scene,
    preferences: Pick<SpaceSwitchingPreferences, 'objectName' | 'armatureName'>
): ArmatureObject {
    const existing = scene.getObject(preferences.objectName);
    if (existing) {
        if (!isArmatureObject(existing)) {
            throw new HostStateError(`"${preferences.objectName}" exists but is not an armature`);
        }
        return existing;
    }

    const created = scene.createArmatureObject(preferences.objectName, preferences.armatureName);
    created.showInFront = true;
    switchLog.debug(`Created temporary armature object "${created.name}"`);
    return created;
}

/** Template keys describing a pose bone. */
export function boneNameKeys(poseBone: PoseBone): BoneNameKeys {
    return {
        bone_name: poseBone.name,
        armature_name: poseBone.object.armature.name,
        object_name: poseBone.object.name,
    };
}
