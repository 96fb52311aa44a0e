import * as THREE from 'three';
import type { PoseBone, Scene } from '../armature';
import { InvalidArgument } from '../lib/errors';
import { switchLog } from '../lib/logger';
import type { SpaceSwitchingPreferences } from '../store/preferencesStore';
import { withStructuralEdit } from './HierarchyEditSession';
import { getSpaceSwitchingArmatureObject } from './tempArmature';

export interface AddEmptyRequest {
    /** Head to tail distance. */
    length: number;
    preferences: SpaceSwitchingPreferences;
}

/**
 * Add an unconstrained temporary bone at the 3D cursor. It replaces the
 * current selection and becomes the active bone.
 */
export function addEmpty(scene: Scene, { length, preferences }: AddEmptyRequest): PoseBone {
    if (!(length >= 0)) {
        throw new InvalidArgument(`Length must be zero or more, got ${length}`);
    }

    const originalObjects = scene.objectsInMode;
    for (const poseBone of scene.selectedPoseBones) {
        poseBone.bone.select = false;
    }

    const tempObject = getSpaceSwitchingArmatureObject(scene, preferences);
    const head = scene.cursor.clone().applyMatrix4(tempObject.matrixWorld.clone().invert());

    const name = withStructuralEdit(scene, tempObject, originalObjects, (editBones) => {
        const editBone = editBones.new(preferences.emptyName);
        editBone.head.copy(head);
        editBone.tail.copy(head).add(new THREE.Vector3(0, length, 0));
        editBone.useDeform = false;
        return editBone.name;
    });

    const empty = tempObject.pose.require(name);
    empty.bone.select = true;
    empty.bone.tag = 'EMPTY';
    tempObject.armature.activeBoneName = name;

    scene.update();
    switchLog.debug(`Added empty "${name}" at (${head.toArray().map((v) => v.toFixed(3)).join(', ')})`);
    return empty;
}
