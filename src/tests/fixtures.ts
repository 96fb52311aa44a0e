/**
 * Rig builders shared by the scenario tests.
 */

import * as THREE from 'three';
import {
    poseBoneChannelPath,
    type ArmatureObject,
    type ChannelName,
    type PoseBone,
    type Scene,
} from '../armature';
import { DEFAULT_PREFERENCES, type SpaceSwitchingPreferences } from '../store/preferencesStore';

export type Vec3 = [number, number, number];

export interface BoneSpec {
    name: string;
    head: Vec3;
    tail: Vec3;
    parent?: string;
    connect?: boolean;
}

export const PREFERENCES: SpaceSwitchingPreferences = { ...DEFAULT_PREFERENCES };

/** Create an armature object with the given bones, in object mode. */
export function buildRig(scene: Scene, objectName: string, bones: BoneSpec[]): ArmatureObject {
    const object = scene.createArmatureObject(objectName);
    object.armature.beginEdit();
    const editBones = object.armature.editBones;
    for (const spec of bones) {
        const editBone = editBones.new(spec.name);
        editBone.head.fromArray(spec.head);
        editBone.tail.fromArray(spec.tail);
        editBone.parentName = spec.parent ?? null;
        editBone.useConnect = spec.connect ?? false;
    }
    object.armature.commitEdit();
    object.pose.sync();
    return object;
}

/** Make `object` active, enter pose mode and select `selected` bones. */
export function enterPoseMode(
    scene: Scene,
    object: ArmatureObject,
    selected: string[],
    active: string | null = selected[0] ?? null
): void {
    scene.activeObject = object;
    scene.selectObject(object);
    scene.setMode('POSE');
    for (const poseBone of object.pose.bones) {
        poseBone.bone.select = selected.includes(poseBone.name);
    }
    object.armature.activeBoneName = active;
}

/** Key an Euler rotation in degrees. */
export function keyEulerDegrees(poseBone: PoseBone, frame: number, angles: Vec3): void {
    const [x, y, z] = angles.map((d) => THREE.MathUtils.degToRad(d));
    poseBone.rotationEuler.set(x, y, z);
    poseBone.keyframeInsert('rotation_euler', frame);
}

export function keyLocation(poseBone: PoseBone, frame: number, location: Vec3): void {
    poseBone.location.fromArray(location);
    poseBone.keyframeInsert('location', frame);
}

/** Keyed value of one channel component, or undefined when there is no key. */
export function keyedValue(
    poseBone: PoseBone,
    channel: ChannelName,
    index: number,
    frame: number
): number | undefined {
    const curve = poseBone.object.action?.find(poseBoneChannelPath(poseBone.name, channel), index);
    return curve?.valueAt(frame);
}

export function hasCurve(poseBone: PoseBone, channel: ChannelName): boolean {
    return poseBone.object.action?.find(poseBoneChannelPath(poseBone.name, channel), 0) !== undefined;
}
