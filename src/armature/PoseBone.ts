/**
 * Pose Bone
 * =========
 *
 * Per-bone animation state of an armature object: the keyable channels,
 * rotation mode, display settings, constraints and the last evaluated
 * pose-space matrix.
 *
 * Pose bones survive mode changes; they are matched to bones by name.
 *
 * @module PoseBone
 */

import * as THREE from 'three';
import {
    axisAngleFromQuaternion,
    isEulerMode,
    quaternionFromAxisAngle,
    quaternionFromWxyz,
    quaternionToWxyz,
    type AxisAngle,
    type RotationMode,
} from '../lib/math/rotationModes';
import type { ArmatureObject, SceneObject } from './ArmatureObject';
import { poseBoneChannelPath } from './Action';
import type { Bone } from './Bone';
import { ConstraintCollection } from './constraints';
import { CHANNEL_SIZES, type ChannelName } from './types';

export type Bool3 = [boolean, boolean, boolean];

export class PoseBone {
    readonly object: ArmatureObject;
    readonly name: string;

    // Channels
    readonly location = new THREE.Vector3();
    readonly rotationQuaternion = new THREE.Quaternion();
    readonly rotationEuler = new THREE.Euler(0, 0, 0, 'XYZ');
    rotationAxisAngle: AxisAngle = [0, 0, 1, 0];
    readonly scale = new THREE.Vector3(1, 1, 1);
    private mode: RotationMode = 'QUATERNION';

    // Locks
    lockLocation: Bool3 = [false, false, false];
    lockRotation: Bool3 = [false, false, false];
    lockRotationW = false;
    lockRotations4d = false;
    lockScale: Bool3 = [false, false, false];

    // Display
    customShape: SceneObject | null = null;
    readonly customShapeTranslation = new THREE.Vector3();
    readonly customShapeRotationEuler = new THREE.Euler();
    readonly customShapeScaleXyz = new THREE.Vector3(1, 1, 1);
    /** Name of the pose bone whose transform places the custom shape. */
    customShapeTransform: string | null = null;
    useCustomShapeBoneSize = true;

    readonly constraints = new ConstraintCollection();

    /** Evaluated pose-space matrix, written by the evaluator. */
    readonly matrix = new THREE.Matrix4();

    constructor(object: ArmatureObject, name: string) {
        this.object = object;
        this.name = name;
    }

    get bone(): Bone {
        return this.object.armature.requireBone(this.name);
    }

    get parent(): PoseBone | null {
        const parentName = this.bone.parentName;
        return parentName === null ? null : this.object.pose.require(parentName);
    }

    get rotationMode(): RotationMode {
        return this.mode;
    }

    set rotationMode(mode: RotationMode) {
        this.mode = mode;
        if (isEulerMode(mode)) {
            this.rotationEuler.order = mode;
        }
    }

    // ========================================================================
    // BASIS MATRIX
    // ========================================================================

    /** Rotation of the active representation as a quaternion. */
    getRotation(): THREE.Quaternion {
        if (this.mode === 'QUATERNION') {
            return this.rotationQuaternion.clone().normalize();
        }
        if (this.mode === 'AXIS_ANGLE') {
            return quaternionFromAxisAngle(this.rotationAxisAngle);
        }
        return new THREE.Quaternion().setFromEuler(this.rotationEuler);
    }

    /** Local transform from the channels. Connected bones ignore location. */
    get matrixBasis(): THREE.Matrix4 {
        const location = this.bone.useConnect ? new THREE.Vector3() : this.location;
        return new THREE.Matrix4().compose(location, this.getRotation(), this.scale);
    }

    /** Write a local transform back into the channels of the active representation. */
    setMatrixBasis(matrix: THREE.Matrix4): void {
        const location = new THREE.Vector3();
        const rotation = new THREE.Quaternion();
        const scale = new THREE.Vector3();
        matrix.decompose(location, rotation, scale);

        this.location.copy(location);
        this.scale.copy(scale);

        const mode = this.mode;
        if (mode === 'QUATERNION') {
            this.rotationQuaternion.copy(rotation);
        } else if (mode === 'AXIS_ANGLE') {
            this.rotationAxisAngle = axisAngleFromQuaternion(rotation);
        } else {
            this.rotationEuler.setFromQuaternion(rotation, mode);
        }
    }

    // ========================================================================
    // CHANNEL ACCESS
    // ========================================================================

    readChannel(channel: ChannelName): number[] {
        switch (channel) {
            case 'location':
                return this.location.toArray();
            case 'rotation_quaternion':
                return quaternionToWxyz(this.rotationQuaternion);
            case 'rotation_euler':
                return [this.rotationEuler.x, this.rotationEuler.y, this.rotationEuler.z];
            case 'rotation_axis_angle':
                return [...this.rotationAxisAngle];
            case 'scale':
                return this.scale.toArray();
        }
    }

    writeChannel(channel: ChannelName, index: number, value: number): void {
        const values = this.readChannel(channel);
        if (index < 0 || index >= values.length) return;
        values[index] = value;

        switch (channel) {
            case 'location':
                this.location.fromArray(values);
                break;
            case 'rotation_quaternion':
                this.rotationQuaternion.copy(quaternionFromWxyz(values));
                break;
            case 'rotation_euler':
                this.rotationEuler.set(values[0], values[1], values[2], this.rotationEuler.order);
                break;
            case 'rotation_axis_angle':
                this.rotationAxisAngle = [values[0], values[1], values[2], values[3]];
                break;
            case 'scale':
                this.scale.fromArray(values);
                break;
        }
    }

    /**
     * Key the current value of a channel. `index` -1 keys every component.
     * Creates the object's action when it has none.
     */
    keyframeInsert(channel: ChannelName, frame: number, group: string | null = this.name, index = -1): void {
        const action = this.object.ensureAction();
        const dataPath = poseBoneChannelPath(this.name, channel);
        const values = this.readChannel(channel);

        for (let i = 0; i < CHANNEL_SIZES[channel]; i++) {
            if (index !== -1 && index !== i) continue;
            action.ensure(dataPath, i, group).insert(frame, values[i]);
        }
    }

    /** Copy channels and settings (not constraints) from another pose bone. */
    copyChannelsFrom(other: PoseBone): void {
        this.location.copy(other.location);
        this.rotationQuaternion.copy(other.rotationQuaternion);
        this.rotationEuler.copy(other.rotationEuler);
        this.rotationAxisAngle = [...other.rotationAxisAngle];
        this.scale.copy(other.scale);
        this.rotationMode = other.rotationMode;

        this.lockLocation = [...other.lockLocation];
        this.lockRotation = [...other.lockRotation];
        this.lockRotationW = other.lockRotationW;
        this.lockRotations4d = other.lockRotations4d;
        this.lockScale = [...other.lockScale];

        this.customShape = other.customShape;
        this.customShapeTranslation.copy(other.customShapeTranslation);
        this.customShapeRotationEuler.copy(other.customShapeRotationEuler);
        this.customShapeScaleXyz.copy(other.customShapeScaleXyz);
        this.customShapeTransform = other.customShapeTransform;
        this.useCustomShapeBoneSize = other.useCustomShapeBoneSize;
    }
}
