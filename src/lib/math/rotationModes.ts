/**
 * Rotation Representations
 * ========================
 *
 * Pose bones store rotation in one of three representations, selected by
 * their rotation mode:
 *
 *   QUATERNION  - [w, x, y, z]
 *   AXIS_ANGLE  - [angle, x, y, z] (angle in radians)
 *   Euler order - [x, y, z] radians, using three.js EulerOrder semantics
 *
 * @module rotationModes
 */

import * as THREE from 'three';
import { InvalidArgument } from '../errors';

// ============================================================================
// TYPES
// ============================================================================

export const EULER_ORDERS: readonly THREE.EulerOrder[] = ['XYZ', 'XZY', 'YXZ', 'YZX', 'ZXY', 'ZYX'];

export type RotationMode = 'QUATERNION' | 'AXIS_ANGLE' | THREE.EulerOrder;

/** [angle, axisX, axisY, axisZ] */
export type AxisAngle = [number, number, number, number];

/** Below this angle the axis of an axis-angle rotation is undefined. */
const AXIS_ANGLE_EPSILON = 1e-8;

// ============================================================================
// MODE HELPERS
// ============================================================================

export function isEulerMode(mode: RotationMode): mode is THREE.EulerOrder {
    return mode !== 'QUATERNION' && mode !== 'AXIS_ANGLE';
}

export function parseRotationMode(value: string): RotationMode {
    if (value === 'QUATERNION' || value === 'AXIS_ANGLE') return value;
    const order = EULER_ORDERS.find((o) => o === value);
    if (order === undefined) {
        throw new InvalidArgument(`Unknown rotation mode "${value}"`);
    }
    return order;
}

// ============================================================================
// AXIS-ANGLE CONVERSION
// ============================================================================

export function quaternionFromAxisAngle([angle, x, y, z]: AxisAngle): THREE.Quaternion {
    const axis = new THREE.Vector3(x, y, z);
    if (axis.lengthSq() === 0) {
        return new THREE.Quaternion();
    }
    return new THREE.Quaternion().setFromAxisAngle(axis.normalize(), angle);
}

/**
 * Axis-angle from a unit quaternion. The angle lies in [0, 2π); a zero
 * rotation reports the +Y axis.
 */
export function axisAngleFromQuaternion(q: THREE.Quaternion): AxisAngle {
    const n = q.clone().normalize();
    const w = THREE.MathUtils.clamp(n.w, -1, 1);
    const angle = 2 * Math.acos(w);
    const s = Math.sqrt(1 - w * w);

    if (s < AXIS_ANGLE_EPSILON || angle < AXIS_ANGLE_EPSILON) {
        return [0, 0, 1, 0];
    }
    return [angle, n.x / s, n.y / s, n.z / s];
}

// ============================================================================
// QUATERNION ARRAY CONVERSION
// ============================================================================

/** three.js stores (x, y, z, w); curves are keyed as [w, x, y, z]. */
export function quaternionToWxyz(q: THREE.Quaternion): [number, number, number, number] {
    return [q.w, q.x, q.y, q.z];
}

export function quaternionFromWxyz([w, x, y, z]: readonly number[]): THREE.Quaternion {
    return new THREE.Quaternion(x, y, z, w);
}
