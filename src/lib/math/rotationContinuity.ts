/**
 * Rotation Continuity
 * ===================
 *
 * The same orientation has more than one encoding:
 *   - q and -q are the same rotation
 *   - each Euler component is congruent modulo 2π
 *
 * Interpolating between keys that picked different encodings makes the
 * rotation spin the long way around. Both helpers pick the encoding
 * closest to the previous key and write it into `current`.
 *
 * @module rotationContinuity
 */

import * as THREE from 'three';

const TWO_PI = Math.PI * 2;

/**
 * Flip `current` to the hemisphere of `previous` (dot product ≥ 0).
 */
export function makeQuaternionCompatible(
    current: THREE.Quaternion,
    previous: THREE.Quaternion
): THREE.Quaternion {
    if (current.dot(previous) < 0) {
        current.set(-current.x, -current.y, -current.z, -current.w);
    }
    return current;
}

/**
 * Shift each component of `current` by whole turns so it lies within ±π of
 * the matching component of `previous`. Components are independent, so this
 * minimises the summed per-axis distance.
 */
export function makeEulerCompatible(current: THREE.Euler, previous: THREE.Euler): THREE.Euler {
    current.set(
        nearestCongruentAngle(current.x, previous.x),
        nearestCongruentAngle(current.y, previous.y),
        nearestCongruentAngle(current.z, previous.z),
        current.order
    );
    return current;
}

/**
 * Representative of `angle` (mod 2π) nearest to `reference`.
 */
export function nearestCongruentAngle(angle: number, reference: number): number {
    const turns = Math.round((reference - angle) / TWO_PI);
    return angle + turns * TWO_PI;
}
