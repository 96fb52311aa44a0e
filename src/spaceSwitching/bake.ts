/**
 * Pose Baking
 * ===========
 *
 * Converts whatever currently drives a set of pose bones (parents,
 * constraints, other curves) into plain keyframes on their own channels.
 *
 * Two passes:
 *   1. Sample: for every frame, evaluate the scene and record each bone's
 *      local transform. Nothing is keyed yet, because keys written during
 *      this pass would change what later frames evaluate to.
 *   2. Key: for every bone, walk the frames in order, apply the sampled
 *      transform and key the requested channels, keeping rotations
 *      continuous from one frame to the next.
 *
 * @module bake
 */

import * as THREE from 'three';
import { convertPoseToLocal, type PoseBone, type Scene } from '../armature';
import type { BakeChannel } from '../armature/types';
import { InvalidArgument } from '../lib/errors';
import { bakeLog } from '../lib/logger';
import { makeEulerCompatible, makeQuaternionCompatible } from '../lib/math/rotationContinuity';

export const ALL_CHANNELS: readonly BakeChannel[] = ['location', 'rotation', 'scale'];

/** samples[boneIndex][frameIndex] is the bone's local transform on that frame. */
export type TransformSamples = THREE.Matrix4[][];

function toChannelSet(channels: Iterable<BakeChannel>): ReadonlySet<BakeChannel> {
    const set = new Set(channels);
    if (set.size === 0) {
        throw new InvalidArgument('No channels enabled');
    }
    return set;
}

// ============================================================================
// SAMPLING
// ============================================================================

/**
 * Local transform of each bone on each frame, as resolved by the scene.
 * Leaves the time cursor on the last sampled frame.
 */
export function sampleVisualTransforms(
    scene: Scene,
    poseBones: readonly PoseBone[],
    frames: readonly number[]
): TransformSamples {
    const samples: TransformSamples = poseBones.map(() => []);

    for (const frame of frames) {
        scene.frameSet(frame);
        scene.update();

        poseBones.forEach((poseBone, index) => {
            samples[index].push(convertPoseToLocal(poseBone, poseBone.matrix));
        });
    }

    return samples;
}

// ============================================================================
// KEYING
// ============================================================================

/**
 * Key sampled transforms onto their bones. Frames must be ascending for the
 * rotation continuity to mean anything.
 */
export function bakeChannels(
    poseBones: readonly PoseBone[],
    frames: readonly number[],
    samples: TransformSamples,
    channels: Iterable<BakeChannel>
): void {
    const enabled = toChannelSet(channels);
    const doLocation = enabled.has('location');
    const doRotation = enabled.has('rotation');
    const doScale = enabled.has('scale');

    if (samples.length !== poseBones.length) {
        throw new InvalidArgument(`Expected samples for ${poseBones.length} bones, got ${samples.length}`);
    }

    poseBones.forEach((poseBone, boneIndex) => {
        const boneSamples = samples[boneIndex];
        if (boneSamples.length !== frames.length) {
            throw new InvalidArgument(
                `Expected ${frames.length} samples for "${poseBone.name}", got ${boneSamples.length}`
            );
        }

        let eulerPrev: THREE.Euler | null = null;
        let quatPrev: THREE.Quaternion | null = null;
        // Connected heads sit on the parent's tail.
        const keyLocation = doLocation && !poseBone.bone.useConnect;

        frames.forEach((frame, frameIndex) => {
            poseBone.setMatrixBasis(boneSamples[frameIndex]);

            if (keyLocation) {
                poseBone.keyframeInsert('location', frame, poseBone.name);
            }

            if (doRotation) {
                const mode = poseBone.rotationMode;
                if (mode === 'QUATERNION') {
                    const quat = poseBone.rotationQuaternion.clone();
                    if (quatPrev) {
                        makeQuaternionCompatible(quat, quatPrev);
                        poseBone.rotationQuaternion.copy(quat);
                    }
                    quatPrev = quat;
                    poseBone.keyframeInsert('rotation_quaternion', frame, poseBone.name);
                } else if (mode === 'AXIS_ANGLE') {
                    poseBone.keyframeInsert('rotation_axis_angle', frame, poseBone.name);
                } else {
                    const euler = poseBone.rotationEuler.clone();
                    if (eulerPrev) {
                        makeEulerCompatible(euler, eulerPrev);
                        poseBone.rotationEuler.copy(euler);
                    }
                    eulerPrev = euler;
                    poseBone.keyframeInsert('rotation_euler', frame, poseBone.name);
                }
            }

            if (doScale) {
                poseBone.keyframeInsert('scale', frame, poseBone.name);
            }
        });
    });
}

// ============================================================================
// BAKE
// ============================================================================

/**
 * Sample and key `poseBones` over `frames`. The time cursor returns to where
 * it was, even when keying fails.
 */
export function customBake(
    scene: Scene,
    frames: readonly number[],
    poseBones: readonly PoseBone[],
    channels: Iterable<BakeChannel>
): void {
    const enabled = toChannelSet(channels);
    const originalFrame = scene.frameCurrent;

    bakeLog.debug(
        `Baking ${poseBones.length} bone(s) over ${frames.length} frame(s): ${Array.from(enabled).join(', ')}`
    );

    try {
        const samples = sampleVisualTransforms(scene, poseBones, frames);
        bakeChannels(poseBones, frames, samples, enabled);
    } finally {
        scene.frameSet(originalFrame);
        scene.update();
    }
}
