/**
 * Pose Evaluator Tests
 * ====================
 *
 * Parent chains, constraints across armatures, dependency cycles and the
 * inverse used when baking.
 */

import { describe, it, expect } from 'vitest';
import * as THREE from 'three';
import { buildRig } from '../tests/fixtures';
import { convertPoseToLocal, headWorldOf, tailWorldOf } from './poseEvaluator';
import { Scene } from './Scene';

function expectVector(actual: THREE.Vector3, expected: [number, number, number]): void {
    expect(actual.x).toBeCloseTo(expected[0], 6);
    expect(actual.y).toBeCloseTo(expected[1], 6);
    expect(actual.z).toBeCloseTo(expected[2], 6);
}

function armRig() {
    const scene = new Scene();
    const rig = buildRig(scene, 'Rig', [
        { name: 'UpperArm', head: [0, 0, 0], tail: [0, 1, 0] },
        { name: 'Forearm', head: [0, 1, 0], tail: [0, 2, 0], parent: 'UpperArm', connect: true },
        { name: 'Hand', head: [0, 2, 0], tail: [0, 3, 0], parent: 'UpperArm' },
        { name: 'Free', head: [2, 0, 0], tail: [2, 1, 0] },
    ]);
    return {
        scene,
        rig,
        upper: rig.pose.require('UpperArm'),
        fore: rig.pose.require('Forearm'),
        hand: rig.pose.require('Hand'),
        free: rig.pose.require('Free'),
    };
}

describe('PoseEvaluator', () => {

    it('should carry parent rotation down the chain', () => {
        const { scene, upper, fore } = armRig();
        upper.rotationQuaternion.setFromAxisAngle(new THREE.Vector3(0, 0, 1), Math.PI / 2);

        scene.update();

        expectVector(headWorldOf(fore), [-1, 0, 0]);
        expectVector(tailWorldOf(fore), [-2, 0, 0]);
    });

    it('should ignore location on a connected bone', () => {
        const { scene, fore } = armRig();
        fore.location.set(5, 5, 5);

        scene.update();

        expectVector(headWorldOf(fore), [0, 1, 0]);
    });

    it('should place a copied location between head and tail', () => {
        const { scene, rig, free } = armRig();
        const constraint = free.constraints.new('COPY_LOCATION');
        constraint.target = rig;
        constraint.subtarget = 'UpperArm';
        constraint.headTail = 0.5;

        scene.update();

        expectVector(headWorldOf(free), [0, 0.5, 0]);
        // Own rotation is untouched
        expectVector(tailWorldOf(free), [0, 1.5, 0]);
    });

    it('should resolve targets on another, moved armature', () => {
        const { scene, rig } = armRig();
        const follower = buildRig(scene, 'Follower', [{ name: 'Bone', head: [0, 0, 0], tail: [0, 1, 0] }]);
        follower.matrixWorld.makeTranslation(10, 0, 0);
        rig.matrixWorld.makeTranslation(0, 0, 3);
        const bone = follower.pose.require('Bone');
        const constraint = bone.constraints.new('COPY_TRANSFORMS');
        constraint.target = rig;
        constraint.subtarget = 'Free';

        scene.update();

        expectVector(headWorldOf(bone), [2, 0, 3]);
        expectVector(new THREE.Vector3().setFromMatrixPosition(bone.matrix), [-8, 0, 3]);
    });

    it('should fall back to the previous evaluation on a dependency cycle', () => {
        const { scene, rig, upper, free } = armRig();
        scene.update();

        const upperToFree = upper.constraints.new('COPY_LOCATION');
        upperToFree.target = rig;
        upperToFree.subtarget = 'Free';
        const freeToUpper = free.constraints.new('COPY_LOCATION');
        freeToUpper.target = rig;
        freeToUpper.subtarget = 'UpperArm';

        expect(() => scene.update()).not.toThrow();
        // Free read UpperArm's last result at the origin, then UpperArm copied Free
        expectVector(headWorldOf(free), [0, 0, 0]);
        expectVector(headWorldOf(upper), [0, 0, 0]);
    });

    it('should invert the pose for a child bone so baking reproduces it', () => {
        const { scene, upper, hand } = armRig();
        upper.rotationQuaternion.setFromAxisAngle(new THREE.Vector3(0, 0, 1), Math.PI / 2);
        scene.update();

        const desired = new THREE.Matrix4()
            .makeRotationX(Math.PI / 6)
            .setPosition(5, 5, 0);
        hand.setMatrixBasis(convertPoseToLocal(hand, desired));
        scene.update();

        hand.matrix.elements.forEach((value, index) => {
            expect(value).toBeCloseTo(desired.elements[index], 6);
        });
    });
});
