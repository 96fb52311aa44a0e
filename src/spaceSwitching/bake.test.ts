import { describe, it, expect } from 'vitest';
import * as THREE from 'three';
import { PoseBone, Scene } from '../armature';
import { HostStateError, InvalidArgument } from '../lib/errors';
import { buildRig, hasCurve, keyedValue, keyLocation } from '../tests/fixtures';
import { ALL_CHANNELS, bakeChannels, customBake, sampleVisualTransforms } from './bake';

const rad = THREE.MathUtils.degToRad;

function rotationX(degrees: number): THREE.Matrix4 {
    return new THREE.Matrix4().makeRotationX(rad(degrees));
}

function rotationZ(degrees: number): THREE.Matrix4 {
    return new THREE.Matrix4().makeRotationZ(rad(degrees));
}

function chain() {
    const scene = new Scene();
    const rig = buildRig(scene, 'Chain', [
        { name: 'UpperArm', head: [0, 0, 0], tail: [0, 1, 0] },
        { name: 'Forearm', head: [0, 1, 0], tail: [0, 2, 0], parent: 'UpperArm', connect: true },
        { name: 'Free', head: [2, 0, 0], tail: [2, 1, 0] },
    ]);
    scene.update();
    return {
        scene,
        upper: rig.pose.require('UpperArm'),
        fore: rig.pose.require('Forearm'),
        free: rig.pose.require('Free'),
    };
}

describe('sampleVisualTransforms', () => {
    it('should record the evaluated local transform on each frame', () => {
        const { scene, free } = chain();
        keyLocation(free, 1, [0, 0, 0]);
        keyLocation(free, 5, [4, 0, 0]);

        const samples = sampleVisualTransforms(scene, [free], [1, 3, 5]);

        const xs = samples[0].map((matrix) => new THREE.Vector3().setFromMatrixPosition(matrix).x);
        expect(xs[0]).toBeCloseTo(0, 6);
        expect(xs[1]).toBeCloseTo(2, 6);
        expect(xs[2]).toBeCloseTo(4, 6);
        expect(scene.frameCurrent).toBe(5);
    });
});

describe('bakeChannels', () => {
    it('should keep consecutive quaternion keys in the same hemisphere', () => {
        const { free } = chain();
        // three.js decomposes the second matrix with a negative w
        bakeChannels([free], [1, 2], [[rotationX(-119), rotationX(-121)]], ['rotation']);

        expect(keyedValue(free, 'rotation_quaternion', 0, 1)).toBeCloseTo(Math.cos(rad(59.5)), 6);
        expect(keyedValue(free, 'rotation_quaternion', 0, 2)).toBeCloseTo(Math.cos(rad(60.5)), 6);
        expect(keyedValue(free, 'rotation_quaternion', 1, 2)).toBeCloseTo(-Math.sin(rad(60.5)), 6);
    });

    it('should unwrap Euler keys past ±180°', () => {
        const { free } = chain();
        free.rotationMode = 'XYZ';

        bakeChannels([free], [1, 2], [[rotationZ(170), rotationZ(190)]], ['rotation']);

        expect(keyedValue(free, 'rotation_euler', 2, 1)).toBeCloseTo(rad(170), 6);
        expect(keyedValue(free, 'rotation_euler', 2, 2)).toBeCloseTo(rad(190), 6);
    });

    it('should not carry continuity from one bone to the next', () => {
        const { upper, free } = chain();
        upper.rotationMode = 'XYZ';
        free.rotationMode = 'XYZ';

        bakeChannels(
            [upper, free],
            [1, 2],
            [
                [rotationZ(170), rotationZ(190)],
                [rotationZ(190), rotationZ(190)],
            ],
            ['rotation']
        );

        expect(keyedValue(upper, 'rotation_euler', 2, 2)).toBeCloseTo(rad(190), 6);
        expect(keyedValue(free, 'rotation_euler', 2, 1)).toBeCloseTo(rad(-170), 6);
    });

    it('should key only the requested channels, grouped by bone', () => {
        const { free } = chain();
        const sample = new THREE.Matrix4().compose(
            new THREE.Vector3(1, 0, 0),
            new THREE.Quaternion(),
            new THREE.Vector3(2, 2, 2)
        );

        bakeChannels([free], [1], [[sample]], ['scale']);

        expect(keyedValue(free, 'scale', 1, 1)).toBeCloseTo(2, 6);
        expect(hasCurve(free, 'location')).toBe(false);
        expect(hasCurve(free, 'rotation_quaternion')).toBe(false);
        expect(free.object.action?.fcurves.map((curve) => curve.group)).toEqual(['Free', 'Free', 'Free']);
    });

    it('should reject samples that do not line up with bones and frames', () => {
        const { free } = chain();
        expect(() => bakeChannels([free], [1, 2], [[rotationZ(0)]], ALL_CHANNELS)).toThrow(InvalidArgument);
        expect(() => bakeChannels([free], [1], [], ALL_CHANNELS)).toThrow(InvalidArgument);
    });
});

describe('customBake', () => {
    it('should not key location on a connected bone', () => {
        const { scene, upper, fore } = chain();

        customBake(scene, [1], [upper, fore], ['location', 'rotation']);

        expect(hasCurve(upper, 'location')).toBe(true);
        expect(hasCurve(fore, 'location')).toBe(false);
        expect(hasCurve(fore, 'rotation_quaternion')).toBe(true);
    });

    it('should refuse an empty channel set before moving the time cursor', () => {
        const { scene, upper } = chain();
        scene.frameSet(7);

        expect(() => customBake(scene, [1, 2], [upper], [])).toThrow(InvalidArgument);
        expect(scene.frameCurrent).toBe(7);
    });

    it('should restore the current frame when baking fails', () => {
        const { scene, upper } = chain();
        scene.frameSet(4);
        const ghost = new PoseBone(upper.object, 'Ghost');

        expect(() => customBake(scene, [1, 2], [ghost], ALL_CHANNELS)).toThrow(HostStateError);
        expect(scene.frameCurrent).toBe(4);
    });
});
