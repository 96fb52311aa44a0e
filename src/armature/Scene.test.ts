/**
 * Scene host tests: object naming, modes and time.
 */

import { describe, it, expect } from 'vitest';
import { HostStateError } from '../lib/errors';
import { buildRig, keyLocation } from '../tests/fixtures';
import { SceneObject } from './ArmatureObject';
import { Scene } from './Scene';

function sceneWithRig() {
    const scene = new Scene();
    const rig = buildRig(scene, 'Rig', [
        { name: 'Root', head: [0, 0, 0], tail: [0, 1, 0] },
        { name: 'Tip', head: [0, 1.5, 0], tail: [0, 2, 0], parent: 'Root', connect: true },
    ]);
    return { scene, rig };
}

describe('Scene', () => {

    describe('objects', () => {
        it('should suffix clashing object and armature names', () => {
            const scene = new Scene();
            const first = scene.createArmatureObject('Rig');
            const second = scene.createArmatureObject('Rig');

            expect(second.name).toBe('Rig.001');
            expect(second.armature.name).toBe('Rig.001');
            expect(scene.renameObject(second, 'Rig')).toBe('Rig.001');
            expect(scene.getObject('Rig')).toBe(first);
        });

        it('should not duplicate an object from outside the scene', () => {
            const scene = new Scene();
            const stray = new Scene().createArmatureObject('Stray');

            expect(scene.duplicateObject(stray)).toBeNull();
        });

        it('should duplicate as a local object with its own action', () => {
            const { scene, rig } = sceneWithRig();
            rig.library = 'rig.blend';
            keyLocation(rig.pose.require('Root'), 1, [1, 2, 3]);

            const copy = scene.duplicateObject(rig);

            expect(copy?.name).toBe('Rig.001');
            expect(copy?.isLinked).toBe(false);
            expect(copy?.action).not.toBe(rig.action);
            expect(copy?.pose.require('Root').location.toArray()).toEqual([1, 2, 3]);
            expect(scene.activeObject).toBe(copy);
            expect(scene.selectedObjects).toEqual([copy]);
        });

        it('should refuse to remove an object that is in pose mode', () => {
            const { scene, rig } = sceneWithRig();
            scene.activeObject = rig;
            scene.setMode('POSE');

            expect(() => scene.removeObject(rig)).toThrow(HostStateError);
        });
    });

    describe('modes', () => {
        it('should need a visible active armature', () => {
            const scene = new Scene();
            scene.activeObject = scene.link(new SceneObject('Lamp', 'MESH'));

            expect(() => scene.setMode('POSE')).toThrow(HostStateError);
            expect(scene.mode).toBe('OBJECT');
        });

        it('should take selected armatures along with the active one', () => {
            const { scene, rig } = sceneWithRig();
            const other = scene.createArmatureObject('Other');
            const hidden = scene.createArmatureObject('Hidden');
            hidden.hideViewport = true;
            scene.selectObject(other);
            scene.selectObject(hidden);
            scene.activeObject = rig;

            scene.setMode('POSE');

            expect(scene.objectsInMode).toEqual([rig, other]);
        });

        it('should not edit a linked armature', () => {
            const { scene, rig } = sceneWithRig();
            rig.library = 'rig.blend';
            scene.activeObject = rig;

            expect(() => scene.setMode('EDIT')).toThrow(HostStateError);
            expect(scene.mode).toBe('OBJECT');
        });

        it('should rebuild bones and snap connected heads when leaving edit mode', () => {
            const { scene, rig } = sceneWithRig();
            scene.activeObject = rig;
            scene.setMode('EDIT');

            const added = rig.armature.editBones.new('Extra');
            added.head.set(4, 0, 0);
            added.tail.set(4, 3, 0);
            scene.setMode('POSE');

            expect(added.isRetired).toBe(true);
            expect(rig.pose.require('Extra').bone.length).toBe(3);
            // Built with a gap; commitEdit moved it onto Root's tail
            expect(rig.armature.requireBone('Tip').head.toArray()).toEqual([0, 1, 0]);
            expect(rig.armature.requireBone('Tip').tail.toArray()).toEqual([0, 1.5, 0]);
        });
    });

    describe('time', () => {
        it('should write curve values into pose channels on frame change', () => {
            const { scene, rig } = sceneWithRig();
            const root = rig.pose.require('Root');
            keyLocation(root, 1, [0, 0, 0]);
            keyLocation(root, 11, [10, 0, 0]);

            scene.frameSet(6);

            expect(scene.frameCurrent).toBe(6);
            expect(root.location.x).toBe(5);
        });
    });
});
