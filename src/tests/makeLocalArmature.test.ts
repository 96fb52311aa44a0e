/**
 * Make Local Armature Tests
 *
 * A linked rig gets a local duplicate that carries its animation. Running
 * the workflow again keeps whatever was animated on the old duplicate.
 */

import { beforeEach, describe, it, expect } from 'vitest';
import { isArmatureObject, Scene, type ArmatureObject } from '../armature';
import { runOperatorById } from '../operators';
import { makeLocalArmature } from '../spaceSwitching';
import { reportStore } from '../store/reportStore';
import { buildRig, keyedValue, keyLocation, PREFERENCES } from './fixtures';

const FRAMES = { frameStart: 1, frameEnd: 5 };

function linkedProxy() {
    const scene = new Scene();
    const proxy = buildRig(scene, 'Proxy', [
        { name: 'Root', head: [0, 0, 0], tail: [0, 1, 0] },
        { name: 'Tip', head: [0, 1, 0], tail: [0, 2, 0], parent: 'Root', connect: true },
    ]);
    proxy.library = 'rig.blend';
    const root = proxy.pose.require('Root');
    keyLocation(root, 1, [0, 0, 0]);
    keyLocation(root, 5, [4, 0, 0]);
    scene.frameSet(1);
    scene.update();

    scene.activeObject = proxy;
    scene.selectObject(proxy);
    return { scene, proxy, context: { scene, preferences: PREFERENCES } };
}

function localOf(scene: Scene): ArmatureObject {
    const local = scene.getObject('Proxy_Local');
    if (!isArmatureObject(local)) throw new Error('expected a local duplicate');
    return local;
}

describe('Make Local Armature', () => {
    beforeEach(() => {
        reportStore.getState().clear();
    });

    it('should duplicate the rig, bake its motion and constrain it to the copy', () => {
        const { scene, proxy, context } = linkedProxy();

        const result = runOperatorById('space_switching.make_local_armature', context, FRAMES);
        expect(result.status).toBe('FINISHED');

        const local = localOf(scene);
        expect(local.isLinked).toBe(false);
        expect(local.armature.name).toBe('Proxy.001');
        expect(scene.activeObject).toBe(local);
        expect(scene.frameCurrent).toBe(1);

        const localRoot = local.pose.require('Root');
        for (let frame = 1; frame <= 5; frame++) {
            expect(keyedValue(localRoot, 'location', 0, frame)).toBeCloseTo(frame - 1, 6);
        }
        expect(localRoot.constraints.length).toBe(0);

        for (const name of ['Root', 'Tip']) {
            const constraint = proxy.pose.require(name).constraints.at(0);
            expect(constraint?.type).toBe('COPY_TRANSFORMS');
            expect(constraint?.target).toBe(local);
            expect(constraint?.subtarget).toBe(name);
        }
        expect(proxy.hideViewport).toBe(true);
    });

    it('should keep animation from the previous copy when run again', () => {
        const { scene, proxy, context } = linkedProxy();
        runOperatorById('space_switching.make_local_armature', context, FRAMES);

        const oldLocal = localOf(scene);
        keyLocation(oldLocal.pose.require('Root'), 5, [8, 0, 0]);
        scene.activeObject = proxy;

        const result = makeLocalArmature(scene, {
            source: proxy,
            frames: [1, 2, 3, 4, 5],
            preferences: PREFERENCES,
        });

        expect(result.replaced).toBe(oldLocal);
        expect(result.duplicate).not.toBe(oldLocal);
        expect(scene.objects.map((object) => object.name)).toEqual(['Proxy', 'Proxy_Local']);

        // The old copy's edit was baked onto the rig before it went away
        expect(keyedValue(proxy.pose.require('Root'), 'location', 0, 5)).toBeCloseTo(8, 6);
        expect(keyedValue(result.duplicate.pose.require('Root'), 'location', 0, 5)).toBeCloseTo(8, 6);
        expect(keyedValue(result.duplicate.pose.require('Root'), 'location', 0, 4)).toBeCloseTo(3, 6);
        expect(proxy.pose.require('Root').constraints.at(0)?.target).toBe(result.duplicate);
    });

    it('should rebuild the copy when the previous one was already deleted', () => {
        const { scene, proxy, context } = linkedProxy();
        runOperatorById('space_switching.make_local_armature', context, FRAMES);
        scene.removeObject(localOf(scene));

        const result = makeLocalArmature(scene, { source: proxy, frames: [], preferences: PREFERENCES });

        expect(result.replaced).toBeNull();
        expect(result.duplicate.name).toBe('Proxy_Local');
        expect(proxy.pose.require('Root').constraints.length).toBe(1);
    });

    it('should report a bone with more than one constraint', () => {
        const { scene, proxy, context } = linkedProxy();
        const root = proxy.pose.require('Root');
        root.constraints.new('COPY_LOCATION');
        root.constraints.new('COPY_ROTATION');

        const result = runOperatorById('space_switching.make_local_armature', context, FRAMES);

        expect(result.status).toBe('FINISHED');
        expect(reportStore.getState().reports.map((report) => report.message)).toEqual([
            'Unable to determine existing local object because bone Root has more than one constraint.',
        ]);
        expect(reportStore.getState().reports[0]?.source).toBe('space_switching.make_local_armature');
        expect(scene.getObject('Proxy_Local')).toBeUndefined();
    });

    it('should report a rig bound to two different objects', () => {
        const { scene, proxy, context } = linkedProxy();
        const first = scene.createArmatureObject('First');
        const second = scene.createArmatureObject('Second');
        proxy.pose.require('Root').constraints.new('COPY_TRANSFORMS').target = first;
        proxy.pose.require('Tip').constraints.new('COPY_TRANSFORMS').target = second;

        runOperatorById('space_switching.make_local_armature', context, FRAMES);

        expect(reportStore.getState().reports.map((report) => report.message)).toEqual([
            'Unable to determine existing local object because Proxy is constrained to more than one target.',
        ]);
    });
});
