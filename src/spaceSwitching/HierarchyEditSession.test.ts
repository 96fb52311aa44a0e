import { describe, it, expect } from 'vitest';
import { Scene } from '../armature';
import { HostStateError } from '../lib/errors';
import { buildRig, enterPoseMode } from '../tests/fixtures';
import { beginStructuralEdit, withStructuralEdit } from './HierarchyEditSession';

function posedLinkedRig() {
    const scene = new Scene();
    const rig = buildRig(scene, 'Rig', [{ name: 'Root', head: [0, 0, 0], tail: [0, 1, 0] }]);
    rig.library = 'rig.blend';
    const temp = scene.createArmatureObject('Temp');
    enterPoseMode(scene, rig, ['Root']);
    return { scene, rig, temp };
}

describe('HierarchyEditSession', () => {
    it('should edit only the temporary armature even when the rig is linked', () => {
        const { scene, rig, temp } = posedLinkedRig();

        const session = beginStructuralEdit(scene, temp, scene.objectsInMode);

        expect(scene.mode).toBe('EDIT');
        expect(scene.objectsInMode).toEqual([temp]);
        expect(scene.activeObject).toBe(temp);
        expect(scene.isSelected(rig)).toBe(false);

        session.editBones.new('Helper');
        session.endStructuralEdit();

        expect(session.isActive).toBe(false);
        expect(scene.mode).toBe('POSE');
        expect(scene.isSelected(rig)).toBe(true);
        expect(rig.armature.activeBoneName).toBeNull();
        expect(Array.from(temp.armature.bones.keys())).toEqual(['Helper']);
    });

    it('should refuse edit bones after the session ended and end only once', () => {
        const { scene, temp } = posedLinkedRig();
        const session = beginStructuralEdit(scene, temp, scene.objectsInMode);
        session.endStructuralEdit();
        scene.setMode('OBJECT');

        session.endStructuralEdit();

        expect(scene.mode).toBe('OBJECT');
        expect(() => session.editBones).toThrow(HostStateError);
    });

    it('should restore the mode when the edit throws', () => {
        const { scene, temp } = posedLinkedRig();

        expect(() =>
            withStructuralEdit(scene, temp, scene.objectsInMode, () => {
                throw new Error('boom');
            })
        ).toThrow('boom');
        expect(scene.mode).toBe('POSE');
    });

    it('should restore the mode when edit mode cannot be entered', () => {
        const { scene, rig } = posedLinkedRig();

        expect(() => beginStructuralEdit(scene, rig, [])).toThrow(HostStateError);
        expect(scene.mode).toBe('POSE');
    });

    it('should come back to object mode when started from edit mode', () => {
        const scene = new Scene();
        const rig = buildRig(scene, 'Rig', [{ name: 'Root', head: [0, 0, 0], tail: [0, 1, 0] }]);
        const temp = scene.createArmatureObject('Temp');
        scene.activeObject = rig;
        scene.setMode('EDIT');

        withStructuralEdit(scene, temp, [rig], (editBones) => editBones.new('Helper'));

        expect(scene.mode).toBe('OBJECT');
        expect(scene.isSelected(rig)).toBe(true);
    });
});
