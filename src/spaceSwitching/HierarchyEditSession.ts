/**
 * Hierarchy Edit Session
 * ======================
 *
 * Bones can only be created or removed in EDIT mode, and only on local
 * armatures. Source rigs are often linked, so a session isolates the
 * temporary armature before entering EDIT mode:
 *
 *   begin: POSE → OBJECT, deselect the rigs in pose mode, select and
 *          activate the temporary armature, OBJECT → EDIT
 *   end:   EDIT → OBJECT, reselect the rigs (clearing their active bone),
 *          OBJECT → previous mode
 *
 * Edit bones are retired when the session ends. Anything needed afterwards
 * must be looked up again by name.
 *
 * @module HierarchyEditSession
 */

import type { ArmatureObject, EditBoneCollection, Scene } from '../armature';
import type { ObjectMode } from '../armature/types';
import { HostStateError } from '../lib/errors';
import { editLog } from '../lib/logger';

export class HierarchyEditSession {
    private readonly scene: Scene;
    readonly target: ArmatureObject;
    private readonly originalObjects: readonly ArmatureObject[];
    private readonly priorMode: ObjectMode;
    private ended = false;

    private constructor(
        scene: Scene,
        target: ArmatureObject,
        originalObjects: readonly ArmatureObject[],
        priorMode: ObjectMode
    ) {
        this.scene = scene;
        this.target = target;
        this.originalObjects = originalObjects;
        this.priorMode = priorMode;
    }

    static begin(scene: Scene, target: ArmatureObject, originalObjects: readonly ArmatureObject[]): HierarchyEditSession {
        const priorMode = scene.mode === 'EDIT' ? 'OBJECT' : scene.mode;
        const session = new HierarchyEditSession(scene, target, originalObjects, priorMode);

        scene.setMode('OBJECT');
        // A linked rig that stays selected (or active) would block EDIT mode.
        for (const object of originalObjects) {
            scene.selectObject(object, false);
        }
        scene.selectObject(target, true);
        scene.activeObject = target;

        try {
            scene.setMode('EDIT');
        } catch (error) {
            session.endStructuralEdit();
            throw error;
        }

        editLog.debug(`Structural edit on "${target.name}"`);
        return session;
    }

    get isActive(): boolean {
        return !this.ended;
    }

    get editBones(): EditBoneCollection {
        if (this.ended) {
            throw new HostStateError(`Structural edit on "${this.target.name}" has already ended`);
        }
        return this.target.armature.editBones;
    }

    endStructuralEdit(): void {
        if (this.ended) return;
        this.ended = true;

        this.scene.setMode('OBJECT');
        for (const object of this.originalObjects) {
            this.scene.selectObject(object, true);
            object.armature.activeBoneName = null;
        }
        this.scene.setMode(this.priorMode);
        editLog.debug(`Structural edit on "${this.target.name}" ended, back in ${this.priorMode} mode`);
    }
}

export function beginStructuralEdit(
    scene: Scene,
    target: ArmatureObject,
    originalObjects: readonly ArmatureObject[]
): HierarchyEditSession {
    return HierarchyEditSession.begin(scene, target, originalObjects);
}

/**
 * Run `edit` inside a structural edit session. The session always ends,
 * restoring the previous mode, whether `edit` returns or throws.
 */
export function withStructuralEdit<T>(
    scene: Scene,
    target: ArmatureObject,
    originalObjects: readonly ArmatureObject[],
    edit: (editBones: EditBoneCollection) => T
): T {
    const session = beginStructuralEdit(scene, target, originalObjects);
    try {
        return edit(session.editBones);
    } finally {
        session.endStructuralEdit();
    }
}
