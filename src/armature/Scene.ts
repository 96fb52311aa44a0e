/**
 * Scene
 * =====
 *
 * The host environment the space switching tools run against:
 *
 *   - named objects, object selection and the active object
 *   - the OBJECT / EDIT / POSE mode state machine
 *   - the time cursor, scene frame range and 3D cursor
 *   - animation playback (frameSet) and pose evaluation (update)
 *
 * Structural changes (creating or removing bones) are only possible in
 * EDIT mode. Leaving EDIT mode rebuilds bones, so edit handles never
 * outlive the mode they were created in.
 *
 * @module Scene
 */

import * as THREE from 'three';
import { HostStateError } from '../lib/errors';
import { rigLog } from '../lib/logger';
import { uniqueName } from '../lib/naming';
import { parsePoseBoneChannelPath } from './Action';
import { Armature } from './Armature';
import { ArmatureObject, isArmatureObject, SceneObject } from './ArmatureObject';
import { copyConstraints } from './constraints';
import { evaluateArmatures } from './poseEvaluator';
import type { PoseBone } from './PoseBone';
import type { ObjectMode } from './types';

export class Scene {
    private readonly objectMap = new Map<string, SceneObject>();
    private readonly selection = new Set<SceneObject>();
    private active: SceneObject | null = null;

    private currentMode: ObjectMode = 'OBJECT';
    private inMode: ArmatureObject[] = [];

    frameCurrent = 1;
    frameStart = 1;
    frameEnd = 250;
    readonly cursor = new THREE.Vector3();

    // ========================================================================
    // OBJECTS
    // ========================================================================

    get objects(): SceneObject[] {
        return Array.from(this.objectMap.values());
    }

    get armatureObjects(): ArmatureObject[] {
        return this.objects.filter(isArmatureObject);
    }

    getObject(name: string): SceneObject | undefined {
        return this.objectMap.get(name);
    }

    /** Link an object into the scene. Clashing names get a numeric suffix. */
    link<T extends SceneObject>(object: T): T {
        object.name = uniqueName(object.name, (candidate) => this.objectMap.has(candidate));
        this.objectMap.set(object.name, object);
        return object;
    }

    createArmatureObject(objectName: string, armatureName: string = objectName): ArmatureObject {
        const armatureTaken = (candidate: string) =>
            this.armatureObjects.some((object) => object.armature.name === candidate);
        const armature = new Armature(uniqueName(armatureName, armatureTaken));
        return this.link(new ArmatureObject(objectName, armature));
    }

    /** Rename keeping names unique. Returns the final name. */
    renameObject(object: SceneObject, name: string): string {
        this.objectMap.delete(object.name);
        object.name = uniqueName(name, (candidate) => this.objectMap.has(candidate));
        this.objectMap.set(object.name, object);
        return object.name;
    }

    removeObject(object: SceneObject): void {
        if (this.objectMap.get(object.name) !== object) {
            throw new HostStateError(`Object "${object.name}" is not in the scene`);
        }
        if (isArmatureObject(object) && this.inMode.includes(object)) {
            throw new HostStateError(`Cannot remove "${object.name}" while it is in ${this.currentMode} mode`);
        }
        this.objectMap.delete(object.name);
        this.selection.delete(object);
        if (this.active === object) this.active = null;
        rigLog.debug(`Removed object "${object.name}"`);
    }

    /**
     * Duplicate an armature object as a local object with its own armature
     * data, pose and action. The duplicate becomes the only selected object
     * and the active one. Returns null when the source is not in the scene.
     */
    duplicateObject(source: ArmatureObject): ArmatureObject | null {
        if (this.objectMap.get(source.name) !== source) {
            return null;
        }
        const armatureTaken = (candidate: string) =>
            this.armatureObjects.some((object) => object.armature.name === candidate);
        const armature = source.armature.clone(uniqueName(source.armature.name, armatureTaken));
        const copy = new ArmatureObject(source.name, armature);
        copy.matrixWorld.copy(source.matrixWorld);
        copy.showInFront = source.showInFront;
        copy.library = null;

        for (const poseBone of copy.pose.bones) {
            const original = source.pose.require(poseBone.name);
            poseBone.copyChannelsFrom(original);
            copyConstraints(original.constraints, poseBone.constraints);
        }
        if (source.action) {
            copy.action = source.action.clone(`${source.action.name}.copy`);
        }

        this.link(copy);
        this.selection.clear();
        this.selection.add(copy);
        this.active = copy;
        return copy;
    }

    // ========================================================================
    // SELECTION
    // ========================================================================

    get activeObject(): SceneObject | null {
        return this.active;
    }

    set activeObject(object: SceneObject | null) {
        this.active = object;
    }

    isSelected(object: SceneObject): boolean {
        return this.selection.has(object);
    }

    selectObject(object: SceneObject, select = true): void {
        if (select) {
            this.selection.add(object);
        } else {
            this.selection.delete(object);
        }
    }

    get selectedObjects(): SceneObject[] {
        return this.objects.filter((object) => this.selection.has(object));
    }

    // ========================================================================
    // MODES
    // ========================================================================

    get mode(): ObjectMode {
        return this.currentMode;
    }

    /** Armature objects taking part in the current EDIT or POSE mode. */
    get objectsInMode(): ArmatureObject[] {
        return [...this.inMode];
    }

    /**
     * Switch every selected armature (and the active one) into `mode`.
     * Linked armatures cannot enter EDIT mode.
     */
    setMode(mode: ObjectMode): void {
        if (mode === this.currentMode) return;

        if (this.currentMode === 'EDIT') {
            for (const object of this.inMode) {
                object.armature.commitEdit();
                object.pose.sync();
            }
        }
        this.inMode = [];
        this.currentMode = 'OBJECT';

        if (mode === 'OBJECT') {
            rigLog.debug('Mode: OBJECT');
            return;
        }

        const active = this.active;
        if (!isArmatureObject(active) || active.hideViewport) {
            throw new HostStateError(`Cannot enter ${mode} mode without a visible active armature`);
        }

        const participants = this.armatureObjects.filter(
            (object) => !object.hideViewport && (object === active || this.selection.has(object))
        );

        if (mode === 'EDIT') {
            const linked = participants.find((object) => object.isLinked);
            if (linked) {
                throw new HostStateError(`Cannot edit linked armature "${linked.name}"`);
            }
            for (const object of participants) {
                object.armature.beginEdit();
            }
        }

        this.inMode = participants;
        this.currentMode = mode;
        rigLog.debug(`Mode: ${mode} (${participants.map((o) => o.name).join(', ')})`);
    }

    // ========================================================================
    // POSE BONE SELECTION
    // ========================================================================

    /** Visible, selected pose bones of every object in pose mode. */
    get selectedPoseBones(): PoseBone[] {
        if (this.currentMode !== 'POSE') return [];
        const result: PoseBone[] = [];
        for (const object of this.inMode) {
            for (const poseBone of object.pose.bones) {
                const bone = poseBone.bone;
                if (bone.select && !bone.hide) {
                    result.push(poseBone);
                }
            }
        }
        return result;
    }

    /** Active bone of the active object, when that object is in pose mode. */
    get activePoseBone(): PoseBone | null {
        if (this.currentMode !== 'POSE') return null;
        const active = this.active;
        if (!isArmatureObject(active) || !this.inMode.includes(active)) return null;
        const name = active.armature.activeBoneName;
        return name === null ? null : active.pose.get(name) ?? null;
    }

    // ========================================================================
    // TIME AND EVALUATION
    // ========================================================================

    /** Move the time cursor and write animated values into pose channels. */
    frameSet(frame: number): void {
        this.frameCurrent = frame;
        for (const object of this.armatureObjects) {
            const action = object.action;
            if (!action) continue;
            for (const curve of action.fcurves) {
                const parsed = parsePoseBoneChannelPath(curve.dataPath);
                if (!parsed) continue;
                const poseBone = object.pose.get(parsed.boneName);
                if (!poseBone) continue;
                poseBone.writeChannel(parsed.channel, curve.arrayIndex, curve.evaluate(frame));
            }
        }
    }

    /** Re-evaluate every armature's pose, constraints included. */
    update(): void {
        evaluateArmatures(this.armatureObjects);
    }
}
