/**
 * Scene objects and the pose of armature objects.
 */

import * as THREE from 'three';
import { HostStateError } from '../lib/errors';
import { Action } from './Action';
import type { Armature } from './Armature';
import { PoseBone } from './PoseBone';
import type { ObjectType } from './types';

export class SceneObject {
    name: string;
    readonly type: ObjectType;
    readonly matrixWorld = new THREE.Matrix4();
    hideViewport = false;
    /** Library the object is linked from; null for local objects. */
    library: string | null = null;
    showInFront = false;

    constructor(name: string, type: ObjectType) {
        this.name = name;
        this.type = type;
    }

    get isLinked(): boolean {
        return this.library !== null;
    }
}

/**
 * Pose bones of one armature object, kept in bone order.
 */
export class Pose {
    private readonly owner: ArmatureObject;
    private readonly poseBones = new Map<string, PoseBone>();

    constructor(owner: ArmatureObject) {
        this.owner = owner;
    }

    get bones(): PoseBone[] {
        return Array.from(this.poseBones.values());
    }

    get(name: string): PoseBone | undefined {
        return this.poseBones.get(name);
    }

    require(name: string): PoseBone {
        const poseBone = this.poseBones.get(name);
        if (!poseBone) {
            throw new HostStateError(`Pose bone "${name}" does not exist on "${this.owner.name}"`);
        }
        return poseBone;
    }

    /**
     * Match pose bones to the armature's bones: existing ones are kept,
     * new bones get fresh channels, removed bones lose theirs.
     */
    sync(): void {
        const previous = new Map(this.poseBones);
        this.poseBones.clear();
        for (const name of this.owner.armature.bones.keys()) {
            this.poseBones.set(name, previous.get(name) ?? new PoseBone(this.owner, name));
        }
    }
}

export class ArmatureObject extends SceneObject {
    armature: Armature;
    readonly pose: Pose;
    action: Action | null = null;

    constructor(name: string, armature: Armature) {
        super(name, 'ARMATURE');
        this.armature = armature;
        this.pose = new Pose(this);
        this.pose.sync();
    }

    ensureAction(): Action {
        if (!this.action) {
            this.action = new Action(`${this.name}Action`);
        }
        return this.action;
    }
}

export function isArmatureObject(object: SceneObject | null | undefined): object is ArmatureObject {
    return object instanceof ArmatureObject;
}
