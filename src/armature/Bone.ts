/**
 * Bone rest data and its edit-mode counterpart.
 *
 * `Bone` is the read-mostly structure seen outside edit mode. `EditBone`
 * exists only while its armature is in edit mode; leaving edit mode rebuilds
 * every `Bone` from the edit bones and retires the edit handles.
 */

import * as THREE from 'three';
import { HostStateError } from '../lib/errors';
import type { SpaceSwitchingTag } from './types';

const Y_AXIS = new THREE.Vector3(0, 1, 0);

/** Head/tail/flags shared by both representations. */
export interface BoneFields {
    name: string;
    parentName: string | null;
    head: THREE.Vector3;
    tail: THREE.Vector3;
    useConnect: boolean;
    useDeform: boolean;
    hide: boolean;
    select: boolean;
    showWire: boolean;
    tag: SpaceSwitchingTag;
}

/**
 * Armature-space rest matrix: translation at the head, +Y pointing at the tail.
 */
export function restMatrixFromHeadTail(head: THREE.Vector3, tail: THREE.Vector3): THREE.Matrix4 {
    const direction = tail.clone().sub(head);
    const rotation = new THREE.Quaternion();
    if (direction.lengthSq() > 0) {
        rotation.setFromUnitVectors(Y_AXIS, direction.normalize());
    }
    return new THREE.Matrix4().compose(head.clone(), rotation, new THREE.Vector3(1, 1, 1));
}

export class Bone implements BoneFields {
    readonly name: string;
    readonly parentName: string | null;
    readonly head: THREE.Vector3;
    readonly tail: THREE.Vector3;
    readonly useConnect: boolean;
    useDeform: boolean;
    hide: boolean;
    select: boolean;
    showWire: boolean;
    tag: SpaceSwitchingTag;

    /** Armature-space rest matrix. */
    readonly matrixLocal: THREE.Matrix4;

    constructor(fields: BoneFields) {
        this.name = fields.name;
        this.parentName = fields.parentName;
        this.head = fields.head.clone();
        this.tail = fields.tail.clone();
        this.useConnect = fields.useConnect;
        this.useDeform = fields.useDeform;
        this.hide = fields.hide;
        this.select = fields.select;
        this.showWire = fields.showWire;
        this.tag = fields.tag;
        this.matrixLocal = restMatrixFromHeadTail(this.head, this.tail);
    }

    get length(): number {
        return this.head.distanceTo(this.tail);
    }
}

export class EditBone implements BoneFields {
    name: string;
    parentName: string | null = null;
    head = new THREE.Vector3();
    tail = new THREE.Vector3(0, 1, 0);
    useConnect = false;
    useDeform = true;
    hide = false;
    select = false;
    showWire = false;
    tag: SpaceSwitchingTag = 'NONE';

    private retired = false;

    constructor(name: string) {
        this.name = name;
    }

    static fromBone(bone: Bone): EditBone {
        const edit = new EditBone(bone.name);
        edit.parentName = bone.parentName;
        edit.head.copy(bone.head);
        edit.tail.copy(bone.tail);
        edit.useConnect = bone.useConnect;
        edit.useDeform = bone.useDeform;
        edit.hide = bone.hide;
        edit.select = bone.select;
        edit.showWire = bone.showWire;
        edit.tag = bone.tag;
        return edit;
    }

    get length(): number {
        return this.head.distanceTo(this.tail);
    }

    /** Parent by handle; the collection stores the name. */
    setParent(parent: EditBone | null): void {
        this.assertLive();
        this.parentName = parent ? parent.name : null;
    }

    /** Called when edit mode ends. */
    retire(): void {
        this.retired = true;
    }

    get isRetired(): boolean {
        return this.retired;
    }

    assertLive(): void {
        if (this.retired) {
            throw new HostStateError(`Edit bone "${this.name}" was used after leaving edit mode`);
        }
    }
}
