/**
 * Armature data: the bone hierarchy shared by an armature object.
 *
 * Bones can only be created, removed or re-parented through `editBones`,
 * which exists between `beginEdit()` and `commitEdit()`.
 */

import { HostStateError } from '../lib/errors';
import { uniqueName } from '../lib/naming';
import { Bone, EditBone } from './Bone';

export class EditBoneCollection {
    private readonly bones = new Map<string, EditBone>();

    constructor(initial: Iterable<EditBone>) {
        for (const bone of initial) {
            this.bones.set(bone.name, bone);
        }
    }

    /** Create a bone. Name clashes get a numeric suffix, like any other bone. */
    new(name: string): EditBone {
        const finalName = uniqueName(name, (candidate) => this.bones.has(candidate));
        const bone = new EditBone(finalName);
        this.bones.set(finalName, bone);
        return bone;
    }

    get(name: string): EditBone | undefined {
        return this.bones.get(name);
    }

    require(name: string): EditBone {
        const bone = this.bones.get(name);
        if (!bone) {
            throw new HostStateError(`Edit bone "${name}" does not exist`);
        }
        return bone;
    }

    /** Remove a bone; its children are re-parented to its parent. */
    remove(bone: EditBone): void {
        bone.assertLive();
        if (this.bones.get(bone.name) !== bone) {
            throw new HostStateError(`Edit bone "${bone.name}" is not part of this armature`);
        }
        this.bones.delete(bone.name);
        for (const child of this.bones.values()) {
            if (child.parentName === bone.name) {
                child.parentName = bone.parentName;
                child.useConnect = false;
            }
        }
        bone.retire();
    }

    values(): IterableIterator<EditBone> {
        return this.bones.values();
    }

    get size(): number {
        return this.bones.size;
    }
}

export class Armature {
    name: string;

    /** Bones in creation order. Replaced wholesale when edit mode ends. */
    private boneMap = new Map<string, Bone>();

    /** Active bone, by name. */
    activeBoneName: string | null = null;

    private edit: EditBoneCollection | null = null;

    constructor(name: string) {
        this.name = name;
    }

    get bones(): ReadonlyMap<string, Bone> {
        return this.boneMap;
    }

    requireBone(name: string): Bone {
        const bone = this.boneMap.get(name);
        if (!bone) {
            throw new HostStateError(`Bone "${name}" does not exist in armature "${this.name}"`);
        }
        return bone;
    }

    get isEditing(): boolean {
        return this.edit !== null;
    }

    get editBones(): EditBoneCollection {
        if (!this.edit) {
            throw new HostStateError(`Armature "${this.name}" is not in edit mode`);
        }
        return this.edit;
    }

    beginEdit(): void {
        if (this.edit) return;
        this.edit = new EditBoneCollection(Array.from(this.boneMap.values(), (bone) => EditBone.fromBone(bone)));
    }

    /**
     * Rebuild bones from edit bones. Parents come before children, connected
     * heads snap to their parent's tail, and every edit handle is retired.
     */
    commitEdit(): void {
        if (!this.edit) return;
        const editBones = Array.from(this.edit.values());
        const byName = new Map(editBones.map((bone) => [bone.name, bone]));
        const rebuilt = new Map<string, Bone>();

        const visit = (bone: EditBone, stack: Set<string>) => {
            if (rebuilt.has(bone.name)) return;
            if (stack.has(bone.name)) {
                throw new HostStateError(`Bone "${bone.name}" is its own ancestor`);
            }
            stack.add(bone.name);

            const parent = bone.parentName === null ? undefined : byName.get(bone.parentName);
            if (bone.parentName !== null && !parent) {
                bone.parentName = null;
                bone.useConnect = false;
            }
            if (parent) {
                visit(parent, stack);
                if (bone.useConnect) {
                    const offset = parent.tail.clone().sub(bone.head);
                    bone.head.add(offset);
                    bone.tail.add(offset);
                }
            } else {
                bone.useConnect = false;
            }

            stack.delete(bone.name);
            rebuilt.set(bone.name, new Bone(bone));
        };

        for (const bone of editBones) {
            visit(bone, new Set());
        }

        // Keep creation order rather than dependency order.
        this.boneMap = new Map(editBones.map((bone) => {
            const built = rebuilt.get(bone.name);
            if (!built) {
                throw new HostStateError(`Bone "${bone.name}" was not rebuilt`);
            }
            return [bone.name, built];
        }));

        for (const bone of editBones) {
            bone.retire();
        }
        this.edit = null;

        if (this.activeBoneName !== null && !this.boneMap.has(this.activeBoneName)) {
            this.activeBoneName = null;
        }
    }

    /** Deep copy for object duplication. */
    clone(name: string): Armature {
        const copy = new Armature(name);
        copy.boneMap = new Map(Array.from(this.boneMap, ([boneName, bone]) => [boneName, new Bone(bone)]));
        copy.activeBoneName = this.activeBoneName;
        return copy;
    }
}
