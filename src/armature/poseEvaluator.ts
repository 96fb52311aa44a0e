/**
 * Pose Evaluator
 * ==============
 *
 * Resolves the pose-space matrix of every pose bone from its channels, its
 * parent chain and its constraints.
 *
 *   pose = parentPose · (parentRest⁻¹ · rest) · basis      (child)
 *   pose = rest · basis                                    (root)
 *
 * Constraints then run in order in world space. Constraint targets on other
 * bones (or other armatures) are resolved first, recursively. A dependency
 * cycle is broken by reusing the bone's previous evaluation.
 *
 * @module poseEvaluator
 */

import * as THREE from 'three';
import { evalLog } from '../lib/logger';
import type { ArmatureObject } from './ArmatureObject';
import type { Constraint, ConstraintEdge } from './constraints';
import type { PoseBone } from './PoseBone';

// ============================================================================
// HELPERS
// ============================================================================

/** parentRest⁻¹ · rest, or rest for a root bone. */
function restRelativeToParent(poseBone: PoseBone): THREE.Matrix4 {
    const bone = poseBone.bone;
    const parent = poseBone.parent;
    if (!parent) {
        return bone.matrixLocal.clone();
    }
    return parent.bone.matrixLocal.clone().invert().multiply(bone.matrixLocal);
}

export function worldMatrixOf(poseBone: PoseBone): THREE.Matrix4 {
    return poseBone.object.matrixWorld.clone().multiply(poseBone.matrix);
}

export function headWorldOf(poseBone: PoseBone): THREE.Vector3 {
    return new THREE.Vector3().applyMatrix4(worldMatrixOf(poseBone));
}

export function tailWorldOf(poseBone: PoseBone): THREE.Vector3 {
    return new THREE.Vector3(0, poseBone.bone.length, 0).applyMatrix4(worldMatrixOf(poseBone));
}

/**
 * Basis that reproduces `poseMatrix` for this bone with no constraints,
 * given its parent's current evaluation.
 */
export function convertPoseToLocal(poseBone: PoseBone, poseMatrix: THREE.Matrix4): THREE.Matrix4 {
    const parent = poseBone.parent;
    const base = restRelativeToParent(poseBone);
    if (parent) {
        base.premultiply(parent.matrix);
    }
    return base.invert().multiply(poseMatrix);
}

// ============================================================================
// EVALUATOR
// ============================================================================

export class PoseEvaluator {
    private readonly done = new Set<PoseBone>();
    private readonly inProgress = new Set<PoseBone>();

    evaluate(objects: Iterable<ArmatureObject>): void {
        for (const object of objects) {
            for (const poseBone of object.pose.bones) {
                this.resolve(poseBone);
            }
        }
    }

    /** Pose-space matrix of a bone, evaluating it on first request. */
    resolve(poseBone: PoseBone): THREE.Matrix4 {
        if (this.done.has(poseBone)) {
            return poseBone.matrix;
        }
        if (this.inProgress.has(poseBone)) {
            evalLog.warn(`Dependency cycle through "${poseBone.object.name}:${poseBone.name}", using previous evaluation`);
            return poseBone.matrix;
        }
        this.inProgress.add(poseBone);

        const parent = poseBone.parent;
        const pose = restRelativeToParent(poseBone);
        if (parent) {
            pose.premultiply(this.resolve(parent));
        }
        pose.multiply(poseBone.matrixBasis);

        if (poseBone.constraints.length > 0) {
            const objectWorld = poseBone.object.matrixWorld;
            const world = objectWorld.clone().multiply(pose);
            for (const constraint of poseBone.constraints) {
                this.applyConstraint(constraint, world);
            }
            pose.copy(objectWorld.clone().invert().multiply(world));
        }

        poseBone.matrix.copy(pose);
        this.inProgress.delete(poseBone);
        this.done.add(poseBone);
        return poseBone.matrix;
    }

    private targetWorld(edge: ConstraintEdge): { matrix: THREE.Matrix4; length: number } | null {
        const target = edge.target;
        if (!target) return null;
        if (edge.subtarget === '') {
            return { matrix: target.matrixWorld.clone(), length: 0 };
        }
        const poseBone = target.pose.get(edge.subtarget);
        if (!poseBone) {
            evalLog.debug(`Constraint target "${target.name}:${edge.subtarget}" is missing`);
            return null;
        }
        const matrix = target.matrixWorld.clone().multiply(this.resolve(poseBone));
        return { matrix, length: poseBone.bone.length };
    }

    private applyConstraint(constraint: Constraint, world: THREE.Matrix4): void {
        switch (constraint.type) {
            case 'COPY_TRANSFORMS': {
                const target = this.targetWorld(constraint.edges()[0]);
                if (target) world.copy(target.matrix);
                break;
            }
            case 'COPY_LOCATION': {
                const target = this.targetWorld(constraint.edges()[0]);
                if (!target) break;
                const head = new THREE.Vector3().applyMatrix4(target.matrix);
                const tail = new THREE.Vector3(0, target.length, 0).applyMatrix4(target.matrix);
                world.setPosition(head.lerp(tail, constraint.headTail));
                break;
            }
            case 'COPY_ROTATION': {
                const target = this.targetWorld(constraint.edges()[0]);
                if (!target) break;
                const position = new THREE.Vector3();
                const rotation = new THREE.Quaternion();
                const scale = new THREE.Vector3();
                world.decompose(position, rotation, scale);
                target.matrix.decompose(new THREE.Vector3(), rotation, new THREE.Vector3());
                world.compose(position, rotation, scale);
                break;
            }
            case 'IK':
                // Chains are not solved; targets still count as dependencies.
                for (const edge of constraint.edges()) {
                    this.targetWorld(edge);
                }
                break;
        }
    }
}

export function evaluateArmatures(objects: Iterable<ArmatureObject>): void {
    new PoseEvaluator().evaluate(objects);
}
