/**
 * Pose bone constraints.
 *
 * Every constraint exposes its dependency edges, so code that needs to know
 * "what does this bone depend on" never branches on the constraint type.
 */

import { HostStateError } from '../lib/errors';
import { uniqueName } from '../lib/naming';
import type { ArmatureObject } from './ArmatureObject';

// ============================================================================
// TYPES
// ============================================================================

export type ConstraintType = 'COPY_TRANSFORMS' | 'COPY_LOCATION' | 'COPY_ROTATION' | 'IK';

export type ConstraintEdgeRole = 'target' | 'pole_target';

/** One (object, bone) slot a constraint reads from. */
export interface ConstraintEdge {
    role: ConstraintEdgeRole;
    target: ArmatureObject | null;
    subtarget: string;
}

const DEFAULT_NAMES: Record<ConstraintType, string> = {
    COPY_TRANSFORMS: 'Copy Transforms',
    COPY_LOCATION: 'Copy Location',
    COPY_ROTATION: 'Copy Rotation',
    IK: 'IK',
};

// ============================================================================
// CONSTRAINT VARIANTS
// ============================================================================

abstract class TargetedConstraint {
    name: string;
    target: ArmatureObject | null = null;
    subtarget = '';

    constructor(name: string) {
        this.name = name;
    }

    edges(): ConstraintEdge[] {
        return [{ role: 'target', target: this.target, subtarget: this.subtarget }];
    }
}

/** Replace the owner's whole world matrix with the target's. */
export class CopyTransformsConstraint extends TargetedConstraint {
    readonly type = 'COPY_TRANSFORMS' as const;
}

/** Move the owner to a point between the target's head (0) and tail (1). */
export class CopyLocationConstraint extends TargetedConstraint {
    readonly type = 'COPY_LOCATION' as const;
    headTail = 0;
}

/** Give the owner the target's world orientation. */
export class CopyRotationConstraint extends TargetedConstraint {
    readonly type = 'COPY_ROTATION' as const;
}

/** Stored for the rig; the evaluator does not solve IK chains. */
export class IKConstraint extends TargetedConstraint {
    readonly type = 'IK' as const;
    poleTarget: ArmatureObject | null = null;
    poleSubtarget = '';
    chainCount = 0;
    /** Radians. */
    poleAngle = 0;

    override edges(): ConstraintEdge[] {
        return [
            ...super.edges(),
            { role: 'pole_target', target: this.poleTarget, subtarget: this.poleSubtarget },
        ];
    }
}

export type Constraint =
    | CopyTransformsConstraint
    | CopyLocationConstraint
    | CopyRotationConstraint
    | IKConstraint;

interface ConstraintByType {
    COPY_TRANSFORMS: CopyTransformsConstraint;
    COPY_LOCATION: CopyLocationConstraint;
    COPY_ROTATION: CopyRotationConstraint;
    IK: IKConstraint;
}

const FACTORIES: { [K in ConstraintType]: (name: string) => ConstraintByType[K] } = {
    COPY_TRANSFORMS: (name) => new CopyTransformsConstraint(name),
    COPY_LOCATION: (name) => new CopyLocationConstraint(name),
    COPY_ROTATION: (name) => new CopyRotationConstraint(name),
    IK: (name) => new IKConstraint(name),
};

// ============================================================================
// COLLECTION
// ============================================================================

export class ConstraintCollection implements Iterable<Constraint> {
    private items: Constraint[] = [];

    new<T extends ConstraintType>(type: T): ConstraintByType[T] {
        const name = uniqueName(DEFAULT_NAMES[type], (candidate) => this.items.some((c) => c.name === candidate));
        const constraint = FACTORIES[type](name);
        this.items.push(constraint);
        return constraint;
    }

    remove(constraint: Constraint): void {
        const index = this.items.indexOf(constraint);
        if (index < 0) {
            throw new HostStateError(`Constraint "${constraint.name}" is not in this collection`);
        }
        this.items.splice(index, 1);
    }

    clear(): void {
        this.items = [];
    }

    get length(): number {
        return this.items.length;
    }

    at(index: number): Constraint | undefined {
        return this.items[index];
    }

    toArray(): Constraint[] {
        return [...this.items];
    }

    [Symbol.iterator](): Iterator<Constraint> {
        return this.items[Symbol.iterator]();
    }
}

/** Append copies of `source`'s constraints, keeping their targets. */
export function copyConstraints(source: ConstraintCollection, destination: ConstraintCollection): void {
    for (const constraint of source) {
        const copy = destination.new(constraint.type);
        copy.name = constraint.name;
        copy.target = constraint.target;
        copy.subtarget = constraint.subtarget;
        if (constraint.type === 'COPY_LOCATION' && copy instanceof CopyLocationConstraint) {
            copy.headTail = constraint.headTail;
        }
        if (constraint.type === 'IK' && copy instanceof IKConstraint) {
            copy.poleTarget = constraint.poleTarget;
            copy.poleSubtarget = constraint.poleSubtarget;
            copy.chainCount = constraint.chainCount;
            copy.poleAngle = constraint.poleAngle;
        }
    }
}
