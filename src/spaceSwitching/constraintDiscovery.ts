import type { ArmatureObject, Constraint, PoseBone } from '../armature';

/**
 * Whether any of the constraint's target slots (IK has two) points at `candidate`.
 */
export function isConstrainedTo(constraint: Constraint, candidate: PoseBone): boolean {
    return constraint.edges().some(
        (edge) => edge.target === candidate.object && edge.subtarget === candidate.name
    );
}

/** Pose bones with at least one constraint pointing at `candidate`. */
export function findBonesConstrainedTo(objects: Iterable<ArmatureObject>, candidate: PoseBone): PoseBone[] {
    const result: PoseBone[] = [];
    for (const object of objects) {
        for (const poseBone of object.pose.bones) {
            for (const constraint of poseBone.constraints) {
                if (isConstrainedTo(constraint, candidate)) {
                    result.push(poseBone);
                    break;
                }
            }
        }
    }
    return result;
}
