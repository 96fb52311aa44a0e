/**
 * Error taxonomy for space switching.
 *
 * Only `UserPreconditionFailed` is expected during normal use; the operator
 * layer turns it into an error report instead of letting it propagate.
 */

export class SpaceSwitchingError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** Caller passed an argument the operation cannot work with. */
export class InvalidArgument extends SpaceSwitchingError {}

/** Parallel lists built during hierarchy construction disagree. Always a bug. */
export class InternalInconsistency extends SpaceSwitchingError {}

/** A host primitive was used in the wrong mode or on a missing entity. */
export class HostStateError extends SpaceSwitchingError {}

/** The user asked for something the current scene cannot satisfy. */
export class UserPreconditionFailed extends SpaceSwitchingError {}
