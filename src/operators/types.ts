/**
 * Operator contract
 *
 * An operator is a user-facing command: `poll` says whether it is available
 * in the current scene state, `defaults` fills in its properties the way a
 * dialog would, and `execute` runs it.
 */

import type { Scene } from '../armature';
import type { SpaceSwitchingPreferences } from '../store/preferencesStore';

export interface OperatorContext {
    scene: Scene;
    /** Naming conventions; the preferences store when omitted. */
    preferences?: SpaceSwitchingPreferences;
}

export type OperatorStatus = 'FINISHED' | 'CANCELLED';

export interface OperatorResult {
    status: OperatorStatus;
}

export interface Operator<P> {
    id: string;
    label: string;
    description: string;
    defaults(context: OperatorContext): P;
    poll(context: OperatorContext): boolean;
    execute(context: OperatorContext, props: P): OperatorResult;
}

/** Properties of operators that bake over a frame range. */
export interface FrameRangeProps {
    frameStart: number;
    frameEnd: number;
}

export const FINISHED: Readonly<OperatorResult> = { status: 'FINISHED' };
export const CANCELLED: Readonly<OperatorResult> = { status: 'CANCELLED' };
