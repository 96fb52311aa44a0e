import { framesInRange, type PoseBone } from '../armature';
import { InvalidArgument } from '../lib/errors';
import { getPreferences, type SpaceSwitchingPreferences } from '../store/preferencesStore';
import type { FrameRangeProps, OperatorContext } from './types';

export const FRAME_START_MIN = 0;
export const FRAME_END_MIN = 1;
export const FRAME_MAX = 300000;

export function preferencesOf(context: OperatorContext): SpaceSwitchingPreferences {
    return context.preferences ?? getPreferences();
}

/** Scene frame range, as a dialog would prefill it. */
export function sceneFrameDefaults({ scene }: OperatorContext): FrameRangeProps {
    return { frameStart: scene.frameStart, frameEnd: scene.frameEnd };
}

function checkFrame(label: string, value: number, min: number): void {
    if (!Number.isInteger(value) || value < min || value > FRAME_MAX) {
        throw new InvalidArgument(`${label} must be an integer in [${min}, ${FRAME_MAX}], got ${value}`);
    }
}

/** Inclusive frame list. A start after the end gives no frames. */
export function framesFromProps({ frameStart, frameEnd }: FrameRangeProps): number[] {
    checkFrame('Start frame', frameStart, FRAME_START_MIN);
    checkFrame('End frame', frameEnd, FRAME_END_MIN);
    return framesInRange({ start: frameStart, end: frameEnd });
}

// ============================================================================
// POLL HELPERS
// ============================================================================

export function inPoseMode({ scene }: OperatorContext): boolean {
    return scene.mode === 'POSE';
}

export function selectedPoseBones({ scene }: OperatorContext): PoseBone[] {
    return scene.selectedPoseBones;
}

/** Pose mode with at least `min` selected bones, none of them constrained yet. */
export function hasUnconstrainedSelection(context: OperatorContext, min: number): boolean {
    if (!inPoseMode(context)) return false;
    const selected = selectedPoseBones(context);
    return selected.length >= min && selected.every((poseBone) => poseBone.constraints.length === 0);
}
