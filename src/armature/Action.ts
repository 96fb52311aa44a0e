/**
 * Actions and F-Curves
 * ====================
 *
 * An action is a bag of single-value curves, each addressed by a data path
 * and an array index:
 *
 *   pose.bones["Arm"].rotation_euler  [2]  -> Z rotation of bone "Arm"
 *
 * Curves interpolate linearly between keys and hold the first/last value
 * outside their key range.
 *
 * @module Action
 */

import { isChannelName, type ChannelName } from './types';

// ============================================================================
// DATA PATHS
// ============================================================================

const BONE_PATH = /^pose\.bones\["((?:[^"\\]|\\.)*)"\]\.(\w+)$/;

function escapeName(name: string): string {
    return name.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

function unescapeName(escaped: string): string {
    return escaped.replace(/\\(.)/g, '$1');
}

/** `pose.bones["<name>"]`, the prefix shared by every curve of one bone. */
export function poseBonePath(boneName: string): string {
    return `pose.bones["${escapeName(boneName)}"]`;
}

export function poseBoneChannelPath(boneName: string, channel: ChannelName): string {
    return `${poseBonePath(boneName)}.${channel}`;
}

export function parsePoseBoneChannelPath(dataPath: string): { boneName: string; channel: ChannelName } | null {
    const match = BONE_PATH.exec(dataPath);
    if (!match) return null;
    const [, escaped, channel] = match;
    if (!isChannelName(channel)) return null;
    return { boneName: unescapeName(escaped), channel };
}

// ============================================================================
// F-CURVE
// ============================================================================

export interface Keyframe {
    frame: number;
    value: number;
}

/** Keys closer than this share a frame. */
const FRAME_EPSILON = 1e-4;

export class FCurve {
    readonly dataPath: string;
    readonly arrayIndex: number;
    group: string | null;
    private keys: Keyframe[] = [];

    constructor(dataPath: string, arrayIndex: number, group: string | null = null) {
        this.dataPath = dataPath;
        this.arrayIndex = arrayIndex;
        this.group = group;
    }

    get keyframes(): readonly Keyframe[] {
        return this.keys;
    }

    /** Insert a key, replacing any key on the same frame. */
    insert(frame: number, value: number): void {
        const existing = this.keys.find((k) => Math.abs(k.frame - frame) < FRAME_EPSILON);
        if (existing) {
            existing.value = value;
            return;
        }
        const index = this.keys.findIndex((k) => k.frame > frame);
        const key = { frame, value };
        if (index < 0) {
            this.keys.push(key);
        } else {
            this.keys.splice(index, 0, key);
        }
    }

    valueAt(frame: number): number | undefined {
        return this.keys.find((k) => Math.abs(k.frame - frame) < FRAME_EPSILON)?.value;
    }

    evaluate(frame: number): number {
        const keys = this.keys;
        if (keys.length === 0) return 0;

        const first = keys[0];
        const last = keys[keys.length - 1];
        if (frame <= first.frame) return first.value;
        if (frame >= last.frame) return last.value;

        for (let i = 1; i < keys.length; i++) {
            const next = keys[i];
            if (frame <= next.frame) {
                const prev = keys[i - 1];
                const t = (frame - prev.frame) / (next.frame - prev.frame);
                return prev.value + (next.value - prev.value) * t;
            }
        }
        return last.value;
    }

    clone(): FCurve {
        const copy = new FCurve(this.dataPath, this.arrayIndex, this.group);
        copy.keys = this.keys.map((k) => ({ ...k }));
        return copy;
    }
}

// ============================================================================
// ACTION
// ============================================================================

export class Action {
    name: string;
    private curves: FCurve[] = [];

    constructor(name: string) {
        this.name = name;
    }

    get fcurves(): readonly FCurve[] {
        return this.curves;
    }

    find(dataPath: string, arrayIndex: number): FCurve | undefined {
        return this.curves.find((c) => c.dataPath === dataPath && c.arrayIndex === arrayIndex);
    }

    ensure(dataPath: string, arrayIndex: number, group: string | null): FCurve {
        const existing = this.find(dataPath, arrayIndex);
        if (existing) {
            if (existing.group === null) existing.group = group;
            return existing;
        }
        const curve = new FCurve(dataPath, arrayIndex, group);
        this.curves.push(curve);
        return curve;
    }

    remove(curve: FCurve): void {
        this.curves = this.curves.filter((c) => c !== curve);
    }

    /** Remove every curve whose data path starts with `prefix`. Returns how many went. */
    removeByPrefix(prefix: string): number {
        const before = this.curves.length;
        this.curves = this.curves.filter((c) => !c.dataPath.startsWith(prefix));
        return before - this.curves.length;
    }

    clone(name: string): Action {
        const copy = new Action(name);
        copy.curves = this.curves.map((c) => c.clone());
        return copy;
    }
}
