/**
 * Shared armature types.
 */

/** Provenance of a bone. NONE for every bone the user authored. */
export type SpaceSwitchingTag = 'NONE' | 'EMPTY' | 'SPACE' | 'COPY';

export type ObjectMode = 'OBJECT' | 'EDIT' | 'POSE';

export type ObjectType = 'ARMATURE' | 'EMPTY' | 'MESH';

/** Keyable pose channels, named after their data path suffix. */
export type ChannelName =
    | 'location'
    | 'rotation_quaternion'
    | 'rotation_euler'
    | 'rotation_axis_angle'
    | 'scale';

export const CHANNEL_SIZES: Record<ChannelName, number> = {
    location: 3,
    rotation_quaternion: 4,
    rotation_euler: 3,
    rotation_axis_angle: 4,
    scale: 3,
};

export function isChannelName(value: string): value is ChannelName {
    return Object.prototype.hasOwnProperty.call(CHANNEL_SIZES, value);
}

/** Channel groups a bake can write. */
export type BakeChannel = 'location' | 'rotation' | 'scale';

export interface FrameRange {
    start: number;
    end: number;
}

/** Inclusive list of integer frames. */
export function framesInRange({ start, end }: FrameRange): number[] {
    const frames: number[] = [];
    for (let frame = start; frame <= end; frame++) {
        frames.push(frame);
    }
    return frames;
}
