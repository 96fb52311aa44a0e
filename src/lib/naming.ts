import { InvalidArgument } from './errors';

/** Substitution keys for temporary bone names. */
export type BoneNameKeys = {
    bone_name: string;
    armature_name: string;
    object_name: string;
};

/** Substitution keys for the local duplicate object name. */
export type ObjectNameKeys = {
    object: string;
    armature: string;
};

const TOKEN = /\{\{|\}\}|\{([^{}]*)\}/g;

/**
 * Fill `{key}` placeholders in a naming template. `{{` and `}}` produce literal braces.
 * Throws `InvalidArgument` for keys the template cannot know about.
 */
export function formatTemplate(template: string, keys: Readonly<Record<string, string>>): string {
    const values = new Map<string, string>(Object.entries(keys));

    return template.replace(TOKEN, (match, key: string | undefined) => {
        if (match === '{{') return '{';
        if (match === '}}') return '}';
        const value = key === undefined ? undefined : values.get(key);
        if (value === undefined) {
            const known = Array.from(values.keys()).map((k) => `{${k}}`).join(', ');
            throw new InvalidArgument(`Unknown key ${match} in naming template "${template}" (expected ${known})`);
        }
        return value;
    });
}

/**
 * `base`, or `base.001`, `base.002`, ... whichever is first free.
 */
export function uniqueName(base: string, isTaken: (name: string) => boolean): string {
    if (!isTaken(base)) return base;
    const stem = base.replace(/\.\d{3,}$/, '');
    for (let i = 1; ; i++) {
        const candidate = `${stem}.${String(i).padStart(3, '0')}`;
        if (!isTaken(candidate)) return candidate;
    }
}
