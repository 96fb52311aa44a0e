/**
 * Preferences Store
 * =================
 *
 * Naming conventions for everything the space switching tools create.
 *
 * Bone templates accept {bone_name}, {armature_name} and {object_name}.
 * The local duplicate template accepts {object} and {armature}.
 */

import { createStore } from 'zustand/vanilla';

// ============================================================================
// TYPES
// ============================================================================

export interface SpaceSwitchingPreferences {
    /** Object holding every temporary bone */
    objectName: string;
    /** Armature data of that object */
    armatureName: string;
    /** Unconstrained temporary bone */
    emptyName: string;
    /** Constrained copy of a source bone */
    copyName: string;
    /** Outer anchor above a connected copy */
    parentName: string;
    /** Anchor carrying the target space */
    spaceName: string;
    /** Local duplicate of a linked armature object */
    localArmatureObjectName: string;
}

interface PreferencesState extends SpaceSwitchingPreferences {
    setPreferences: (changes: Partial<SpaceSwitchingPreferences>) => void;
    reset: () => void;
}

// ============================================================================
// DEFAULTS
// ============================================================================

export const DEFAULT_PREFERENCES: Readonly<SpaceSwitchingPreferences> = {
    objectName: 'SpaceSwitching',
    armatureName: 'SpaceSwitchingArmature',
    emptyName: 'Empty',
    copyName: '{bone_name}_Copy',
    parentName: '{bone_name}_Parent',
    spaceName: '{bone_name}_Space',
    localArmatureObjectName: '{object}_Local',
};

// ============================================================================
// STORE
// ============================================================================

export const preferencesStore = createStore<PreferencesState>()((set) => ({
    ...DEFAULT_PREFERENCES,

    setPreferences: (changes) => {
        set(changes);
    },

    reset: () => {
        set({ ...DEFAULT_PREFERENCES });
    },
}));

/** Plain snapshot of the current naming conventions. */
export function getPreferences(): SpaceSwitchingPreferences {
    const state = preferencesStore.getState();
    return {
        objectName: state.objectName,
        armatureName: state.armatureName,
        emptyName: state.emptyName,
        copyName: state.copyName,
        parentName: state.parentName,
        spaceName: state.spaceName,
        localArmatureObjectName: state.localArmatureObjectName,
    };
}
