/**
 * Space Switch
 * ============
 *
 * Moves the animation of selected bones into another space by building
 * temporary copies in the space switching armature:
 *
 *   1. Hide each source and create a copy bone (plus anchor bones that
 *      reproduce the destination space or a connected parent).
 *   2. Bind each copy to its source with Copy Transforms and bake the copy.
 *   3. Drop the bindings and point the sources at their copies instead, so
 *      editing a copy moves its source.
 *
 * Space layouts built under the copy:
 *
 *   world, unconnected:      Copy
 *   target, unconnected:     Space → Copy
 *   connected (any space):   Parent → Space → Copy (connected)
 *
 * @module spaceSwitch
 */

import type { CopyTransformsConstraint, PoseBone, Scene } from '../armature';
import { InternalInconsistency } from '../lib/errors';
import { switchLog } from '../lib/logger';
import { isEulerMode } from '../lib/math/rotationModes';
import { formatTemplate } from '../lib/naming';
import type { SpaceSwitchingPreferences } from '../store/preferencesStore';
import { ALL_CHANNELS, customBake } from './bake';
import { withStructuralEdit } from './HierarchyEditSession';
import { boneNameKeys, getSpaceSwitchingArmatureObject } from './tempArmature';

// ============================================================================
// TYPES
// ============================================================================

export interface SpaceSwitchRequest {
    sources: readonly PoseBone[];
    /** Bone whose space the copies live in; null for world space. */
    dest: PoseBone | null;
    activePoseBone: PoseBone | null;
    frames: readonly number[];
    preferences: SpaceSwitchingPreferences;
}

export interface SpaceSwitchPair {
    source: PoseBone;
    copy: PoseBone;
}

export interface SpaceSwitchResult {
    copies: SpaceSwitchPair[];
    /** Copy of the previously active bone, now the active bone. */
    activeCopy: PoseBone | null;
}

// ============================================================================
// HELPERS
// ============================================================================

/** Rotation mode, display settings and wireframe. Locks are not copied. */
function copyAppearance(source: PoseBone, copy: PoseBone): void {
    if (source.bone.useConnect && isEulerMode(source.rotationMode)) {
        // Euler orders tend to gimbal in a space without the real parent chain.
        copy.rotationMode = 'QUATERNION';
    } else {
        copy.rotationMode = source.rotationMode;
        copy.rotationAxisAngle = [...source.rotationAxisAngle];
    }

    copy.customShape = source.customShape;
    copy.customShapeTranslation.copy(source.customShapeTranslation);
    copy.customShapeRotationEuler.copy(source.customShapeRotationEuler);
    copy.customShapeScaleXyz.copy(source.customShapeScaleXyz);
    copy.customShapeTransform = source.customShapeTransform;
    copy.useCustomShapeBoneSize = source.useCustomShapeBoneSize;
    copy.bone.showWire = source.bone.showWire;
}

function hideAsAnchor(anchor: PoseBone): void {
    anchor.bone.hide = true;
    anchor.bone.tag = 'SPACE';
}

/** Hide the anchors above `copy` and bind the outermost one to its space. */
function bindAnchors(source: PoseBone, copy: PoseBone, dest: PoseBone | null): void {
    let anchor = copy.parent;
    if (!anchor) return;

    const connected = source.bone.useConnect;
    if (connected) {
        hideAsAnchor(anchor);
        const outer = anchor.parent;
        if (!outer) {
            throw new InternalInconsistency(`Connected copy "${copy.name}" is missing its parent anchor`);
        }
        anchor = outer;
    }
    hideAsAnchor(anchor);

    const copyLocation = anchor.constraints.new('COPY_LOCATION');
    const sourceParent = source.parent;
    if (connected && sourceParent) {
        // Anchor tail follows the source parent's tail, so the copy can stay connected.
        copyLocation.target = sourceParent.object;
        copyLocation.subtarget = sourceParent.name;
        copyLocation.headTail = 1;
    } else if (dest) {
        copyLocation.target = dest.object;
        copyLocation.subtarget = dest.name;
    }

    if (dest) {
        const copyRotation = anchor.constraints.new('COPY_ROTATION');
        copyRotation.target = dest.object;
        copyRotation.subtarget = dest.name;
    }
}

// ============================================================================
// SPACE SWITCH
// ============================================================================

/**
 * Build copies of `sources` in the space of `dest` (world space when null),
 * bake them and constrain the sources to them.
 *
 * `dest` is dropped from `sources`. If nothing is left the call does
 * nothing and returns an empty result.
 */
export function spaceSwitch(scene: Scene, request: SpaceSwitchRequest): SpaceSwitchResult {
    const { dest, activePoseBone, frames, preferences } = request;
    const sources = request.sources.filter((poseBone) => poseBone !== dest);
    if (sources.length === 0) {
        switchLog.debug('Nothing to switch after excluding the target bone');
        return { copies: [], activeCopy: null };
    }

    const originalObjects = scene.objectsInMode;

    // Copies get selected instead.
    for (const poseBone of scene.selectedPoseBones) {
        poseBone.bone.select = false;
    }
    for (const source of sources) {
        // Puppeted by its copy until the copy is removed.
        source.bone.hide = true;
    }

    const tempObject = getSpaceSwitchingArmatureObject(scene, preferences);

    // Edit bones do not survive the session, so only names come out of it.
    const copyNames = withStructuralEdit(scene, tempObject, originalObjects, (editBones) =>
        sources.map((source) => {
            const copyBone = editBones.new(formatTemplate(preferences.copyName, boneNameKeys(source)));
            copyBone.head.set(0, 0, 0);
            copyBone.tail.set(0, source.bone.length, 0);
            copyBone.useDeform = false;

            const sourceParent = source.parent;
            if (source.bone.useConnect && sourceParent) {
                // The copy's head pivots on the outer anchor's tail.
                const outer = editBones.new(formatTemplate(preferences.parentName, boneNameKeys(source)));
                outer.head.set(0, 0, 0);
                outer.tail.set(0, 1, 0);
                outer.useDeform = false;

                const inner = editBones.new(formatTemplate(preferences.spaceName, boneNameKeys(dest ?? sourceParent)));
                inner.head.set(0, -1, 0);
                inner.tail.set(0, 0, 0);
                inner.useDeform = false;
                inner.setParent(outer);

                copyBone.setParent(inner);
                copyBone.useConnect = true;
            } else if (dest) {
                const space = editBones.new(formatTemplate(preferences.spaceName, boneNameKeys(dest)));
                space.head.set(0, 0, 0);
                space.tail.set(0, dest.bone.length, 0);
                space.useDeform = false;
                copyBone.setParent(space);
            }

            return copyBone.name;
        })
    );

    if (copyNames.length !== sources.length) {
        throw new InternalInconsistency(
            `Created ${copyNames.length} copies for ${sources.length} source bones`
        );
    }

    const copies: SpaceSwitchPair[] = [];
    const bindings: CopyTransformsConstraint[] = [];
    let activeCopy: PoseBone | null = null;

    for (let i = 0; i < sources.length; i++) {
        const source = sources[i];
        const copy = tempObject.pose.require(copyNames[i]);
        copy.bone.select = true;
        copy.bone.tag = 'COPY';

        copyAppearance(source, copy);

        const copyTransforms = copy.constraints.new('COPY_TRANSFORMS');
        copyTransforms.target = source.object;
        copyTransforms.subtarget = source.name;
        bindings.push(copyTransforms);

        if (source === activePoseBone) {
            // The temporary object is still active from the edit session.
            tempObject.armature.activeBoneName = copy.name;
            activeCopy = copy;
        }

        bindAnchors(source, copy, dest);
        copies.push({ source, copy });
    }

    customBake(scene, frames, copies.map(({ copy }) => copy), ALL_CHANNELS);

    if (copies.length !== sources.length || bindings.length !== sources.length) {
        throw new InternalInconsistency(
            `Expected ${sources.length} copies and bindings, got ${copies.length} and ${bindings.length}`
        );
    }

    copies.forEach(({ source, copy }, index) => {
        copy.constraints.remove(bindings[index]);

        // A connected head already follows its parent's tail.
        if (!source.bone.useConnect) {
            const copyLocation = source.constraints.new('COPY_LOCATION');
            copyLocation.target = copy.object;
            copyLocation.subtarget = copy.name;
        }

        const copyRotation = source.constraints.new('COPY_ROTATION');
        copyRotation.target = copy.object;
        copyRotation.subtarget = copy.name;
    });

    scene.update();
    switchLog.debug(
        `Switched ${copies.length} bone(s) to ${dest ? `"${dest.name}" space` : 'world space'}`
    );

    return { copies, activeCopy };
}
