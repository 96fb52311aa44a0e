import { isArmatureObject } from '../armature';
import { makeLocalArmature } from '../spaceSwitching/makeLocalArmature';
import { framesFromProps, preferencesOf, sceneFrameDefaults } from './context';
import { CANCELLED, FINISHED, type FrameRangeProps, type Operator } from './types';

export const makeLocalArmatureOperator: Operator<FrameRangeProps> = {
    id: 'space_switching.make_local_armature',
    label: 'Make Local Armature',
    description:
        'Constrain a linked armature to a local duplicate. Can be repeated after the linked file changes without losing animation',

    defaults: sceneFrameDefaults,

    poll: ({ scene }) => scene.mode === 'OBJECT' && isArmatureObject(scene.activeObject),

    execute: (context, props) => {
        const source = context.scene.activeObject;
        if (!isArmatureObject(source)) return CANCELLED;

        makeLocalArmature(context.scene, {
            source,
            frames: framesFromProps(props),
            preferences: preferencesOf(context),
        });
        return FINISHED;
    },
};
