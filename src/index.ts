/**
 * Rig space switching: temporary re-parenting of animated bones into world
 * space or another bone's space, with baking back onto the original rig.
 */

export * from './armature';
export * from './spaceSwitching';
export * from './operators';
export * from './lib/errors';
export * from './lib/naming';
export * from './lib/math';
export { createLogger, type Logger } from './lib/logger';
export * from './store/preferencesStore';
export * from './store/reportStore';
