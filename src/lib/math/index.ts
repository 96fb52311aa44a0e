/**
 * Math Module Barrel Export
 * =========================
 */

export * from './rotationModes';
export * from './rotationContinuity';
