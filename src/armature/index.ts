export * from './types';
export * from './Action';
export * from './Bone';
export * from './Armature';
export * from './constraints';
export * from './PoseBone';
export * from './ArmatureObject';
export * from './poseEvaluator';
export * from './Scene';
