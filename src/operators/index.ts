export * from './types';
export * from './context';
export * from './runOperator';
export * from './bakePose';
export * from './temporaryBones';
export * from './switchSpace';
export * from './twoBoneIk';
export * from './makeLocalArmature';
export * from './registry';
