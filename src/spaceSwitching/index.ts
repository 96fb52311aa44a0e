export * from './bake';
export * from './HierarchyEditSession';
export * from './tempArmature';
export * from './constraintDiscovery';
export * from './spaceSwitch';
export * from './removeBones';
export * from './addEmpty';
export * from './twoBoneIk';
export * from './makeLocalArmature';
