export * from './config';
export * from './environment';
export * from './logger';
export * from './point';
export * from './pointKinds';
export * from './pointRegistry';
export * from './pointsLoader';
export * from './priorityResolver';
export * from './random';
export * from './results';
export * from './simulationEngine';
export * from './simulationRules';
export * from './units';
export * from './virtualDevice';
