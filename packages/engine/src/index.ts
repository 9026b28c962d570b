export * from './types';
export * from './grid';
export * from './logic';
export * from './constants';
export * from './helpers';
export * from './actor';
export * from './mapGeneration';

// Data
export * from './data/bestiary';

// Systems
export * from './systems/rng';
export * from './systems/entity-store';
export * from './systems/entities/entity-factory';
export * from './systems/combat';
export * from './systems/experience';
export * from './systems/progression';
export * from './systems/visibility';
export * from './systems/transition';
export * from './systems/ai';
export * from './systems/replay-validation';
