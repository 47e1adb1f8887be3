// src/types/index.ts

export * from './execution';
export * from './incident';
export * from './protocol';
export * from './settings';
export * from './token-usage';
