/**
 * @file packages/shared/src/index.ts
 * @description Public surface of the shared package.
 */

export * from './types.js';
export * from './constants.js';
export * from './sensor-path.js';
export * from './property-bag.js';
