/**
 * Core type definitions.
 */

export type * from './logger.js';
export type * from './metrics.js';
export type * from './world.js';
export type * from './action.js';

export { PLATFORMS } from './world.js';
