/**
 * Models layer exports for TimeFlip data structures.
 */

export * from './history';
export * from './session';
export * from './status';
