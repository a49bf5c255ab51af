export { TYPES } from './types';
export { createContainer } from './container';
export type { ContainerOptions } from './container';
export * from './errors';
export * from './schemas';
export type * from './interfaces';
