/**
 * rental-repairs-core - Infrastructure Layer
 *
 * @module infrastructure
 */

export * from './logging';
export * from './memory';
