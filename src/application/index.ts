/**
 * rental-repairs-core - Application Layer
 *
 * Use cases over the domain, plus the configuration and retry helpers they
 * run with.
 *
 * @module application
 */

export * from './config';
export * from './ports';
export * from './resilience';
export * from './services';
