/**
 * rental-repairs-core - Domain Layer
 *
 * Aggregates, rules and ports. Nothing here depends on application or
 * infrastructure code.
 *
 * @module domain
 */

export * from './authorization';
export * from './context';
export * from './events';
export * from './exceptions';
export * from './property';
export * from './repository';
export * from './specialization';
export * from './specification';
export * from './tenant-request';
export * from './worker';

export { systemClock, FixedClock } from './clock';
export type { IClock } from './clock';

export {
  validateInput,
  collectIssues,
  EmailSchema,
  IdentifierSchema,
  NonEmptyTextSchema,
} from './validation';
