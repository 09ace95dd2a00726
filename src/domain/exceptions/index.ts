/**
 * rental-repairs-core - Exception Module
 *
 * Exception types shared by every layer
 */

export {
  DomainException,
  isDomainException,
  ValidationException,
  InvariantViolationException,
  IllegalStatusTransitionException,
  TerminalRequestException,
  AssignmentRejectionReason,
  AssignmentRejectedException,
  AuthorizationException,
  ConcurrencyException,
  UniqueKeyConflictException,
  NotFoundException,
  UnsupportedSpecificationException,
  UnitOfWorkStateException,
  EventDispatchException,
} from './exceptions';

export type { ExceptionCategory, AggregateName } from './exceptions';
