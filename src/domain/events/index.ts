/**
 * @fileoverview Domain Events Exports
 */

// ============================================================================
// Core Interfaces
// ============================================================================

export type {
  EventMetadata,
  IDomainEvent,
  IEventRaisingEntity,
  IEventBus,
  IEventHandler,
} from './IDomainEvent';

// ============================================================================
// Base Classes
// ============================================================================

export { AggregateRoot, DomainEvent } from './IDomainEvent';
