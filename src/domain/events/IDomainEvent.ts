/**
 * @fileoverview Domain Events - Event-Raising Aggregates
 *
 * @packageDocumentation
 * @module rental-repairs-core/domain/events
 *
 * ## Hexagonal Architecture Layer: DOMAIN (Core)
 *
 * Aggregates RAISE events but never PUBLISH them. Raised events stay on the
 * aggregate until a repository saves it; the unit of work then buffers them
 * and hands them to an {@link IEventBus} only after the commit succeeded.
 *
 * ```
 * 1. Aggregate raises event → stored in _domainEvents[]
 * 2. Repository stages aggregate → extracts events
 * 3. Unit of Work buffers events
 * 4. Commit succeeds → events published
 * 5. Rollback → events discarded
 * ```
 *
 * Delivery (email, SMS, push) is an {@link IEventHandler} supplied by the
 * host; the core's job ends at producing an event with complete data.
 */

import { v4 as uuidv4 } from 'uuid';
import { OperationContext } from '../context';

/**
 * Metadata attached to every domain event.
 *
 * @example
 * ```typescript
 * console.log(event.metadata.eventId);       // '550e8400-e29b-41d4-a716-446655440000'
 * console.log(event.metadata.occurredAt);    // '2024-12-19T10:30:45.123Z'
 * console.log(event.metadata.correlationId); // 'req-abc-123'
 * ```
 */
export interface EventMetadata {
  /** Unique id of this event instance (UUID v4), used for deduplication */
  eventId: string;

  /** ISO 8601 timestamp of the state change */
  occurredAt: string;

  /** Correlation id of the operation that raised the event */
  correlationId?: string;

  /** User id of the principal whose action raised the event */
  actorId?: string;
}

/**
 * A significant state change, named in the past tense (`WorkerAssigned`).
 *
 * @template TPayload - Plain data describing the change
 */
export interface IDomainEvent<TPayload = unknown> {
  /** Event name used for routing to handlers */
  readonly eventName: string;

  readonly metadata: EventMetadata;

  /** Plain data record; safe to serialize */
  readonly payload: TPayload;
}

/**
 * Entity that collects the events it raises.
 */
export interface IEventRaisingEntity {
  readonly domainEvents: readonly IDomainEvent[];

  clearEvents(): void;
}

/**
 * Publishes domain events to registered handlers.
 *
 * Implemented by infrastructure; the domain never calls it directly.
 */
export interface IEventBus {
  /**
   * Dispatch one event to every handler registered for its name.
   */
  publish<T extends IDomainEvent>(event: T): Promise<void>;

  /**
   * Dispatch events in order.
   */
  publishAll(events: readonly IDomainEvent[]): Promise<void>;

  /**
   * Register a handler for an event name.
   */
  registerHandler<T extends IDomainEvent>(eventName: string, handler: IEventHandler<T>): void;
}

/**
 * Reacts to one kind of domain event (send a notification, update a
 * projection). Thrown errors are reported by the event bus.
 *
 * @example
 * ```typescript
 * class NotifyTenantOnStatusChange implements IEventHandler<RequestStatusChanged> {
 *   constructor(private readonly sms: SmsGateway) {}
 *
 *   async handle(event: RequestStatusChanged): Promise<void> {
 *     await this.sms.send(event.payload.tenantId, `Your request is now ${event.payload.to}`);
 *   }
 * }
 * ```
 */
export interface IEventHandler<TEvent extends IDomainEvent> {
  handle(event: TEvent): Promise<void>;
}

/**
 * Base class for the core's events. Stamps metadata from the active
 * {@link OperationContext}.
 */
export abstract class DomainEvent<TPayload> implements IDomainEvent<TPayload> {
  abstract readonly eventName: string;

  readonly metadata: EventMetadata;

  constructor(
    public readonly payload: TPayload,
    occurredAt: Date,
  ) {
    const context = OperationContext.current();
    this.metadata = {
      eventId: uuidv4(),
      occurredAt: occurredAt.toISOString(),
      correlationId: context?.correlationId,
      actorId: context?.actorId,
    };
  }
}

/**
 * Abstract base class for Aggregate Roots.
 *
 * Holds raised events and the optimistic concurrency version. The version is
 * the one the aggregate was loaded at; repositories compare it with the
 * stored version on update and call {@link markPersisted} after a write.
 *
 * @example
 * ```typescript
 * class Worker extends AggregateRoot {
 *   deactivate(reason: string, now: Date): void {
 *     this.props.isActive = false;
 *     this.raiseEvent(new WorkerDeactivated({ workerId: this.id, reason }, now));
 *   }
 * }
 * ```
 */
export abstract class AggregateRoot implements IEventRaisingEntity {
  /**
   * Private array of domain events raised by this aggregate.
   */
  private _domainEvents: IDomainEvent[] = [];

  private _version: number;

  protected constructor(version: number) {
    this._version = version;
  }

  abstract get id(): string;

  /**
   * Version the aggregate was loaded at; 0 for a new aggregate.
   */
  get version(): number {
    return this._version;
  }

  get domainEvents(): readonly IDomainEvent[] {
    return this._domainEvents;
  }

  /**
   * Record the version written by the store.
   */
  markPersisted(version: number): void {
    this._version = version;
  }

  /**
   * Store an event for publication after commit.
   */
  protected raiseEvent(event: IDomainEvent): void {
    this._domainEvents.push(event);
  }

  clearEvents(): void {
    this._domainEvents = [];
  }
}
