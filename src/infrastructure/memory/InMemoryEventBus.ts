/**
 * rental-repairs-core - In-Process Event Bus
 *
 * Dispatches domain events to handlers registered by event name. Handlers
 * registered under `'*'` receive every event.
 *
 * @module infrastructure/memory/InMemoryEventBus
 */

import type { IDomainEvent, IEventBus, IEventHandler } from '../../domain/events';
import { EventDispatchException } from '../../domain/exceptions';
import { ILogger, noopLogger } from '../../application/ports';

export const ALL_EVENTS = '*';

type DispatchFailure = { eventName: string; eventId: string; error: Error };

export class InMemoryEventBus implements IEventBus {
  private readonly handlers = new Map<string, IEventHandler<IDomainEvent>[]>();

  constructor(private readonly logger: ILogger = noopLogger) {}

  /**
   * Every handler runs even when an earlier one fails; failures are logged
   * and reported together.
   *
   * @throws EventDispatchException
   */
  async publish<T extends IDomainEvent>(event: T): Promise<void> {
    const failures = await this.dispatch(event);
    if (failures.length > 0) {
      throw new EventDispatchException(failures);
    }
  }

  /**
   * @throws EventDispatchException after all events were dispatched
   */
  async publishAll(events: readonly IDomainEvent[]): Promise<void> {
    const failures: DispatchFailure[] = [];
    for (const event of events) {
      failures.push(...(await this.dispatch(event)));
    }
    if (failures.length > 0) {
      throw new EventDispatchException(failures);
    }
  }

  registerHandler<T extends IDomainEvent>(eventName: string, handler: IEventHandler<T>): void {
    const registered = this.handlers.get(eventName) ?? [];
    // routed by name, so a handler only sees the events it registered for
    registered.push(handler);
    this.handlers.set(eventName, registered);
  }

  handlerCount(eventName: string): number {
    return this.handlers.get(eventName)?.length ?? 0;
  }

  clear(): void {
    this.handlers.clear();
  }

  private async dispatch(event: IDomainEvent): Promise<DispatchFailure[]> {
    const targets = [
      ...(this.handlers.get(event.eventName) ?? []),
      ...(this.handlers.get(ALL_EVENTS) ?? []),
    ];

    const failures: DispatchFailure[] = [];
    for (const handler of targets) {
      try {
        await handler.handle(event);
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        this.logger.error('Event handler failed', {
          eventName: event.eventName,
          eventId: event.metadata.eventId,
          error: error.message,
        });
        failures.push({ eventName: event.eventName, eventId: event.metadata.eventId, error });
      }
    }
    return failures;
  }
}
