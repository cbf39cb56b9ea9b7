import { randomUUID } from 'crypto';

/**
 * Something that happened while restoring a page state, such as a transition
 * being fired again. `aggregateId` is the id of the transition log involved.
 */
export interface DomainEvent {
  /** Dotted name, e.g. `replay.finished` */
  readonly type: string;
  readonly occurredAt: Date;
  /** `<type>-<uuid>` */
  readonly eventId: string;
  readonly aggregateId: string;
}

export abstract class BaseDomainEvent implements DomainEvent {
  readonly occurredAt = new Date();
  readonly eventId: string;

  protected constructor(
    readonly type: string,
    readonly aggregateId: string
  ) {
    this.eventId = `${type}-${randomUUID()}`;
  }
}

export type EventHandler<T extends DomainEvent = DomainEvent> = (event: T) => void | Promise<void>;

/**
 * Delivers replay events to whoever follows a restore: progress output,
 * reports or tests.
 */
export interface EventBus {
  /** Resolves once every handler of the event's type has run. */
  publish<T extends DomainEvent>(event: T): Promise<void>;

  subscribe<T extends DomainEvent>(eventType: string, handler: EventHandler<T>): void;

  unsubscribe(eventType: string, handler: EventHandler): void;

  /** Drops every subscription. */
  clear(): void;
}
