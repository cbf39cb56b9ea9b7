import { EventBus, DomainEvent, EventHandler } from '../../domain/events/DomainEvent';
import { loggers } from '../logging';

/**
 * In-memory implementation of EventBus for a single process.
 */
export class InMemoryEventBus implements EventBus {
  private handlers: Map<string, Set<EventHandler>> = new Map();
  private eventHistory: DomainEvent[] = [];
  private maxHistorySize: number;

  constructor(options?: { maxHistorySize?: number }) {
    this.maxHistorySize = options?.maxHistorySize ?? 1000;
  }

  async publish<T extends DomainEvent>(event: T): Promise<void> {
    this.eventHistory.push(event);
    if (this.eventHistory.length > this.maxHistorySize) {
      this.eventHistory.shift();
    }

    const typeHandlers = this.handlers.get(event.type);
    if (!typeHandlers || typeHandlers.size === 0) {
      return;
    }

    await Promise.all(
      Array.from(typeHandlers).map(async handler => {
        try {
          await handler(event);
        } catch (error) {
          loggers.event.error(`Error in event handler for ${event.type}`, {
            error: error instanceof Error ? error.message : String(error),
          });
        }
      })
    );
  }

  subscribe<T extends DomainEvent>(eventType: string, handler: EventHandler<T>): void {
    let typeHandlers = this.handlers.get(eventType);
    if (!typeHandlers) {
      typeHandlers = new Set();
      this.handlers.set(eventType, typeHandlers);
    }
    typeHandlers.add(handler as EventHandler);
  }

  unsubscribe(eventType: string, handler: EventHandler): void {
    this.handlers.get(eventType)?.delete(handler);
  }

  clear(): void {
    this.handlers.clear();
    this.eventHistory = [];
  }

  /**
   * Events published so far, optionally only those of one type.
   */
  getHistory(eventType?: string): ReadonlyArray<DomainEvent> {
    if (eventType) {
      return this.eventHistory.filter(e => e.type === eventType);
    }
    return [...this.eventHistory];
  }

  clearHistory(): void {
    this.eventHistory = [];
  }
}
