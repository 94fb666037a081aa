import { v4 as uuid } from 'uuid';
import type { AppEvent, EventType } from '../modules/events/events.types.js';
import { createSilentLogger, type Logger } from './logger.js';
import type { Clock } from './types.js';

type EventOf<T extends EventType> = Extract<AppEvent, { type: T }>;
type Handler<T extends EventType> = (event: EventOf<T>) => void;

export interface EventBus {
  publish(event: AppEvent): void;
  subscribe<T extends EventType>(eventType: T, handler: Handler<T>): () => void;
}

export class InMemoryEventBus implements EventBus {
  private handlers: Map<EventType, Array<(event: AppEvent) => void>> = new Map();

  constructor(private readonly logger: Logger = createSilentLogger()) {}

  publish(event: AppEvent) {
    const list = this.handlers.get(event.type) || [];
    for (const h of list) {
      try {
        h(event);
      } catch (err) {
        this.logger.error({ err, eventType: event.type, eventId: event.id }, 'Event handler failed');
      }
    }
  }

  subscribe<T extends EventType>(eventType: T, handler: Handler<T>) {
    const wrapped = (event: AppEvent) => {
      if (isEventOf(event, eventType)) {
        handler(event);
      }
    };
    const list = this.handlers.get(eventType) || [];
    list.push(wrapped);
    this.handlers.set(eventType, list);
    return () => {
      const current = this.handlers.get(eventType) || [];
      this.handlers.set(eventType, current.filter(h => h !== wrapped));
    };
  }
}

function isEventOf<T extends EventType>(event: AppEvent, type: T): event is EventOf<T> {
  return event.type === type;
}

export function buildEvent<T extends EventType>(
  clock: Clock,
  type: T,
  tenantId: string,
  payload: EventOf<T>['payload'],
) {
  return { id: uuid(), type, occurredAt: clock.now().toISOString(), tenantId, payload };
}
