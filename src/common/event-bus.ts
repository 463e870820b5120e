import { v4 as uuid } from 'uuid';
import type { DomainEvent } from './types.js';
import { moduleLogger } from './logger.js';

export const EVENT_TYPES = {
  SessionStarted: 'SessionStarted',
  StageDegraded: 'StageDegraded',
  SessionCompleted: 'SessionCompleted',
} as const;

export type EventType = (typeof EVENT_TYPES)[keyof typeof EVENT_TYPES];

type Handler = (event: DomainEvent) => void;

const log = moduleLogger('events');

export class InMemoryEventBus {
  private handlers: Map<string, Handler[]> = new Map();

  publish(event: DomainEvent) {
    const list = this.handlers.get(event.type) || [];
    for (const h of list) {
      try {
        h(event);
      } catch (err) {
        log.error({ err, eventType: event.type }, 'event handler failed');
      }
    }
  }

  emit(type: EventType, payload: Record<string, unknown>): DomainEvent {
    const event: DomainEvent = { id: uuid(), type, occurredAt: new Date().toISOString(), payload };
    this.publish(event);
    return event;
  }

  subscribe(eventType: string, handler: Handler): () => void {
    const list = this.handlers.get(eventType) || [];
    list.push(handler);
    this.handlers.set(eventType, list);
    return () => {
      const current = this.handlers.get(eventType) || [];
      this.handlers.set(eventType, current.filter(h => h !== handler));
    };
  }
}

export const eventBus = new InMemoryEventBus();
