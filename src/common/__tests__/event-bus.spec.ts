import { describe, expect, it, vi } from 'vitest';
import { EVENT_TYPES, InMemoryEventBus } from '../event-bus.js';

describe('InMemoryEventBus', () => {
  it('invokes subscribed handlers in order', () => {
    const bus = new InMemoryEventBus();
    const handlerA = vi.fn();
    const handlerB = vi.fn();

    bus.subscribe('TestEvent', handlerA);
    bus.subscribe('TestEvent', handlerB);

    const event = {
      id: 'evt',
      type: 'TestEvent',
      occurredAt: '2025-01-01T00:00:00.000Z',
      payload: {},
    };

    bus.publish(event);

    expect(handlerA).toHaveBeenCalledWith(event);
    expect(handlerB).toHaveBeenCalledWith(event);
    expect(handlerA.mock.invocationCallOrder[0]).toBeLessThan(handlerB.mock.invocationCallOrder[0]);
  });

  it('keeps publishing when a handler throws', () => {
    const bus = new InMemoryEventBus();
    const erroring = vi.fn(() => {
      throw new Error('boom');
    });
    const good = vi.fn();

    bus.subscribe('ResilientEvent', erroring);
    bus.subscribe('ResilientEvent', good);

    bus.publish({
      id: 'evt2',
      type: 'ResilientEvent',
      occurredAt: '2025-01-01T00:00:00.000Z',
      payload: {},
    });

    expect(good).toHaveBeenCalled();
  });

  it('emits events with generated ids and stops delivering after unsubscribe', () => {
    const bus = new InMemoryEventBus();
    const handler = vi.fn();
    const unsubscribe = bus.subscribe(EVENT_TYPES.StageDegraded, handler);

    const event = bus.emit(EVENT_TYPES.StageDegraded, { stage: 'coach' });
    expect(event.type).toBe('StageDegraded');
    expect(event.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(handler).toHaveBeenCalledWith(event);

    unsubscribe();
    bus.emit(EVENT_TYPES.StageDegraded, { stage: 'plan' });
    expect(handler).toHaveBeenCalledTimes(1);
  });
});
