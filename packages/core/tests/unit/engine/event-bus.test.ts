import { describe, expect, it, vi } from 'vitest';
import { EventBus } from '../../../src/engine/event-bus.js';

describe('EventBus', () => {
  it('delivers events to listeners until they detach', () => {
    const bus = new EventBus();
    const listener = vi.fn();
    bus.on('event', listener);

    const event = { type: 'debate.started', topicTitle: 'T', timestamp: '2025-01-01T00:00:00.000Z' } as const;
    bus.emitEvent(event);
    bus.off('event', listener);
    bus.emitEvent(event);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(event);
  });
});
