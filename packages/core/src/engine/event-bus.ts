// packages/core/src/engine/event-bus.ts

import { EventEmitter } from 'eventemitter3';
import type { DebateEvent } from '../types/events.js';

interface EventBusEvents {
  event: (event: DebateEvent) => void;
}

/** Typed event bus for orchestrator progress events. */
export class EventBus extends EventEmitter<EventBusEvents> {
  emitEvent(event: DebateEvent): void {
    this.emit('event', event);
  }
}
