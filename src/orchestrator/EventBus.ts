/**
 * Event Bus for pipeline events (ingestion, retrieval, tools, agent)
 *
 * Subscriptions are typed by event type; session subscriptions receive
 * every event carrying that session id.
 */

import { EventEmitter } from "events";
import type { Event } from "../schemas/events.js";

export type EventType = Event["type"];
export type EventOf<T extends EventType> = Event & { type: T };

type Listener = (event: Event) => void;

const ALL_EVENTS = "*";

function isEventOf<T extends EventType>(event: Event, type: T): event is EventOf<T> {
  return event.type === type;
}

export class EventBus {
  private emitter = new EventEmitter();
  private sessionListeners = new Map<string, Set<Listener>>();

  constructor() {
    this.emitter.setMaxListeners(100); // Concurrent agent sessions
  }

  /**
   * Subscribe to one event type. Returns the unsubscribe function.
   */
  on<T extends EventType>(type: T, handler: (event: EventOf<T>) => void): () => void {
    const listener: Listener = (event) => {
      if (isEventOf(event, type)) handler(event);
    };
    this.emitter.on(type, listener);
    return () => {
      this.emitter.off(type, listener);
    };
  }

  /**
   * Subscribe to every event of a session (an ingestion batch, a search
   * request or an agent run).
   */
  onSession(sessionId: string, handler: (event: Event) => void): void {
    const listener: Listener = (event) => {
      if (event.session_id === sessionId) handler(event);
    };

    let listeners = this.sessionListeners.get(sessionId);
    if (!listeners) {
      listeners = new Set();
      this.sessionListeners.set(sessionId, listeners);
    }
    listeners.add(listener);
    this.emitter.on(ALL_EVENTS, listener);
  }

  offSession(sessionId: string): void {
    const listeners = this.sessionListeners.get(sessionId);
    if (!listeners) return;
    for (const listener of listeners) {
      this.emitter.off(ALL_EVENTS, listener);
    }
    this.sessionListeners.delete(sessionId);
  }

  emit(event: Event): void {
    this.emitter.emit(event.type, event);
    this.emitter.emit(ALL_EVENTS, event);
  }

  listenerCount(type?: EventType): number {
    return this.emitter.listenerCount(type ?? ALL_EVENTS);
  }
}

export const eventBus = new EventBus();
