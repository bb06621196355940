import type { TimelineEventMap, TimelineEventName } from '../events/index.js';

export type EventHandler<E extends TimelineEventName> = (payload: TimelineEventMap[E]) => void;

export interface IEventBus {
  emit<E extends TimelineEventName>(event: E, payload: TimelineEventMap[E]): void;
  /** Returns an unsubscribe function */
  on<E extends TimelineEventName>(event: E, handler: EventHandler<E>): () => void;
  once<E extends TimelineEventName>(event: E, handler: EventHandler<E>): void;
  removeAllListeners(event?: TimelineEventName): void;
}
