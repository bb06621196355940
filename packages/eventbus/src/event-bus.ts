import type { EventHandler, IEventBus, TimelineEventName, TimelineEventMap } from '@lifeline/core';

type HandlerSets = { readonly [E in TimelineEventName]: Set<EventHandler<E>> };

// One set per event for the bus's lifetime; subscriptions only add to and delete from it
function createHandlerSets(): HandlerSets {
  return {
    'branch:created': new Set(),
    'branch:completed': new Set(),
    'branch:abandoned': new Set(),
    'branch:reactivated': new Set(),
    'branch:merged': new Set(),
    'branch:deleted': new Set(),
    'plan:generated': new Set(),
    'plan:fallback': new Set(),
    'plan:regenerated': new Set(),
    'plan:updated': new Set(),
    'commit:created': new Set(),
  };
}

/**
 * In-process event channel between the core and its consumers.
 * Handlers run synchronously in registration order; a throwing handler is
 * logged and the remaining handlers still run.
 */
export class EventBus implements IEventBus {
  private readonly handlers: HandlerSets = createHandlerSets();

  emit<E extends TimelineEventName>(event: E, payload: TimelineEventMap[E]): void {
    const set: Set<EventHandler<E>> = this.handlers[event];

    for (const handler of [...set]) {
      try {
        handler(payload);
      } catch (error) {
        console.error(`[EventBus] Error in handler for "${event}":`, error);
      }
    }
  }

  on<E extends TimelineEventName>(event: E, handler: EventHandler<E>): () => void {
    const set: Set<EventHandler<E>> = this.handlers[event];
    set.add(handler);
    return () => {
      set.delete(handler);
    };
  }

  once<E extends TimelineEventName>(event: E, handler: EventHandler<E>): void {
    const unsubscribe = this.on(event, (payload) => {
      unsubscribe();
      handler(payload);
    });
  }

  removeAllListeners(event?: TimelineEventName): void {
    if (event) {
      this.handlers[event].clear();
      return;
    }
    for (const set of Object.values(this.handlers)) {
      set.clear();
    }
  }

  listenerCount(event: TimelineEventName): number {
    return this.handlers[event].size;
  }
}
