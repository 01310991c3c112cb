/**
 * EventBus: publish/subscribe for history and exchange events.
 *
 * Subscribers may be sync or async. A throwing or rejecting subscriber is
 * logged and skipped; the store that emitted the event is never affected.
 */

import type { EventBus as IEventBus, EventHandler, HistoryEvent } from "@storyloom/sdk";
import { createLogger } from "@storyloom/shared";

const logger = createLogger("EventBus");

export interface HistoryEventBus extends IEventBus {
  /** Number of subscribers for `type`, wildcard subscribers excluded. */
  listenerCount(type: string): number;
  /** Remove every subscriber. */
  clear(): void;
}

export function createEventBus(): HistoryEventBus {
  const byType = new Map<string, Set<EventHandler>>();
  const wildcard = new Set<EventHandler>();

  function deliver(handler: EventHandler, event: HistoryEvent): void {
    let result: void | Promise<void>;
    try {
      result = handler(event);
    } catch (err) {
      logger.error("Subscriber threw", { type: event.type, error: String(err) });
      return;
    }
    if (result instanceof Promise) {
      result.catch((err: unknown) => {
        logger.error("Subscriber rejected", { type: event.type, error: String(err) });
      });
    }
  }

  const bus: HistoryEventBus = {
    on(type, handler) {
      let set = byType.get(type);
      if (!set) {
        set = new Set();
        byType.set(type, set);
      }
      set.add(handler);
      const owned = set;
      return () => {
        owned.delete(handler);
      };
    },

    once(type, handler) {
      const unsubscribe = bus.on(type, (event) => {
        unsubscribe();
        return handler(event);
      });
      return unsubscribe;
    },

    onAny(handler) {
      wildcard.add(handler);
      return () => {
        wildcard.delete(handler);
      };
    },

    emit(event) {
      // Copy so subscribers may unsubscribe while being called.
      for (const handler of [...(byType.get(event.type) ?? [])]) {
        deliver(handler, event);
      }
      for (const handler of [...wildcard]) {
        deliver(handler, event);
      }
    },

    listenerCount(type) {
      return byType.get(type)?.size ?? 0;
    },

    clear() {
      byType.clear();
      wildcard.clear();
    },
  };

  return bus;
}
