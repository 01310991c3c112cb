/**
 * Event system types and constants.
 */

/** Handler function for events. */
export type EventHandler = (event: HistoryEvent) => void | Promise<void>;

/** EventBus interface for pub/sub communication. */
export interface EventBus {
  on(type: string, handler: EventHandler): () => void;
  once(type: string, handler: EventHandler): () => void;
  onAny(handler: EventHandler): () => void;
  emit(event: HistoryEvent): void;
}

/** An event emitted by a history store. */
export interface HistoryEvent {
  type: string;
  timestamp: number;
  payload?: unknown;
}

/** History event type constants. */
export const HistoryEventType = {
  PROPOSED: "history:proposed",
  PREPARED: "history:prepared",
  COMMITTED: "history:committed",
  DISCARDED: "history:discarded",
  RESET: "history:reset",
  TRUNCATED: "history:truncated",
  POLICY_WARNING: "history:policy_warning",
  MAX_TOKENS_CHANGED: "history:max_tokens_changed",

  // Exchange
  EXCHANGE_SENT: "exchange:sent",
  EXCHANGE_RECEIVED: "exchange:received",
  EXCHANGE_FAILED: "exchange:failed",
} as const;

export type HistoryEventTypeValue = (typeof HistoryEventType)[keyof typeof HistoryEventType];
