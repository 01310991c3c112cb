/**
 * Snapshot codec: converts a history store to and from plain data for the
 * persistence layer. Restored data is validated before any store is built.
 */

import type { EventBus, HistorySnapshot, TokenCounter } from "@storyloom/sdk";
import { SnapshotError } from "@storyloom/sdk";
import { HistorySnapshotSchema, validateInput, type Logger } from "@storyloom/shared";
import { createHistoryStore, type HistoryStore } from "../memory/history-store.js";

export interface RestoreOptions {
  countTokens?: TokenCounter;
  bus?: EventBus;
  logger?: Logger;
}

export function serializeHistory(store: HistoryStore): HistorySnapshot {
  return {
    version: 1,
    maxTokens: store.maxTokens,
    committed: store.committedSequence().map((m) => ({ ...m })),
    proposal: store.hasPendingProposal ? store.activeSequence().map((m) => ({ ...m })) : null,
    hasPendingProposal: store.hasPendingProposal,
  };
}

/**
 * Rebuild a store from persisted data. A proposal is only restored when the
 * pending flag is set; both sequences are re-truncated to the stored budget.
 */
export function restoreHistory(data: unknown, options: RestoreOptions = {}): HistoryStore {
  const result = validateInput(HistorySnapshotSchema, data);
  if (!result.success) {
    throw new SnapshotError(result.error);
  }
  const snapshot = result.data;
  const proposal = snapshot.hasPendingProposal ? snapshot.proposal ?? snapshot.committed : null;

  return createHistoryStore({
    maxTokens: snapshot.maxTokens,
    countTokens: options.countTokens,
    bus: options.bus,
    logger: options.logger,
    initialState: { committed: snapshot.committed, proposal },
  });
}
