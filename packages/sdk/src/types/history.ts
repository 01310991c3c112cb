/**
 * Value types shared by the history store, truncation and persistence.
 */

import type { Message } from "./message.js";

/**
 * Soft warning raised when the budget could not be met because the newest
 * message alone is larger than it. The message is kept anyway.
 */
export interface PolicyWarning {
  kind: "oversized_message";
  /** Token cost of the oversized message. */
  tokens: number;
  maxTokens: number;
  /** First characters of the offending message, for display. */
  preview: string;
}

/** Outcome of bounding a sequence to a token budget. */
export interface TruncationResult {
  /** Longest suffix of the input that fits (or the newest message alone). */
  messages: Message[];
  /** Token count of `messages`. */
  tokens: number;
  /** Number of messages dropped from the front. */
  dropped: number;
  warning: PolicyWarning | null;
}

/** Current token consumption of the active sequence. */
export interface TokenUsage {
  used: number;
  max: number;
  messages: number;
}

/** Persisted form of a history store. */
export interface HistorySnapshot {
  version: 1;
  maxTokens: number;
  committed: Message[];
  proposal: Message[] | null;
  hasPendingProposal: boolean;
}
