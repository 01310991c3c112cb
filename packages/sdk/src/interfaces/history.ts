/**
 * History store interface: the dual-state (committed vs. proposal)
 * conversation memory that backs every model invocation.
 */

import type { Message, Sequence } from "../types/message.js";
import type { PolicyWarning, TokenUsage } from "../types/history.js";

export interface IHistoryStore {
  /** Identifier used in logs and events. */
  readonly id: string;

  /** True while a proposal diverges from the committed history. */
  readonly hasPendingProposal: boolean;

  /** Current truncation budget. */
  readonly maxTokens: number;

  /** Append to the proposal, creating it from the committed history if needed. */
  addMessage(message: Message): PolicyWarning | null;

  /** Append several messages with a single truncation pass. */
  addMessages(messages: Sequence): PolicyWarning | null;

  /** Freeze the active sequence as the committed baseline before a model call. */
  prepareForResponse(): void;

  /** Promote the proposal. No-op when nothing is pending. */
  commitProposal(): void;

  /** Drop the proposal, reverting to the last commit. No-op when nothing is pending. */
  discardProposal(): void;

  /** Proposal when pending, otherwise the committed history. Always a fresh array. */
  activeSequence(): Message[];

  /** The committed history, regardless of any pending proposal. */
  committedSequence(): Message[];

  /** Replace the committed history and clear any proposal. */
  reset(messages: Sequence): PolicyWarning | null;

  /** Reset to an empty history. */
  clear(): void;

  /** Change the budget and re-truncate the active sequence immediately. */
  setMaxTokens(maxTokens: number): PolicyWarning | null;

  tokenUsage(): TokenUsage;
}
