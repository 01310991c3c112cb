/**
 * HistoryStore: token-budgeted, dual-state conversation memory.
 *
 * Two states: Clean (only the committed history exists) and Proposed (a
 * proposal copied from the committed history is receiving new messages).
 * Every transition copies arrays, so the committed and proposal sequences
 * never share a mutable list, and every read hands out a fresh array that
 * callers may keep as a private snapshot.
 *
 * All operations are synchronous, so each one runs to completion before any
 * other callback (such as a returning model call) can touch the store.
 */

import type {
  EventBus,
  IHistoryStore,
  Message,
  PolicyWarning,
  Sequence,
  TokenCounter,
  TokenUsage,
} from "@storyloom/sdk";
import { HistoryEventType, InvalidConfigurationError, cloneMessage } from "@storyloom/sdk";
import {
  createLogger,
  generateId,
  validateInput,
  MaxTokensSchema,
  DEFAULT_MAX_TOKENS,
  type Logger,
} from "@storyloom/shared";
import { truncate } from "./truncation.js";
import { countSequenceTokens, createSafeCounter, estimateTokens } from "./token-counter.js";

export interface HistoryStoreOptions {
  maxTokens?: number;
  /** Defaults to `estimateTokens`. Failures fall back to the worst case. */
  countTokens?: TokenCounter;
  /** Receives `history:*` events when provided. */
  bus?: EventBus;
  logger?: Logger;
  id?: string;
  /** Starting state; a non-null proposal starts the store in Proposed. */
  initialState?: {
    committed: Sequence;
    proposal: Sequence | null;
  };
}

export interface HistoryStore extends IHistoryStore {
  /** The safe counter the store measures with. */
  readonly countTokens: TokenCounter;
}

export function assertValidMaxTokens(value: number): number {
  const result = validateInput(MaxTokensSchema, value);
  if (!result.success) {
    throw new InvalidConfigurationError("maxTokens", value, result.error);
  }
  return result.data;
}

export function createHistoryStore(options: HistoryStoreOptions = {}): HistoryStore {
  const id = options.id ?? generateId();
  const logger = options.logger ? options.logger.child("HistoryStore") : createLogger("HistoryStore");
  logger.setContext({ storeId: id });

  const bus = options.bus;
  const countTokens = createSafeCounter(options.countTokens ?? estimateTokens, logger);
  let maxTokens = assertValidMaxTokens(options.maxTokens ?? DEFAULT_MAX_TOKENS);

  let committed: Message[] = [];
  let proposal: Message[] | null = null;

  function emit(type: string, payload: Record<string, unknown> = {}): void {
    bus?.emit({ type, timestamp: Date.now(), payload: { storeId: id, ...payload } });
  }

  function active(): Message[] {
    return proposal ?? committed;
  }

  /** Bound `messages` to the budget, reporting drops and warnings. */
  function bounded(messages: Message[], reason: string): { messages: Message[]; warning: PolicyWarning | null } {
    const result = truncate(messages, maxTokens, countTokens);
    if (result.dropped > 0) {
      logger.debug("Truncated history", { reason, dropped: result.dropped, tokens: result.tokens, maxTokens });
      emit(HistoryEventType.TRUNCATED, { reason, dropped: result.dropped, tokens: result.tokens });
    }
    if (result.warning) {
      logger.warn("Newest message exceeds token budget, keeping it alone", {
        tokens: result.warning.tokens,
        maxTokens,
      });
      emit(HistoryEventType.POLICY_WARNING, { warning: result.warning });
    }
    return { messages: result.messages, warning: result.warning };
  }

  function propose(incoming: Sequence): PolicyWarning | null {
    const base = proposal ?? committed;
    const next = [...base, ...incoming.map(cloneMessage)];
    const { messages, warning } = bounded(next, "proposal");
    proposal = messages;
    emit(HistoryEventType.PROPOSED, { added: incoming.length, messages: messages.length });
    return warning;
  }

  function replaceCommitted(messages: Sequence, reason: string): PolicyWarning | null {
    const bound = bounded(messages.map(cloneMessage), reason);
    committed = bound.messages;
    proposal = null;
    return bound.warning;
  }

  if (options.initialState) {
    replaceCommitted(options.initialState.committed, "restore");
    if (options.initialState.proposal !== null) {
      const bound = bounded(options.initialState.proposal.map(cloneMessage), "restore");
      proposal = bound.messages;
    }
  }

  const store: HistoryStore = {
    id,
    countTokens,

    get hasPendingProposal(): boolean {
      return proposal !== null;
    },

    get maxTokens(): number {
      return maxTokens;
    },

    addMessage(message: Message): PolicyWarning | null {
      return propose([message]);
    },

    addMessages(messages: Sequence): PolicyWarning | null {
      return propose(messages);
    },

    prepareForResponse(): void {
      committed = [...active()];
      proposal = null;
      logger.debug("Prepared for response", { messages: committed.length });
      emit(HistoryEventType.PREPARED, { messages: committed.length });
    },

    commitProposal(): void {
      if (proposal === null) {
        logger.debug("Commit skipped, no pending proposal");
        return;
      }
      committed = [...proposal];
      proposal = null;
      logger.debug("Committed proposal", { messages: committed.length });
      emit(HistoryEventType.COMMITTED, { messages: committed.length });
    },

    discardProposal(): void {
      if (proposal === null) {
        logger.debug("Discard skipped, no pending proposal");
        return;
      }
      const discarded = proposal.length;
      proposal = null;
      logger.debug("Discarded proposal", { discarded, messages: committed.length });
      emit(HistoryEventType.DISCARDED, { discarded, messages: committed.length });
    },

    activeSequence(): Message[] {
      return [...active()];
    },

    committedSequence(): Message[] {
      return [...committed];
    },

    reset(messages: Sequence): PolicyWarning | null {
      const warning = replaceCommitted(messages, "reset");
      logger.debug("Reset history", { messages: committed.length });
      emit(HistoryEventType.RESET, { messages: committed.length });
      return warning;
    },

    clear(): void {
      store.reset([]);
    },

    setMaxTokens(value: number): PolicyWarning | null {
      const previous = maxTokens;
      maxTokens = assertValidMaxTokens(value);
      emit(HistoryEventType.MAX_TOKENS_CHANGED, { previous, maxTokens });

      // Committed is bounded as well: a discard makes it active again.
      const bound = bounded(committed, "max_tokens_changed");
      committed = bound.messages;
      if (proposal === null) {
        return bound.warning;
      }
      const pending = bounded(proposal, "max_tokens_changed");
      proposal = pending.messages;
      return pending.warning;
    },

    tokenUsage(): TokenUsage {
      const messages = active();
      return {
        used: countSequenceTokens(messages, countTokens),
        max: maxTokens,
        messages: messages.length,
      };
    },
  };

  return store;
}
