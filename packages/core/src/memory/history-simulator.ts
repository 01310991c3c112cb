/**
 * HistorySimulator: seeds a fresh store from previously written text.
 *
 * Imported narrative has no real dialogue turns, so each of the last
 * `limit` chunks becomes a synthesized pair: a sentinel user prompt
 * followed by the chunk as the assistant's reply.
 */

import type { EventBus, Message, TokenCounter } from "@storyloom/sdk";
import { InvalidConfigurationError, assistantMessage, userMessage } from "@storyloom/sdk";
import {
  createLogger,
  DEFAULT_MAX_TOKENS,
  DEFAULT_SIMULATED_PROMPT,
  DEFAULT_SIMULATION_CHUNKS,
  type Logger,
} from "@storyloom/shared";
import { createHistoryStore, type HistoryStore } from "./history-store.js";

export interface SimulationOptions {
  /** Number of trailing chunks to replay. */
  limit?: number;
  maxTokens?: number;
  countTokens?: TokenCounter;
  /** Content of every synthesized user turn. */
  prompt?: string;
  bus?: EventBus;
  logger?: Logger;
}

/** Build the synthesized conversation for the tail of `chunks`. */
export function simulateConversation(
  chunks: readonly string[],
  limit: number,
  prompt: string = DEFAULT_SIMULATED_PROMPT,
): Message[] {
  if (!Number.isInteger(limit) || limit < 0) {
    throw new InvalidConfigurationError("simulationChunks", limit, "must be a non-negative integer");
  }
  const tail = limit === 0 ? [] : chunks.slice(-limit);
  const messages: Message[] = [];
  for (const chunk of tail) {
    messages.push(userMessage(prompt), assistantMessage(chunk));
  }
  return messages;
}

/** Build a Clean store whose committed history is the simulated tail. */
export function simulateHistory(
  chunks: readonly string[],
  options: SimulationOptions = {},
): HistoryStore {
  const logger = options.logger ?? createLogger("HistorySimulator");
  const limit = options.limit ?? DEFAULT_SIMULATION_CHUNKS;
  const messages = simulateConversation(chunks, limit, options.prompt);

  const store = createHistoryStore({
    maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
    countTokens: options.countTokens,
    bus: options.bus,
    logger: options.logger,
  });
  store.reset(messages);

  logger.info("Simulated history from imported text", {
    chunks: chunks.length,
    replayed: Math.min(limit, chunks.length),
    messages: store.committedSequence().length,
  });
  return store;
}
