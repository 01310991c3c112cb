/**
 * Story import: every chunk of the loaded text becomes canon, and only the
 * tail seeds the conversation memory.
 */

import type { EventBus, TokenCounter } from "@storyloom/sdk";
import type { Logger, ValidatedMemoryConfig } from "@storyloom/shared";
import { simulateHistory } from "../memory/history-simulator.js";
import type { HistoryStore } from "../memory/history-store.js";
import { segmentCanonText } from "./segmenter.js";

export interface LoadedStory {
  canon: string[];
  history: HistoryStore;
}

export interface LoadStoryOptions {
  config: ValidatedMemoryConfig;
  countTokens?: TokenCounter;
  bus?: EventBus;
  logger?: Logger;
}

export function loadStory(text: string, options: LoadStoryOptions): LoadedStory {
  const canon = segmentCanonText(text);
  const history = simulateHistory(canon, {
    limit: options.config.simulationChunks,
    maxTokens: options.config.maxTokens,
    prompt: options.config.simulatedPrompt,
    countTokens: options.countTokens,
    bus: options.bus,
    logger: options.logger,
  });
  return { canon, history };
}
