// EventBus
export { createEventBus } from "./bus/index.js";
export type { HistoryEventBus } from "./bus/index.js";

// Configuration
export { loadMemoryConfig } from "./config/index.js";

// Memory
export { createHistoryStore, assertValidMaxTokens } from "./memory/history-store.js";
export type { HistoryStore, HistoryStoreOptions } from "./memory/history-store.js";
export { truncate } from "./memory/truncation.js";
export {
  estimateTokens,
  worstCaseTokens,
  createSafeCounter,
  countSequenceTokens,
} from "./memory/token-counter.js";
export { simulateHistory, simulateConversation } from "./memory/history-simulator.js";
export type { SimulationOptions } from "./memory/history-simulator.js";

// Story import
export { segmentCanonText } from "./story/segmenter.js";
export { loadStory } from "./story/loader.js";
export type { LoadedStory, LoadStoryOptions } from "./story/loader.js";

// Persistence
export { serializeHistory, restoreHistory } from "./state/snapshot.js";
export type { RestoreOptions } from "./state/snapshot.js";

// Execution
export { runExchange, composeGuidance } from "./execution/exchange.js";
export type { ExchangeDeps } from "./execution/exchange.js";
export { splitReasoning } from "./execution/response.js";
export type { ParsedResponse } from "./execution/response.js";

// Observability
export {
  formatContextMonitor,
  formatHistoryStatus,
  previewContent,
} from "./observability/context-monitor.js";
