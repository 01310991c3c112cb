// Types
export type {
  MessageRole,
  UserMessage,
  AssistantMessage,
  Message,
  Sequence,
  TokenCounter,
} from "./types/message.js";

export { userMessage, assistantMessage, cloneMessage } from "./types/message.js";

export type {
  PolicyWarning,
  TruncationResult,
  TokenUsage,
  HistorySnapshot,
} from "./types/history.js";

export type {
  ModelInvoker,
  ExchangeRequest,
  ExchangeResult,
} from "./types/exchange.js";

export type {
  EventHandler,
  EventBus,
  HistoryEvent,
  HistoryEventTypeValue,
} from "./types/events.js";

export { HistoryEventType } from "./types/events.js";

// Errors
export {
  MemoryError,
  ConfigError,
  InvalidConfigurationError,
  SnapshotError,
  ProviderError,
} from "./errors/base.js";

export { ErrorCode } from "./errors/codes.js";
export type { ErrorCodeValue } from "./errors/codes.js";

// Interfaces
export type { IHistoryStore } from "./interfaces/history.js";
