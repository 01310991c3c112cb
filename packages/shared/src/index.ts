export { createLogger, setLogSink } from "./logger/index.js";
export type { Logger, LogLevel, LogContext, LogSink } from "./logger/index.js";

export { generateId, shortId } from "./utils/uuid.js";
export { validateInput, formatZodError } from "./utils/validation.js";
export type { ValidationResult } from "./utils/validation.js";

export {
  MemoryConfigSchema,
  MaxTokensSchema,
  MessageSchema,
  HistorySnapshotSchema,
  DEFAULT_GUIDANCE,
  DEFAULT_MAX_TOKENS,
  DEFAULT_SIMULATION_CHUNKS,
  DEFAULT_SIMULATED_PROMPT,
} from "./utils/config-schema.js";
export type { ValidatedMemoryConfig, ValidatedHistorySnapshot } from "./utils/config-schema.js";
