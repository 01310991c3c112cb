/**
 * Error hierarchy for the history memory.
 */

import { ErrorCode } from "./codes.js";

export class MemoryError extends Error {
  constructor(
    message: string,
    public readonly code: string = ErrorCode.MEMORY_ERROR,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "MemoryError";
  }
}

export class ConfigError extends MemoryError {
  constructor(
    message: string,
    options?: { cause?: unknown; code?: string },
  ) {
    super(message, options?.code ?? ErrorCode.CONFIG_ERROR, options);
    this.name = "ConfigError";
  }
}

/**
 * A configuration value was rejected at the point it was set.
 * The previous valid value stays in effect.
 */
export class InvalidConfigurationError extends ConfigError {
  constructor(
    public readonly field: string,
    public readonly value: unknown,
    message: string,
  ) {
    super(`Invalid "${field}": ${message}`, { code: ErrorCode.INVALID_CONFIGURATION });
    this.name = "InvalidConfigurationError";
  }
}

/** Persisted history state failed validation. */
export class SnapshotError extends MemoryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Invalid history snapshot: ${message}`, ErrorCode.SNAPSHOT_INVALID, options);
    this.name = "SnapshotError";
  }
}

/** A model call failed, was aborted or timed out. */
export class ProviderError extends MemoryError {
  constructor(
    message: string,
    options?: { cause?: unknown; code?: string },
  ) {
    super(`Model invocation failed: ${message}`, options?.code ?? ErrorCode.PROVIDER_ERROR, options);
    this.name = "ProviderError";
  }
}
