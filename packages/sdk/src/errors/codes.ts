/**
 * Error codes carried by MemoryError subclasses.
 */

export const ErrorCode = {
  MEMORY_ERROR: "MEMORY_ERROR",
  CONFIG_ERROR: "CONFIG_ERROR",
  INVALID_CONFIGURATION: "INVALID_CONFIGURATION",
  SNAPSHOT_INVALID: "SNAPSHOT_INVALID",
  PROVIDER_ERROR: "PROVIDER_ERROR",
  PROVIDER_ABORTED: "PROVIDER_ABORTED",
  PROVIDER_TIMEOUT: "PROVIDER_TIMEOUT",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];
