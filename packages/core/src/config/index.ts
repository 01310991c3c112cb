/**
 * Memory configuration loading.
 */

import { ConfigError } from "@storyloom/sdk";
import { MemoryConfigSchema, validateInput, type ValidatedMemoryConfig } from "@storyloom/shared";

/** Validate raw configuration (e.g. parsed settings JSON) and fill defaults. */
export function loadMemoryConfig(raw: unknown = {}): ValidatedMemoryConfig {
  const result = validateInput(MemoryConfigSchema, raw);
  if (!result.success) {
    throw new ConfigError(`Invalid memory configuration: ${result.error}`);
  }
  return result.data;
}
