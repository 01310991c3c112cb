/**
 * Zod schemas for memory configuration and persisted history.
 *
 * Validated at load time so a misconfigured budget is rejected before any
 * store is built from it.
 */

import { z } from "zod";

/** Sentinel prompt used for synthesized user turns when importing text. */
export const DEFAULT_SIMULATED_PROMPT = "(Continue the story.)";

/** User turn sent when the writer gives no guidance. */
export const DEFAULT_GUIDANCE = "Continue the story.";

export const DEFAULT_MAX_TOKENS = 12000;

export const DEFAULT_SIMULATION_CHUNKS = 5;

export const MaxTokensSchema = z
  .number({ invalid_type_error: "maxTokens must be a number" })
  .int("maxTokens must be an integer")
  .min(1, "maxTokens must be at least 1");

export const MemoryConfigSchema = z.object({
  maxTokens: MaxTokensSchema.default(DEFAULT_MAX_TOKENS),
  simulationChunks: z
    .number()
    .int("simulationChunks must be an integer")
    .nonnegative("simulationChunks must not be negative")
    .default(DEFAULT_SIMULATION_CHUNKS),
  simulatedPrompt: z
    .string()
    .min(1, "simulatedPrompt must not be empty")
    .default(DEFAULT_SIMULATED_PROMPT),
});

export type ValidatedMemoryConfig = z.infer<typeof MemoryConfigSchema>;

export const MessageSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
});

export const HistorySnapshotSchema = z.object({
  version: z.literal(1),
  maxTokens: MaxTokensSchema,
  committed: z.array(MessageSchema),
  proposal: z.array(MessageSchema).nullable().default(null),
  hasPendingProposal: z.boolean().default(false),
});

export type ValidatedHistorySnapshot = z.infer<typeof HistorySnapshotSchema>;
