/**
 * Model invocation types. The LLM client itself lives outside this project.
 */

import type { Message } from "./message.js";
import type { PolicyWarning } from "./history.js";

/** Opaque model call: system prompt + conversation + provider parameters. */
export type ModelInvoker<P> = (
  systemPrompt: string,
  messages: readonly Message[],
  params: P,
) => Promise<string>;

export interface ExchangeRequest<P> {
  /** User guidance for this turn. Blank guidance sends `defaultGuidance`. */
  guidance: string;
  /** Defaults to "Continue the story.". */
  defaultGuidance?: string;
  /** Tag name that non-blank guidance is wrapped in, e.g. `instruction`. */
  guidanceTag?: string;
  systemPrompt: string;
  params: P;
  invoke: ModelInvoker<P>;
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface ExchangeResult {
  /** Raw model output, as appended to the history. */
  raw: string;
  /** Output with reasoning blocks removed. */
  narrative: string;
  /** Concatenated content of the reasoning blocks. */
  reasoning: string;
  /** The private snapshot that was sent to the model, user turn included. */
  sent: Message[];
  warning: PolicyWarning | null;
}
