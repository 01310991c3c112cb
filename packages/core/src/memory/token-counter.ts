/**
 * Token counting adapters.
 *
 * The real tokenizer is supplied by the caller. `estimateTokens` is the
 * default when none is given: roughly four characters per token for prose.
 */

import type { Message, TokenCounter } from "@storyloom/sdk";
import type { Logger } from "@storyloom/shared";

const CHARS_PER_TOKEN = 4;

export function estimateTokens(text: string): number {
  if (!text) return 0;
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/**
 * Upper bound on what any byte-level tokenizer can produce for `text`:
 * one token per UTF-8 byte.
 */
export function worstCaseTokens(text: string): number {
  return Buffer.byteLength(text, "utf8");
}

/**
 * Wrap a counter so it never throws and never returns an unusable value.
 * A failing count is replaced by the worst case for that text, which keeps
 * the truncation bound intact.
 */
export function createSafeCounter(counter: TokenCounter, logger?: Logger): TokenCounter {
  return (text) => {
    let count: number;
    try {
      count = counter(text);
    } catch (err) {
      logger?.warn("Token counter failed, assuming worst case", {
        length: text.length,
        error: String(err),
      });
      return worstCaseTokens(text);
    }
    if (!Number.isInteger(count) || count < 0) {
      logger?.warn("Token counter returned an invalid count, assuming worst case", {
        length: text.length,
        count,
      });
      return worstCaseTokens(text);
    }
    return count;
  };
}

export function countSequenceTokens(messages: readonly Message[], countTokens: TokenCounter): number {
  let total = 0;
  for (const message of messages) {
    total += countTokens(message.content);
  }
  return total;
}
