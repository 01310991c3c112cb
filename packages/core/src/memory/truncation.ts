/**
 * TruncationPolicy: bounds a sequence to a token budget.
 *
 * Keeps the longest suffix that fits, scanning from the newest message
 * backward and stopping at the first message that would exceed the budget.
 * The newest message is always kept, even when it alone is over budget;
 * that case yields a PolicyWarning instead of an empty history.
 */

import type { Message, PolicyWarning, TokenCounter, TruncationResult } from "@storyloom/sdk";

const PREVIEW_LENGTH = 80;

export function truncate(
  sequence: readonly Message[],
  maxTokens: number,
  countTokens: TokenCounter,
): TruncationResult {
  if (sequence.length === 0) {
    return { messages: [], tokens: 0, dropped: 0, warning: null };
  }

  const newest = sequence[sequence.length - 1];
  const newestTokens = countTokens(newest.content);

  if (newestTokens > maxTokens) {
    return {
      messages: [newest],
      tokens: newestTokens,
      dropped: sequence.length - 1,
      warning: oversizedWarning(newest, newestTokens, maxTokens),
    };
  }

  let total = newestTokens;
  let start = sequence.length - 1;

  for (let i = sequence.length - 2; i >= 0; i--) {
    const tokens = countTokens(sequence[i].content);
    if (total + tokens > maxTokens) break;
    total += tokens;
    start = i;
  }

  return {
    messages: sequence.slice(start),
    tokens: total,
    dropped: start,
    warning: null,
  };
}

function oversizedWarning(message: Message, tokens: number, maxTokens: number): PolicyWarning {
  return {
    kind: "oversized_message",
    tokens,
    maxTokens,
    preview: message.content.slice(0, PREVIEW_LENGTH),
  };
}
