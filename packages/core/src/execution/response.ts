/**
 * Splits a raw model reply into narrative text and `<think>` reasoning.
 */

const THINK_BLOCK = /<think>([\s\S]*?)<\/think>/gi;

export interface ParsedResponse {
  narrative: string;
  reasoning: string;
}

export function splitReasoning(raw: string): ParsedResponse {
  const reasoningParts: string[] = [];
  const narrativeParts: string[] = [];
  let lastEnd = 0;

  for (const match of raw.matchAll(THINK_BLOCK)) {
    const start = match.index ?? 0;
    narrativeParts.push(raw.slice(lastEnd, start).trim());
    reasoningParts.push(match[1].trim());
    lastEnd = start + match[0].length;
  }
  narrativeParts.push(raw.slice(lastEnd).trim());

  return {
    narrative: narrativeParts.filter(Boolean).join("\n"),
    reasoning: reasoningParts.filter(Boolean).join("\n"),
  };
}
