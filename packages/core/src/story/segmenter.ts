/**
 * Splits plain story text into canon chunks at blank lines.
 */

const BLANK_LINE = /\r?\n[ \t]*\r?\n/;

export function segmentCanonText(text: string): string[] {
  return text
    .split(BLANK_LINE)
    .map((chunk) => chunk.trim())
    .filter((chunk) => chunk.length > 0);
}
