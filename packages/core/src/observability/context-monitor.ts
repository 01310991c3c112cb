/**
 * Plain-text rendering of what the model will see next, for a context
 * monitor panel or a debug dump.
 */

import type { IHistoryStore, MessageRole } from "@storyloom/sdk";

const PREVIEW_LENGTH = 150;

function roleLabel(role: MessageRole): string {
  switch (role) {
    case "user":
      return "User";
    case "assistant":
      return "Assistant";
  }
}

export function previewContent(content: string, length: number = PREVIEW_LENGTH): string {
  const flat = content.slice(0, length).replace(/\n/g, " ");
  return content.length > length ? `${flat}...` : flat;
}

export function formatContextMonitor(store: IHistoryStore): string {
  const usage = store.tokenUsage();
  const lines = [`--- Context History (Tokens: ${usage.used} / ${usage.max}) ---`];
  for (const message of store.activeSequence()) {
    lines.push(`[${roleLabel(message.role)}]: ${previewContent(message.content)}`);
  }
  return lines.join("\n");
}

/** One-line summary for a status bar. */
export function formatHistoryStatus(store: IHistoryStore): string {
  const usage = store.tokenUsage();
  const pending = store.hasPendingProposal ? " | pending proposal" : "";
  return `History: ${usage.messages} msgs / ${usage.used} tokens (max ${usage.max})${pending}`;
}
