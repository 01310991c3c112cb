/**
 * Identifiers for history stores and traces.
 */

import { randomUUID } from "node:crypto";

export function generateId(): string {
  return randomUUID();
}

/** Leading characters of an id, enough to tell stores apart in a log line. */
export function shortId(id: string, length = 8): string {
  return id.replace(/-/g, "").slice(0, length);
}
