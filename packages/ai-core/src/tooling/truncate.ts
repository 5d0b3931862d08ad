// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-core/tooling/truncate`
 * Purpose: Size-bound text payloads with an explicit truncation marker.
 * Scope: Pure string helpers. Does not know about tools.
 * Invariants:
 *   - MARKER_APPENDED: text longer than maxChars becomes maxChars chars + marker
 *   - TRUNCATION_IDEMPOTENT: truncating already-truncated text with the same limit is a no-op
 * Side-effects: none
 * Links: tool-runner.ts, @fathom/ai-tools crawl-webpage
 * @public
 */

export const TRUNCATION_MARKER = "... [truncated]";

export interface TruncatedText {
  readonly text: string;
  readonly truncated: boolean;
}

export function isTruncated(
  text: string,
  maxChars: number,
  marker: string = TRUNCATION_MARKER
): boolean {
  return text.length === maxChars + marker.length && text.endsWith(marker);
}

export function truncateText(
  text: string,
  maxChars: number,
  marker: string = TRUNCATION_MARKER
): TruncatedText {
  if (isTruncated(text, maxChars, marker)) return { text, truncated: true };
  if (text.length <= maxChars) return { text, truncated: false };
  return { text: text.slice(0, maxChars) + marker, truncated: true };
}

/**
 * Truncate every string value (recursively) in a JSON-like payload.
 */
export function boundPayloadText(value: unknown, maxChars: number): unknown {
  if (typeof value === "string") return truncateText(value, maxChars).text;
  if (Array.isArray(value)) {
    return value.map((item) => boundPayloadText(item, maxChars));
  }
  if (typeof value === "object" && value !== null) {
    return boundRecordText(Object.fromEntries(Object.entries(value)), maxChars);
  }
  return value;
}

export function boundRecordText(
  record: Readonly<Record<string, unknown>>,
  maxChars: number
): Record<string, unknown> {
  const bounded: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(record)) {
    bounded[key] = boundPayloadText(item, maxChars);
  }
  return bounded;
}
