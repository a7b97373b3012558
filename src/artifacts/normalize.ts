/**
 * Normalize a tag for the tag index and tag search.
 *
 * Rules:
 * 1. Trim leading/trailing whitespace
 * 2. Lowercase
 * 3. Collapse internal whitespace to single spaces
 *
 * Examples:
 * - "  High Risk  " → "high risk"
 * - "WEATHER" → "weather"
 */
export function normalize(s: string): string {
  return s.trim().toLowerCase().replace(/\s+/g, " ");
}

/** Normalized, de-duplicated, non-empty tags in first-seen order. */
export function normalizeTags(tags: readonly string[]): string[] {
  return [...new Set(tags.map(normalize))].filter((t) => t !== "");
}
