import { distance as levenshteinDistance } from "fastest-levenshtein";

/** Minimum normalised similarity for a name to be suggested. */
export const SUGGESTION_CUTOFF = 0.6;

/**
 * Removes client-side decorations from a requested tool name: surrounding
 * whitespace, leading slashes, a `tools/` route prefix and any dotted or
 * slashed module qualification (only the last segment is kept).
 */
export function stripToolNameDecorations(raw: string): string {
  let name = raw.trim().replace(/^\/+/, "");
  if (name.toLowerCase().startsWith("tools/")) {
    name = name.slice("tools/".length);
  }
  const lastSeparator = Math.max(name.lastIndexOf("."), name.lastIndexOf("/"));
  if (lastSeparator >= 0 && lastSeparator < name.length - 1) {
    name = name.slice(lastSeparator + 1);
  }
  return name;
}

/**
 * Canonical key used by the last lookup layer: lowercase alphanumerics only,
 * so `terminal-command`, `terminal_command` and `TerminalCommand` collide.
 */
export function canonicalToolKey(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]/g, "");
}

/** Normalised Levenshtein similarity between two names, in `[0, 1]`. */
export function nameSimilarity(left: string, right: string): number {
  const maxLength = Math.max(left.length, right.length);
  if (maxLength === 0) {
    return 1;
  }
  return 1 - levenshteinDistance(left, right) / maxLength;
}

/**
 * Returns up to `limit` candidate names closest to the requested one, best
 * first. Names are compared on their canonical keys; ties keep alphabetical
 * order.
 */
export function suggestToolNames(requested: string, candidates: Iterable<string>, limit = 3): string[] {
  const key = canonicalToolKey(stripToolNameDecorations(requested));
  const scored: Array<{ name: string; score: number }> = [];
  for (const name of candidates) {
    const score = nameSimilarity(key, canonicalToolKey(name));
    if (score >= SUGGESTION_CUTOFF) {
      scored.push({ name, score });
    }
  }
  scored.sort((a, b) => b.score - a.score || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  return scored.slice(0, Math.max(0, limit)).map((entry) => entry.name);
}
