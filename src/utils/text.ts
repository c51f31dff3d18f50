/** Maximum length retained for error messages surfaced to callers. */
const ERROR_TEXT_MAX_LENGTH = 1_000;

/** Collapses every whitespace run (including newlines and tabs) into one space. */
export function singleLine(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Truncates the text to `maxChars` characters, replacing the tail with an
 * ellipsis so the result never exceeds the limit.
 */
export function truncateText(text: string, maxChars: number): string {
  if (maxChars <= 0) {
    return "";
  }
  if (text.length <= maxChars) {
    return text;
  }
  return `${text.slice(0, Math.max(0, maxChars - 1))}…`;
}

/**
 * Normalises an error message so it fits on one bounded line. Blank messages
 * fall back to the provided placeholder.
 */
export function normaliseErrorMessage(text: string, fallback = "unexpected error"): string {
  const collapsed = singleLine(text);
  return truncateText(collapsed.length === 0 ? fallback : collapsed, ERROR_TEXT_MAX_LENGTH);
}

/** Extracts a message from any thrown value. */
export function describeThrown(error: unknown): string {
  if (error instanceof Error) {
    return error.message.length > 0 ? error.message : error.name;
  }
  if (typeof error === "string") {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
