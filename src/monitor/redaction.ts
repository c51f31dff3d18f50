/** Placeholder inserted in place of a redacted value. */
export const REDACTION_TOKEN = "[REDACTED]";

/** Keys whose values are replaced wholesale, compared case-insensitively. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "proxy-authorization",
  "x-api-key",
  "api-key",
  "api_key",
  "apikey",
  "token",
  "access_token",
  "refresh_token",
  "github_token",
  "password",
  "secret",
  "client_secret",
  "cookie",
  "set-cookie",
]);

interface TextRule {
  readonly pattern: RegExp;
  readonly replacement: string;
}

/**
 * Credential-shaped fragments scrubbed from free text. Order matters: header
 * rules run before the generic token and address rules.
 */
const TEXT_RULES: readonly TextRule[] = [
  { pattern: /Authorization:\s*Basic\s+[A-Za-z0-9+/=]+/gi, replacement: "Authorization: Basic [REDACTED]" },
  { pattern: /Authorization:\s*Bearer\s+[^\s"']+/gi, replacement: "Authorization: Bearer [REDACTED]" },
  { pattern: /\bBearer\s+[A-Za-z0-9._~+/-]{16,}=*/g, replacement: "Bearer [REDACTED]" },
  { pattern: /\bgh[pousr]_[A-Za-z0-9]{20,}\b/g, replacement: "[REDACTED_GITHUB_TOKEN]" },
  { pattern: /\bgithub_pat_[A-Za-z0-9_]{20,}\b/g, replacement: "[REDACTED_GITHUB_TOKEN]" },
  { pattern: /\b[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}\b/g, replacement: "[REDACTED_EMAIL]" },
  { pattern: /\b(?:\d{1,3}\.){3}\d{1,3}\b/g, replacement: "[REDACTED_IP]" },
];

/** Returns true when values stored under the key must never be recorded. */
export function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase());
}

/** Scrubs credential-shaped substrings from the text. */
export function redactText(text: string): string {
  let result = text;
  for (const rule of TEXT_RULES) {
    result = result.replace(rule.pattern, rule.replacement);
  }
  return result;
}

/**
 * Recursively redacts a JSON-like value: sensitive keys lose their value and
 * every string goes through {@link redactText}. The input is never mutated.
 */
export function redactValue(value: unknown, seen: WeakSet<object> = new WeakSet()): unknown {
  if (typeof value === "string") {
    return redactText(value);
  }
  if (value === null || typeof value !== "object") {
    return value;
  }
  if (seen.has(value)) {
    return "[Circular]";
  }
  seen.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((entry: unknown) => redactValue(entry, seen));
    }
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = isSensitiveKey(key) ? REDACTION_TOKEN : redactValue(entry, seen);
    }
    return result;
  } finally {
    seen.delete(value);
  }
}
