import { stableStringify } from "../utils/canonical.js";
import { singleLine, truncateText } from "../utils/text.js";

/** Longest argument preview stored on a call event. */
export const ARGS_PREVIEW_MAX_CHARS = 240;

/** One-line, bounded rendering of call arguments for diagnostics. */
export function previewArguments(args: unknown, maxChars: number = ARGS_PREVIEW_MAX_CHARS): string {
  return truncateText(singleLine(stableStringify(args)), maxChars);
}
