import type { ZodIssue } from "zod";

import type { ArgumentValidator, ObjectSchema } from "./derive.js";

/** Maximum number of issues reported for a single call. */
export const MAX_REPORTED_ISSUES = 50;

export interface ArgumentIssue {
  /** Dotted path of the offending argument, `(root)` for the whole object. */
  path: string;
  code: string;
  message: string;
}

export type ArgumentCheck =
  | { valid: true; errors: []; data: Record<string, unknown> }
  | { valid: false; errors: ArgumentIssue[] };

/** Guidance attached to validation failures. */
export interface ArgumentGuidance {
  unknown_args: string[];
  missing_args: string[];
  expected_args: string[];
}

function formatPath(path: ReadonlyArray<string | number>): string {
  return path.length === 0 ? "(root)" : path.join(".");
}

function toIssues(issue: ZodIssue): ArgumentIssue[] {
  if (issue.code === "unrecognized_keys") {
    return issue.keys.map((key) => ({
      path: formatPath([...issue.path, key]),
      code: "unknown_argument",
      message: `Unknown argument "${key}"`,
    }));
  }
  if (issue.code === "invalid_type" && issue.received === "undefined") {
    const path = formatPath(issue.path);
    return [{ path, code: "missing_argument", message: `Missing required argument "${path}"` }];
  }
  return [{ path: formatPath(issue.path), code: issue.code, message: issue.message }];
}

/**
 * Validates call arguments against a tool's strict validator. On success the
 * parsed data (defaults applied) is returned; on failure at most
 * {@link MAX_REPORTED_ISSUES} issues are reported.
 */
export function validateArguments(validator: ArgumentValidator, args: unknown): ArgumentCheck {
  const parsed = validator.safeParse(args);
  if (parsed.success) {
    const data: Record<string, unknown> = { ...parsed.data };
    return { valid: true, errors: [], data };
  }
  const errors = parsed.error.issues.flatMap((issue) => toIssues(issue)).slice(0, MAX_REPORTED_ISSUES);
  return { valid: false, errors };
}

/** Lists unknown, missing and expected argument names for a call. */
export function describeArgumentProblems(schema: ObjectSchema, args: Readonly<Record<string, unknown>>): ArgumentGuidance {
  const expected = Object.keys(schema.properties);
  const known = new Set(expected);
  return {
    unknown_args: Object.keys(args).filter((key) => !known.has(key)).sort(),
    missing_args: schema.required.filter((key) => args[key] === undefined),
    expected_args: expected,
  };
}
