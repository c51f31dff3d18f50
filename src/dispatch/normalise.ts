import type { RegisteredTool } from "../mcp/registry.js";
import { describeArgumentProblems, validateArguments, type ArgumentGuidance, type ArgumentIssue } from "../schema/validate.js";
import { hasOwn } from "../utils/object.js";

/** Argument names carrying an `owner/repo` compound identifier. */
const COMPOUND_REPOSITORY_KEYS = ["full_name", "repository", "repo_full_name"] as const;

type NormalisableTool = Pick<RegisteredTool, "shape" | "aliases">;

/** `target-ref` and `targetRef` both become `target_ref`. */
export function toSnakeCase(key: string): string {
  return key
    .replace(/-/g, "_")
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .toLowerCase();
}

function splitRepository(value: unknown): { owner: string; repo: string } | null {
  if (typeof value !== "string") {
    return null;
  }
  const parts = value.trim().split("/");
  if (parts.length !== 2) {
    return null;
  }
  const [owner = "", repo = ""] = parts;
  return owner.length > 0 && repo.length > 0 ? { owner, repo } : null;
}

/**
 * Rewrites the argument spellings callers commonly send into the names the
 * tool declares. Keys the tool declares always win over aliased variants, and
 * keys nothing maps are kept untouched so validation reports them.
 */
export function normaliseArguments(tool: NormalisableTool, raw: Readonly<Record<string, unknown>>): Record<string, unknown> {
  const shape = tool.shape;
  const declared = (key: string) => hasOwn(shape, key);
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(raw)) {
    if (declared(key)) {
      result[key] = value;
    }
  }
  for (const [key, value] of Object.entries(raw)) {
    if (declared(key)) {
      continue;
    }
    const alias = tool.aliases[key];
    const target = alias !== undefined && declared(alias) ? alias : toSnakeCase(key);
    if (declared(target)) {
      if (!hasOwn(result, target)) {
        result[target] = value;
      }
    } else {
      result[key] = value;
    }
  }

  if (declared("owner") && declared("repo") && result.owner === undefined && result.repo === undefined) {
    for (const key of COMPOUND_REPOSITORY_KEYS) {
      const parts = splitRepository(result[key]);
      if (parts) {
        result.owner = parts.owner;
        result.repo = parts.repo;
        if (!declared(key)) {
          delete result[key];
        }
        break;
      }
    }
  }

  if (declared("full_name") && result.full_name === undefined) {
    const { owner, repo } = result;
    if (typeof owner === "string" && typeof repo === "string" && owner.length > 0 && repo.length > 0) {
      result.full_name = `${owner}/${repo}`;
      for (const key of ["owner", "repo"]) {
        if (!declared(key)) {
          delete result[key];
        }
      }
    }
  }

  for (const [key, type] of Object.entries(shape)) {
    if (result[key] === null && type.isOptional() && !type.isNullable()) {
      delete result[key];
    }
  }
  return result;
}

export type PreparedArguments =
  | { ok: true; args: Record<string, unknown> }
  | { ok: false; args: Record<string, unknown>; issues: ArgumentIssue[]; guidance: ArgumentGuidance };

/**
 * Normalises then validates call arguments. With validation disabled the
 * normalised arguments are passed through as-is.
 */
export function prepareArguments(
  tool: Pick<RegisteredTool, "shape" | "aliases" | "validator" | "inputSchema">,
  raw: Readonly<Record<string, unknown>>,
  options: { validate?: boolean } = {},
): PreparedArguments {
  const args = normaliseArguments(tool, raw);
  if (options.validate === false) {
    return { ok: true, args };
  }
  const check = validateArguments(tool.validator, args);
  if (check.valid) {
    return { ok: true, args: check.data };
  }
  return { ok: false, args, issues: check.errors, guidance: describeArgumentProblems(tool.inputSchema, args) };
}
