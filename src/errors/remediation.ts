import type { ErrorCategory, ErrorOrigin } from "./taxonomy.js";

export type RemediationKind =
  | "inspect_schema"
  | "fix_arguments"
  | "authorize_mutations"
  | "target_unprotected_ref"
  | "retry_with_longer_timeout"
  | "reduce_scope"
  | "configure_credentials"
  | "retry_later"
  | "use_fallback_tool"
  | "avoid_platform_block"
  | "inspect_recent_errors";

/** One actionable step returned to the caller alongside a failure. */
export interface RemediationStep {
  kind: RemediationKind;
  action: string;
  /** Tool the caller can invoke to carry out the step. */
  tool?: string;
}

export interface RemediationContext {
  /** Alternate tool able to perform the same operation locally. */
  fallbackTool?: string | null;
  /** Result of the credential presence probe; `undefined` when unknown. */
  credentialsPresent?: boolean;
  /** Ref guarded by the write-gate. */
  protectedRef?: string;
}

function fallbackStep(toolName: string, fallbackTool: string | null | undefined): RemediationStep[] {
  if (!fallbackTool || fallbackTool === toolName) {
    return [];
  }
  return [
    {
      kind: "use_fallback_tool",
      action: `Use ${fallbackTool} to perform this operation in the local workspace instead of ${toolName}.`,
      tool: fallbackTool,
    },
  ];
}

/**
 * Returns the ordered remediation steps for a classified failure. The most
 * direct fix comes first; generic follow-ups come last.
 */
export function adviseRemediation(
  category: ErrorCategory,
  origin: ErrorOrigin,
  toolName: string,
  context: RemediationContext = {},
): RemediationStep[] {
  const steps: RemediationStep[] = [];

  if (origin === "external_platform") {
    steps.push(...fallbackStep(toolName, context.fallbackTool));
    steps.push({
      kind: "avoid_platform_block",
      action: `The hosting platform refused the ${toolName} call before it reached the server; do not resend it unchanged.`,
    });
  }

  switch (category) {
    case "validation":
      steps.push(
        {
          kind: "inspect_schema",
          action: `Call describe_tool with name="${toolName}" to review the accepted arguments.`,
          tool: "describe_tool",
        },
        {
          kind: "fix_arguments",
          action: `Correct the arguments and call ${toolName} again; validate_args checks them without side effects.`,
          tool: "validate_args",
        },
      );
      break;
    case "authorization": {
      const protectedRef = context.protectedRef ?? "the protected branch";
      steps.push(
        {
          kind: "target_unprotected_ref",
          action: `Target a branch other than ${protectedRef}; mutations of other branches do not need authorization.`,
        },
        {
          kind: "authorize_mutations",
          action: `Call authorize_mutations with allowed=true before mutating ${protectedRef} or calls without a target branch.`,
          tool: "authorize_mutations",
        },
      );
      break;
    }
    case "timeout":
      steps.push(
        { kind: "retry_with_longer_timeout", action: `Retry ${toolName} with a longer timeout.` },
        { kind: "reduce_scope", action: "Narrow the request (fewer files, smaller ranges, shorter commands) so it completes sooner." },
      );
      break;
    case "upstream":
      if (context.credentialsPresent === false) {
        steps.push({
          kind: "configure_credentials",
          action: "No remote credential is configured; set GITHUB_TOKEN (or GH_TOKEN) and restart the server.",
        });
      }
      if (origin !== "external_platform") {
        steps.push(...fallbackStep(toolName, context.fallbackTool));
      }
      steps.push({ kind: "retry_later", action: "Retry after a short delay; the upstream dependency reported a failure." });
      break;
    case "unknown":
      break;
  }

  steps.push({
    kind: "inspect_recent_errors",
    action: "Call get_recent_errors to inspect the recorded failure details.",
    tool: "get_recent_errors",
  });
  return steps;
}
