import type { ErrorCategory } from "../errors/taxonomy.js";
import type { RemediationStep } from "../errors/remediation.js";

const CATEGORY_TITLES: Record<ErrorCategory, string> = {
  validation: "Invalid arguments",
  authorization: "Write not authorized",
  timeout: "Call timed out",
  upstream: "Upstream dependency failed",
  unknown: "Unexpected failure",
};

/** Number of remediation actions quoted in a user message. */
const MAX_QUOTED_STEPS = 3;

export interface FailureSummaryInput {
  category: ErrorCategory;
  tool: string;
  message: string;
  remediation_steps: readonly RemediationStep[];
}

/**
 * Human-readable rendering of a failure: a title line followed by the first
 * remediation actions as a numbered list.
 */
export function buildUserMessage(failure: FailureSummaryInput): string {
  const lines = [`${CATEGORY_TITLES[failure.category]} (${failure.tool}): ${failure.message}`];
  const steps = failure.remediation_steps.slice(0, MAX_QUOTED_STEPS);
  if (steps.length > 0) {
    lines.push("Next steps:");
    steps.forEach((step, index) => lines.push(`${index + 1}. ${step.action}`));
  }
  return lines.join("\n");
}
