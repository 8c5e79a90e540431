import type { ZodIssue } from "zod";

export class ConfigError extends Error {
  readonly issues: readonly ZodIssue[];

  constructor(issues: readonly ZodIssue[]) {
    const details = issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    super(`Invalid simulation config: ${details}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Raised when the simulation observes a state it can never legally reach,
 * e.g. water catching fire. Indicates a logic defect, never operator input.
 */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantError";
  }
}

/** Throws only when `enabled`; release builds of the host skip the check. */
export function assertInvariant(
  enabled: boolean,
  condition: boolean,
  message: string | (() => string)
): void {
  if (!enabled || condition) return;
  throw new InvariantError(typeof message === "string" ? message : message());
}
