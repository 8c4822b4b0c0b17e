/**
 * Error types surfaced by the token workflow.
 *
 * Every fatal failure reaches the CLI as one of these, carrying the offending
 * field (input errors) or the workflow step (dependency errors). A rejected
 * revocation is not an error: see `RevokeResult` in workflow.ts.
 */

export type ErrorCode = "INVALID_INPUT" | "DEPENDENCY_FAILURE";

export type WorkflowStep = "signing" | "listing" | "creating" | "revoking";

export class GitHubAppTokenError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "GitHubAppTokenError";
  }
}

export class InvalidInputError extends GitHubAppTokenError {
  constructor(
    public readonly field: string,
    message: string,
  ) {
    super(`${field}: ${message}`, "INVALID_INPUT");
    this.name = "InvalidInputError";
  }
}

export class DependencyFailureError extends GitHubAppTokenError {
  constructor(
    public readonly step: WorkflowStep,
    message: string,
    cause?: unknown,
  ) {
    const detail = cause === undefined ? "" : `: ${describeCause(cause)}`;
    super(`${step} failed: ${message}${detail}`, "DEPENDENCY_FAILURE", { cause });
    this.name = "DependencyFailureError";
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
