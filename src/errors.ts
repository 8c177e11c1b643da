import type { ZodError } from "zod";

/**
 * Malformed suite manifest or run request. Raised before any case executes.
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly caseName: string | null = null,
    public readonly issues: string[] = []
  ) {
    super(issues.length ? `${message}\n${issues.map((issue) => `  - ${issue}`).join("\n")}` : message);
    this.name = "ValidationError";
  }

  /**
   * `caseNameAt` maps a `cases[i]` issue back to the name declared in the raw manifest.
   */
  static fromZod(
    source: string,
    error: ZodError,
    caseNameAt: (index: number) => string | null = () => null
  ): ValidationError {
    const issues = error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    const casePath = error.issues
      .map((issue) => issue.path)
      .find((path) => path[0] === "cases" && typeof path[1] === "number");
    let caseName: string | null = null;
    if (casePath && typeof casePath[1] === "number") {
      caseName = caseNameAt(casePath[1]) ?? `#${casePath[1]}`;
    }
    const subject = caseName ? ` (case "${caseName}")` : "";
    return new ValidationError(`Invalid ${source}${subject}`, caseName, issues);
  }
}

/**
 * The infrastructure could not produce or destroy a session. Aborts the remaining run.
 */
export class ProvisioningError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProvisioningError";
  }
}

/**
 * Artifact injection or runtime boot failed for one case. The case is recorded as `error`.
 */
export class CaseSetupError extends Error {
  constructor(
    public readonly caseName: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`[${caseName}] ${message}`, options);
    this.name = "CaseSetupError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
