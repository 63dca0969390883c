/**
 * @footfall/core - Error Classes
 *
 * Typed error hierarchy for footfall. Only startup-time configuration
 * handling throws these; per-request operations recover locally.
 */

/**
 * Base error class for all footfall errors.
 * Provides a `code` field for programmatic error handling.
 */
export class FootfallError extends Error {
  /** Machine-readable error code */
  public readonly code: string;
  /** Additional error context */
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string = "FOOTFALL_ERROR",
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "FootfallError";
    this.code = code;
    this.details = details;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /** Serialize error to a JSON-friendly object. */
  toJSON(): Record<string, unknown> {
    return {
      error: {
        code: this.code,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
      },
    };
  }
}

/**
 * Thrown when the FootfallConfig fails validation at startup.
 */
export class InvalidConfigError extends FootfallError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Invalid footfall configuration: ${message}`, "INVALID_CONFIG", details);
    this.name = "InvalidConfigError";
  }
}

/** One problem found while validating a rule list. */
export interface RuleIssue {
  /** Position of the offending rule in its list */
  index: number;
  /** Human-readable description */
  message: string;
}

/**
 * Thrown when a static rule list cannot be used. Raised only while the
 * configuration is loaded, never while a request is evaluated.
 */
export class InvalidRuleError extends FootfallError {
  /** Every problem found in the rule list */
  public readonly issues: RuleIssue[];

  constructor(listName: string, issues: RuleIssue[]) {
    super(
      `Invalid rules in "${listName}": ${issues.map((i) => `#${i.index} ${i.message}`).join("; ")}`,
      "INVALID_RULE",
      { list: listName, issues },
    );
    this.name = "InvalidRuleError";
    this.issues = issues;
  }
}

/**
 * Render an unknown thrown value as a message, for logging.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return typeof err === "string" ? err : "Unknown error";
}
