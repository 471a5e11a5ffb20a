/* ------------------------------------------------------------------
 * errors.ts  •  Error types for canonical-digest
 * ------------------------------------------------------------------ */

export const INVALID_INPUT_REASONS = [
  "non-finite-number",
  "unsafe-integer",
  "non-string-key",
  "unsupported-type",
  "cycle",
  "depth-exceeded",
  "duplicate-key",
] as const;

/** Why a value could not be canonicalized */
export type InvalidInputReason = (typeof INVALID_INPUT_REASONS)[number];

/**
 * The only error the canonicalizer raises. Always a caller bug: the value
 * handed in is not a JSON value. Never retried.
 */
export class InvalidInputError extends Error {
  constructor(
    public readonly reason: InvalidInputReason,
    public readonly path: string,
    detail: string
  ) {
    super(`${detail} at ${path}`);
    this.name = "InvalidInput";
  }
}

/** Raised when merged configuration fails validation */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
  }
}

export function isInvalidInput(err: unknown): err is InvalidInputError {
  return err instanceof InvalidInputError;
}

/** Best-effort message extraction for logging */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
