/**
 * packages/core/src/errors.ts — Error codes and error type for Sprig.
 *
 * Why: Every violation the reconciler can detect is surfaced as a SprigError
 * carrying a deterministic code, so callers and tests can match on the code
 * instead of on message text.
 *
 * Taxonomy:
 *   - Invariant violations (stream/storage/stack misalignment) are fatal.
 *   - Platform failures abort the patch application that hit them.
 *   - User-code throws (update, effects) are wrapped and fatal.
 */

/**
 * Deterministic error codes for all runtime violations.
 */
export type SprigErrorCode =
  | "SPRIG_UNBALANCED_STREAM"
  | "SPRIG_STORAGE_MISALIGNED"
  | "SPRIG_SLOT_TAKEN"
  | "SPRIG_SCOPE_UNDERFLOW"
  | "SPRIG_NOT_AN_ELEMENT"
  | "SPRIG_PLATFORM_ERROR"
  | "SPRIG_USER_CODE_THROW"
  | "SPRIG_INVALID_STATE"
  | "SPRIG_INVALID_CONFIG";

/**
 * Error class for all deterministic runtime violations.
 * The `code` property identifies the specific violation.
 */
export class SprigError extends Error {
  override readonly name = "SprigError";
  readonly code: SprigErrorCode;

  constructor(code: SprigErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SprigError);
    }
  }
}

export function isSprigError(v: unknown): v is SprigError {
  return v instanceof SprigError;
}

export function describeThrown(v: unknown): string {
  if (v instanceof Error) return `${v.name}: ${v.message}`;
  return String(v);
}
