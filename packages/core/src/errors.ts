/**
 * Error types for Weft.
 */

// =============================================================================
// WeftErrorCode Union
// =============================================================================

/**
 * Deterministic error codes for runtime violations.
 * These are surfaced as WeftError instances.
 */
export type WeftErrorCode =
  | "WEFT_DUPLICATE_ID"
  | "WEFT_INVALID_DESCRIPTION"
  | "WEFT_INVALID_CONFIG"
  | "WEFT_UNKNOWN_NODE"
  | "WEFT_USER_CODE_THROW"
  | "WEFT_DISPOSED";

/**
 * Fatal outcome of an operation that reports failure as a value instead of
 * throwing (reconciliation).
 */
export type WeftFatal = Readonly<{
  code: WeftErrorCode;
  detail: string;
}>;

/** Result union shared by fallible core operations. */
export type WeftResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; fatal: WeftFatal }>;

// =============================================================================
// WeftError Class
// =============================================================================

/**
 * Error class for all deterministic runtime violations.
 * The `code` property identifies the specific violation.
 */
export class WeftError extends Error {
  override readonly name = "WeftError";
  readonly code: WeftErrorCode;

  constructor(code: WeftErrorCode, message?: string, options?: ErrorOptions) {
    super(message ?? code, options);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, WeftError);
    }
  }
}

/** Raise a fatal result as a WeftError. */
export function throwFatal(fatal: WeftFatal): never {
  throw new WeftError(fatal.code, `${fatal.code}: ${fatal.detail}`);
}
