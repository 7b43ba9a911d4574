/**
 * Error taxonomy.
 *
 * Every failure is one of four categories:
 * - validation: bad input, rejected before any mutation
 * - state: the operation does not apply to the current state
 * - concurrency: re-entry into a guarded operation
 * - authorization: the caller is not authorized as the required principal
 *
 * Each code belongs to exactly one category. Errors are always thrown,
 * never returned silently.
 */

export type ErrorCategory = "validation" | "state" | "concurrency" | "authorization";

export type ValidationErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_DURATION"
  | "INVALID_MAX_LOSS"
  | "INVALID_PENALTY"
  | "INVALID_COMMITMENT_TYPE"
  | "INVALID_ATTESTATION_TYPE"
  | "INVALID_PERCENT"
  | "SELF_TRANSFER"
  | "EMPTY_BATCH"
  | "BATCH_TOO_LARGE";

export type StateErrorCode =
  | "NOT_INITIALIZED"
  | "ALREADY_INITIALIZED"
  | "NOT_FOUND"
  | "TOKEN_NOT_FOUND"
  | "NOT_OWNER"
  | "ALREADY_SETTLED"
  | "ALREADY_EXITED"
  | "NOT_EXPIRED"
  | "TABLE_ALREADY_OPEN";

export type ConcurrencyErrorCode = "REENTRANCY_DETECTED";

export type AuthorizationErrorCode = "UNAUTHORIZED";

export type DomainErrorCode =
  | ValidationErrorCode
  | StateErrorCode
  | ConcurrencyErrorCode
  | AuthorizationErrorCode;

export const ERROR_CATEGORIES: Readonly<Record<DomainErrorCode, ErrorCategory>> = {
  INVALID_AMOUNT: "validation",
  INVALID_DURATION: "validation",
  INVALID_MAX_LOSS: "validation",
  INVALID_PENALTY: "validation",
  INVALID_COMMITMENT_TYPE: "validation",
  INVALID_ATTESTATION_TYPE: "validation",
  INVALID_PERCENT: "validation",
  SELF_TRANSFER: "validation",
  EMPTY_BATCH: "validation",
  BATCH_TOO_LARGE: "validation",
  NOT_INITIALIZED: "state",
  ALREADY_INITIALIZED: "state",
  NOT_FOUND: "state",
  TOKEN_NOT_FOUND: "state",
  NOT_OWNER: "state",
  ALREADY_SETTLED: "state",
  ALREADY_EXITED: "state",
  NOT_EXPIRED: "state",
  TABLE_ALREADY_OPEN: "state",
  REENTRANCY_DETECTED: "concurrency",
  UNAUTHORIZED: "authorization",
} as const;

/**
 * Base class of every error the domain packages throw.
 */
export class DomainError<C extends DomainErrorCode = DomainErrorCode> extends Error {
  public readonly code: C;
  public readonly category: ErrorCategory;

  constructor(code: C, message: string) {
    super(message);
    this.name = "DomainError";
    this.code = code;
    this.category = ERROR_CATEGORIES[code];
  }
}

/**
 * Thrown by an AuthorizationProvider when the ambient caller is not
 * authorized as the requested principal.
 */
export class AuthorizationError extends DomainError<AuthorizationErrorCode> {
  public readonly principal: string;

  constructor(principal: string, message?: string) {
    super("UNAUTHORIZED", message ?? `Caller is not authorized as "${principal}"`);
    this.name = "AuthorizationError";
    this.principal = principal;
  }
}
