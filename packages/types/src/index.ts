/**
 * @commitlock/types: Shared domain types for the Commitlock stack.
 *
 * Used across all packages:
 * - Commitments, rules and lifecycle status
 * - Ownership tokens and their metadata
 * - Attestations and health metrics
 * - Collaborator interfaces (auth, storage, events, clock, oracle)
 * - Error taxonomy
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Status sets are closed tagged variants, matched exhaustively
 */

export type { Address, Timestamp } from "./primitives.js";
export { SECONDS_PER_DAY, assertNever } from "./primitives.js";

export type {
  Commitment,
  CommitmentRules,
  CommitmentStatus,
  CommitmentStatusKind,
  CommitmentType,
} from "./commitment.js";
export { COMMITMENT_TYPES, MAX_DURATION_DAYS } from "./commitment.js";

export type {
  MintRequest,
  OwnershipRecord,
  TokenMetadata,
  TokenStatus,
} from "./token.js";

export type {
  Attestation,
  AttestationType,
  HealthMetrics,
} from "./attestation.js";
export { ATTESTATION_TYPES } from "./attestation.js";

export type {
  AuthorizationProvider,
  Clock,
  DiagnosticLogger,
  DurableStore,
  EventPayload,
  EventSink,
  JsonValue,
  StorageTier,
  StoreKey,
  StoreTable,
  ViolationOracle,
} from "./collaborators.js";

export type {
  AuthorizationErrorCode,
  ConcurrencyErrorCode,
  DomainErrorCode,
  ErrorCategory,
  StateErrorCode,
  ValidationErrorCode,
} from "./errors.js";
export { AuthorizationError, DomainError, ERROR_CATEGORIES } from "./errors.js";

export {
  isAttestationType,
  isCommitmentType,
  isDomainError,
  isDurationDays,
  isPercent,
} from "./guards.js";
