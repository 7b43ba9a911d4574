/**
 * Type barrel: re-exports all public types from @commitlock/node.
 */

// DTOs
export {
  AmountSchema,
  AttestSchema,
  AttestationTypeSchema,
  BatchModeSchema,
  BatchTransferSchema,
  CommitmentRulesSchema,
  CommitmentTypeSchema,
  CreateCommitmentSchema,
  ListAttestationsQuerySchema,
  ListCommitmentsQuerySchema,
  PrincipalSchema,
  RecordDrawdownSchema,
  RecordFeesSchema,
  TokenIdSchema,
  TransferSchema,
  UpdateValueSchema,
} from "./dto.js";
export type {
  AttestDto,
  BatchTransferDto,
  CreateCommitmentDto,
  ListAttestationsQuery,
  ListCommitmentsQuery,
  RecordDrawdownDto,
  RecordFeesDto,
  TransferDto,
  UpdateValueDto,
} from "./dto.js";

// Views
export {
  toBatchResultView,
  toCommitmentView,
  toHealthMetricsView,
  toTokenView,
} from "./views.js";
export type { CommitmentStatusView, CommitmentView } from "./views.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Auth
export { ROLE_PERMISSIONS, hasPermission } from "./auth.js";
export type { Role, Permission, AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
