/**
 * @commitlock/attestation: Compliance engine.
 *
 * Attestations, a running compliance score moved by them, and a score
 * recomputed from the commitment ledger's snapshot. The two scores are
 * independent.
 */

export { ComplianceEngine } from "./compliance-engine.js";

export {
  attestationDelta,
  clampScore,
  computeDrawdownPercent,
  COMPLIANT_ATTESTATION_BONUS,
  DEFAULT_SEVERITY_PENALTY,
  EXCESS_DRAWDOWN_WEIGHT,
  INITIAL_SCORE,
  isWithinMaxLoss,
  MAX_SCORE,
  MIN_SCORE,
  scoreSnapshot,
  SEVERITY_PENALTIES,
  severityPenalty,
  UNEXPIRED_BONUS,
} from "./scoring.js";

export { ComplianceError } from "./types.js";
export type {
  CommitmentReader,
  ComplianceEngineOptions,
  ComplianceErrorCode,
  EngineConfig,
  HealthRecord,
} from "./types.js";
