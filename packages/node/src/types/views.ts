/**
 * Response shapes.
 *
 * Domain records carry bigint values; JSON cannot. Every bigint is sent
 * as its decimal string.
 */

import type { BatchTransferResult } from "@commitlock/registry";
import type {
  Commitment,
  CommitmentStatus,
  HealthMetrics,
  OwnershipRecord,
} from "@commitlock/types";
import { assertNever } from "@commitlock/types";

export type CommitmentStatusView =
  | { readonly kind: "active" }
  | { readonly kind: "settled"; readonly settledAt: number }
  | { readonly kind: "early_exit"; readonly exitedAt: number; readonly penalty: string };

export interface CommitmentView {
  readonly id: string;
  readonly owner: string;
  readonly tokenId: number;
  readonly rules: {
    readonly durationDays: number;
    readonly maxLossPercent: number;
    readonly commitmentType: string;
    readonly earlyExitPenaltyPercent: number;
    readonly minFeeThreshold: string;
    readonly gracePeriodDays: number;
  };
  readonly amount: string;
  readonly asset: string;
  readonly createdAt: number;
  readonly expiresAt: number;
  readonly currentValue: string;
  readonly status: CommitmentStatusView;
}

function statusView(status: CommitmentStatus): CommitmentStatusView {
  switch (status.kind) {
    case "active":
      return { kind: "active" };
    case "settled":
      return { kind: "settled", settledAt: status.settledAt };
    case "early_exit":
      return { kind: "early_exit", exitedAt: status.exitedAt, penalty: status.penalty.toString() };
    default:
      return assertNever(status);
  }
}

export function toCommitmentView(commitment: Commitment): CommitmentView {
  return {
    id: commitment.id,
    owner: commitment.owner,
    tokenId: commitment.tokenId,
    rules: {
      ...commitment.rules,
      minFeeThreshold: commitment.rules.minFeeThreshold.toString(),
    },
    amount: commitment.amount.toString(),
    asset: commitment.asset,
    createdAt: commitment.createdAt,
    expiresAt: commitment.expiresAt,
    currentValue: commitment.currentValue.toString(),
    status: statusView(commitment.status),
  };
}

export function toTokenView(record: OwnershipRecord) {
  return {
    tokenId: record.tokenId,
    owner: record.owner,
    isActive: record.status.kind === "active",
    status: record.status,
    metadata: {
      ...record.metadata,
      initialAmount: record.metadata.initialAmount.toString(),
    },
  };
}

export function toHealthMetricsView(metrics: HealthMetrics) {
  return {
    commitmentId: metrics.commitmentId,
    initialValue: metrics.initialValue.toString(),
    currentValue: metrics.currentValue.toString(),
    drawdownPercent: metrics.drawdownPercent.toString(),
    feesGenerated: metrics.feesGenerated.toString(),
    volatilityExposure: metrics.volatilityExposure.toString(),
    lastAttestation: metrics.lastAttestation,
    complianceScore: metrics.complianceScore,
  };
}

export function toBatchResultView(result: BatchTransferResult) {
  return {
    mode: result.mode,
    succeeded: result.succeeded,
    transferred: result.transferred,
    failures: result.failures.map((f) => ({
      index: f.index,
      code: f.error.code,
      message: f.error.message,
    })),
  };
}
