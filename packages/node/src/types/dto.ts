/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type. Shapes are
 * checked here; domain rules (ranges, ownership, lifecycle) are left to
 * the components so their error codes reach the client. The one range
 * checked here is the duration cap, past which expiry times stop being
 * exact JSON numbers.
 *
 * Amounts travel as decimal strings and are parsed to bigint.
 */

import { z } from "zod";
import { BATCH_MODES } from "@commitlock/primitives";
import { ATTESTATION_TYPES, COMMITMENT_TYPES, MAX_DURATION_DAYS } from "@commitlock/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AmountSchema = z
  .string()
  .regex(/^\d{1,39}$/, "Expected a non-negative integer string")
  .transform((value) => BigInt(value));

export const PrincipalSchema = z.string().min(1).max(256);

export const CommitmentTypeSchema = z.enum(COMMITMENT_TYPES);

export const AttestationTypeSchema = z.enum(ATTESTATION_TYPES);

export const BatchModeSchema = z.enum(BATCH_MODES);

// =============================================================================
// Commitment DTOs
// =============================================================================

export const CommitmentRulesSchema = z.object({
  durationDays: z.number().int().max(MAX_DURATION_DAYS),
  maxLossPercent: z.number().int(),
  commitmentType: CommitmentTypeSchema,
  earlyExitPenaltyPercent: z.number().int(),
  minFeeThreshold: AmountSchema.default("0"),
  gracePeriodDays: z.number().int().min(0).default(0),
});

export const CreateCommitmentSchema = z.object({
  amount: AmountSchema,
  asset: PrincipalSchema,
  rules: CommitmentRulesSchema,
});

export type CreateCommitmentDto = z.infer<typeof CreateCommitmentSchema>;

export const UpdateValueSchema = z.object({
  value: AmountSchema,
});

export type UpdateValueDto = z.infer<typeof UpdateValueSchema>;

export const ListCommitmentsQuerySchema = z.object({
  owner: PrincipalSchema.optional(),
  status: z.enum(["active", "settled", "early_exit"]).optional(),
});

export type ListCommitmentsQuery = z.infer<typeof ListCommitmentsQuerySchema>;

// =============================================================================
// Token DTOs
// =============================================================================

export const TokenIdSchema = z.coerce.number().int().positive();

export const TransferSchema = z.object({
  to: PrincipalSchema,
});

export type TransferDto = z.infer<typeof TransferSchema>;

export const BatchTransferSchema = z.object({
  mode: BatchModeSchema,
  transfers: z.array(
    z.object({
      /** Defaults to the caller. */
      from: PrincipalSchema.optional(),
      to: PrincipalSchema,
      tokenId: z.number().int().positive(),
    }),
  ),
});

export type BatchTransferDto = z.infer<typeof BatchTransferSchema>;

// =============================================================================
// Compliance DTOs
// =============================================================================

export const AttestSchema = z.object({
  attestationType: AttestationTypeSchema,
  data: z.record(z.string()).default({}),
  isCompliant: z.boolean(),
});

export type AttestDto = z.infer<typeof AttestSchema>;

export const ListAttestationsQuerySchema = z.object({
  type: AttestationTypeSchema.optional(),
});

export type ListAttestationsQuery = z.infer<typeof ListAttestationsQuerySchema>;

export const RecordFeesSchema = z.object({
  amount: AmountSchema,
});

export type RecordFeesDto = z.infer<typeof RecordFeesSchema>;

export const RecordDrawdownSchema = z.object({
  percent: z.number(),
});

export type RecordDrawdownDto = z.infer<typeof RecordDrawdownSchema>;
