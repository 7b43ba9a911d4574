/**
 * @commitlock/registry: Tokenized ownership of commitments.
 *
 * - mint / transfer / settle / markExited, each under a reentrancy guard
 * - batchTransfer with atomic or best-effort semantics and per-address
 *   aggregation of balance and token-list writes
 */

export { OwnershipRegistry } from "./ownership-registry.js";
export { validateMintRequest } from "./validation.js";
export { RegistryError } from "./types.js";
export type {
  BatchTransferResult,
  OwnershipRegistryOptions,
  RegistryConfig,
  RegistryErrorCode,
  TokenOverlay,
  TransferRequest,
} from "./types.js";
