/**
 * Shared fixtures for registry tests.
 */

import { AllowAllAuthorization, InMemoryDurableStore, ManualClock } from "@commitlock/host";
import { InMemoryEventStore } from "@commitlock/event-store";
import type { AuthorizationProvider, MintRequest } from "@commitlock/types";
import { OwnershipRegistry } from "../src/ownership-registry.js";

export const ADMIN = "ledger";
export const START = 1_000;

export interface RegistryFixture {
  readonly registry: OwnershipRegistry;
  readonly events: InMemoryEventStore;
  readonly clock: ManualClock;
}

export function makeRegistry(
  options: { auth?: AuthorizationProvider; maxBatchSize?: number } = {},
): RegistryFixture {
  const clock = new ManualClock(START);
  const events = new InMemoryEventStore({ clock });
  const registry = new OwnershipRegistry({
    auth: options.auth ?? new AllowAllAuthorization(),
    store: new InMemoryDurableStore(),
    events,
    clock,
    maxBatchSize: options.maxBatchSize,
  });
  registry.initialize(ADMIN);
  return { registry, events, clock };
}

export function mintRequest(overrides: Partial<MintRequest> = {}): MintRequest {
  return {
    commitmentId: "commitment-1",
    durationDays: 30,
    maxLossPercent: 10,
    commitmentType: "balanced",
    earlyExitPenaltyPercent: 5,
    initialAmount: 1_000n,
    asset: "asset-usd",
    ...overrides,
  };
}

/** Mint one token per owner, in order. Returns the token ids. */
export function mintTo(registry: OwnershipRegistry, owners: readonly string[]): number[] {
  return owners.map((owner, i) =>
    registry.mint(owner, mintRequest({ commitmentId: `commitment-${i + 1}` })),
  );
}
