/**
 * Shared fixtures for compliance engine tests.
 */

import {
  AllowAllAuthorization,
  InMemoryDurableStore,
  ManualClock,
  StaticViolationOracle,
} from "@commitlock/host";
import { InMemoryEventStore } from "@commitlock/event-store";
import { CommitmentLedger } from "@commitlock/core";
import { OwnershipRegistry } from "@commitlock/registry";
import type { AuthorizationProvider, CommitmentRules } from "@commitlock/types";
import { ComplianceEngine } from "../src/compliance-engine.js";

export const ADMIN = "admin";
export const START = 1_700_000_000;

export interface EngineFixture {
  readonly engine: ComplianceEngine;
  readonly ledger: CommitmentLedger;
  readonly oracle: StaticViolationOracle;
  readonly events: InMemoryEventStore;
  readonly clock: ManualClock;
}

export function makeEngine(
  options: { auth?: AuthorizationProvider; initialize?: boolean } = {},
): EngineFixture {
  const auth = options.auth ?? new AllowAllAuthorization();
  const store = new InMemoryDurableStore();
  const clock = new ManualClock(START);
  const events = new InMemoryEventStore({ clock });
  const oracle = new StaticViolationOracle();

  const registry = new OwnershipRegistry({ auth, store, events, clock });
  registry.initialize("ledger");
  const ledger = new CommitmentLedger({ address: "ledger", auth, store, events, clock, registry });
  ledger.initialize(ADMIN);

  const engine = new ComplianceEngine({
    auth,
    store,
    events,
    clock,
    ledger,
    violations: oracle,
  });
  if (options.initialize ?? true) {
    engine.initialize(ADMIN);
  }

  return { engine, ledger, oracle, events, clock };
}

export function rules(overrides: Partial<CommitmentRules> = {}): CommitmentRules {
  return {
    durationDays: 30,
    maxLossPercent: 10,
    commitmentType: "safe",
    earlyExitPenaltyPercent: 5,
    minFeeThreshold: 100n,
    gracePeriodDays: 3,
    ...overrides,
  };
}

/** Create a commitment of `amount` and report `currentValue` for it. */
export function seedCommitment(
  fixture: EngineFixture,
  amount: bigint,
  currentValue: bigint = amount,
  overrides: Partial<CommitmentRules> = {},
): string {
  const id = fixture.ledger.createCommitment("alice", amount, "asset-usd", rules(overrides));
  if (currentValue !== amount) {
    fixture.ledger.updateValue(id, currentValue);
  }
  return id;
}
