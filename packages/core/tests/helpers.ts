/**
 * Shared fixtures for commitment ledger tests.
 */

import { AllowAllAuthorization, InMemoryDurableStore, ManualClock } from "@commitlock/host";
import { InMemoryEventStore } from "@commitlock/event-store";
import { OwnershipRegistry } from "@commitlock/registry";
import type {
  AuthorizationProvider,
  CommitmentRules,
  DiagnosticLogger,
  EventSink,
} from "@commitlock/types";
import { CommitmentLedger } from "../src/commitment-ledger.js";

export const LEDGER_ADDRESS = "ledger";
export const ADMIN = "admin";
export const START = 1_700_000_000;

export interface LedgerFixture {
  readonly ledger: CommitmentLedger;
  readonly registry: OwnershipRegistry;
  readonly events: InMemoryEventStore;
  readonly clock: ManualClock;
}

export interface FixtureOptions {
  readonly auth?: AuthorizationProvider;
  readonly ledgerEvents?: EventSink;
  readonly logger?: DiagnosticLogger;
  readonly initialize?: boolean;
  readonly clock?: ManualClock;
}

/** Moves one second forward every time it is read. */
export class TickingClock extends ManualClock {
  override now(): number {
    const current = super.now();
    this.advance(1);
    return current;
  }
}

export function makeLedger(options: FixtureOptions = {}): LedgerFixture {
  const auth = options.auth ?? new AllowAllAuthorization();
  const store = new InMemoryDurableStore();
  const clock = options.clock ?? new ManualClock(START);
  const events = new InMemoryEventStore({ clock });

  const registry = new OwnershipRegistry({ auth, store, events, clock });
  registry.initialize(LEDGER_ADDRESS);

  const ledger = new CommitmentLedger({
    address: LEDGER_ADDRESS,
    auth,
    store,
    events: options.ledgerEvents ?? events,
    clock,
    registry,
    logger: options.logger,
  });
  if (options.initialize ?? true) {
    ledger.initialize(ADMIN);
  }

  return { ledger, registry, events, clock };
}

export function rules(overrides: Partial<CommitmentRules> = {}): CommitmentRules {
  return {
    durationDays: 30,
    maxLossPercent: 10,
    commitmentType: "balanced",
    earlyExitPenaltyPercent: 5,
    minFeeThreshold: 0n,
    gracePeriodDays: 0,
    ...overrides,
  };
}
