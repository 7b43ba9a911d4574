/**
 * Test helpers for @commitlock/node.
 *
 * Provides a test app factory that creates a Hono app with
 * all middleware and routes, but no HTTP server.
 */

import { ManualClock } from "@commitlock/host";
import { createApp } from "../src/app.js";
import type { AppInstance, CreateAppOptions } from "../src/app.js";

export const ADMIN = "admin";
export const START = 1_700_000_000;
export const DAY = 86_400;

export interface TestApp extends AppInstance {
  readonly clock: ManualClock;
}

/**
 * Create a test app in unsecured mode with a manual clock.
 */
export function createTestApp(overrides: Partial<CreateAppOptions> = {}): TestApp {
  const clock = new ManualClock(START);
  const instance = createApp({
    serviceConfig: { adminPrincipal: ADMIN, clock },
    ...overrides,
  });
  return { ...instance, clock };
}

/**
 * JSON request helper.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

/** Acting principal header for unsecured mode. */
export function as(principal: string): Record<string, string> {
  return { "X-Principal": principal };
}

export const BALANCED_RULES = {
  durationDays: 30,
  maxLossPercent: 10,
  commitmentType: "balanced",
  earlyExitPenaltyPercent: 5,
} as const;

/**
 * POST a commitment owned by `owner` and return its id and token id.
 */
export async function createCommitment(
  app: AppInstance["app"],
  owner: string,
  amount: string = "1000",
  rules: Record<string, unknown> = BALANCED_RULES,
): Promise<{ id: string; tokenId: number }> {
  const res = await app.request(
    jsonRequest("/api/v1/commitments", "POST", { amount, asset: "asset-usd", rules }, as(owner)),
  );
  if (res.status !== 201) {
    throw new Error(`Commitment creation failed with ${res.status}: ${await res.text()}`);
  }
  const body = (await res.json()) as { data: { id: string; tokenId: number } };
  return { id: body.data.id, tokenId: body.data.tokenId };
}
