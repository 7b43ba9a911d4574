/**
 * Tests for runtime type guards and the error taxonomy.
 */

import { describe, it, expect } from "vitest";
import {
  AuthorizationError,
  DomainError,
  ERROR_CATEGORIES,
  MAX_DURATION_DAYS,
  isAttestationType,
  isCommitmentType,
  isDomainError,
  isDurationDays,
  isPercent,
} from "../src/index.js";

describe("isCommitmentType", () => {
  it("accepts the three risk profiles", () => {
    expect(isCommitmentType("safe")).toBe(true);
    expect(isCommitmentType("balanced")).toBe(true);
    expect(isCommitmentType("aggressive")).toBe(true);
  });

  it("rejects other strings and non-strings", () => {
    expect(isCommitmentType("reckless")).toBe(false);
    expect(isCommitmentType("SAFE")).toBe(false);
    expect(isCommitmentType(1)).toBe(false);
    expect(isCommitmentType(null)).toBe(false);
  });
});

describe("isAttestationType", () => {
  it("accepts every attestation type", () => {
    for (const t of ["health_check", "violation", "fee_generation", "drawdown", "other"]) {
      expect(isAttestationType(t)).toBe(true);
    }
  });

  it("rejects unknown types", () => {
    expect(isAttestationType("audit")).toBe(false);
    expect(isAttestationType(undefined)).toBe(false);
  });
});

describe("isPercent", () => {
  it("accepts integers between 0 and 100", () => {
    expect(isPercent(0)).toBe(true);
    expect(isPercent(100)).toBe(true);
  });

  it("rejects out-of-range and fractional values", () => {
    expect(isPercent(101)).toBe(false);
    expect(isPercent(-1)).toBe(false);
    expect(isPercent(12.5)).toBe(false);
    expect(isPercent("10")).toBe(false);
  });
});

describe("isDurationDays", () => {
  it("accepts whole days from 1 to 2^32 - 1", () => {
    expect(isDurationDays(1)).toBe(true);
    expect(isDurationDays(MAX_DURATION_DAYS)).toBe(true);
    expect(MAX_DURATION_DAYS).toBe(2 ** 32 - 1);
  });

  it("rejects zero, fractions and values past the cap", () => {
    expect(isDurationDays(0)).toBe(false);
    expect(isDurationDays(1.5)).toBe(false);
    expect(isDurationDays(MAX_DURATION_DAYS + 1)).toBe(false);
    expect(isDurationDays(1e300)).toBe(false);
  });
});

describe("DomainError", () => {
  it("derives the category from the code", () => {
    expect(new DomainError("INVALID_AMOUNT", "x").category).toBe("validation");
    expect(new DomainError("NOT_EXPIRED", "x").category).toBe("state");
    expect(new DomainError("REENTRANCY_DETECTED", "x").category).toBe("concurrency");
  });

  it("maps every code to exactly one category", () => {
    const categories = new Set(Object.values(ERROR_CATEGORIES));
    expect([...categories].sort()).toEqual([
      "authorization",
      "concurrency",
      "state",
      "validation",
    ]);
  });

  it("is recognized by the guards", () => {
    const err = new DomainError("NOT_FOUND", "missing");
    expect(isDomainError(err)).toBe(true);
    expect(isDomainError(new Error("plain"))).toBe(false);
  });
});

describe("AuthorizationError", () => {
  it("carries the principal and the authorization category", () => {
    const err = new AuthorizationError("alice");
    expect(err).toBeInstanceOf(DomainError);
    expect(err.code).toBe("UNAUTHORIZED");
    expect(err.category).toBe("authorization");
    expect(err.principal).toBe("alice");
    expect(err.message).toBe('Caller is not authorized as "alice"');
    expect(err.name).toBe("AuthorizationError");
  });
});
