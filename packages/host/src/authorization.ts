/**
 * Authorization providers.
 *
 * - AllowAllAuthorization: every principal is authorized; each check is
 *   recorded so tests can assert who had to authorize
 * - ContextAuthorization: a stack of frames, each holding the principals
 *   authorized for the duration of one call
 */

import { AuthorizationError } from "@commitlock/types";
import type { Address, AuthorizationProvider } from "@commitlock/types";

export class AllowAllAuthorization implements AuthorizationProvider {
  private readonly _checked: Address[] = [];

  requireAuth(principal: Address): void {
    this._checked.push(principal);
  }

  invokeAs<T>(_principal: Address, operation: () => T): T {
    return operation();
  }

  /** Principals whose authorization was required, in call order. */
  get checked(): readonly Address[] {
    return [...this._checked];
  }

  reset(): void {
    this._checked.length = 0;
  }
}

export class ContextAuthorization implements AuthorizationProvider {
  private readonly _frames: ReadonlySet<Address>[] = [];

  requireAuth(principal: Address): void {
    if (!this.isAuthorized(principal)) {
      throw new AuthorizationError(principal);
    }
  }

  invokeAs<T>(principal: Address, operation: () => T): T {
    return this.runAs([principal], operation);
  }

  /**
   * Run `operation` with `principals` authorized. Frames nest; an inner
   * frame adds to the principals of the frames around it.
   */
  runAs<T>(principals: readonly Address[], operation: () => T): T {
    this._frames.push(new Set(principals));
    try {
      return operation();
    } finally {
      this._frames.pop();
    }
  }

  isAuthorized(principal: Address): boolean {
    return this._frames.some((frame) => frame.has(principal));
  }

  get depth(): number {
    return this._frames.length;
  }
}
