/**
 * @commitlock/host: In-process implementations of the collaborators
 * every component is constructed with: durable storage, authorization,
 * clocks and the violation oracle.
 */

export { InMemoryDurableStore, StoreError } from "./durable-store.js";
export { AllowAllAuthorization, ContextAuthorization } from "./authorization.js";
export { ManualClock, SystemClock } from "./clock.js";
export { StaticViolationOracle } from "./violation-oracle.js";
