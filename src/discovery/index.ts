/**
 * Discovery モジュール
 */

export { Discovery, DEFAULT_DISCOVERY_CONCURRENCY } from "./discovery.js";
export type { DiscoveryOptions } from "./discovery.js";
export { deriveGuardStatus, toServerState } from "./status.js";
export type { StatusObservation } from "./status.js";
