/**
 * 型定義のエクスポート
 */

// Common
export type { OperationOptions, Tags, ResourceKind, ResourceRef } from "./common.js";

// Guard
export type {
  GuardId,
  GuardStatus,
  Guard,
  PeeringInfo,
  CreateGuardRequest,
  PeerGuardRequest,
} from "./guard.js";

// ネットワーク
export type {
  NetworkRequest,
  NetworkInfo,
  NsgRuleRequest,
  RuleProtocol,
  ObservedRuleProtocol,
  RuleDirection,
  RuleClass,
  PeerRequest,
  PeerResult,
  ReversePeeringState,
} from "./network.js";

// Machine
export type {
  ServerState,
  ServerPlacement,
  CreateServerRequest,
  Server,
  MachineProvider,
} from "./machine.js";
