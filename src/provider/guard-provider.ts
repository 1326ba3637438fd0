/**
 * GuardProvider
 * エンジンが依存する唯一の境界（VM + ネットワーク + 発見 + ピアリング）
 */

import type {
  Guard,
  GuardId,
  MachineProvider,
  NetworkInfo,
  NetworkRequest,
  NsgRuleRequest,
  OperationOptions,
  PeerRequest,
  PeerResult,
} from "../types/index.js";
import type { ResourceNames } from "../tags/index.js";
import type { ResourceGroupRecord } from "../cloud/arm-client.js";

export interface GuardProvider extends MachineProvider {
  readonly name: Guard["provider"];

  /** 設定済みのリソースグループ接頭辞で導出したリソース名 */
  namesFor(guardId: string): ResourceNames;

  ensureNetwork(req: NetworkRequest, options?: OperationOptions): Promise<NetworkInfo>;
  configureNicForwarding(nicId: string, options?: OperationOptions): Promise<void>;
  ensureNsgRule(req: NsgRuleRequest, options?: OperationOptions): Promise<void>;
  cleanupNetwork(guardId: string, options?: OperationOptions): Promise<void>;

  /** 隔離境界のみを確認（サブリソースは読まない） */
  getBoundary(guardId: GuardId, options?: OperationOptions): Promise<ResourceGroupRecord>;
  getGuard(guardId: GuardId, options?: OperationOptions): Promise<Guard>;
  listGuards(options?: OperationOptions): Promise<Guard[]>;

  peerNetwork(req: PeerRequest, options?: OperationOptions): Promise<PeerResult>;
  unpeerNetwork(guardId: string, peeringName: string, options?: OperationOptions): Promise<void>;
}
