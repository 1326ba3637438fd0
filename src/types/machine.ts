/**
 * MachineProvider の型定義
 * 汎用的な VM ライフサイクル（作成 / 取得 / 削除 / 一覧）
 */

import type { OperationOptions } from "./common.js";

/** VM の電源状態 */
export type ServerState = "starting" | "running" | "stopped" | "deleting" | "unknown";

/**
 * ネットワーク対応プロバイダ向けの配置情報
 * NIC と隔離境界（リソースグループ）は EnsureNetwork で事前に作成済みであること
 */
export interface ServerPlacement {
  resourceGroup: string;
  networkInterfaceId: string;
}

/**
 * VM 作成パラメータ
 */
export interface CreateServerRequest {
  name: string;
  serverType: string;
  image: string;
  location: string;
  sshKeys: string[];
  /** cloud-init ドキュメント（プレーンテキスト。エンコードはプロバイダ側の責務） */
  userData: string;
  labels: Record<string, string>;
  placement?: ServerPlacement;
}

/**
 * プロビジョニング済みの VM
 */
export interface Server {
  id: string;
  name: string;
  location: string;
  state: ServerState;
  labels: Record<string, string>;
  publicIpv4?: string;
}

/**
 * 汎用 VM ライフサイクル
 * ガード固有のネットワーク操作は GuardProvider が拡張する
 */
export interface MachineProvider {
  createServer(req: CreateServerRequest, options?: OperationOptions): Promise<Server>;
  getServer(serverId: string, options?: OperationOptions): Promise<Server>;
  deleteServer(serverId: string, options?: OperationOptions): Promise<void>;
  waitForServer(serverId: string, state: ServerState, options?: OperationOptions): Promise<void>;
  listServers(filters: Record<string, string>, options?: OperationOptions): Promise<Server[]>;
}
