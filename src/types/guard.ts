/**
 * Guard の型定義
 * Guard はクラウド上のリソースとタグから毎回再構成されるビューであり、ローカルには保存しない
 */

import type { ServerState } from "./machine.js";

/**
 * Guard ID の形式: guard-{UUIDv7}
 * タイムスタンプ順でソート可能
 *
 * @law 形式: guard-{UUIDv7}（例: guard-019471a2-7c8d-7000-8000-000000000001）
 * @law ガードが所有する全リソースの唯一の結合キー。作成後は不変
 * @grounding ランタイムバリデーションで検証
 */
export type GuardId = `guard-${string}`;

/**
 * 導出されたガードの状態
 * @law トランザクショナルな状態ではなく、観測したリソースから毎回導出する
 */
export type GuardStatus =
  | "Provisioning"
  | "Active"
  | "PartiallyCreated"
  | "Stopped"
  | "TearingDown"
  | "Degraded"
  | "Unknown";

/**
 * ピアリング 1 件
 */
export interface PeeringInfo {
  /**
   * ピアリング名
   * @law `<guardID>-peer` で始まる（再発見のためにガード ID から決定的に導出）
   */
  name: string;
  remote_vnet_id: string;
  /** クラウドが報告するピアリング状態（Initiated / Connected / Disconnected） */
  state?: string;
  /** メッシュ経路を伝播した場合のみ */
  route_table_id?: string;
}

/**
 * ガード（WireGuard ゲートウェイ VM とそのネットワーク）
 *
 * 未作成・消失したサブリソースのフィールドは空文字列のまま返す。
 */
export interface Guard {
  /**
   * 通常は GuardId
   * guard-id タグが不正な Degraded エントリでは、タグの生の値またはリソースグループ名
   */
  id: string;
  provider: "azure";
  location: string;
  status: GuardStatus;
  public_ip: string;
  private_ip: string;
  server_id: string;
  /** 隔離境界（リソースグループ）名 */
  resource_group: string;
  resource_group_id: string;
  vnet_id: string;
  subnet_id: string;
  nsg_id: string;
  nic_id: string;
  public_ip_id: string;
  /**
   * メッシュ CIDR
   * @law 順序は保持するが意味を持たない
   */
  mesh_cidrs: string[];
  wireguard_port: number;
  /** VM が存在する場合のみ */
  vm_state?: ServerState;
  /** 予約外のタグ */
  metadata: Record<string, string>;
  /**
   * 作成日時（created-at タグ）
   * @law 形式: ISO 8601
   */
  created_at?: string;
  peerings: PeeringInfo[];
  /** 一覧取得で再構成に失敗したエントリのみ（status = Degraded） */
  error?: string;
}

/**
 * ガード作成リクエスト
 */
export interface CreateGuardRequest {
  /** 省略時は設定のデフォルトロケーション */
  location?: string;
  /**
   * wg0.conf の内容
   * @law UTF-8、空白以外の文字を含むこと
   */
  wireGuardConf: string;
  meshCidrs: string[];
}

/**
 * ピアリング要求（CLI の peer コマンド相当）
 */
export interface PeerGuardRequest {
  remoteVNetId: string;
  /** 指定時のみメッシュ経路をルートテーブルとして伝播 */
  subnetId?: string;
}
