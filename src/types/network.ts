/**
 * ネットワーク操作の型定義
 * NetworkOrchestrator / PeeringManager の入出力
 */

/**
 * ネットワーク基盤の作成パラメータ
 */
export interface NetworkRequest {
  guardId: string;
  location: string;
  vnetCidr: string;
  subnetCidr: string;
  wireGuardPort: number;
  /** タグとして全リソースに付与する */
  meshCidrs: string[];
  /** created-at タグ（省略時は現在時刻） */
  createdAt?: string;
}

/**
 * 作成（または既存）のネットワークリソース
 */
export interface NetworkInfo {
  resource_group: string;
  resource_group_id: string;
  vnet_id: string;
  subnet_id: string;
  nsg_id: string;
  nic_id: string;
  public_ip_id: string;
  public_ip: string;
  private_ip: string;
}

export type RuleProtocol = "Tcp" | "Udp" | "*";
/** クラウド上で観測しうるプロトコル（既存ルールの読み取り用） */
export type ObservedRuleProtocol = RuleProtocol | "Icmp" | "Esp" | "Ah";
export type RuleDirection = "Inbound" | "Outbound";

/**
 * ルールクラス
 * @law クラスごとに優先度帯が固定される（management 100-199, tunnel 200-299, custom 1000-4096）
 */
export type RuleClass = "management" | "tunnel" | "custom";

/**
 * NSG ルールの upsert 要求
 * @law ルール名をキーとする。同一パラメータでの再実行はルールを増やさない
 */
export interface NsgRuleRequest {
  guardId: string;
  ruleName: string;
  /**
   * @law 100 <= priority <= 4096
   * @law ルールクラスごとに予約された帯域を使用（nsg-rules.ts 参照）
   */
  priority: number;
  /** 指定時は priority がこのクラスの帯域内であること */
  ruleClass?: RuleClass;
  protocol: RuleProtocol;
  /** 例: "51820" */
  destPort: string;
  direction: RuleDirection;
}

/**
 * ピアリング作成パラメータ
 */
export interface PeerRequest {
  guardId: string;
  guardVNetId: string;
  remoteVNetId: string;
  peeringName: string;
  /** 伝播する経路のネクストホップ */
  guardPrivateIp: string;
  meshCidrs: string[];
  /** 指定時のみ経路伝播を行う（リモート側サブネット） */
  subnetId?: string;
}

/**
 * 逆方向リンクの作成結果
 * Pending: 権限不足で作成できず、リモート側の管理者が帯域外で完了させる想定
 */
export type ReversePeeringState = "Created" | "Pending";

/**
 * ピアリング作成結果
 */
export interface PeerResult {
  peering_name: string;
  remote_vnet_id: string;
  forward_state: string;
  reverse_state: ReversePeeringState;
  route_table_id?: string;
}
