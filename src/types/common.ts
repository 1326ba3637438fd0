/**
 * 共通の型定義
 * 循環参照を避けるため、複数モジュールで使用される型をここに配置
 */

/**
 * 1 回の操作（create / status / list / teardown / peer）に渡すオプション
 */
export interface OperationOptions {
  /** 呼び出し元のキャンセル / タイムアウトシグナル。すべてのクラウド呼び出しに伝播する */
  signal?: AbortSignal | undefined;
}

/** リソースタグ（キーと値はどちらも文字列） */
export type Tags = Record<string, string>;

/**
 * ガードが所有するリソースの種別
 * @law 部分作成エラーの報告と、ログの resourceKind に使用
 */
export type ResourceKind =
  | "resource_group"
  | "network_security_group"
  | "security_rule"
  | "virtual_network"
  | "subnet"
  | "public_ip"
  | "network_interface"
  | "virtual_network_peering"
  | "route_table"
  | "virtual_machine";

/**
 * 作成済みリソースへの参照
 */
export interface ResourceRef {
  kind: ResourceKind;
  name: string;
  id: string;
}
