/**
 * ガード ID から決定的に導出するリソース名
 * 存在確認はすべてこの名前で行うため、ローカルに ID を保存する必要がない
 */

import { createHash } from "node:crypto";

/** Azure のリソース名（ピアリング、ルートテーブル）の上限 */
const MAX_NAME_LENGTH = 80;

/** 切り詰めた名前の末尾に付けるハッシュの桁数 */
const NAME_HASH_LENGTH = 8;

export const DEFAULT_RESOURCE_GROUP_PREFIX = "guardctl";

/** NIC の IP 構成名（構成は 1 つのみ） */
export const IP_CONFIGURATION_NAME = "ipconfig1";

export interface ResourceNames {
  guardId: string;
  /** 隔離境界 */
  resourceGroup: string;
  virtualNetwork: string;
  subnet: string;
  securityGroup: string;
  networkInterface: string;
  publicIp: string;
  virtualMachine: string;
}

export function resourceNames(
  guardId: string,
  resourceGroupPrefix: string = DEFAULT_RESOURCE_GROUP_PREFIX
): ResourceNames {
  return {
    guardId,
    resourceGroup: `${resourceGroupPrefix}-${guardId}`,
    virtualNetwork: `${guardId}-vnet`,
    subnet: `${guardId}-subnet`,
    securityGroup: `${guardId}-nsg`,
    networkInterface: `${guardId}-nic`,
    publicIp: `${guardId}-pip`,
    virtualMachine: `${guardId}-vm`,
  };
}

/**
 * ガードのピアリング名の接頭辞
 * @law Discovery はこの接頭辞で VNet のピアリング一覧を絞り込む
 */
export function peeringNamePrefix(guardId: string): string {
  return `${guardId}-peer`;
}

/**
 * ガード VNet → リモート VNet のピアリング名
 * @law 同じガード / リモートの組は常に同じ名前（再ピアリングは更新になる）
 */
export function peeringName(guardId: string, remoteVNetName: string): string {
  return truncateName(`${peeringNamePrefix(guardId)}-${remoteVNetName}`);
}

/**
 * リモート VNet → ガード VNet（逆方向）のピアリング名
 */
export function reversePeeringName(guardId: string): string {
  return truncateName(`${peeringNamePrefix(guardId)}-return`);
}

/**
 * メッシュ経路を保持するルートテーブル名
 */
export function routeTableName(peering: string): string {
  return truncateName(`${peering}-routes`);
}

/**
 * 上限を超える名前は先頭を残し、元の名前全体の sha256 の先頭 8 桁を付ける
 * @law 異なる元の名前は切り詰め後も異なる名前になる
 */
function truncateName(name: string): string {
  if (name.length <= MAX_NAME_LENGTH) {
    return name;
  }
  const hash = createHash("sha256").update(name).digest("hex").slice(0, NAME_HASH_LENGTH);
  return `${name.slice(0, MAX_NAME_LENGTH - NAME_HASH_LENGTH - 1)}-${hash}`;
}
