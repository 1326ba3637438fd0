/**
 * TagScheme
 * ガードの所有関係とメタデータをリソースタグとして表現する唯一の場所
 *
 * タグがシステム・オブ・レコードであり、ここでの符号化がずれると
 * Discovery はリソースを黙って見失う。
 */

import type { Tags } from "../types/index.js";
import { ValidationError } from "../errors/index.js";

export const TAG_MANAGED_BY = "managed-by";
export const TAG_MANAGED_BY_VALUE = "guardctl";
export const TAG_GUARD_ID = "guard-id";
export const TAG_MESH_CIDRS = "mesh-cidrs";
export const TAG_WG_PORT = "wg-port";
export const TAG_CREATED_AT = "created-at";

/**
 * 予約済みタグキー
 * @law Guard.metadata にはこれ以外のタグのみ含める
 */
export const RESERVED_TAG_KEYS = [
  TAG_MANAGED_BY,
  TAG_GUARD_ID,
  TAG_MESH_CIDRS,
  TAG_WG_PORT,
  TAG_CREATED_AT,
] as const;

/** Azure のタグ値の上限 */
export const MAX_TAG_VALUE_LENGTH = 256;

/**
 * タグとして保存するガードの属性
 */
export interface GuardTagFields {
  guardId: string;
  meshCidrs: string[];
  wireGuardPort?: number;
  createdAt?: string;
}

/**
 * タグから復元したガードの属性
 */
export interface DecodedGuardTags {
  guardId: string;
  meshCidrs: string[];
  wireGuardPort?: number;
  createdAt?: string;
  metadata: Record<string, string>;
}

/**
 * ガード属性をタグに符号化
 */
export function encodeGuardTags(fields: GuardTagFields): Tags {
  const tags: Tags = {
    [TAG_MANAGED_BY]: TAG_MANAGED_BY_VALUE,
    [TAG_GUARD_ID]: fields.guardId,
    [TAG_MESH_CIDRS]: fields.meshCidrs.join(","),
  };
  if (fields.wireGuardPort !== undefined) {
    tags[TAG_WG_PORT] = String(fields.wireGuardPort);
  }
  if (fields.createdAt !== undefined) {
    tags[TAG_CREATED_AT] = fields.createdAt;
  }

  for (const [key, value] of Object.entries(tags)) {
    if (value.length > MAX_TAG_VALUE_LENGTH) {
      throw new ValidationError(
        `Tag '${key}' exceeds ${MAX_TAG_VALUE_LENGTH} characters`,
        { guardId: fields.guardId, field: key }
      );
    }
  }
  return tags;
}

/**
 * タグからガード属性を復元
 * 管理マーカーまたは guard-id がなければ undefined
 */
export function decodeGuardTags(tags: Tags | undefined): DecodedGuardTags | undefined {
  if (!tags || !isManaged(tags)) {
    return undefined;
  }
  const guardId = tags[TAG_GUARD_ID];
  if (!guardId) {
    return undefined;
  }

  const decoded: DecodedGuardTags = {
    guardId,
    meshCidrs: parseMeshCidrs(tags[TAG_MESH_CIDRS]),
    metadata: {},
  };

  const port = parsePort(tags[TAG_WG_PORT]);
  if (port !== undefined) {
    decoded.wireGuardPort = port;
  }
  const createdAt = tags[TAG_CREATED_AT];
  if (createdAt) {
    decoded.createdAt = createdAt;
  }

  const reserved: readonly string[] = RESERVED_TAG_KEYS;
  for (const [key, value] of Object.entries(tags)) {
    if (!reserved.includes(key)) {
      decoded.metadata[key] = value;
    }
  }
  return decoded;
}

/**
 * 管理マーカーが付いているか
 */
export function isManaged(tags: Tags | undefined): boolean {
  return tags?.[TAG_MANAGED_BY] === TAG_MANAGED_BY_VALUE;
}

/**
 * リソースが指定ガードの所有物か
 * @law 管理マーカーと guard-id の両方が一致すること
 */
export function isOwnedBy(tags: Tags | undefined, guardId: string): boolean {
  return isManaged(tags) && tags?.[TAG_GUARD_ID] === guardId;
}

/**
 * 一覧取得に使うタグフィルタ
 */
export function managedTagFilter(): { name: string; value: string } {
  return { name: TAG_MANAGED_BY, value: TAG_MANAGED_BY_VALUE };
}

function parseMeshCidrs(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(",")
    .map((cidr) => cidr.trim())
    .filter((cidr) => cidr.length > 0);
}

function parsePort(value: string | undefined): number | undefined {
  if (!value || !/^\d+$/.test(value)) {
    return undefined;
  }
  const port = Number(value);
  return port >= 1 && port <= 65535 ? port : undefined;
}
