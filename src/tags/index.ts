/**
 * Tags モジュール
 * タグ符号化と決定的なリソース名
 */

export {
  TAG_MANAGED_BY,
  TAG_MANAGED_BY_VALUE,
  TAG_GUARD_ID,
  TAG_MESH_CIDRS,
  TAG_WG_PORT,
  TAG_CREATED_AT,
  RESERVED_TAG_KEYS,
  MAX_TAG_VALUE_LENGTH,
  encodeGuardTags,
  decodeGuardTags,
  isManaged,
  isOwnedBy,
  managedTagFilter,
} from "./tag-scheme.js";
export type { GuardTagFields, DecodedGuardTags } from "./tag-scheme.js";

export {
  DEFAULT_RESOURCE_GROUP_PREFIX,
  IP_CONFIGURATION_NAME,
  resourceNames,
  peeringNamePrefix,
  peeringName,
  reversePeeringName,
  routeTableName,
} from "./resource-names.js";
export type { ResourceNames } from "./resource-names.js";
