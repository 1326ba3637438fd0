/**
 * Guard モジュール
 * ガード ID とリクエストの検証
 */

export { GUARD_ID_PATTERN, isValidGuardId, validateGuardId, generateGuardId } from "./guard-id.js";
export { isIPv4Cidr, validateCreateGuardRequest } from "./validate-request.js";
