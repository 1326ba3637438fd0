/**
 * ガード作成リクエストの検証
 */

import { isIPv4 } from "node:net";
import type { CreateGuardRequest } from "../types/index.js";
import { ValidationError } from "../errors/index.js";

/**
 * IPv4 CIDR（例: 10.200.0.0/16）か
 */
export function isIPv4Cidr(value: string): boolean {
  const [address, prefix, ...rest] = value.split("/");
  if (address === undefined || prefix === undefined || rest.length > 0) {
    return false;
  }
  if (!/^\d{1,2}$/.test(prefix) || Number(prefix) > 32) {
    return false;
  }
  return isIPv4(address);
}

/**
 * @throws ValidationError WireGuard 設定が空、またはメッシュ CIDR が不正
 */
export function validateCreateGuardRequest(request: CreateGuardRequest): void {
  if (request.wireGuardConf.trim().length === 0) {
    throw new ValidationError("WireGuard configuration is required", { field: "wireGuardConf" });
  }
  for (const cidr of request.meshCidrs) {
    if (!isIPv4Cidr(cidr)) {
      throw new ValidationError(`Invalid mesh CIDR: '${cidr}'`, { field: "meshCidrs" });
    }
  }
  if (request.location !== undefined && request.location.trim().length === 0) {
    throw new ValidationError("Location must not be empty", { field: "location" });
  }
}
