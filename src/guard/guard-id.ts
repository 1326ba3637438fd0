/**
 * Guard ID の生成と検証
 */

import { v7 as uuidv7 } from "uuid";
import type { GuardId } from "../types/index.js";
import { ValidationError } from "../errors/index.js";

export const GUARD_ID_PATTERN =
  /^guard-[0-9a-f]{8}-[0-9a-f]{4}-7[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

export function isValidGuardId(value: string): value is GuardId {
  return GUARD_ID_PATTERN.test(value);
}

export function validateGuardId(value: string): GuardId {
  if (!isValidGuardId(value)) {
    throw new ValidationError(`Invalid guard id format: ${value}`, { field: "guardId" });
  }
  return value;
}

export function generateGuardId(): GuardId {
  return validateGuardId(`guard-${uuidv7()}`);
}
