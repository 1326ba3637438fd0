/**
 * NSG ルールの優先度帯と標準ルール
 *
 * ルールクラスごとに帯域を固定し、同じ方向のルール同士が優先度で衝突しないようにする。
 */

import type { NsgRuleRequest, RuleClass } from "../types/index.js";
import type { SecurityRuleRecord } from "../cloud/arm-client.js";
import { ValidationError } from "../errors/index.js";

export interface PriorityBand {
  min: number;
  max: number;
}

/** SSH などの管理用ルール */
export const MANAGEMENT_BAND: PriorityBand = { min: 100, max: 199 };
/** WireGuard などのトンネルルール */
export const TUNNEL_BAND: PriorityBand = { min: 200, max: 299 };
/** 利用者が追加するルール */
export const CUSTOM_BAND: PriorityBand = { min: 1000, max: 4096 };

export const RULE_CLASS_BANDS: Record<RuleClass, PriorityBand> = {
  management: MANAGEMENT_BAND,
  tunnel: TUNNEL_BAND,
  custom: CUSTOM_BAND,
};

export const MIN_PRIORITY = 100;
export const MAX_PRIORITY = 4096;

export const SSH_RULE_NAME = "AllowSSH";
export const SSH_PRIORITY = MANAGEMENT_BAND.min;
export const WIREGUARD_RULE_NAME = "AllowWireGuard";
export const WIREGUARD_PRIORITY = TUNNEL_BAND.min;

export function sshRuleRequest(guardId: string): NsgRuleRequest {
  return {
    guardId,
    ruleName: SSH_RULE_NAME,
    priority: SSH_PRIORITY,
    ruleClass: "management",
    protocol: "Tcp",
    destPort: "22",
    direction: "Inbound",
  };
}

export function wireGuardRuleRequest(guardId: string, port: number): NsgRuleRequest {
  return {
    guardId,
    ruleName: WIREGUARD_RULE_NAME,
    priority: WIREGUARD_PRIORITY,
    ruleClass: "tunnel",
    protocol: "Udp",
    destPort: String(port),
    direction: "Inbound",
  };
}

/**
 * 要求を許可ルールの定義に変換
 */
export function toSecurityRule(req: NsgRuleRequest): SecurityRuleRecord {
  return {
    name: req.ruleName,
    priority: req.priority,
    protocol: req.protocol,
    direction: req.direction,
    access: "Allow",
    sourceAddressPrefix: "*",
    sourcePortRange: "*",
    destinationAddressPrefix: "*",
    destinationPortRange: req.destPort,
  };
}

/**
 * 優先度の範囲と、既存ルールとの衝突を検証
 * @law ruleClass があれば、そのクラスの帯域外の優先度は拒否する
 * @law 同名ルールは更新対象のため衝突とみなさない
 */
export function validateRulePriority(
  req: NsgRuleRequest,
  existing: readonly SecurityRuleRecord[]
): void {
  if (!Number.isInteger(req.priority) || req.priority < MIN_PRIORITY || req.priority > MAX_PRIORITY) {
    throw new ValidationError(
      `Rule priority ${req.priority} is outside ${MIN_PRIORITY}-${MAX_PRIORITY}`,
      { guardId: req.guardId, field: "priority" }
    );
  }

  if (req.ruleClass !== undefined) {
    const band = RULE_CLASS_BANDS[req.ruleClass];
    if (req.priority < band.min || req.priority > band.max) {
      throw new ValidationError(
        `Rule priority ${req.priority} is outside the ${req.ruleClass} band ${band.min}-${band.max}`,
        { guardId: req.guardId, field: "priority" }
      );
    }
  }

  const conflict = existing.find(
    (rule) =>
      rule.name !== req.ruleName &&
      rule.direction === req.direction &&
      rule.priority === req.priority
  );
  if (conflict) {
    throw new ValidationError(
      `Rule priority ${req.priority} is already used by '${conflict.name}' (${req.direction})`,
      { guardId: req.guardId, field: "priority" }
    );
  }
}

/**
 * 既存ルールが要求と同一か
 */
export function isSameRule(a: SecurityRuleRecord, b: SecurityRuleRecord): boolean {
  return (
    a.name === b.name &&
    a.priority === b.priority &&
    a.protocol === b.protocol &&
    a.direction === b.direction &&
    a.access === b.access &&
    a.sourceAddressPrefix === b.sourceAddressPrefix &&
    a.sourcePortRange === b.sourcePortRange &&
    a.destinationAddressPrefix === b.destinationAddressPrefix &&
    a.destinationPortRange === b.destinationPortRange
  );
}
