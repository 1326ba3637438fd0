/**
 * Network モジュール
 */

export { NetworkOrchestrator } from "./network-orchestrator.js";
export type { NetworkOrchestratorOptions } from "./network-orchestrator.js";
export {
  MANAGEMENT_BAND,
  TUNNEL_BAND,
  CUSTOM_BAND,
  RULE_CLASS_BANDS,
  MIN_PRIORITY,
  MAX_PRIORITY,
  SSH_RULE_NAME,
  SSH_PRIORITY,
  WIREGUARD_RULE_NAME,
  WIREGUARD_PRIORITY,
  sshRuleRequest,
  wireGuardRuleRequest,
  toSecurityRule,
  validateRulePriority,
  isSameRule,
} from "./nsg-rules.js";
export type { PriorityBand } from "./nsg-rules.js";
