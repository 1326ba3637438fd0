/**
 * ガード状態の導出
 * 観測したリソースから毎回計算する純粋関数
 */

import type { GuardStatus, ServerState } from "../types/index.js";

export interface StatusObservation {
  /** リソースグループのプロビジョニング状態 */
  resourceGroupState?: string | undefined;
  vm?:
    | {
        provisioningState?: string | undefined;
        powerState?: string | undefined;
      }
    | undefined;
  /** NSG / VNet / サブネット / パブリック IP / NIC がすべて存在するか */
  networkComplete: boolean;
}

/**
 * クラウドの電源状態（PowerState/xxx の xxx）を ServerState に変換
 */
export function toServerState(
  powerState: string | undefined,
  provisioningState?: string | undefined
): ServerState {
  if (provisioningState === "Deleting") {
    return "deleting";
  }
  switch (powerState) {
    case "running":
      return "running";
    case "starting":
      return "starting";
    case "stopped":
    case "stopping":
    case "deallocated":
    case "deallocating":
      return "stopped";
  }
  if (provisioningState === "Creating") {
    return "starting";
  }
  return "unknown";
}

/**
 * @law 判定は上から順に評価する
 *   境界が Deleting → TearingDown
 *   VM なし → PartiallyCreated
 *   VM が Creating / starting → Provisioning
 *   VM が running かつネットワーク完備 → Active
 *   VM が stopped / deallocated → Stopped
 *   VM はあるがネットワークが欠けている → PartiallyCreated
 *   それ以外 → Unknown
 */
export function deriveGuardStatus(observation: StatusObservation): GuardStatus {
  if (observation.resourceGroupState === "Deleting") {
    return "TearingDown";
  }
  const vm = observation.vm;
  if (!vm) {
    return "PartiallyCreated";
  }
  if (vm.provisioningState === "Creating" || vm.powerState === "starting") {
    return "Provisioning";
  }
  if (vm.powerState === "running" && observation.networkComplete) {
    return "Active";
  }
  if (vm.powerState === "stopped" || vm.powerState === "deallocated") {
    return "Stopped";
  }
  if (!observation.networkComplete) {
    return "PartiallyCreated";
  }
  return "Unknown";
}
