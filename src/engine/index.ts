/**
 * Engine モジュール
 */

export { GuardProvisioner } from "./guard-provisioner.js";
export type { GuardProvisionerOptions, GuardDefaults } from "./guard-provisioner.js";
export { provisionGuard } from "./use-cases/provision-guard.js";
export type { ProvisionGuardDeps } from "./use-cases/provision-guard.js";
export { teardownGuard } from "./use-cases/teardown-guard.js";
export { peerGuard, unpeerGuard } from "./use-cases/peer-guard.js";
