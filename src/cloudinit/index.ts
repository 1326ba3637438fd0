/**
 * Cloud-init モジュール
 */

export {
  renderGuardCloudInit,
  CLOUD_CONFIG_HEADER,
  WIREGUARD_CONF_PATH,
  SYSCTL_CONF_PATH,
} from "./guard-template.js";
export type { GuardCloudInitParams } from "./guard-template.js";
