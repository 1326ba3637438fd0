/**
 * ガード VM の cloud-init
 * WireGuard の導入、wg0.conf の配置、IPv4 転送の有効化を行う #cloud-config を生成する
 */

import { stringify as stringifyYaml } from "yaml";
import { ValidationError } from "../errors/index.js";

export const CLOUD_CONFIG_HEADER = "#cloud-config";
export const WIREGUARD_CONF_PATH = "/etc/wireguard/wg0.conf";
export const SYSCTL_CONF_PATH = "/etc/sysctl.d/99-guard.conf";

export interface GuardCloudInitParams {
  /** wg0.conf の内容（そのまま書き込む） */
  wireGuardConf: string;
  wireGuardPort: number;
  meshCidrs: string[];
}

export function renderGuardCloudInit(params: GuardCloudInitParams): string {
  if (params.wireGuardConf.trim().length === 0) {
    throw new ValidationError("WireGuard configuration is empty", { field: "wireGuardConf" });
  }

  const document = {
    package_update: true,
    packages: ["wireguard", "wireguard-tools"],
    write_files: [
      {
        path: WIREGUARD_CONF_PATH,
        owner: "root:root",
        permissions: "0600",
        content: params.wireGuardConf,
      },
      {
        path: SYSCTL_CONF_PATH,
        owner: "root:root",
        permissions: "0644",
        content: "net.ipv4.ip_forward = 1\n",
      },
    ],
    runcmd: [
      ["sysctl", "--system"],
      ["systemctl", "enable", "--now", "wg-quick@wg0"],
    ],
  };

  const comments = [
    `# wireguard port: ${params.wireGuardPort}`,
    `# mesh cidrs: ${params.meshCidrs.length > 0 ? params.meshCidrs.join(",") : "none"}`,
  ];
  return `${CLOUD_CONFIG_HEADER}\n${comments.join("\n")}\n${stringifyYaml(document)}`;
}
