/**
 * テスト共通のフィクスチャ
 */

import type { GuardId } from "../../src/types/index.js";
import { createLogger } from "../../src/logging/index.js";
import { AzureGuardProvider } from "../../src/provider/index.js";
import { GuardProvisioner, type GuardDefaults } from "../../src/engine/index.js";
import { InMemoryArmClient } from "./in-memory-arm-client.js";

export const GUARD_A: GuardId = "guard-01900000-0000-7000-8000-000000000001";
export const GUARD_B: GuardId = "guard-01900000-0000-7000-8000-000000000002";

export const CREATED_AT = "2026-01-01T00:00:00.000Z";
export const SSH_KEY = "ssh-ed25519 AAAAC3test-key test@example";
export const WG_CONF = "[Interface]\nPrivateKey = test-secret\nListenPort = 51820\n";

export const silentLogger = createLogger({ level: "silent" });

export const DEFAULTS: GuardDefaults = {
  location: "westeurope",
  vmSize: "Standard_B1s",
  image: "Canonical:ubuntu-24_04-lts:server:latest",
  vnetCidr: "10.100.0.0/16",
  subnetCidr: "10.100.1.0/24",
  wireGuardPort: 51820,
};

export interface Harness {
  client: InMemoryArmClient;
  provider: AzureGuardProvider;
  provisioner: GuardProvisioner;
}

/**
 * インメモリのクラウド上に GuardProvisioner を組み立てる
 * ids を順に払い出す
 */
export function createHarness(
  ids: GuardId[] = [GUARD_A],
  options: { resourceGroupPrefix?: string } = {}
): Harness {
  const client = new InMemoryArmClient();
  const provider = new AzureGuardProvider(client, {
    ...options,
    logger: silentLogger,
    machine: { sleep: async () => undefined },
  });
  const queue = [...ids];
  const provisioner = new GuardProvisioner(provider, {
    defaults: DEFAULTS,
    sshKeys: [SSH_KEY],
    logger: silentLogger,
    generateId: () => {
      const next = queue.shift();
      if (next === undefined) {
        throw new Error("No more guard ids in the test harness");
      }
      return next;
    },
    now: () => new Date(CREATED_AT),
  });
  return { client, provider, provisioner };
}

export function resourceGroupOf(guardId: GuardId): string {
  return `guardctl-${guardId}`;
}
