/**
 * AzureMachineProvider
 * ArmClient 上の汎用 VM ライフサイクル
 *
 * サーバー ID は VM のリソース ID。ネットワークは EnsureNetwork で作成済みの NIC を使う。
 */

import { setTimeout as delay } from "node:timers/promises";
import type {
  CreateServerRequest,
  MachineProvider,
  OperationOptions,
  Server,
  ServerState,
} from "../types/index.js";
import type { ArmClient, VirtualMachineRecord } from "../cloud/arm-client.js";
import { equalsIgnoreCase, parseResourceId } from "../cloud/resource-id.js";
import {
  NotFoundError,
  OperationCancelledError,
  TransientCloudError,
  ValidationError,
} from "../errors/index.js";
import { toServerState } from "../discovery/status.js";
import { logger as defaultLogger, type Logger } from "../logging/index.js";

export interface AzureMachineProviderOptions {
  adminUsername?: string;
  /** waitForServer のポーリング間隔 */
  pollIntervalMs?: number;
  /** waitForServer の上限 */
  waitTimeoutMs?: number;
  logger?: Logger;
  /** テスト用に差し替え可能な待機 */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export const DEFAULT_ADMIN_USERNAME = "azureuser";
const DEFAULT_POLL_INTERVAL_MS = 5_000;
const DEFAULT_WAIT_TIMEOUT_MS = 10 * 60_000;

export class AzureMachineProvider implements MachineProvider {
  private readonly adminUsername: string;
  private readonly pollIntervalMs: number;
  private readonly waitTimeoutMs: number;
  private readonly logger: Logger;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(
    private readonly client: ArmClient,
    options: AzureMachineProviderOptions = {}
  ) {
    this.adminUsername = options.adminUsername ?? DEFAULT_ADMIN_USERNAME;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.waitTimeoutMs = options.waitTimeoutMs ?? DEFAULT_WAIT_TIMEOUT_MS;
    this.logger = (options.logger ?? defaultLogger).child({ component: "machine" });
    this.sleep = options.sleep ?? defaultSleep;
  }

  async createServer(req: CreateServerRequest, options?: OperationOptions): Promise<Server> {
    if (!req.placement) {
      throw new ValidationError("Azure servers require a placement (resource group and NIC)", {
        field: "placement",
      });
    }
    if (req.sshKeys.length === 0) {
      throw new ValidationError("At least one SSH public key is required", { field: "sshKeys" });
    }

    const vm = await this.client.createOrUpdateVirtualMachine(
      req.placement.resourceGroup,
      req.name,
      {
        location: req.location,
        tags: req.labels,
        vmSize: req.serverType,
        image: req.image,
        computerName: req.name,
        adminUsername: this.adminUsername,
        sshPublicKeys: req.sshKeys,
        customData: Buffer.from(req.userData, "utf-8").toString("base64"),
        networkInterfaceId: req.placement.networkInterfaceId,
      },
      options
    );
    this.logger.info({ server: vm.name, size: req.serverType }, "Created virtual machine");
    return toServer(vm);
  }

  async getServer(serverId: string, options?: OperationOptions): Promise<Server> {
    const { resourceGroup, name } = parseServerId(serverId);
    const vm = await this.client.getVirtualMachine(resourceGroup, name, options);
    if (!vm) {
      throw new NotFoundError(`Server '${name}' not found`, {
        resourceKind: "virtual_machine",
        resourceName: name,
      });
    }
    return toServer(vm);
  }

  /**
   * @law 既に存在しなければ成功
   */
  async deleteServer(serverId: string, options?: OperationOptions): Promise<void> {
    const { resourceGroup, name } = parseServerId(serverId);
    const deleted = await this.client.deleteVirtualMachine(resourceGroup, name, options);
    this.logger.info({ server: name, deleted }, "Deleted virtual machine");
  }

  /**
   * 指定の状態になるまでポーリング
   * @throws TransientCloudError 上限時間内に到達しない
   */
  async waitForServer(serverId: string, state: ServerState, options?: OperationOptions): Promise<void> {
    const deadline = Date.now() + this.waitTimeoutMs;
    for (;;) {
      const server = await this.getServer(serverId, options);
      if (server.state === state) {
        return;
      }
      if (Date.now() >= deadline) {
        throw new TransientCloudError(
          `Server '${server.name}' did not reach '${state}' (last state: ${server.state})`,
          { resourceKind: "virtual_machine", resourceName: server.name, operation: "wait" }
        );
      }
      this.logger.debug({ server: server.name, state: server.state, want: state }, "Waiting for server");
      try {
        await this.sleep(this.pollIntervalMs, options?.signal);
      } catch {
        throw new OperationCancelledError(`Cancelled while waiting for '${server.name}'`, {
          resourceKind: "virtual_machine",
          resourceName: server.name,
          operation: "wait",
        });
      }
    }
  }

  /**
   * ラベル（タグ）がすべて一致するサーバーを列挙
   */
  async listServers(filters: Record<string, string>, options?: OperationOptions): Promise<Server[]> {
    const machines = await this.client.listVirtualMachines(undefined, options);
    return machines
      .filter((vm) => Object.entries(filters).every(([key, value]) => vm.tags[key] === value))
      .map(toServer);
  }
}

function parseServerId(serverId: string): { resourceGroup: string; name: string } {
  const parsed = parseResourceId(serverId, "server id");
  if (!equalsIgnoreCase(parsed.resourceType, "virtualMachines")) {
    throw new ValidationError(`Not a virtual machine id: ${serverId}`, { field: "server id" });
  }
  return { resourceGroup: parsed.resourceGroup, name: parsed.resourceName };
}

function toServer(vm: VirtualMachineRecord): Server {
  return {
    id: vm.id,
    name: vm.name,
    location: vm.location,
    state: toServerState(vm.powerState, vm.provisioningState),
    labels: vm.tags,
  };
}

async function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  await delay(ms, undefined, signal ? { signal } : {});
}
