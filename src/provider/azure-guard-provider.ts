/**
 * AzureGuardProvider
 * 1 つの ArmClient 上で NetworkOrchestrator / Discovery / PeeringManager / AzureMachineProvider を合成する
 */

import type {
  CreateServerRequest,
  Guard,
  GuardId,
  NetworkInfo,
  NetworkRequest,
  NsgRuleRequest,
  OperationOptions,
  PeerRequest,
  PeerResult,
  Server,
  ServerState,
} from "../types/index.js";
import type { ArmClient, ResourceGroupRecord } from "../cloud/arm-client.js";
import type { ResourceNames } from "../tags/index.js";
import { NetworkOrchestrator } from "../network/network-orchestrator.js";
import { Discovery } from "../discovery/discovery.js";
import { PeeringManager } from "../peering/peering-manager.js";
import {
  AzureMachineProvider,
  type AzureMachineProviderOptions,
} from "../machine/azure-machine-provider.js";
import type { Logger } from "../logging/index.js";
import type { GuardProvider } from "./guard-provider.js";

export interface AzureGuardProviderOptions {
  resourceGroupPrefix?: string;
  discoveryConcurrency?: number;
  machine?: Omit<AzureMachineProviderOptions, "logger">;
  logger?: Logger;
}

export class AzureGuardProvider implements GuardProvider {
  readonly name = "azure" as const;

  readonly network: NetworkOrchestrator;
  readonly discovery: Discovery;
  readonly peering: PeeringManager;
  readonly machines: AzureMachineProvider;

  constructor(client: ArmClient, options: AzureGuardProviderOptions = {}) {
    const shared = {
      ...(options.resourceGroupPrefix !== undefined && { resourceGroupPrefix: options.resourceGroupPrefix }),
      ...(options.logger !== undefined && { logger: options.logger }),
    };
    this.network = new NetworkOrchestrator(client, shared);
    this.discovery = new Discovery(client, {
      ...shared,
      ...(options.discoveryConcurrency !== undefined && { concurrency: options.discoveryConcurrency }),
    });
    this.peering = new PeeringManager(client, shared);
    this.machines = new AzureMachineProvider(client, {
      ...options.machine,
      ...(options.logger !== undefined && { logger: options.logger }),
    });
  }

  namesFor(guardId: string): ResourceNames {
    return this.network.namesFor(guardId);
  }

  // Machine

  createServer(req: CreateServerRequest, options?: OperationOptions): Promise<Server> {
    return this.machines.createServer(req, options);
  }

  getServer(serverId: string, options?: OperationOptions): Promise<Server> {
    return this.machines.getServer(serverId, options);
  }

  deleteServer(serverId: string, options?: OperationOptions): Promise<void> {
    return this.machines.deleteServer(serverId, options);
  }

  waitForServer(serverId: string, state: ServerState, options?: OperationOptions): Promise<void> {
    return this.machines.waitForServer(serverId, state, options);
  }

  listServers(filters: Record<string, string>, options?: OperationOptions): Promise<Server[]> {
    return this.machines.listServers(filters, options);
  }

  // Network

  ensureNetwork(req: NetworkRequest, options?: OperationOptions): Promise<NetworkInfo> {
    return this.network.ensureNetwork(req, options);
  }

  configureNicForwarding(nicId: string, options?: OperationOptions): Promise<void> {
    return this.network.configureNicForwarding(nicId, options);
  }

  ensureNsgRule(req: NsgRuleRequest, options?: OperationOptions): Promise<void> {
    return this.network.ensureNsgRule(req, options);
  }

  cleanupNetwork(guardId: string, options?: OperationOptions): Promise<void> {
    return this.network.cleanupNetwork(guardId, options);
  }

  // Discovery

  getBoundary(guardId: GuardId, options?: OperationOptions): Promise<ResourceGroupRecord> {
    return this.discovery.getBoundary(guardId, options);
  }

  getGuard(guardId: GuardId, options?: OperationOptions): Promise<Guard> {
    return this.discovery.getGuard(guardId, options);
  }

  listGuards(options?: OperationOptions): Promise<Guard[]> {
    return this.discovery.listGuards(options);
  }

  // Peering

  peerNetwork(req: PeerRequest, options?: OperationOptions): Promise<PeerResult> {
    return this.peering.peerNetwork(req, options);
  }

  unpeerNetwork(guardId: string, peeringName: string, options?: OperationOptions): Promise<void> {
    return this.peering.unpeerNetwork(guardId, peeringName, options);
  }
}
