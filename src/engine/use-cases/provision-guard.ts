/**
 * ProvisionGuard Use Case
 * ネットワーク → NIC 転送 → WireGuard ルール → VM の順にガードを作成する
 */

import type {
  CreateGuardRequest,
  Guard,
  GuardId,
  NetworkInfo,
  OperationOptions,
  ResourceRef,
  Server,
} from "../../types/index.js";
import type { GuardProvider } from "../../provider/guard-provider.js";
import { OperationCancelledError, PartialProvisionError } from "../../errors/index.js";
import { encodeGuardTags, type ResourceNames } from "../../tags/index.js";
import { wireGuardRuleRequest } from "../../network/nsg-rules.js";
import { renderGuardCloudInit } from "../../cloudinit/guard-template.js";
import { validateCreateGuardRequest } from "../../guard/validate-request.js";
import type { Logger } from "../../logging/index.js";

/**
 * 設定から与えられるガードの既定値
 */
export interface GuardDefaults {
  location: string;
  vmSize: string;
  image: string;
  vnetCidr: string;
  subnetCidr: string;
  wireGuardPort: number;
}

export interface ProvisionGuardDeps {
  provider: GuardProvider;
  defaults: GuardDefaults;
  sshKeys: string[];
  logger: Logger;
  generateId: () => GuardId;
  now: () => Date;
}

/**
 * ProvisionGuard Use Case を実行
 *
 * @law 途中で失敗した場合はロールバックせず PartialProvisionError（再実行または teardown で回復）
 */
export async function provisionGuard(
  request: CreateGuardRequest,
  deps: ProvisionGuardDeps,
  options?: OperationOptions
): Promise<Guard> {
  validateCreateGuardRequest(request);

  const guardId = deps.generateId();
  const location = request.location ?? deps.defaults.location;
  const createdAt = deps.now().toISOString();
  const port = deps.defaults.wireGuardPort;
  const log = deps.logger.child({ guardId });

  log.info({ location, meshCidrs: request.meshCidrs }, "Provisioning guard");

  const network = await deps.provider.ensureNetwork(
    {
      guardId,
      location,
      vnetCidr: deps.defaults.vnetCidr,
      subnetCidr: deps.defaults.subnetCidr,
      wireGuardPort: port,
      meshCidrs: request.meshCidrs,
      createdAt,
    },
    options
  );

  const names = deps.provider.namesFor(guardId);
  const resources = networkResources(network, names);
  let server: Server | undefined;
  try {
    await deps.provider.configureNicForwarding(network.nic_id, options);
    await deps.provider.ensureNsgRule(wireGuardRuleRequest(guardId, port), options);

    const userData = renderGuardCloudInit({
      wireGuardConf: request.wireGuardConf,
      wireGuardPort: port,
      meshCidrs: request.meshCidrs,
    });

    server = await deps.provider.createServer(
      {
        name: names.virtualMachine,
        serverType: deps.defaults.vmSize,
        image: deps.defaults.image,
        location,
        sshKeys: deps.sshKeys,
        userData,
        labels: encodeGuardTags({
          guardId,
          meshCidrs: request.meshCidrs,
          wireGuardPort: port,
          createdAt,
        }),
        placement: {
          resourceGroup: network.resource_group,
          networkInterfaceId: network.nic_id,
        },
      },
      options
    );
    await deps.provider.waitForServer(server.id, "running", options);
  } catch (error) {
    if (error instanceof OperationCancelledError) {
      throw error;
    }
    if (server) {
      resources.push({ kind: "virtual_machine", name: server.name, id: server.id });
    }
    log.error({ err: error, resources: resources.length }, "Guard provisioning failed");
    throw new PartialProvisionError(guardId, resources, error);
  }

  log.info({ server: server.name, publicIp: network.public_ip }, "Guard is active");

  return {
    id: guardId,
    provider: deps.provider.name,
    location,
    status: "Active",
    public_ip: network.public_ip,
    private_ip: network.private_ip,
    server_id: server.id,
    resource_group: network.resource_group,
    resource_group_id: network.resource_group_id,
    vnet_id: network.vnet_id,
    subnet_id: network.subnet_id,
    nsg_id: network.nsg_id,
    nic_id: network.nic_id,
    public_ip_id: network.public_ip_id,
    mesh_cidrs: request.meshCidrs,
    wireguard_port: port,
    vm_state: "running",
    metadata: {},
    created_at: createdAt,
    peerings: [],
  };
}

function networkResources(network: NetworkInfo, names: ResourceNames): ResourceRef[] {
  return [
    { kind: "resource_group", name: network.resource_group, id: network.resource_group_id },
    { kind: "network_security_group", name: names.securityGroup, id: network.nsg_id },
    { kind: "virtual_network", name: names.virtualNetwork, id: network.vnet_id },
    { kind: "subnet", name: names.subnet, id: network.subnet_id },
    { kind: "public_ip", name: names.publicIp, id: network.public_ip_id },
    { kind: "network_interface", name: names.networkInterface, id: network.nic_id },
  ];
}
