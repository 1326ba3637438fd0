/**
 * テスト用のインメモリ ArmClient
 * リソースグループ削除のカスケード、ピアリング状態、失敗の注入を再現する
 */

import type {
  ArmClient,
  NetworkInterfaceParams,
  NetworkInterfaceRecord,
  PeeringParams,
  PeeringRecord,
  PublicIpParams,
  PublicIpRecord,
  ResourceGroupParams,
  ResourceGroupRecord,
  RouteTableParams,
  RouteTableRecord,
  SecurityGroupParams,
  SecurityGroupRecord,
  SecurityRuleRecord,
  SubnetRecord,
  VirtualMachineParams,
  VirtualMachineRecord,
  VirtualNetworkParams,
  VirtualNetworkRecord,
} from "../../src/cloud/arm-client.js";
import { buildResourceId, parseVirtualNetworkId } from "../../src/cloud/resource-id.js";
import { OperationCancelledError, PermanentCloudError } from "../../src/errors/index.js";
import type { OperationOptions, ResourceKind } from "../../src/types/index.js";

export const TEST_SUBSCRIPTION_ID = "00000000-0000-0000-0000-000000000000";

interface Failure {
  operation: string;
  name?: string | undefined;
  error: unknown;
  /** 残りの失敗回数（undefined は無制限） */
  remaining?: number | undefined;
}

/**
 * 失敗させる呼び出しの指定
 * name を指定した場合はそのリソース名への呼び出しのみ
 */
export interface FailureFilter {
  name?: string;
  times?: number;
}

export class InMemoryArmClient implements ArmClient {
  readonly subscriptionId = TEST_SUBSCRIPTION_ID;

  /** "operation:name" 形式の呼び出し記録 */
  readonly calls: string[] = [];
  /** createOrUpdateVirtualMachine に渡された params */
  readonly vmParams: VirtualMachineParams[] = [];

  private readonly groups = new Map<string, ResourceGroupRecord>();
  private readonly securityGroups = new Map<string, SecurityGroupRecord>();
  private readonly virtualNetworks = new Map<string, VirtualNetworkRecord>();
  private readonly publicIps = new Map<string, PublicIpRecord>();
  private readonly networkInterfaces = new Map<string, NetworkInterfaceRecord>();
  private readonly routeTables = new Map<string, RouteTableRecord>();
  private readonly virtualMachines = new Map<string, VirtualMachineRecord>();
  private readonly failures: Failure[] = [];
  private addressCounter = 0;

  /** setIpForwarding を無視する（反映されない NIC の再現） */
  ignoreIpForwarding = false;

  failOn(operation: string, error: unknown, filter: FailureFilter = {}): void {
    this.failures.push({ operation, name: filter.name, error, remaining: filter.times });
  }

  /** 作成系の呼び出しだけを抜き出す */
  writeCalls(): string[] {
    return this.calls.filter((call) => !call.startsWith("get") && !call.startsWith("list"));
  }

  // ---------------------------------------------------------------------------
  // Seeding
  // ---------------------------------------------------------------------------

  /**
   * ワークロード側の VNet（管理対象外）を用意する
   */
  seedVirtualNetwork(
    resourceGroup: string,
    name: string,
    init: { location: string; addressPrefix: string; subnets: Array<{ name: string; addressPrefix: string }> }
  ): VirtualNetworkRecord {
    if (!this.groups.has(resourceGroup)) {
      this.groups.set(resourceGroup, {
        id: buildResourceId(this.subscriptionId, resourceGroup),
        name: resourceGroup,
        location: init.location,
        tags: {},
        provisioningState: "Succeeded",
      });
    }
    const id = this.networkId(resourceGroup, `virtualNetworks/${name}`);
    const vnet: VirtualNetworkRecord = {
      id,
      name,
      location: init.location,
      tags: {},
      addressPrefixes: [init.addressPrefix],
      subnets: init.subnets.map((subnet) => ({
        id: `${id}/subnets/${subnet.name}`,
        name: subnet.name,
        addressPrefix: subnet.addressPrefix,
      })),
      peerings: [],
    };
    this.virtualNetworks.set(key(resourceGroup, name), vnet);
    return vnet;
  }

  /** リソースグループを Deleting 状態にする */
  markDeleting(resourceGroup: string): void {
    const group = this.groups.get(resourceGroup);
    if (group) {
      group.provisioningState = "Deleting";
    }
  }

  /** VM の電源状態を変える */
  setPowerState(resourceGroup: string, name: string, powerState: string): void {
    const vm = this.virtualMachines.get(key(resourceGroup, name));
    if (vm) {
      vm.powerState = powerState;
    }
  }

  /** 個別リソースを削除する（部分的な消失の再現） */
  removeResource(kind: "public_ip" | "network_interface" | "virtual_machine", resourceGroup: string, name: string): void {
    const store =
      kind === "public_ip" ? this.publicIps : kind === "network_interface" ? this.networkInterfaces : this.virtualMachines;
    store.delete(key(resourceGroup, name));
  }

  resourceGroupNames(): string[] {
    return [...this.groups.keys()];
  }

  // ---------------------------------------------------------------------------
  // Resource groups
  // ---------------------------------------------------------------------------

  async getResourceGroup(name: string, options?: OperationOptions): Promise<ResourceGroupRecord | undefined> {
    this.enter("getResourceGroup", name, options);
    return clone(this.groups.get(name));
  }

  async createOrUpdateResourceGroup(
    name: string,
    params: ResourceGroupParams,
    options?: OperationOptions
  ): Promise<ResourceGroupRecord> {
    this.enter("createOrUpdateResourceGroup", name, options);
    const group: ResourceGroupRecord = {
      id: buildResourceId(this.subscriptionId, name),
      name,
      location: params.location,
      tags: { ...params.tags },
      provisioningState: "Succeeded",
    };
    this.groups.set(name, group);
    return structuredClone(group);
  }

  async deleteResourceGroup(name: string, options?: OperationOptions): Promise<boolean> {
    this.enter("deleteResourceGroup", name, options);
    if (!this.groups.delete(name)) {
      return false;
    }
    const prefix = `${name}/`;
    for (const store of [
      this.securityGroups,
      this.virtualNetworks,
      this.publicIps,
      this.networkInterfaces,
      this.routeTables,
      this.virtualMachines,
    ]) {
      for (const storeKey of [...store.keys()]) {
        if (storeKey.startsWith(prefix)) {
          store.delete(storeKey);
        }
      }
    }
    return true;
  }

  async listResourceGroups(
    tagFilter: { name: string; value: string },
    options?: OperationOptions
  ): Promise<ResourceGroupRecord[]> {
    this.enter("listResourceGroups", "*", options);
    return [...this.groups.values()]
      .filter((group) => group.tags[tagFilter.name] === tagFilter.value)
      .map((group) => structuredClone(group));
  }

  // ---------------------------------------------------------------------------
  // Network security groups
  // ---------------------------------------------------------------------------

  async getSecurityGroup(
    resourceGroup: string,
    name: string,
    options?: OperationOptions
  ): Promise<SecurityGroupRecord | undefined> {
    this.enter("getSecurityGroup", name, options);
    return clone(this.securityGroups.get(key(resourceGroup, name)));
  }

  async createOrUpdateSecurityGroup(
    resourceGroup: string,
    name: string,
    params: SecurityGroupParams,
    options?: OperationOptions
  ): Promise<SecurityGroupRecord> {
    this.enter("createOrUpdateSecurityGroup", name, options);
    this.requireGroup(resourceGroup, "network_security_group", name);
    const group: SecurityGroupRecord = {
      id: this.networkId(resourceGroup, `networkSecurityGroups/${name}`),
      name,
      location: params.location,
      tags: { ...params.tags },
      securityRules: params.securityRules.map((rule) => ({ ...rule })),
    };
    this.securityGroups.set(key(resourceGroup, name), group);
    return structuredClone(group);
  }

  async createOrUpdateSecurityRule(
    resourceGroup: string,
    securityGroupName: string,
    rule: SecurityRuleRecord,
    options?: OperationOptions
  ): Promise<SecurityRuleRecord> {
    this.enter("createOrUpdateSecurityRule", rule.name, options);
    const group = this.securityGroups.get(key(resourceGroup, securityGroupName));
    if (!group) {
      throw notFound("network_security_group", securityGroupName);
    }
    group.securityRules = [...group.securityRules.filter((existing) => existing.name !== rule.name), { ...rule }];
    return { ...rule };
  }

  // ---------------------------------------------------------------------------
  // Virtual networks and subnets
  // ---------------------------------------------------------------------------

  async getVirtualNetwork(
    resourceGroup: string,
    name: string,
    options?: OperationOptions
  ): Promise<VirtualNetworkRecord | undefined> {
    this.enter("getVirtualNetwork", name, options);
    return clone(this.virtualNetworks.get(key(resourceGroup, name)));
  }

  async createOrUpdateVirtualNetwork(
    resourceGroup: string,
    name: string,
    params: VirtualNetworkParams,
    options?: OperationOptions
  ): Promise<VirtualNetworkRecord> {
    this.enter("createOrUpdateVirtualNetwork", name, options);
    this.requireGroup(resourceGroup, "virtual_network", name);
    const id = this.networkId(resourceGroup, `virtualNetworks/${name}`);
    const previous = this.virtualNetworks.get(key(resourceGroup, name));
    const vnet: VirtualNetworkRecord = {
      id,
      name,
      location: params.location,
      tags: { ...params.tags },
      addressPrefixes: [...params.addressPrefixes],
      subnets: params.subnets.map((subnet) => ({
        id: `${id}/subnets/${subnet.name}`,
        name: subnet.name,
        addressPrefix: subnet.addressPrefix,
        networkSecurityGroupId: subnet.networkSecurityGroupId,
      })),
      peerings: previous?.peerings ?? [],
    };
    this.virtualNetworks.set(key(resourceGroup, name), vnet);
    return structuredClone(vnet);
  }

  async getSubnet(
    resourceGroup: string,
    virtualNetworkName: string,
    name: string,
    options?: OperationOptions
  ): Promise<SubnetRecord | undefined> {
    this.enter("getSubnet", name, options);
    const vnet = this.virtualNetworks.get(key(resourceGroup, virtualNetworkName));
    return clone(vnet?.subnets.find((subnet) => subnet.name === name));
  }

  async associateRouteTable(
    resourceGroup: string,
    virtualNetworkName: string,
    subnetName: string,
    routeTableId: string,
    options?: OperationOptions
  ): Promise<SubnetRecord> {
    this.enter("associateRouteTable", subnetName, options);
    const subnet = this.virtualNetworks
      .get(key(resourceGroup, virtualNetworkName))
      ?.subnets.find((candidate) => candidate.name === subnetName);
    if (!subnet) {
      throw notFound("subnet", subnetName);
    }
    subnet.routeTableId = routeTableId;
    return { ...subnet };
  }

  // ---------------------------------------------------------------------------
  // Public IPs and network interfaces
  // ---------------------------------------------------------------------------

  async getPublicIp(resourceGroup: string, name: string, options?: OperationOptions): Promise<PublicIpRecord | undefined> {
    this.enter("getPublicIp", name, options);
    return clone(this.publicIps.get(key(resourceGroup, name)));
  }

  async createOrUpdatePublicIp(
    resourceGroup: string,
    name: string,
    params: PublicIpParams,
    options?: OperationOptions
  ): Promise<PublicIpRecord> {
    this.enter("createOrUpdatePublicIp", name, options);
    this.requireGroup(resourceGroup, "public_ip", name);
    const address: PublicIpRecord = {
      id: this.networkId(resourceGroup, `publicIPAddresses/${name}`),
      name,
      location: params.location,
      tags: { ...params.tags },
      ipAddress: `203.0.113.${++this.addressCounter}`,
    };
    this.publicIps.set(key(resourceGroup, name), address);
    return { ...address };
  }

  async getNetworkInterface(
    resourceGroup: string,
    name: string,
    options?: OperationOptions
  ): Promise<NetworkInterfaceRecord | undefined> {
    this.enter("getNetworkInterface", name, options);
    return clone(this.networkInterfaces.get(key(resourceGroup, name)));
  }

  async createOrUpdateNetworkInterface(
    resourceGroup: string,
    name: string,
    params: NetworkInterfaceParams,
    options?: OperationOptions
  ): Promise<NetworkInterfaceRecord> {
    this.enter("createOrUpdateNetworkInterface", name, options);
    this.requireGroup(resourceGroup, "network_interface", name);
    const nic: NetworkInterfaceRecord = {
      id: this.networkId(resourceGroup, `networkInterfaces/${name}`),
      name,
      location: params.location,
      tags: { ...params.tags },
      enableIpForwarding: params.enableIpForwarding,
      privateIpAddress: "10.100.1.4",
      subnetId: params.subnetId,
      publicIpAddressId: params.publicIpAddressId,
    };
    this.networkInterfaces.set(key(resourceGroup, name), nic);
    return { ...nic };
  }

  async setIpForwarding(
    resourceGroup: string,
    name: string,
    enabled: boolean,
    options?: OperationOptions
  ): Promise<NetworkInterfaceRecord> {
    this.enter("setIpForwarding", name, options);
    const nic = this.networkInterfaces.get(key(resourceGroup, name));
    if (!nic) {
      throw notFound("network_interface", name);
    }
    if (!this.ignoreIpForwarding) {
      nic.enableIpForwarding = enabled;
    }
    return { ...nic };
  }

  /** テスト用に NIC の IP 転送を直接切り替える */
  forceIpForwarding(resourceGroup: string, name: string, enabled: boolean): void {
    const nic = this.networkInterfaces.get(key(resourceGroup, name));
    if (nic) {
      nic.enableIpForwarding = enabled;
    }
  }

  // ---------------------------------------------------------------------------
  // Peerings and route tables
  // ---------------------------------------------------------------------------

  async getPeering(
    resourceGroup: string,
    virtualNetworkName: string,
    name: string,
    options?: OperationOptions
  ): Promise<PeeringRecord | undefined> {
    this.enter("getPeering", name, options);
    const vnet = this.virtualNetworks.get(key(resourceGroup, virtualNetworkName));
    return clone(vnet?.peerings.find((peering) => peering.name === name));
  }

  async createOrUpdatePeering(
    resourceGroup: string,
    virtualNetworkName: string,
    name: string,
    params: PeeringParams,
    options?: OperationOptions
  ): Promise<PeeringRecord> {
    this.enter("createOrUpdatePeering", name, options);
    const vnet = this.virtualNetworks.get(key(resourceGroup, virtualNetworkName));
    if (!vnet) {
      throw notFound("virtual_network", virtualNetworkName);
    }

    const remote = parseVirtualNetworkId(params.remoteVirtualNetworkId);
    const remoteVNet = this.virtualNetworks.get(key(remote.resourceGroup, remote.name));
    const counterpart = remoteVNet?.peerings.find((peering) => peering.remoteVirtualNetworkId === vnet.id);
    if (counterpart) {
      counterpart.peeringState = "Connected";
    }

    const peering: PeeringRecord = {
      id: `${vnet.id}/virtualNetworkPeerings/${name}`,
      name,
      remoteVirtualNetworkId: params.remoteVirtualNetworkId,
      peeringState: counterpart ? "Connected" : "Initiated",
    };
    vnet.peerings = [...vnet.peerings.filter((existing) => existing.name !== name), peering];
    return { ...peering };
  }

  async deletePeering(
    resourceGroup: string,
    virtualNetworkName: string,
    name: string,
    options?: OperationOptions
  ): Promise<boolean> {
    this.enter("deletePeering", name, options);
    const vnet = this.virtualNetworks.get(key(resourceGroup, virtualNetworkName));
    const peering = vnet?.peerings.find((existing) => existing.name === name);
    if (!vnet || !peering) {
      return false;
    }
    vnet.peerings = vnet.peerings.filter((existing) => existing.name !== name);

    const remote = parseVirtualNetworkId(peering.remoteVirtualNetworkId);
    const counterpart = this.virtualNetworks
      .get(key(remote.resourceGroup, remote.name))
      ?.peerings.find((candidate) => candidate.remoteVirtualNetworkId === vnet.id);
    if (counterpart) {
      counterpart.peeringState = "Disconnected";
    }
    return true;
  }

  async getRouteTable(
    resourceGroup: string,
    name: string,
    options?: OperationOptions
  ): Promise<RouteTableRecord | undefined> {
    this.enter("getRouteTable", name, options);
    return clone(this.routeTables.get(key(resourceGroup, name)));
  }

  async createOrUpdateRouteTable(
    resourceGroup: string,
    name: string,
    params: RouteTableParams,
    options?: OperationOptions
  ): Promise<RouteTableRecord> {
    this.enter("createOrUpdateRouteTable", name, options);
    this.requireGroup(resourceGroup, "route_table", name);
    const table: RouteTableRecord = {
      id: this.networkId(resourceGroup, `routeTables/${name}`),
      name,
      location: params.location,
      tags: { ...params.tags },
      routes: params.routes.map((route) => ({ ...route })),
    };
    this.routeTables.set(key(resourceGroup, name), table);
    return structuredClone(table);
  }

  // ---------------------------------------------------------------------------
  // Virtual machines
  // ---------------------------------------------------------------------------

  async getVirtualMachine(
    resourceGroup: string,
    name: string,
    options?: OperationOptions
  ): Promise<VirtualMachineRecord | undefined> {
    this.enter("getVirtualMachine", name, options);
    return clone(this.virtualMachines.get(key(resourceGroup, name)));
  }

  async createOrUpdateVirtualMachine(
    resourceGroup: string,
    name: string,
    params: VirtualMachineParams,
    options?: OperationOptions
  ): Promise<VirtualMachineRecord> {
    this.enter("createOrUpdateVirtualMachine", name, options);
    this.requireGroup(resourceGroup, "virtual_machine", name);
    this.vmParams.push(structuredClone(params));
    const vm: VirtualMachineRecord = {
      id: buildResourceId(this.subscriptionId, resourceGroup, `Microsoft.Compute/virtualMachines/${name}`),
      name,
      location: params.location,
      tags: { ...params.tags },
      powerState: "running",
      provisioningState: "Succeeded",
    };
    this.virtualMachines.set(key(resourceGroup, name), vm);
    return { ...vm, tags: { ...vm.tags } };
  }

  async deleteVirtualMachine(resourceGroup: string, name: string, options?: OperationOptions): Promise<boolean> {
    this.enter("deleteVirtualMachine", name, options);
    return this.virtualMachines.delete(key(resourceGroup, name));
  }

  async listVirtualMachines(
    resourceGroup: string | undefined,
    options?: OperationOptions
  ): Promise<VirtualMachineRecord[]> {
    this.enter("listVirtualMachines", resourceGroup ?? "*", options);
    return [...this.virtualMachines.entries()]
      .filter(([storeKey]) => resourceGroup === undefined || storeKey.startsWith(`${resourceGroup}/`))
      .map(([, vm]) => structuredClone(vm));
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private enter(operation: string, name: string, options: OperationOptions | undefined): void {
    if (options?.signal?.aborted) {
      throw new OperationCancelledError(`Cancelled before ${operation} '${name}'`);
    }
    this.calls.push(`${operation}:${name}`);

    const failure = this.failures.find(
      (candidate) =>
        candidate.operation === operation &&
        (candidate.name === undefined || candidate.name === name) &&
        (candidate.remaining === undefined || candidate.remaining > 0)
    );
    if (failure) {
      if (failure.remaining !== undefined) {
        failure.remaining -= 1;
      }
      throw failure.error;
    }
  }

  private requireGroup(resourceGroup: string, kind: ResourceKind, name: string): void {
    if (!this.groups.has(resourceGroup)) {
      throw new PermanentCloudError(`Resource group '${resourceGroup}' could not be found`, {
        resourceKind: kind,
        resourceName: name,
        operation: "createOrUpdate",
        statusCode: 404,
        cloudCode: "ResourceGroupNotFound",
      });
    }
  }

  private networkId(resourceGroup: string, path: string): string {
    return buildResourceId(this.subscriptionId, resourceGroup, `Microsoft.Network/${path}`);
  }
}

function key(resourceGroup: string, name: string): string {
  return `${resourceGroup}/${name}`;
}

function clone<T>(value: T | undefined): T | undefined {
  return value === undefined ? undefined : structuredClone(value);
}

function notFound(kind: ResourceKind, name: string): PermanentCloudError {
  return new PermanentCloudError(`${kind} '${name}' not found`, {
    resourceKind: kind,
    resourceName: name,
    statusCode: 404,
    cloudCode: "NotFound",
  });
}

