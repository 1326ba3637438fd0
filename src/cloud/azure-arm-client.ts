/**
 * ArmClient の Azure SDK 実装
 *
 * SDK 自身のリトライは無効化し、withRetry で一時的な失敗のみ再試行する。
 * 404 は取得系で undefined、削除系で false に変換する。
 */

import type { TokenCredential } from "@azure/identity";
import { ClientSecretCredential, DefaultAzureCredential } from "@azure/identity";
import { ResourceManagementClient, type ResourceGroup } from "@azure/arm-resources";
import {
  NetworkManagementClient,
  type NetworkInterface,
  type NetworkSecurityGroup,
  type PublicIPAddress,
  type RouteTable,
  type SecurityRule,
  type Subnet,
  type VirtualNetwork,
  type VirtualNetworkPeering,
} from "@azure/arm-network";
import { ComputeManagementClient, type VirtualMachine } from "@azure/arm-compute";
import type { OperationOptions } from "../types/index.js";
import type { ObservedRuleProtocol, RuleDirection } from "../types/index.js";
import { ValidationError } from "../errors/index.js";
import { logger as defaultLogger, type Logger } from "../logging/index.js";
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
} from "./arm-client.js";
import { IP_CONFIGURATION_NAME } from "../tags/index.js";
import {
  DEFAULT_RETRY_POLICY,
  classifyCloudError,
  toCloudError,
  withRetry,
  type CloudCallContext,
  type RetryPolicy,
} from "./retry.js";

/**
 * 認証情報
 * clientId / clientSecret / tenantId がすべて揃えばサービスプリンシパル、
 * それ以外は DefaultAzureCredential（環境変数、マネージド ID、az login）
 */
export interface AzureCredentialSettings {
  subscriptionId: string;
  tenantId?: string | undefined;
  clientId?: string | undefined;
  clientSecret?: string | undefined;
}

/** SDK 呼び出しに渡すオプション */
interface SdkCallOptions {
  abortSignal?: AbortSignal;
}

export interface AzureArmClientOptions {
  retryPolicy?: RetryPolicy;
  logger?: Logger;
}

/**
 * VM イメージ参照
 */
export interface ImageReference {
  publisher: string;
  offer: string;
  sku: string;
  version: string;
}

/**
 * "Publisher:Offer:SKU:Version" 形式のイメージ指定を解析
 */
export function parseImageReference(image: string): ImageReference {
  const parts = image.split(":").map((part) => part.trim());
  const [publisher, offer, sku, version] = parts;
  if (parts.length !== 4 || !publisher || !offer || !sku || !version) {
    throw new ValidationError(
      `Invalid image '${image}': expected Publisher:Offer:SKU:Version`,
      { field: "image" }
    );
  }
  return { publisher, offer, sku, version };
}

export function createCredential(settings: AzureCredentialSettings): TokenCredential {
  if (settings.tenantId && settings.clientId && settings.clientSecret) {
    return new ClientSecretCredential(settings.tenantId, settings.clientId, settings.clientSecret);
  }
  return new DefaultAzureCredential();
}

/**
 * 設定から ArmClient を生成
 */
export function createAzureArmClient(
  settings: AzureCredentialSettings,
  options: AzureArmClientOptions = {}
): ArmClient {
  return new AzureArmClient(createCredential(settings), settings.subscriptionId, options);
}

export class AzureArmClient implements ArmClient {
  private readonly resources: ResourceManagementClient;
  private readonly network: NetworkManagementClient;
  private readonly compute: ComputeManagementClient;
  private readonly retryPolicy: RetryPolicy;
  private readonly logger: Logger;

  constructor(
    credential: TokenCredential,
    readonly subscriptionId: string,
    options: AzureArmClientOptions = {}
  ) {
    const clientOptions = { retryOptions: { maxRetries: 0 } };
    this.resources = new ResourceManagementClient(credential, subscriptionId, clientOptions);
    this.network = new NetworkManagementClient(credential, subscriptionId, clientOptions);
    this.compute = new ComputeManagementClient(credential, subscriptionId, clientOptions);
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.logger = (options.logger ?? defaultLogger).child({ component: "arm-client" });
  }

  // ---------------------------------------------------------------------------
  // Resource groups
  // ---------------------------------------------------------------------------

  async getResourceGroup(name: string, options?: OperationOptions): Promise<ResourceGroupRecord | undefined> {
    const group = await this.read(
      { resourceKind: "resource_group", resourceName: name, operation: "get" },
      (sdkOptions) => this.resources.resourceGroups.get(name, sdkOptions),
      options
    );
    return group ? toResourceGroupRecord(group) : undefined;
  }

  async createOrUpdateResourceGroup(
    name: string,
    params: ResourceGroupParams,
    options?: OperationOptions
  ): Promise<ResourceGroupRecord> {
    const group = await this.write(
      { resourceKind: "resource_group", resourceName: name, operation: "createOrUpdate" },
      (sdkOptions) =>
        this.resources.resourceGroups.createOrUpdate(
          name,
          { location: params.location, tags: params.tags },
          sdkOptions
        ),
      options
    );
    return toResourceGroupRecord(group);
  }

  async deleteResourceGroup(name: string, options?: OperationOptions): Promise<boolean> {
    return this.remove(
      { resourceKind: "resource_group", resourceName: name, operation: "delete" },
      (sdkOptions) => this.resources.resourceGroups.beginDeleteAndWait(name, sdkOptions),
      options
    );
  }

  async listResourceGroups(
    tagFilter: { name: string; value: string },
    options?: OperationOptions
  ): Promise<ResourceGroupRecord[]> {
    const filter = `tagName eq '${tagFilter.name}' and tagValue eq '${tagFilter.value}'`;
    return this.write(
      { resourceKind: "resource_group", resourceName: "*", operation: "list" },
      async (sdkOptions) => {
        const groups: ResourceGroupRecord[] = [];
        for await (const group of this.resources.resourceGroups.list({ ...sdkOptions, filter })) {
          groups.push(toResourceGroupRecord(group));
        }
        return groups;
      },
      options
    );
  }

  // ---------------------------------------------------------------------------
  // Network security groups
  // ---------------------------------------------------------------------------

  async getSecurityGroup(
    resourceGroup: string,
    name: string,
    options?: OperationOptions
  ): Promise<SecurityGroupRecord | undefined> {
    const group = await this.read(
      { resourceKind: "network_security_group", resourceName: name, operation: "get" },
      (sdkOptions) => this.network.networkSecurityGroups.get(resourceGroup, name, sdkOptions),
      options
    );
    return group ? this.toSecurityGroupRecord(resourceGroup, name, group) : undefined;
  }

  async createOrUpdateSecurityGroup(
    resourceGroup: string,
    name: string,
    params: SecurityGroupParams,
    options?: OperationOptions
  ): Promise<SecurityGroupRecord> {
    const group = await this.write(
      { resourceKind: "network_security_group", resourceName: name, operation: "createOrUpdate" },
      (sdkOptions) =>
        this.network.networkSecurityGroups.beginCreateOrUpdateAndWait(
          resourceGroup,
          name,
          {
            location: params.location,
            tags: params.tags,
            securityRules: params.securityRules.map(toSdkSecurityRule),
          },
          sdkOptions
        ),
      options
    );
    return this.toSecurityGroupRecord(resourceGroup, name, group);
  }

  async createOrUpdateSecurityRule(
    resourceGroup: string,
    securityGroupName: string,
    rule: SecurityRuleRecord,
    options?: OperationOptions
  ): Promise<SecurityRuleRecord> {
    const created = await this.write(
      { resourceKind: "security_rule", resourceName: rule.name, operation: "createOrUpdate" },
      (sdkOptions) =>
        this.network.securityRules.beginCreateOrUpdateAndWait(
          resourceGroup,
          securityGroupName,
          rule.name,
          toSdkSecurityRule(rule),
          sdkOptions
        ),
      options
    );
    return toSecurityRuleRecord(created) ?? rule;
  }

  // ---------------------------------------------------------------------------
  // Virtual networks and subnets
  // ---------------------------------------------------------------------------

  async getVirtualNetwork(
    resourceGroup: string,
    name: string,
    options?: OperationOptions
  ): Promise<VirtualNetworkRecord | undefined> {
    const vnet = await this.read(
      { resourceKind: "virtual_network", resourceName: name, operation: "get" },
      (sdkOptions) => this.network.virtualNetworks.get(resourceGroup, name, sdkOptions),
      options
    );
    return vnet ? this.toVirtualNetworkRecord(resourceGroup, name, vnet) : undefined;
  }

  async createOrUpdateVirtualNetwork(
    resourceGroup: string,
    name: string,
    params: VirtualNetworkParams,
    options?: OperationOptions
  ): Promise<VirtualNetworkRecord> {
    const vnet = await this.write(
      { resourceKind: "virtual_network", resourceName: name, operation: "createOrUpdate" },
      (sdkOptions) =>
        this.network.virtualNetworks.beginCreateOrUpdateAndWait(
          resourceGroup,
          name,
          {
            location: params.location,
            tags: params.tags,
            addressSpace: { addressPrefixes: params.addressPrefixes },
            subnets: params.subnets.map((subnet) => ({
              name: subnet.name,
              addressPrefix: subnet.addressPrefix,
              networkSecurityGroup: { id: subnet.networkSecurityGroupId },
            })),
          },
          sdkOptions
        ),
      options
    );
    return this.toVirtualNetworkRecord(resourceGroup, name, vnet);
  }

  async getSubnet(
    resourceGroup: string,
    virtualNetworkName: string,
    name: string,
    options?: OperationOptions
  ): Promise<SubnetRecord | undefined> {
    const subnet = await this.read(
      { resourceKind: "subnet", resourceName: name, operation: "get" },
      (sdkOptions) => this.network.subnets.get(resourceGroup, virtualNetworkName, name, sdkOptions),
      options
    );
    return subnet ? this.toSubnetRecord(resourceGroup, virtualNetworkName, subnet) : undefined;
  }

  async associateRouteTable(
    resourceGroup: string,
    virtualNetworkName: string,
    subnetName: string,
    routeTableId: string,
    options?: OperationOptions
  ): Promise<SubnetRecord> {
    const context: CloudCallContext = {
      resourceKind: "subnet",
      resourceName: subnetName,
      operation: "associateRouteTable",
    };
    const subnet = await this.write(
      context,
      async (sdkOptions) => {
        // 既存のアドレス範囲や NSG を保つため、取得した定義に上書きする
        const current = await this.network.subnets.get(resourceGroup, virtualNetworkName, subnetName, sdkOptions);
        return this.network.subnets.beginCreateOrUpdateAndWait(
          resourceGroup,
          virtualNetworkName,
          subnetName,
          { ...current, routeTable: { id: routeTableId } },
          sdkOptions
        );
      },
      options
    );
    return this.toSubnetRecord(resourceGroup, virtualNetworkName, subnet);
  }

  // ---------------------------------------------------------------------------
  // Public IPs and network interfaces
  // ---------------------------------------------------------------------------

  async getPublicIp(
    resourceGroup: string,
    name: string,
    options?: OperationOptions
  ): Promise<PublicIpRecord | undefined> {
    const address = await this.read(
      { resourceKind: "public_ip", resourceName: name, operation: "get" },
      (sdkOptions) => this.network.publicIPAddresses.get(resourceGroup, name, sdkOptions),
      options
    );
    return address ? this.toPublicIpRecord(resourceGroup, name, address) : undefined;
  }

  async createOrUpdatePublicIp(
    resourceGroup: string,
    name: string,
    params: PublicIpParams,
    options?: OperationOptions
  ): Promise<PublicIpRecord> {
    const address = await this.write(
      { resourceKind: "public_ip", resourceName: name, operation: "createOrUpdate" },
      (sdkOptions) =>
        this.network.publicIPAddresses.beginCreateOrUpdateAndWait(
          resourceGroup,
          name,
          {
            location: params.location,
            tags: params.tags,
            sku: { name: "Standard" },
            publicIPAllocationMethod: "Static",
          },
          sdkOptions
        ),
      options
    );
    return this.toPublicIpRecord(resourceGroup, name, address);
  }

  async getNetworkInterface(
    resourceGroup: string,
    name: string,
    options?: OperationOptions
  ): Promise<NetworkInterfaceRecord | undefined> {
    const nic = await this.read(
      { resourceKind: "network_interface", resourceName: name, operation: "get" },
      (sdkOptions) => this.network.networkInterfaces.get(resourceGroup, name, sdkOptions),
      options
    );
    return nic ? this.toNetworkInterfaceRecord(resourceGroup, name, nic) : undefined;
  }

  async createOrUpdateNetworkInterface(
    resourceGroup: string,
    name: string,
    params: NetworkInterfaceParams,
    options?: OperationOptions
  ): Promise<NetworkInterfaceRecord> {
    const nic = await this.write(
      { resourceKind: "network_interface", resourceName: name, operation: "createOrUpdate" },
      (sdkOptions) =>
        this.network.networkInterfaces.beginCreateOrUpdateAndWait(
          resourceGroup,
          name,
          {
            location: params.location,
            tags: params.tags,
            enableIPForwarding: params.enableIpForwarding,
            ipConfigurations: [
              {
                name: IP_CONFIGURATION_NAME,
                subnet: { id: params.subnetId },
                publicIPAddress: { id: params.publicIpAddressId },
                privateIPAllocationMethod: "Dynamic",
              },
            ],
          },
          sdkOptions
        ),
      options
    );
    return this.toNetworkInterfaceRecord(resourceGroup, name, nic);
  }

  async setIpForwarding(
    resourceGroup: string,
    name: string,
    enabled: boolean,
    options?: OperationOptions
  ): Promise<NetworkInterfaceRecord> {
    const nic = await this.write(
      { resourceKind: "network_interface", resourceName: name, operation: "setIpForwarding" },
      async (sdkOptions) => {
        const current = await this.network.networkInterfaces.get(resourceGroup, name, sdkOptions);
        return this.network.networkInterfaces.beginCreateOrUpdateAndWait(
          resourceGroup,
          name,
          { ...current, enableIPForwarding: enabled },
          sdkOptions
        );
      },
      options
    );
    return this.toNetworkInterfaceRecord(resourceGroup, name, nic);
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
    const peering = await this.read(
      { resourceKind: "virtual_network_peering", resourceName: name, operation: "get" },
      (sdkOptions) =>
        this.network.virtualNetworkPeerings.get(resourceGroup, virtualNetworkName, name, sdkOptions),
      options
    );
    return peering ? this.toPeeringRecord(resourceGroup, virtualNetworkName, peering) : undefined;
  }

  async createOrUpdatePeering(
    resourceGroup: string,
    virtualNetworkName: string,
    name: string,
    params: PeeringParams,
    options?: OperationOptions
  ): Promise<PeeringRecord> {
    const peering = await this.write(
      { resourceKind: "virtual_network_peering", resourceName: name, operation: "createOrUpdate" },
      (sdkOptions) =>
        this.network.virtualNetworkPeerings.beginCreateOrUpdateAndWait(
          resourceGroup,
          virtualNetworkName,
          name,
          {
            remoteVirtualNetwork: { id: params.remoteVirtualNetworkId },
            allowVirtualNetworkAccess: params.allowVirtualNetworkAccess,
            allowForwardedTraffic: params.allowForwardedTraffic,
          },
          sdkOptions
        ),
      options
    );
    return this.toPeeringRecord(resourceGroup, virtualNetworkName, { ...peering, name });
  }

  async deletePeering(
    resourceGroup: string,
    virtualNetworkName: string,
    name: string,
    options?: OperationOptions
  ): Promise<boolean> {
    return this.remove(
      { resourceKind: "virtual_network_peering", resourceName: name, operation: "delete" },
      (sdkOptions) =>
        this.network.virtualNetworkPeerings.beginDeleteAndWait(resourceGroup, virtualNetworkName, name, sdkOptions),
      options
    );
  }

  async getRouteTable(
    resourceGroup: string,
    name: string,
    options?: OperationOptions
  ): Promise<RouteTableRecord | undefined> {
    const table = await this.read(
      { resourceKind: "route_table", resourceName: name, operation: "get" },
      (sdkOptions) => this.network.routeTables.get(resourceGroup, name, sdkOptions),
      options
    );
    return table ? this.toRouteTableRecord(resourceGroup, name, table) : undefined;
  }

  async createOrUpdateRouteTable(
    resourceGroup: string,
    name: string,
    params: RouteTableParams,
    options?: OperationOptions
  ): Promise<RouteTableRecord> {
    const table = await this.write(
      { resourceKind: "route_table", resourceName: name, operation: "createOrUpdate" },
      (sdkOptions) =>
        this.network.routeTables.beginCreateOrUpdateAndWait(
          resourceGroup,
          name,
          { location: params.location, tags: params.tags, routes: params.routes },
          sdkOptions
        ),
      options
    );
    return this.toRouteTableRecord(resourceGroup, name, table);
  }

  // ---------------------------------------------------------------------------
  // Virtual machines
  // ---------------------------------------------------------------------------

  async getVirtualMachine(
    resourceGroup: string,
    name: string,
    options?: OperationOptions
  ): Promise<VirtualMachineRecord | undefined> {
    const vm = await this.read(
      { resourceKind: "virtual_machine", resourceName: name, operation: "get" },
      (sdkOptions) =>
        this.compute.virtualMachines.get(resourceGroup, name, { ...sdkOptions, expand: "instanceView" }),
      options
    );
    return vm ? this.toVirtualMachineRecord(resourceGroup, name, vm) : undefined;
  }

  async createOrUpdateVirtualMachine(
    resourceGroup: string,
    name: string,
    params: VirtualMachineParams,
    options?: OperationOptions
  ): Promise<VirtualMachineRecord> {
    const image = parseImageReference(params.image);
    const vm = await this.write(
      { resourceKind: "virtual_machine", resourceName: name, operation: "createOrUpdate" },
      (sdkOptions) =>
        this.compute.virtualMachines.beginCreateOrUpdateAndWait(
          resourceGroup,
          name,
          {
            location: params.location,
            tags: params.tags,
            hardwareProfile: { vmSize: params.vmSize },
            storageProfile: {
              imageReference: image,
              osDisk: { createOption: "FromImage", deleteOption: "Delete" },
            },
            osProfile: {
              computerName: params.computerName,
              adminUsername: params.adminUsername,
              customData: params.customData,
              linuxConfiguration: {
                disablePasswordAuthentication: true,
                ssh: {
                  publicKeys: params.sshPublicKeys.map((keyData) => ({
                    path: `/home/${params.adminUsername}/.ssh/authorized_keys`,
                    keyData,
                  })),
                },
              },
            },
            networkProfile: {
              networkInterfaces: [{ id: params.networkInterfaceId, primary: true }],
            },
          },
          sdkOptions
        ),
      options
    );
    return this.toVirtualMachineRecord(resourceGroup, name, vm);
  }

  async deleteVirtualMachine(resourceGroup: string, name: string, options?: OperationOptions): Promise<boolean> {
    return this.remove(
      { resourceKind: "virtual_machine", resourceName: name, operation: "delete" },
      (sdkOptions) => this.compute.virtualMachines.beginDeleteAndWait(resourceGroup, name, sdkOptions),
      options
    );
  }

  async listVirtualMachines(
    resourceGroup: string | undefined,
    options?: OperationOptions
  ): Promise<VirtualMachineRecord[]> {
    return this.write(
      { resourceKind: "virtual_machine", resourceName: resourceGroup ?? "*", operation: "list" },
      async (sdkOptions) => {
        const pages = resourceGroup
          ? this.compute.virtualMachines.list(resourceGroup, { ...sdkOptions, expand: "instanceView" })
          : this.compute.virtualMachines.listAll({ ...sdkOptions, statusOnly: "true" });
        const machines: VirtualMachineRecord[] = [];
        for await (const vm of pages) {
          const group = vm.id ? resourceGroupOf(vm.id) : resourceGroup;
          machines.push(this.toVirtualMachineRecord(group ?? "", vm.name ?? "", vm));
        }
        return machines;
      },
      options
    );
  }

  // ---------------------------------------------------------------------------
  // Call wrappers
  // ---------------------------------------------------------------------------

  /** 取得系: 404 は undefined */
  private async read<T>(
    context: CloudCallContext,
    call: (sdkOptions: SdkCallOptions) => Promise<T>,
    options?: OperationOptions
  ): Promise<T | undefined> {
    try {
      return await this.retrying(context, call, options);
    } catch (error) {
      if (classifyCloudError(error) === "not_found") {
        return undefined;
      }
      throw toCloudError(error, context, this.retryPolicy.maxAttempts);
    }
  }

  /** 作成・更新・一覧系: 404 も含めエラーに変換 */
  private async write<T>(
    context: CloudCallContext,
    call: (sdkOptions: SdkCallOptions) => Promise<T>,
    options?: OperationOptions
  ): Promise<T> {
    try {
      return await this.retrying(context, call, options);
    } catch (error) {
      throw toCloudError(error, context, this.retryPolicy.maxAttempts);
    }
  }

  /** 削除系: 既に存在しなければ false */
  private async remove(
    context: CloudCallContext,
    call: (sdkOptions: SdkCallOptions) => Promise<unknown>,
    options?: OperationOptions
  ): Promise<boolean> {
    try {
      await this.retrying(context, call, options);
      return true;
    } catch (error) {
      if (classifyCloudError(error) === "not_found") {
        return false;
      }
      throw toCloudError(error, context, this.retryPolicy.maxAttempts);
    }
  }

  private retrying<T>(
    context: CloudCallContext,
    call: (sdkOptions: SdkCallOptions) => Promise<T>,
    options?: OperationOptions
  ): Promise<T> {
    this.logger.debug(context, "Cloud call");
    return withRetry((signal) => call(signal ? { abortSignal: signal } : {}), context, {
      policy: this.retryPolicy,
      signal: options?.signal,
      logger: this.logger,
    });
  }

  // ---------------------------------------------------------------------------
  // Mapping
  // ---------------------------------------------------------------------------

  private idOf(resourceGroup: string, providerPath: string, id: string | undefined): string {
    return id ?? `/subscriptions/${this.subscriptionId}/resourceGroups/${resourceGroup}/providers/${providerPath}`;
  }

  private toSecurityGroupRecord(
    resourceGroup: string,
    name: string,
    group: NetworkSecurityGroup
  ): SecurityGroupRecord {
    return {
      id: this.idOf(resourceGroup, `Microsoft.Network/networkSecurityGroups/${name}`, group.id),
      name: group.name ?? name,
      location: group.location ?? "",
      tags: group.tags ?? {},
      securityRules: (group.securityRules ?? []).flatMap((rule) => {
        const record = toSecurityRuleRecord(rule);
        return record ? [record] : [];
      }),
    };
  }

  private toVirtualNetworkRecord(
    resourceGroup: string,
    name: string,
    vnet: VirtualNetwork
  ): VirtualNetworkRecord {
    return {
      id: this.idOf(resourceGroup, `Microsoft.Network/virtualNetworks/${name}`, vnet.id),
      name: vnet.name ?? name,
      location: vnet.location ?? "",
      tags: vnet.tags ?? {},
      addressPrefixes: vnet.addressSpace?.addressPrefixes ?? [],
      subnets: (vnet.subnets ?? []).map((subnet) => this.toSubnetRecord(resourceGroup, name, subnet)),
      peerings: (vnet.virtualNetworkPeerings ?? []).map((peering) =>
        this.toPeeringRecord(resourceGroup, name, peering)
      ),
    };
  }

  private toSubnetRecord(resourceGroup: string, virtualNetworkName: string, subnet: Subnet): SubnetRecord {
    const name = subnet.name ?? "";
    const record: SubnetRecord = {
      id: this.idOf(
        resourceGroup,
        `Microsoft.Network/virtualNetworks/${virtualNetworkName}/subnets/${name}`,
        subnet.id
      ),
      name,
      addressPrefix: subnet.addressPrefix ?? subnet.addressPrefixes?.[0] ?? "",
    };
    if (subnet.networkSecurityGroup?.id) {
      record.networkSecurityGroupId = subnet.networkSecurityGroup.id;
    }
    if (subnet.routeTable?.id) {
      record.routeTableId = subnet.routeTable.id;
    }
    return record;
  }

  private toPeeringRecord(
    resourceGroup: string,
    virtualNetworkName: string,
    peering: VirtualNetworkPeering
  ): PeeringRecord {
    const name = peering.name ?? "";
    const record: PeeringRecord = {
      id: this.idOf(
        resourceGroup,
        `Microsoft.Network/virtualNetworks/${virtualNetworkName}/virtualNetworkPeerings/${name}`,
        peering.id
      ),
      name,
      remoteVirtualNetworkId: peering.remoteVirtualNetwork?.id ?? "",
    };
    if (peering.peeringState) {
      record.peeringState = peering.peeringState;
    }
    return record;
  }

  private toPublicIpRecord(resourceGroup: string, name: string, address: PublicIPAddress): PublicIpRecord {
    const record: PublicIpRecord = {
      id: this.idOf(resourceGroup, `Microsoft.Network/publicIPAddresses/${name}`, address.id),
      name: address.name ?? name,
      location: address.location ?? "",
      tags: address.tags ?? {},
    };
    if (address.ipAddress) {
      record.ipAddress = address.ipAddress;
    }
    return record;
  }

  private toNetworkInterfaceRecord(
    resourceGroup: string,
    name: string,
    nic: NetworkInterface
  ): NetworkInterfaceRecord {
    const ipConfiguration = nic.ipConfigurations?.[0];
    const record: NetworkInterfaceRecord = {
      id: this.idOf(resourceGroup, `Microsoft.Network/networkInterfaces/${name}`, nic.id),
      name: nic.name ?? name,
      location: nic.location ?? "",
      tags: nic.tags ?? {},
      enableIpForwarding: nic.enableIPForwarding ?? false,
    };
    if (ipConfiguration?.privateIPAddress) {
      record.privateIpAddress = ipConfiguration.privateIPAddress;
    }
    if (ipConfiguration?.subnet?.id) {
      record.subnetId = ipConfiguration.subnet.id;
    }
    if (ipConfiguration?.publicIPAddress?.id) {
      record.publicIpAddressId = ipConfiguration.publicIPAddress.id;
    }
    return record;
  }

  private toRouteTableRecord(resourceGroup: string, name: string, table: RouteTable): RouteTableRecord {
    return {
      id: this.idOf(resourceGroup, `Microsoft.Network/routeTables/${name}`, table.id),
      name: table.name ?? name,
      location: table.location ?? "",
      tags: table.tags ?? {},
      routes: (table.routes ?? []).flatMap((route) =>
        route.name && route.addressPrefix && route.nextHopIpAddress && route.nextHopType === "VirtualAppliance"
          ? [
              {
                name: route.name,
                addressPrefix: route.addressPrefix,
                nextHopType: "VirtualAppliance" as const,
                nextHopIpAddress: route.nextHopIpAddress,
              },
            ]
          : []
      ),
    };
  }

  private toVirtualMachineRecord(resourceGroup: string, name: string, vm: VirtualMachine): VirtualMachineRecord {
    const record: VirtualMachineRecord = {
      id: this.idOf(resourceGroup, `Microsoft.Compute/virtualMachines/${name}`, vm.id),
      name: vm.name ?? name,
      location: vm.location,
      tags: vm.tags ?? {},
    };
    const powerState = vm.instanceView?.statuses
      ?.map((status) => status.code ?? "")
      .find((code) => code.startsWith("PowerState/"));
    if (powerState) {
      record.powerState = powerState.slice("PowerState/".length);
    }
    if (vm.provisioningState) {
      record.provisioningState = vm.provisioningState;
    }
    return record;
  }
}

function toResourceGroupRecord(group: ResourceGroup): ResourceGroupRecord {
  const record: ResourceGroupRecord = {
    id: group.id ?? "",
    name: group.name ?? "",
    location: group.location,
    tags: group.tags ?? {},
  };
  if (group.properties?.provisioningState) {
    record.provisioningState = group.properties.provisioningState;
  }
  return record;
}

function toSdkSecurityRule(rule: SecurityRuleRecord): SecurityRule {
  return {
    name: rule.name,
    priority: rule.priority,
    protocol: rule.protocol,
    direction: rule.direction,
    access: rule.access,
    sourceAddressPrefix: rule.sourceAddressPrefix,
    sourcePortRange: rule.sourcePortRange,
    destinationAddressPrefix: rule.destinationAddressPrefix,
    destinationPortRange: rule.destinationPortRange,
  };
}

/**
 * SDK のルールを記録に変換
 * @law guardctl が作らないプロトコル（Icmp / Esp / Ah）のルールも優先度衝突の検出対象として残す
 */
export function toSecurityRuleRecord(rule: SecurityRule): SecurityRuleRecord | undefined {
  const protocol = parseProtocol(rule.protocol);
  const direction = parseDirection(rule.direction);
  if (!rule.name || rule.priority === undefined || !protocol || !direction) {
    return undefined;
  }
  return {
    name: rule.name,
    priority: rule.priority,
    protocol,
    direction,
    access: rule.access === "Deny" ? "Deny" : "Allow",
    sourceAddressPrefix: rule.sourceAddressPrefix ?? "*",
    sourcePortRange: rule.sourcePortRange ?? "*",
    destinationAddressPrefix: rule.destinationAddressPrefix ?? "*",
    destinationPortRange: rule.destinationPortRange ?? "*",
  };
}

function parseProtocol(value: string | undefined): ObservedRuleProtocol | undefined {
  switch (value) {
    case "Tcp":
    case "Udp":
    case "Icmp":
    case "Esp":
    case "Ah":
    case "*":
      return value;
    default:
      return undefined;
  }
}

function parseDirection(value: string | undefined): RuleDirection | undefined {
  switch (value) {
    case "Inbound":
    case "Outbound":
      return value;
    default:
      return undefined;
  }
}

function resourceGroupOf(resourceId: string): string | undefined {
  const segments = resourceId.split("/");
  const index = segments.findIndex((segment) => segment.toLowerCase() === "resourcegroups");
  return index >= 0 ? segments[index + 1] : undefined;
}
