/**
 * ArmClient
 * エンジンが依存するクラウド API の最小面
 *
 * 取得系は 404 のとき undefined を返し、削除系は既に存在しないとき false を返す。
 * 一時的な失敗のリトライとエラー分類は実装側の責務。
 */

import type { OperationOptions, Tags } from "../types/index.js";
import type { ObservedRuleProtocol, RuleDirection } from "../types/index.js";

export interface ResourceGroupRecord {
  id: string;
  name: string;
  location: string;
  tags: Tags;
  /** Succeeded / Deleting など */
  provisioningState?: string;
}

export interface SecurityRuleRecord {
  name: string;
  priority: number;
  protocol: ObservedRuleProtocol;
  direction: RuleDirection;
  access: "Allow" | "Deny";
  sourceAddressPrefix: string;
  sourcePortRange: string;
  destinationAddressPrefix: string;
  destinationPortRange: string;
}

export interface SecurityGroupRecord {
  id: string;
  name: string;
  location: string;
  tags: Tags;
  securityRules: SecurityRuleRecord[];
}

export interface SubnetRecord {
  id: string;
  name: string;
  addressPrefix: string;
  networkSecurityGroupId?: string;
  routeTableId?: string;
}

export interface PeeringRecord {
  id: string;
  name: string;
  remoteVirtualNetworkId: string;
  /** Initiated / Connected / Disconnected */
  peeringState?: string;
}

export interface VirtualNetworkRecord {
  id: string;
  name: string;
  location: string;
  tags: Tags;
  addressPrefixes: string[];
  subnets: SubnetRecord[];
  peerings: PeeringRecord[];
}

export interface PublicIpRecord {
  id: string;
  name: string;
  location: string;
  tags: Tags;
  ipAddress?: string;
}

export interface NetworkInterfaceRecord {
  id: string;
  name: string;
  location: string;
  tags: Tags;
  enableIpForwarding: boolean;
  privateIpAddress?: string;
  subnetId?: string;
  publicIpAddressId?: string;
}

export interface RouteRecord {
  name: string;
  addressPrefix: string;
  nextHopType: "VirtualAppliance";
  nextHopIpAddress: string;
}

export interface RouteTableRecord {
  id: string;
  name: string;
  location: string;
  tags: Tags;
  routes: RouteRecord[];
}

export interface VirtualMachineRecord {
  id: string;
  name: string;
  location: string;
  tags: Tags;
  /** 例: "PowerState/running" の "running" 部分 */
  powerState?: string;
  /** Creating / Succeeded / Failed など */
  provisioningState?: string;
}

export interface ResourceGroupParams {
  location: string;
  tags: Tags;
}

export interface SecurityGroupParams {
  location: string;
  tags: Tags;
  securityRules: SecurityRuleRecord[];
}

export interface VirtualNetworkParams {
  location: string;
  tags: Tags;
  addressPrefixes: string[];
  subnets: Array<{ name: string; addressPrefix: string; networkSecurityGroupId: string }>;
}

export interface PublicIpParams {
  location: string;
  tags: Tags;
}

export interface NetworkInterfaceParams {
  location: string;
  tags: Tags;
  enableIpForwarding: boolean;
  subnetId: string;
  publicIpAddressId: string;
}

export interface PeeringParams {
  remoteVirtualNetworkId: string;
  allowVirtualNetworkAccess: boolean;
  allowForwardedTraffic: boolean;
}

export interface RouteTableParams {
  location: string;
  tags: Tags;
  routes: RouteRecord[];
}

export interface VirtualMachineParams {
  location: string;
  tags: Tags;
  vmSize: string;
  /** Publisher:Offer:SKU:Version */
  image: string;
  computerName: string;
  adminUsername: string;
  sshPublicKeys: string[];
  /** base64 エンコード済みの cloud-init */
  customData: string;
  networkInterfaceId: string;
}

/**
 * Azure Resource Manager 相当の操作
 */
export interface ArmClient {
  readonly subscriptionId: string;

  getResourceGroup(name: string, options?: OperationOptions): Promise<ResourceGroupRecord | undefined>;
  createOrUpdateResourceGroup(
    name: string,
    params: ResourceGroupParams,
    options?: OperationOptions
  ): Promise<ResourceGroupRecord>;
  /** カスケード削除。存在しなければ false */
  deleteResourceGroup(name: string, options?: OperationOptions): Promise<boolean>;
  listResourceGroups(
    tagFilter: { name: string; value: string },
    options?: OperationOptions
  ): Promise<ResourceGroupRecord[]>;

  getSecurityGroup(
    resourceGroup: string,
    name: string,
    options?: OperationOptions
  ): Promise<SecurityGroupRecord | undefined>;
  createOrUpdateSecurityGroup(
    resourceGroup: string,
    name: string,
    params: SecurityGroupParams,
    options?: OperationOptions
  ): Promise<SecurityGroupRecord>;
  createOrUpdateSecurityRule(
    resourceGroup: string,
    securityGroupName: string,
    rule: SecurityRuleRecord,
    options?: OperationOptions
  ): Promise<SecurityRuleRecord>;

  getVirtualNetwork(
    resourceGroup: string,
    name: string,
    options?: OperationOptions
  ): Promise<VirtualNetworkRecord | undefined>;
  createOrUpdateVirtualNetwork(
    resourceGroup: string,
    name: string,
    params: VirtualNetworkParams,
    options?: OperationOptions
  ): Promise<VirtualNetworkRecord>;

  getSubnet(
    resourceGroup: string,
    virtualNetworkName: string,
    name: string,
    options?: OperationOptions
  ): Promise<SubnetRecord | undefined>;
  /** 既存サブネットの他の設定を保ったままルートテーブルを関連付ける */
  associateRouteTable(
    resourceGroup: string,
    virtualNetworkName: string,
    subnetName: string,
    routeTableId: string,
    options?: OperationOptions
  ): Promise<SubnetRecord>;

  getPublicIp(
    resourceGroup: string,
    name: string,
    options?: OperationOptions
  ): Promise<PublicIpRecord | undefined>;
  createOrUpdatePublicIp(
    resourceGroup: string,
    name: string,
    params: PublicIpParams,
    options?: OperationOptions
  ): Promise<PublicIpRecord>;

  getNetworkInterface(
    resourceGroup: string,
    name: string,
    options?: OperationOptions
  ): Promise<NetworkInterfaceRecord | undefined>;
  createOrUpdateNetworkInterface(
    resourceGroup: string,
    name: string,
    params: NetworkInterfaceParams,
    options?: OperationOptions
  ): Promise<NetworkInterfaceRecord>;
  /** 他の設定を保ったまま IP 転送フラグのみ変更する */
  setIpForwarding(
    resourceGroup: string,
    name: string,
    enabled: boolean,
    options?: OperationOptions
  ): Promise<NetworkInterfaceRecord>;

  getPeering(
    resourceGroup: string,
    virtualNetworkName: string,
    name: string,
    options?: OperationOptions
  ): Promise<PeeringRecord | undefined>;
  createOrUpdatePeering(
    resourceGroup: string,
    virtualNetworkName: string,
    name: string,
    params: PeeringParams,
    options?: OperationOptions
  ): Promise<PeeringRecord>;
  deletePeering(
    resourceGroup: string,
    virtualNetworkName: string,
    name: string,
    options?: OperationOptions
  ): Promise<boolean>;

  getRouteTable(
    resourceGroup: string,
    name: string,
    options?: OperationOptions
  ): Promise<RouteTableRecord | undefined>;
  createOrUpdateRouteTable(
    resourceGroup: string,
    name: string,
    params: RouteTableParams,
    options?: OperationOptions
  ): Promise<RouteTableRecord>;

  getVirtualMachine(
    resourceGroup: string,
    name: string,
    options?: OperationOptions
  ): Promise<VirtualMachineRecord | undefined>;
  createOrUpdateVirtualMachine(
    resourceGroup: string,
    name: string,
    params: VirtualMachineParams,
    options?: OperationOptions
  ): Promise<VirtualMachineRecord>;
  deleteVirtualMachine(resourceGroup: string, name: string, options?: OperationOptions): Promise<boolean>;
  /** resourceGroup 省略時はサブスクリプション全体 */
  listVirtualMachines(
    resourceGroup: string | undefined,
    options?: OperationOptions
  ): Promise<VirtualMachineRecord[]>;
}
