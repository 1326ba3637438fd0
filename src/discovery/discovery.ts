/**
 * Discovery
 * タグ付きのクラウドリソースだけからガードを再構成する
 *
 * getGuard は決定的な名前による個別取得のみを使うため、書き込み直後でも結果が揃う。
 * listGuards はタグフィルタ付きの一覧に依存し、作成・削除の直後は反映が遅れることがある。
 */

import type {
  Guard,
  GuardId,
  OperationOptions,
  PeeringInfo,
} from "../types/index.js";
import type {
  ArmClient,
  NetworkInterfaceRecord,
  PeeringRecord,
  PublicIpRecord,
  ResourceGroupRecord,
  SecurityGroupRecord,
  VirtualMachineRecord,
  VirtualNetworkRecord,
} from "../cloud/arm-client.js";
import { mapWithConcurrency } from "../cloud/concurrency.js";
import { isPermissionDenied } from "../cloud/retry.js";
import { parseVirtualNetworkId } from "../cloud/resource-id.js";
import { NotFoundError, OperationCancelledError, ValidationError } from "../errors/index.js";
import {
  DEFAULT_RESOURCE_GROUP_PREFIX,
  decodeGuardTags,
  isOwnedBy,
  managedTagFilter,
  peeringNamePrefix,
  resourceNames,
  routeTableName,
  TAG_GUARD_ID,
  type DecodedGuardTags,
} from "../tags/index.js";
import { WIREGUARD_RULE_NAME } from "../network/nsg-rules.js";
import { isValidGuardId } from "../guard/guard-id.js";
import { logger as defaultLogger, type Logger } from "../logging/index.js";
import { deriveGuardStatus, toServerState } from "./status.js";

export const DEFAULT_DISCOVERY_CONCURRENCY = 4;

export interface DiscoveryOptions {
  resourceGroupPrefix?: string;
  /** listGuards の同時再構成数 */
  concurrency?: number;
  logger?: Logger;
}

export class Discovery {
  private readonly resourceGroupPrefix: string;
  private readonly concurrency: number;
  private readonly logger: Logger;

  constructor(
    private readonly client: ArmClient,
    options: DiscoveryOptions = {}
  ) {
    this.resourceGroupPrefix = options.resourceGroupPrefix ?? DEFAULT_RESOURCE_GROUP_PREFIX;
    this.concurrency = options.concurrency ?? DEFAULT_DISCOVERY_CONCURRENCY;
    this.logger = (options.logger ?? defaultLogger).child({ component: "discovery" });
  }

  /**
   * ガードの隔離境界を取得
   * サブリソースは読まないため、teardown の存在確認に使う
   * @throws NotFoundError 境界がない、または管理マーカー / guard-id が一致しない
   */
  async getBoundary(guardId: GuardId, options?: OperationOptions): Promise<ResourceGroupRecord> {
    const names = resourceNames(guardId, this.resourceGroupPrefix);
    const group = await this.client.getResourceGroup(names.resourceGroup, options);
    if (!group || !isOwnedBy(group.tags, guardId)) {
      throw new NotFoundError(`Guard '${guardId}' not found`, {
        guardId,
        resourceKind: "resource_group",
        resourceName: names.resourceGroup,
      });
    }
    return group;
  }

  /**
   * ガードを再構成
   * @throws NotFoundError 境界がない、または管理マーカー / guard-id が一致しない
   */
  async getGuard(guardId: GuardId, options?: OperationOptions): Promise<Guard> {
    const names = resourceNames(guardId, this.resourceGroupPrefix);
    const group = await this.getBoundary(guardId, options);
    const decoded = decodeGuardTags(group.tags);
    if (!decoded) {
      throw new NotFoundError(`Guard '${guardId}' not found`, {
        guardId,
        resourceKind: "resource_group",
        resourceName: names.resourceGroup,
      });
    }

    const rg = names.resourceGroup;
    const [vm, publicIp, nic, vnet, nsg] = await Promise.all([
      this.client.getVirtualMachine(rg, names.virtualMachine, options),
      this.client.getPublicIp(rg, names.publicIp, options),
      this.client.getNetworkInterface(rg, names.networkInterface, options),
      this.client.getVirtualNetwork(rg, names.virtualNetwork, options),
      this.client.getSecurityGroup(rg, names.securityGroup, options),
    ]);

    return this.assemble(guardId, group, decoded, {
      vm: owned(vm, guardId),
      publicIp: owned(publicIp, guardId),
      nic: owned(nic, guardId),
      vnet: owned(vnet, guardId),
      nsg: owned(nsg, guardId),
      subnetName: names.subnet,
      options,
    });
  }

  /**
   * 管理タグの付いた全ガードを再構成
   *
   * @law 再構成に失敗したエントリは status = Degraded、error 付きで返し、走査は続ける
   * @law guard-id タグが不正、または名前が接頭辞と一致しない管理対象の境界も Degraded として返す
   * @law 一覧と個別取得の間に消えた境界（再取得で存在しない）だけを結果から除く
   */
  async listGuards(options?: OperationOptions): Promise<Guard[]> {
    const groups = await this.client.listResourceGroups(managedTagFilter(), options);

    const results = await mapWithConcurrency(
      groups,
      this.concurrency,
      (group): Promise<Guard | undefined> => this.reconstruct(group, options)
    );

    return results
      .filter((guard): guard is Guard => guard !== undefined)
      .sort((a, b) => a.id.localeCompare(b.id));
  }

  private async reconstruct(
    group: ResourceGroupRecord,
    options: OperationOptions | undefined
  ): Promise<Guard | undefined> {
    const decoded = decodeGuardTags(group.tags);
    const rawId = group.tags[TAG_GUARD_ID] || group.name;

    if (!decoded || !isValidGuardId(decoded.guardId)) {
      this.logger.warn({ resourceGroup: group.name, guardId: rawId }, "Managed resource group has no valid guard id");
      return degradedGuard(rawId, group, decoded, `Resource group '${group.name}' has no valid '${TAG_GUARD_ID}' tag`);
    }
    const guardId = decoded.guardId;
    const expected = resourceNames(guardId, this.resourceGroupPrefix).resourceGroup;
    if (group.name !== expected) {
      this.logger.warn({ resourceGroup: group.name, guardId, expected }, "Managed resource group name does not match");
      return degradedGuard(
        guardId,
        group,
        decoded,
        `Resource group '${group.name}' does not match the expected name '${expected}'`
      );
    }

    try {
      return await this.getGuard(guardId, options);
    } catch (error) {
      if (error instanceof OperationCancelledError) {
        throw error;
      }
      if (error instanceof NotFoundError && !(await this.stillExists(group, options))) {
        this.logger.debug({ guardId }, "Guard disappeared during listing");
        return undefined;
      }
      this.logger.warn({ guardId, err: error }, "Failed to reconstruct guard");
      return degradedGuard(guardId, group, decoded, errorMessage(error));
    }
  }

  /**
   * 一覧に現れた境界を自身の名前で再取得
   * 再取得に失敗した場合は存在するものとして扱う
   */
  private async stillExists(group: ResourceGroupRecord, options: OperationOptions | undefined): Promise<boolean> {
    try {
      return (await this.client.getResourceGroup(group.name, options)) !== undefined;
    } catch (error) {
      if (error instanceof OperationCancelledError) {
        throw error;
      }
      this.logger.debug({ resourceGroup: group.name, err: error }, "Failed to re-read resource group");
      return true;
    }
  }

  private async assemble(
    guardId: GuardId,
    group: ResourceGroupRecord,
    decoded: DecodedGuardTags,
    observed: {
      vm: VirtualMachineRecord | undefined;
      publicIp: PublicIpRecord | undefined;
      nic: NetworkInterfaceRecord | undefined;
      vnet: VirtualNetworkRecord | undefined;
      nsg: SecurityGroupRecord | undefined;
      subnetName: string;
      options: OperationOptions | undefined;
    }
  ): Promise<Guard> {
    const { vm, publicIp, nic, vnet, nsg } = observed;
    const subnet = vnet?.subnets.find((candidate) => candidate.name === observed.subnetName);
    const peerings = vnet
      ? await this.resolvePeerings(guardId, vnet.peerings, observed.options)
      : [];

    const guard: Guard = {
      id: guardId,
      provider: "azure",
      location: group.location,
      status: deriveGuardStatus({
        resourceGroupState: group.provisioningState,
        vm,
        networkComplete: Boolean(nsg && vnet && subnet && publicIp && nic),
      }),
      public_ip: publicIp?.ipAddress ?? "",
      private_ip: nic?.privateIpAddress ?? "",
      server_id: vm?.id ?? "",
      resource_group: group.name,
      resource_group_id: group.id,
      vnet_id: vnet?.id ?? "",
      subnet_id: subnet?.id ?? "",
      nsg_id: nsg?.id ?? "",
      nic_id: nic?.id ?? "",
      public_ip_id: publicIp?.id ?? "",
      mesh_cidrs: decoded.meshCidrs,
      wireguard_port: wireGuardPortOf(nsg) ?? decoded.wireGuardPort ?? 0,
      metadata: decoded.metadata,
      peerings,
    };
    if (vm) {
      guard.vm_state = toServerState(vm.powerState, vm.provisioningState);
    }
    if (decoded.createdAt !== undefined) {
      guard.created_at = decoded.createdAt;
    }
    return guard;
  }

  /**
   * ガードのピアリングと、伝播済みのルートテーブルを解決
   * ルートテーブルはリモート側の管理下にあるため、参照できなければ省略する
   */
  private async resolvePeerings(
    guardId: GuardId,
    peerings: PeeringRecord[],
    options: OperationOptions | undefined
  ): Promise<PeeringInfo[]> {
    const prefix = peeringNamePrefix(guardId);
    const ours = peerings.filter((peering) => peering.name.startsWith(prefix));

    const infos: PeeringInfo[] = [];
    for (const peering of ours) {
      const info: PeeringInfo = {
        name: peering.name,
        remote_vnet_id: peering.remoteVirtualNetworkId,
      };
      if (peering.peeringState) {
        info.state = peering.peeringState;
      }
      const routeTableId = await this.findRouteTable(guardId, peering, options);
      if (routeTableId) {
        info.route_table_id = routeTableId;
      }
      infos.push(info);
    }
    return infos;
  }

  private async findRouteTable(
    guardId: GuardId,
    peering: PeeringRecord,
    options: OperationOptions | undefined
  ): Promise<string | undefined> {
    let remoteGroup: string;
    try {
      remoteGroup = parseVirtualNetworkId(peering.remoteVirtualNetworkId).resourceGroup;
    } catch (error) {
      if (error instanceof ValidationError) {
        this.logger.debug({ peering: peering.name }, "Peering has no parsable remote network");
        return undefined;
      }
      throw error;
    }

    try {
      const table = await this.client.getRouteTable(remoteGroup, routeTableName(peering.name), options);
      return table && isOwnedBy(table.tags, guardId) ? table.id : undefined;
    } catch (error) {
      if (isPermissionDenied(error)) {
        this.logger.debug({ peering: peering.name }, "Route table in remote network is not readable");
        return undefined;
      }
      throw error;
    }
  }
}

function owned<T extends { tags: Record<string, string> }>(
  resource: T | undefined,
  guardId: string
): T | undefined {
  return resource && isOwnedBy(resource.tags, guardId) ? resource : undefined;
}

/**
 * NSG の WireGuard ルールから宛先ポートを読む
 */
function wireGuardPortOf(nsg: SecurityGroupRecord | undefined): number | undefined {
  const rule = nsg?.securityRules.find((candidate) => candidate.name === WIREGUARD_RULE_NAME);
  if (!rule || !/^\d+$/.test(rule.destinationPortRange)) {
    return undefined;
  }
  const port = Number(rule.destinationPortRange);
  return port >= 1 && port <= 65535 ? port : undefined;
}

/**
 * 再構成に失敗したガードのエントリ
 * 境界とタグから分かる範囲のみ埋める
 */
function degradedGuard(
  id: string,
  group: ResourceGroupRecord,
  decoded: DecodedGuardTags | undefined,
  error: string
): Guard {
  const guard: Guard = {
    id,
    provider: "azure",
    location: group.location,
    status: "Degraded",
    public_ip: "",
    private_ip: "",
    server_id: "",
    resource_group: group.name,
    resource_group_id: group.id,
    vnet_id: "",
    subnet_id: "",
    nsg_id: "",
    nic_id: "",
    public_ip_id: "",
    mesh_cidrs: decoded?.meshCidrs ?? [],
    wireguard_port: decoded?.wireGuardPort ?? 0,
    metadata: decoded?.metadata ?? {},
    peerings: [],
    error,
  };
  if (decoded?.createdAt !== undefined) {
    guard.created_at = decoded.createdAt;
  }
  return guard;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
