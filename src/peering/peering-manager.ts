/**
 * PeeringManager
 * ガード VNet とワークロード VNet の双方向ピアリング、およびメッシュ経路の伝播
 *
 * 逆方向リンクとルートテーブルはワークロード側に作られるため、teardown では削除されない。
 */

import type { OperationOptions, PeerRequest, PeerResult, ReversePeeringState } from "../types/index.js";
import type { ArmClient, RouteRecord } from "../cloud/arm-client.js";
import { isPermissionDenied } from "../cloud/retry.js";
import { equalsIgnoreCase, parseSubnetId, parseVirtualNetworkId } from "../cloud/resource-id.js";
import { NotFoundError, ValidationError } from "../errors/index.js";
import {
  DEFAULT_RESOURCE_GROUP_PREFIX,
  encodeGuardTags,
  peeringNamePrefix,
  resourceNames,
  reversePeeringName,
  routeTableName,
} from "../tags/index.js";
import { logger as defaultLogger, type Logger } from "../logging/index.js";

export interface PeeringManagerOptions {
  resourceGroupPrefix?: string;
  logger?: Logger;
}

/** ルート名の接頭辞（mesh-route-0, mesh-route-1, ...） */
export const MESH_ROUTE_PREFIX = "mesh-route-";

export class PeeringManager {
  private readonly resourceGroupPrefix: string;
  private readonly logger: Logger;

  constructor(
    private readonly client: ArmClient,
    options: PeeringManagerOptions = {}
  ) {
    this.resourceGroupPrefix = options.resourceGroupPrefix ?? DEFAULT_RESOURCE_GROUP_PREFIX;
    this.logger = (options.logger ?? defaultLogger).child({ component: "peering" });
  }

  /**
   * ピアリングを作成（既存なら更新）
   *
   * @law 逆方向リンクが権限不足で作れない場合は Pending として成功扱い
   * @law subnetId があり meshCidrs が空でなければ経路を伝播する
   */
  async peerNetwork(req: PeerRequest, options?: OperationOptions): Promise<PeerResult> {
    validatePeeringName(req.guardId, req.peeringName);
    const guardVNet = parseVirtualNetworkId(req.guardVNetId);
    const remoteVNet = parseVirtualNetworkId(req.remoteVNetId);
    const subnetRef = req.subnetId !== undefined ? parseSubnetId(req.subnetId) : undefined;
    if (
      subnetRef &&
      !(
        equalsIgnoreCase(subnetRef.virtualNetworkName, remoteVNet.name) &&
        equalsIgnoreCase(subnetRef.resourceGroup, remoteVNet.resourceGroup)
      )
    ) {
      throw new ValidationError(
        `Subnet '${subnetRef.name}' does not belong to virtual network '${remoteVNet.resourceGroup}/${remoteVNet.name}'`,
        { guardId: req.guardId, field: "subnetId" }
      );
    }
    const propagateRoutes = subnetRef !== undefined && req.meshCidrs.length > 0;
    if (propagateRoutes && req.guardPrivateIp.trim().length === 0) {
      throw new ValidationError("Guard private IP is required to propagate mesh routes", {
        guardId: req.guardId,
        field: "guardPrivateIp",
      });
    }
    const log = this.logger.child({ guardId: req.guardId, peering: req.peeringName });

    const forward = await this.client.createOrUpdatePeering(
      guardVNet.resourceGroup,
      guardVNet.name,
      req.peeringName,
      {
        remoteVirtualNetworkId: req.remoteVNetId,
        allowVirtualNetworkAccess: true,
        allowForwardedTraffic: true,
      },
      options
    );
    log.info({ remoteVNet: remoteVNet.name, state: forward.peeringState }, "Forward peering ready");

    const reverseState = await this.ensureReversePeering(req, remoteVNet, log, options);

    const result: PeerResult = {
      peering_name: req.peeringName,
      remote_vnet_id: req.remoteVNetId,
      forward_state: forward.peeringState ?? "Initiated",
      reverse_state: reverseState,
    };

    if (propagateRoutes) {
      result.route_table_id = await this.propagateRoutes(req, subnetRef, remoteVNet, log, options);
    }
    return result;
  }

  /**
   * ピアリングを削除
   * @law 順方向リンクが存在しなければ成功（逆方向には触れない）
   */
  async unpeerNetwork(guardId: string, peeringName: string, options?: OperationOptions): Promise<void> {
    validatePeeringName(guardId, peeringName);
    const names = resourceNames(guardId, this.resourceGroupPrefix);
    const log = this.logger.child({ guardId, peering: peeringName });

    const forward = await this.client.getPeering(
      names.resourceGroup,
      names.virtualNetwork,
      peeringName,
      options
    );
    if (!forward) {
      log.info("Peering already absent");
      return;
    }

    await this.client.deletePeering(names.resourceGroup, names.virtualNetwork, peeringName, options);
    log.info("Deleted forward peering");

    const remoteVNet = parseVirtualNetworkId(forward.remoteVirtualNetworkId);
    try {
      const deleted = await this.client.deletePeering(
        remoteVNet.resourceGroup,
        remoteVNet.name,
        reversePeeringName(guardId),
        options
      );
      log.info({ remoteVNet: remoteVNet.name, deleted }, "Reverse peering removed");
    } catch (error) {
      if (!isPermissionDenied(error)) {
        throw error;
      }
      log.warn(
        { remoteVNet: remoteVNet.name },
        "No permission to remove reverse peering; remove it from the remote network"
      );
    }
  }

  private async ensureReversePeering(
    req: PeerRequest,
    remoteVNet: { resourceGroup: string; name: string },
    log: Logger,
    options: OperationOptions | undefined
  ): Promise<ReversePeeringState> {
    try {
      await this.client.createOrUpdatePeering(
        remoteVNet.resourceGroup,
        remoteVNet.name,
        reversePeeringName(req.guardId),
        {
          remoteVirtualNetworkId: req.guardVNetId,
          allowVirtualNetworkAccess: true,
          allowForwardedTraffic: true,
        },
        options
      );
      return "Created";
    } catch (error) {
      if (!isPermissionDenied(error)) {
        throw error;
      }
      log.warn(
        { remoteVNet: remoteVNet.name },
        "No permission to create reverse peering; it must be created from the remote network"
      );
      return "Pending";
    }
  }

  /**
   * メッシュ CIDR ごとにガードをネクストホップとする経路を作り、サブネットに関連付ける
   */
  private async propagateRoutes(
    req: PeerRequest,
    subnetRef: { resourceGroup: string; virtualNetworkName: string; name: string },
    remoteVNet: { resourceGroup: string; name: string },
    log: Logger,
    options: OperationOptions | undefined
  ): Promise<string> {
    const vnet = await this.client.getVirtualNetwork(remoteVNet.resourceGroup, remoteVNet.name, options);
    if (!vnet) {
      throw new NotFoundError(`Virtual network '${remoteVNet.name}' not found`, {
        guardId: req.guardId,
        resourceKind: "virtual_network",
        resourceName: remoteVNet.name,
      });
    }

    const routes: RouteRecord[] = req.meshCidrs.map((cidr, index) => ({
      name: `${MESH_ROUTE_PREFIX}${index}`,
      addressPrefix: cidr,
      nextHopType: "VirtualAppliance",
      nextHopIpAddress: req.guardPrivateIp,
    }));
    const table = await this.client.createOrUpdateRouteTable(
      subnetRef.resourceGroup,
      routeTableName(req.peeringName),
      {
        location: vnet.location,
        tags: encodeGuardTags({ guardId: req.guardId, meshCidrs: req.meshCidrs }),
        routes,
      },
      options
    );
    log.info({ routeTable: table.name, routes: routes.length }, "Route table ready");

    const subnet = await this.client.getSubnet(
      subnetRef.resourceGroup,
      subnetRef.virtualNetworkName,
      subnetRef.name,
      options
    );
    if (!subnet) {
      throw new NotFoundError(`Subnet '${subnetRef.name}' not found`, {
        guardId: req.guardId,
        resourceKind: "subnet",
        resourceName: subnetRef.name,
      });
    }
    if (equalsIgnoreCase(subnet.routeTableId, table.id)) {
      return table.id;
    }
    if (subnet.routeTableId) {
      log.warn(
        { subnet: subnet.name, previous: subnet.routeTableId },
        "Replacing route table associated with subnet"
      );
    }
    await this.client.associateRouteTable(
      subnetRef.resourceGroup,
      subnetRef.virtualNetworkName,
      subnetRef.name,
      table.id,
      options
    );
    log.info({ subnet: subnet.name }, "Associated route table with subnet");
    return table.id;
  }
}

function validatePeeringName(guardId: string, peeringName: string): void {
  if (!peeringName.startsWith(peeringNamePrefix(guardId))) {
    throw new ValidationError(
      `Peering name '${peeringName}' must start with '${peeringNamePrefix(guardId)}'`,
      { guardId, field: "peeringName" }
    );
  }
}
