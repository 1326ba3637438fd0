/**
 * PeerGuard / UnpeerGuard Use Case
 */

import type {
  GuardId,
  OperationOptions,
  PeerGuardRequest,
  PeerResult,
} from "../../types/index.js";
import type { GuardProvider } from "../../provider/guard-provider.js";
import { NotFoundError } from "../../errors/index.js";
import { parseVirtualNetworkId } from "../../cloud/resource-id.js";
import { peeringName } from "../../tags/index.js";

/**
 * ガードを発見し、その VNet とリモート VNet をピアリングする
 */
export async function peerGuard(
  guardId: GuardId,
  request: PeerGuardRequest,
  provider: GuardProvider,
  options?: OperationOptions
): Promise<PeerResult> {
  const remote = parseVirtualNetworkId(request.remoteVNetId);
  const guard = await provider.getGuard(guardId, options);
  if (!guard.vnet_id) {
    throw new NotFoundError(`Guard '${guardId}' has no virtual network`, {
      guardId,
      resourceKind: "virtual_network",
    });
  }

  return provider.peerNetwork(
    {
      guardId,
      guardVNetId: guard.vnet_id,
      remoteVNetId: request.remoteVNetId,
      peeringName: peeringName(guardId, remote.name),
      guardPrivateIp: guard.private_ip,
      meshCidrs: guard.mesh_cidrs,
      ...(request.subnetId !== undefined && { subnetId: request.subnetId }),
    },
    options
  );
}

export async function unpeerGuard(
  guardId: GuardId,
  name: string,
  provider: GuardProvider,
  options?: OperationOptions
): Promise<void> {
  await provider.unpeerNetwork(guardId, name, options);
}
