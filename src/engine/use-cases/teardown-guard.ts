/**
 * TeardownGuard Use Case
 * ガードの存在を確認してから隔離境界ごと削除する
 */

import type { GuardId, OperationOptions, PeeringInfo } from "../../types/index.js";
import type { GuardProvider } from "../../provider/guard-provider.js";
import { NotFoundError, OperationCancelledError } from "../../errors/index.js";
import type { Logger } from "../../logging/index.js";

/**
 * @throws NotFoundError 未知のガード ID
 * @law 存在確認は境界のみで行い、サブリソースが読めなくても削除は進める
 */
export async function teardownGuard(
  guardId: GuardId,
  provider: GuardProvider,
  logger: Logger,
  options?: OperationOptions
): Promise<void> {
  const boundary = await provider.getBoundary(guardId, options);
  const peerings = await readPeerings(guardId, provider, logger, options);
  logger.info({ guardId, resourceGroup: boundary.name }, "Tearing down guard");

  await provider.cleanupNetwork(guardId, options);

  if (peerings.length > 0) {
    logger.warn(
      { guardId, peerings: peerings.map((peering) => peering.remote_vnet_id) },
      "Reverse peerings and route tables in remote networks are not removed"
    );
  }
}

/**
 * 削除後に残るリモート側のピアリングを報告するためだけに読む
 */
async function readPeerings(
  guardId: GuardId,
  provider: GuardProvider,
  logger: Logger,
  options: OperationOptions | undefined
): Promise<PeeringInfo[]> {
  try {
    return (await provider.getGuard(guardId, options)).peerings;
  } catch (error) {
    if (error instanceof OperationCancelledError || error instanceof NotFoundError) {
      throw error;
    }
    logger.warn({ guardId, err: error }, "Could not read guard resources, remote peerings are not reported");
    return [];
  }
}
