/**
 * GuardProvisioner
 * ガードのライフサイクルを束ねる Facade
 *
 * 状態遷移: Absent → Provisioning → Active | PartiallyCreated → TearingDown → Absent
 * 状態はローカルに保存せず、必要なたびに GuardProvider 経由で再構成する。
 */

import type {
  CreateGuardRequest,
  Guard,
  GuardId,
  OperationOptions,
  PeerGuardRequest,
  PeerResult,
} from "../types/index.js";
import type { GuardProvider } from "../provider/guard-provider.js";
import { ConfigError } from "../errors/index.js";
import { generateGuardId } from "../guard/guard-id.js";
import { logger as defaultLogger, type Logger } from "../logging/index.js";
import { provisionGuard, type GuardDefaults } from "./use-cases/provision-guard.js";
import { teardownGuard } from "./use-cases/teardown-guard.js";
import { peerGuard, unpeerGuard } from "./use-cases/peer-guard.js";

export type { GuardDefaults };

/**
 * GuardProvisioner オプション
 */
export interface GuardProvisionerOptions {
  defaults: GuardDefaults;
  /** provision で VM に登録する SSH 公開鍵 */
  sshKeys?: string[];
  logger?: Logger;
  /** テスト用 */
  generateId?: () => GuardId;
  now?: () => Date;
}

export class GuardProvisioner {
  private readonly defaults: GuardDefaults;
  private readonly sshKeys: string[];
  private readonly logger: Logger;
  private readonly generateId: () => GuardId;
  private readonly now: () => Date;

  constructor(
    private readonly provider: GuardProvider,
    options: GuardProvisionerOptions
  ) {
    this.defaults = options.defaults;
    this.sshKeys = options.sshKeys ?? [];
    this.logger = (options.logger ?? defaultLogger).child({ component: "provisioner" });
    this.generateId = options.generateId ?? generateGuardId;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * ガードを作成
   * @throws ValidationError / PartialProvisionError / OperationCancelledError
   */
  async provision(request: CreateGuardRequest, options?: OperationOptions): Promise<Guard> {
    if (this.sshKeys.length === 0) {
      throw new ConfigError("No SSH public key configured for guard provisioning");
    }
    return provisionGuard(
      request,
      {
        provider: this.provider,
        defaults: this.defaults,
        sshKeys: this.sshKeys,
        logger: this.logger,
        generateId: this.generateId,
        now: this.now,
      },
      options
    );
  }

  /**
   * ガードを削除
   * @throws NotFoundError 未知のガード ID
   */
  async teardown(guardId: GuardId, options?: OperationOptions): Promise<void> {
    await teardownGuard(guardId, this.provider, this.logger, options);
  }

  async getGuard(guardId: GuardId, options?: OperationOptions): Promise<Guard> {
    return this.provider.getGuard(guardId, options);
  }

  async listGuards(options?: OperationOptions): Promise<Guard[]> {
    return this.provider.listGuards(options);
  }

  async peer(guardId: GuardId, request: PeerGuardRequest, options?: OperationOptions): Promise<PeerResult> {
    return peerGuard(guardId, request, this.provider, options);
  }

  async unpeer(guardId: GuardId, peeringName: string, options?: OperationOptions): Promise<void> {
    await unpeerGuard(guardId, peeringName, this.provider, options);
  }
}
