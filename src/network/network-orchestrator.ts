/**
 * NetworkOrchestrator
 * ガード 1 台分のネットワーク基盤を冪等に構築・削除する
 *
 * 構築順: リソースグループ → NSG → VNet + サブネット → パブリック IP → NIC
 * 各リソースは決定的な名前で先に読み、存在しないものだけを作成する。
 */

import type {
  NetworkInfo,
  NetworkRequest,
  NsgRuleRequest,
  OperationOptions,
  ResourceKind,
  ResourceRef,
  Tags,
} from "../types/index.js";
import type { ArmClient, SecurityRuleRecord } from "../cloud/arm-client.js";
import { equalsIgnoreCase, parseResourceId } from "../cloud/resource-id.js";
import {
  NotFoundError,
  OperationCancelledError,
  PartialProvisionError,
  PermanentCloudError,
  ValidationError,
} from "../errors/index.js";
import {
  DEFAULT_RESOURCE_GROUP_PREFIX,
  TAG_GUARD_ID,
  encodeGuardTags,
  isOwnedBy,
  resourceNames,
  type ResourceNames,
} from "../tags/index.js";
import { logger as defaultLogger, type Logger } from "../logging/index.js";
import { isSameRule, sshRuleRequest, toSecurityRule, validateRulePriority } from "./nsg-rules.js";

export interface NetworkOrchestratorOptions {
  resourceGroupPrefix?: string;
  logger?: Logger;
}

/**
 * 所有関係の確認に使うリソースの共通形
 */
interface OwnedResource {
  id: string;
  tags: Tags;
}

export class NetworkOrchestrator {
  private readonly resourceGroupPrefix: string;
  private readonly logger: Logger;

  constructor(
    private readonly client: ArmClient,
    options: NetworkOrchestratorOptions = {}
  ) {
    this.resourceGroupPrefix = options.resourceGroupPrefix ?? DEFAULT_RESOURCE_GROUP_PREFIX;
    this.logger = (options.logger ?? defaultLogger).child({ component: "network" });
  }

  /**
   * ガード ID から全リソース名を導出
   */
  namesFor(guardId: string): ResourceNames {
    return resourceNames(guardId, this.resourceGroupPrefix);
  }

  /**
   * ネットワーク基盤を冪等に構築
   *
   * @throws ValidationError 入力不正
   * @throws PartialProvisionError 途中で失敗し、既に存在するリソースがある
   * @throws OperationCancelledError シグナルによる中断（作成済みのリソースは残る）
   */
  async ensureNetwork(req: NetworkRequest, options?: OperationOptions): Promise<NetworkInfo> {
    validateNetworkRequest(req);

    const names = this.namesFor(req.guardId);
    const tags = encodeGuardTags({
      guardId: req.guardId,
      meshCidrs: req.meshCidrs,
      wireGuardPort: req.wireGuardPort,
      createdAt: req.createdAt ?? new Date().toISOString(),
    });
    const existing: ResourceRef[] = [];
    const log = this.logger.child({ guardId: req.guardId });

    try {
      const group = await this.ensureResource(
        req.guardId,
        existing,
        { kind: "resource_group", name: names.resourceGroup },
        () => this.client.getResourceGroup(names.resourceGroup, options),
        () =>
          this.client.createOrUpdateResourceGroup(
            names.resourceGroup,
            { location: req.location, tags },
            options
          ),
        log
      );

      const securityGroup = await this.ensureResource(
        req.guardId,
        existing,
        { kind: "network_security_group", name: names.securityGroup },
        () => this.client.getSecurityGroup(names.resourceGroup, names.securityGroup, options),
        () =>
          this.client.createOrUpdateSecurityGroup(
            names.resourceGroup,
            names.securityGroup,
            {
              location: req.location,
              tags,
              securityRules: [toSecurityRule(sshRuleRequest(req.guardId))],
            },
            options
          ),
        log
      );

      const virtualNetwork = await this.ensureResource(
        req.guardId,
        existing,
        { kind: "virtual_network", name: names.virtualNetwork },
        async () => {
          const vnet = await this.client.getVirtualNetwork(
            names.resourceGroup,
            names.virtualNetwork,
            options
          );
          // サブネットが欠けた VNet は作り直し（createOrUpdate）の対象
          return vnet && vnet.subnets.some((subnet) => subnet.name === names.subnet) ? vnet : undefined;
        },
        () =>
          this.client.createOrUpdateVirtualNetwork(
            names.resourceGroup,
            names.virtualNetwork,
            {
              location: req.location,
              tags,
              addressPrefixes: [req.vnetCidr],
              subnets: [
                {
                  name: names.subnet,
                  addressPrefix: req.subnetCidr,
                  networkSecurityGroupId: securityGroup.id,
                },
              ],
            },
            options
          ),
        log
      );

      const subnet = virtualNetwork.subnets.find((candidate) => candidate.name === names.subnet);
      if (!subnet) {
        throw new PermanentCloudError(
          `Subnet '${names.subnet}' is missing from virtual network '${names.virtualNetwork}'`,
          { guardId: req.guardId, resourceKind: "subnet", resourceName: names.subnet, operation: "get" }
        );
      }
      existing.push({ kind: "subnet", name: subnet.name, id: subnet.id });

      const publicIp = await this.ensureResource(
        req.guardId,
        existing,
        { kind: "public_ip", name: names.publicIp },
        () => this.client.getPublicIp(names.resourceGroup, names.publicIp, options),
        () =>
          this.client.createOrUpdatePublicIp(
            names.resourceGroup,
            names.publicIp,
            { location: req.location, tags },
            options
          ),
        log
      );

      const nic = await this.ensureResource(
        req.guardId,
        existing,
        { kind: "network_interface", name: names.networkInterface },
        () => this.client.getNetworkInterface(names.resourceGroup, names.networkInterface, options),
        () =>
          this.client.createOrUpdateNetworkInterface(
            names.resourceGroup,
            names.networkInterface,
            {
              location: req.location,
              tags,
              enableIpForwarding: true,
              subnetId: subnet.id,
              publicIpAddressId: publicIp.id,
            },
            options
          ),
        log
      );

      return {
        resource_group: names.resourceGroup,
        resource_group_id: group.id,
        vnet_id: virtualNetwork.id,
        subnet_id: subnet.id,
        nsg_id: securityGroup.id,
        nic_id: nic.id,
        public_ip_id: publicIp.id,
        public_ip: publicIp.ipAddress ?? "",
        private_ip: nic.privateIpAddress ?? "",
      };
    } catch (error) {
      if (
        error instanceof OperationCancelledError ||
        error instanceof ValidationError ||
        existing.length === 0
      ) {
        throw error;
      }
      log.error(
        { resources: existing.map((resource) => resource.name), err: error },
        "Network provisioning stopped with resources in place"
      );
      throw new PartialProvisionError(req.guardId, existing, error);
    }
  }

  /**
   * NIC の IP 転送を有効化し、反映を確認
   */
  async configureNicForwarding(nicId: string, options?: OperationOptions): Promise<void> {
    const parsed = parseResourceId(nicId, "network interface id");
    if (!equalsIgnoreCase(parsed.resourceType, "networkInterfaces")) {
      throw new ValidationError(`Not a network interface id: ${nicId}`, {
        field: "network interface id",
      });
    }
    const { resourceGroup, resourceName } = parsed;

    const nic = await this.client.getNetworkInterface(resourceGroup, resourceName, options);
    if (!nic) {
      throw new NotFoundError(`Network interface '${resourceName}' not found`, {
        resourceKind: "network_interface",
        resourceName,
      });
    }
    if (nic.enableIpForwarding) {
      return;
    }

    await this.client.setIpForwarding(resourceGroup, resourceName, true, options);
    const verified = await this.client.getNetworkInterface(resourceGroup, resourceName, options);
    if (!verified?.enableIpForwarding) {
      throw new PermanentCloudError(`IP forwarding did not take effect on '${resourceName}'`, {
        resourceKind: "network_interface",
        resourceName,
        operation: "setIpForwarding",
      });
    }
    this.logger.info({ nic: resourceName }, "Enabled IP forwarding");
  }

  /**
   * NSG ルールをルール名で upsert
   * @law 同一内容の既存ルールがあれば書き込まない
   */
  async ensureNsgRule(req: NsgRuleRequest, options?: OperationOptions): Promise<void> {
    if (req.ruleName.trim().length === 0) {
      throw new ValidationError("Rule name is required", { guardId: req.guardId, field: "ruleName" });
    }
    const names = this.namesFor(req.guardId);
    const securityGroup = await this.client.getSecurityGroup(
      names.resourceGroup,
      names.securityGroup,
      options
    );
    if (!securityGroup || !isOwnedBy(securityGroup.tags, req.guardId)) {
      throw new NotFoundError(`Network security group for guard '${req.guardId}' not found`, {
        guardId: req.guardId,
        resourceKind: "network_security_group",
        resourceName: names.securityGroup,
      });
    }

    validateRulePriority(req, securityGroup.securityRules);

    const desired: SecurityRuleRecord = toSecurityRule(req);
    const current = securityGroup.securityRules.find((rule) => rule.name === req.ruleName);
    if (current && isSameRule(current, desired)) {
      this.logger.debug({ guardId: req.guardId, rule: req.ruleName }, "Rule already up to date");
      return;
    }

    await this.client.createOrUpdateSecurityRule(
      names.resourceGroup,
      names.securityGroup,
      desired,
      options
    );
    this.logger.info(
      { guardId: req.guardId, rule: req.ruleName, priority: req.priority, port: req.destPort },
      current ? "Updated security rule" : "Created security rule"
    );
  }

  /**
   * 隔離境界ごと削除（カスケード）
   * @law 既に存在しなければ成功
   */
  async cleanupNetwork(guardId: string, options?: OperationOptions): Promise<void> {
    const names = this.namesFor(guardId);
    const deleted = await this.client.deleteResourceGroup(names.resourceGroup, options);
    this.logger.info(
      { guardId, resourceGroup: names.resourceGroup, deleted },
      deleted ? "Deleted guard resource group" : "Guard resource group already absent"
    );
  }

  /**
   * 決定的な名前で読み、なければ作成する
   * 別のガードの guard-id タグを持つリソースは再利用しない
   */
  private async ensureResource<T extends OwnedResource>(
    guardId: string,
    existing: ResourceRef[],
    target: { kind: ResourceKind; name: string },
    get: () => Promise<T | undefined>,
    create: () => Promise<T>,
    log: Logger
  ): Promise<T> {
    const found = await get();
    if (found) {
      if (!isOwnedBy(found.tags, guardId)) {
        throw new PermanentCloudError(
          `${target.kind} '${target.name}' exists but is not owned by guard '${guardId}'` +
            ` (guard-id: ${found.tags[TAG_GUARD_ID] ?? "none"})`,
          { guardId, resourceKind: target.kind, resourceName: target.name, operation: "get" }
        );
      }
      log.debug({ kind: target.kind, name: target.name }, "Reusing existing resource");
      existing.push({ ...target, id: found.id });
      return found;
    }

    const created = await create();
    log.info({ kind: target.kind, name: target.name }, "Created resource");
    existing.push({ ...target, id: created.id });
    return created;
  }
}

/**
 * ネットワーク要求の検証
 */
function validateNetworkRequest(req: NetworkRequest): void {
  if (req.guardId.trim().length === 0) {
    throw new ValidationError("Guard id is required", { field: "guardId" });
  }
  if (req.location.trim().length === 0) {
    throw new ValidationError("Location is required", { guardId: req.guardId, field: "location" });
  }
  if (!Number.isInteger(req.wireGuardPort) || req.wireGuardPort < 1 || req.wireGuardPort > 65535) {
    throw new ValidationError(`Invalid WireGuard port: ${req.wireGuardPort}`, {
      guardId: req.guardId,
      field: "wireGuardPort",
    });
  }
}
