/**
 * Cloud モジュール
 * クラウド API の境界（ArmClient）と呼び出し層
 */

export type {
  ArmClient,
  ResourceGroupRecord,
  SecurityRuleRecord,
  SecurityGroupRecord,
  SubnetRecord,
  PeeringRecord,
  VirtualNetworkRecord,
  PublicIpRecord,
  NetworkInterfaceRecord,
  RouteRecord,
  RouteTableRecord,
  VirtualMachineRecord,
  ResourceGroupParams,
  SecurityGroupParams,
  VirtualNetworkParams,
  PublicIpParams,
  NetworkInterfaceParams,
  PeeringParams,
  RouteTableParams,
  VirtualMachineParams,
} from "./arm-client.js";
export {
  AzureArmClient,
  createAzureArmClient,
  createCredential,
  parseImageReference,
} from "./azure-arm-client.js";
export type { AzureCredentialSettings, AzureArmClientOptions, ImageReference } from "./azure-arm-client.js";
export {
  DEFAULT_RETRY_POLICY,
  withRetry,
  classifyCloudError,
  toCloudError,
  isPermissionDenied,
  backoffDelay,
  describeError,
} from "./retry.js";
export type { RetryPolicy, RetryOptions, FailureClass, CloudCallContext } from "./retry.js";
export { mapWithConcurrency } from "./concurrency.js";
export {
  parseResourceId,
  parseVirtualNetworkId,
  parseSubnetId,
  buildResourceId,
  equalsIgnoreCase,
} from "./resource-id.js";
export type { ParsedResourceId } from "./resource-id.js";
