/**
 * ARM リソース ID の解析
 * 例: /subscriptions/{sub}/resourceGroups/{rg}/providers/Microsoft.Network/virtualNetworks/{vnet}/subnets/{subnet}
 */

import { ValidationError } from "../errors/index.js";

export interface ParsedResourceId {
  subscriptionId: string;
  resourceGroup: string;
  /** 例: Microsoft.Network */
  providerNamespace: string;
  /** 最上位リソースの種別と名前（例: virtualNetworks / workload-vnet） */
  resourceType: string;
  resourceName: string;
  /** 子リソース（例: subnets / default）。存在しない場合は undefined */
  childType?: string;
  childName?: string;
}

/**
 * リソース ID を解析
 * 形式が不正な場合は ValidationError
 */
export function parseResourceId(resourceId: string, label = "resource id"): ParsedResourceId {
  const segments = resourceId.split("/").filter((segment) => segment.length > 0);

  const subscriptionIndex = indexOfSegment(segments, "subscriptions");
  const groupIndex = indexOfSegment(segments, "resourceGroups");
  const providersIndex = indexOfSegment(segments, "providers");

  const subscriptionId = segments[subscriptionIndex + 1];
  const resourceGroup = segments[groupIndex + 1];
  const providerNamespace = segments[providersIndex + 1];
  const resourceType = segments[providersIndex + 2];
  const resourceName = segments[providersIndex + 3];

  if (
    subscriptionIndex !== 0 ||
    groupIndex !== 2 ||
    providersIndex !== 4 ||
    !subscriptionId ||
    !resourceGroup ||
    !providerNamespace ||
    !resourceType ||
    !resourceName
  ) {
    throw new ValidationError(`Invalid ${label}: ${resourceId}`, { field: label });
  }

  const parsed: ParsedResourceId = {
    subscriptionId,
    resourceGroup,
    providerNamespace,
    resourceType,
    resourceName,
  };

  const childType = segments[providersIndex + 4];
  const childName = segments[providersIndex + 5];
  if (childType !== undefined) {
    if (childName === undefined) {
      throw new ValidationError(`Invalid ${label}: ${resourceId}`, { field: label });
    }
    parsed.childType = childType;
    parsed.childName = childName;
  }
  return parsed;
}

/**
 * VNet のリソース ID を解析
 */
export function parseVirtualNetworkId(resourceId: string): { resourceGroup: string; name: string } {
  const parsed = parseResourceId(resourceId, "virtual network id");
  if (!equalsIgnoreCase(parsed.resourceType, "virtualNetworks") || parsed.childType !== undefined) {
    throw new ValidationError(`Not a virtual network id: ${resourceId}`, {
      field: "virtual network id",
    });
  }
  return { resourceGroup: parsed.resourceGroup, name: parsed.resourceName };
}

/**
 * サブネットのリソース ID を解析
 */
export function parseSubnetId(resourceId: string): {
  resourceGroup: string;
  virtualNetworkName: string;
  name: string;
} {
  const parsed = parseResourceId(resourceId, "subnet id");
  if (
    !equalsIgnoreCase(parsed.resourceType, "virtualNetworks") ||
    parsed.childType === undefined ||
    parsed.childName === undefined ||
    !equalsIgnoreCase(parsed.childType, "subnets")
  ) {
    throw new ValidationError(`Not a subnet id: ${resourceId}`, { field: "subnet id" });
  }
  return {
    resourceGroup: parsed.resourceGroup,
    virtualNetworkName: parsed.resourceName,
    name: parsed.childName,
  };
}

/**
 * ARM リソース ID を組み立て
 */
export function buildResourceId(
  subscriptionId: string,
  resourceGroup: string,
  providerPath?: string
): string {
  const base = `/subscriptions/${subscriptionId}/resourceGroups/${resourceGroup}`;
  return providerPath ? `${base}/providers/${providerPath}` : base;
}

/**
 * ARM は ID の大文字小文字を区別しない
 */
export function equalsIgnoreCase(a: string | undefined, b: string | undefined): boolean {
  return a !== undefined && b !== undefined && a.toLowerCase() === b.toLowerCase();
}

function indexOfSegment(segments: string[], name: string): number {
  return segments.findIndex((segment) => segment.toLowerCase() === name.toLowerCase());
}
