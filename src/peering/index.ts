/**
 * Peering モジュール
 */

export { PeeringManager, MESH_ROUTE_PREFIX } from "./peering-manager.js";
export type { PeeringManagerOptions } from "./peering-manager.js";
