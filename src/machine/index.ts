/**
 * Machine モジュール
 */

export { AzureMachineProvider, DEFAULT_ADMIN_USERNAME } from "./azure-machine-provider.js";
export type { AzureMachineProviderOptions } from "./azure-machine-provider.js";
