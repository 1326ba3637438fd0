/**
 * Provider モジュール
 */

export type { GuardProvider } from "./guard-provider.js";
export { AzureGuardProvider } from "./azure-guard-provider.js";
export type { AzureGuardProviderOptions } from "./azure-guard-provider.js";
