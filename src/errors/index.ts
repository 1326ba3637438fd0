/**
 * Errors モジュール
 */

export {
  GuardError,
  ValidationError,
  NotFoundError,
  TransientCloudError,
  PermanentCloudError,
  PartialProvisionError,
  OperationCancelledError,
  ConfigError,
} from "./guard-error.js";
export type { GuardErrorCode, GuardErrorDetails } from "./guard-error.js";
