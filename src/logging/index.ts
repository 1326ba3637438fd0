/**
 * Logging モジュール
 */

export { logger, createLogger } from "./logger.js";
export type { Logger, LoggerOptions } from "./logger.js";
