/**
 * 構造化ログ
 * stdout は CLI の JSON 出力に使うため、ログは stderr に書く
 */

import { pino, destination, type Logger, type LevelWithSilent } from "pino";
import { REDACT_KEYS, REDACT_CENSOR } from "./redaction.js";

export type { Logger };

export interface LoggerOptions {
  level?: LevelWithSilent;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      level: options.level ?? process.env.GUARDCTL_LOG_LEVEL ?? "info",
      base: { system: "guardctl" },
      redact: {
        paths: REDACT_KEYS,
        censor: REDACT_CENSOR,
      },
    },
    destination(2)
  );
}

/**
 * モジュール既定のロガー
 * 各コンポーネントはオプションで差し替え可能（テストでは silent）
 */
export const logger = createLogger();
