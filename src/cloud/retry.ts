/**
 * クラウド呼び出しのリトライとエラー分類
 *
 * 一時的な失敗（レート制限、5xx、タイムアウト、通信エラー）は指数バックオフで再試行し、
 * それ以外（不正パラメータ、権限不足、クォータ）は即座に PermanentCloudError とする。
 */

import { setTimeout as delay } from "node:timers/promises";
import type { ResourceKind } from "../types/index.js";
import {
  GuardError,
  OperationCancelledError,
  PermanentCloudError,
  TransientCloudError,
} from "../errors/index.js";
import { logger as defaultLogger, type Logger } from "../logging/index.js";

/**
 * リトライポリシー
 */
export interface RetryPolicy {
  /** 初回を含む最大試行回数 */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** full jitter を適用するか */
  jitter: boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  baseDelayMs: 500,
  maxDelayMs: 8000,
  jitter: true,
};

/**
 * エラーの分類結果
 */
export type FailureClass = "not_found" | "transient" | "permanent" | "cancelled";

/**
 * 呼び出しの文脈（ログとエラー詳細に使用）
 */
export interface CloudCallContext {
  resourceKind: ResourceKind;
  resourceName: string;
  operation: string;
}

export interface RetryOptions {
  policy?: RetryPolicy;
  signal?: AbortSignal | undefined;
  logger?: Logger;
  /** テスト用に差し替え可能な待機 */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** テスト用に差し替え可能な乱数 */
  random?: () => number;
}

/** 再試行する HTTP ステータス */
const TRANSIENT_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504]);

/** 再試行する通信エラーコード / クラウドのエラーコード */
const TRANSIENT_ERROR_CODES = new Set([
  "ECONNRESET",
  "ETIMEDOUT",
  "ECONNREFUSED",
  "EAI_AGAIN",
  "EPIPE",
  "REQUEST_SEND_ERROR",
  "TooManyRequests",
  "RetryableError",
  "InternalServerError",
  "ServerTimeout",
]);

const TRANSIENT_MESSAGE_PATTERN = /timed?\s*out/i;

/**
 * SDK / 通信エラーから読み取れる情報
 */
interface ErrorShape {
  statusCode?: number;
  code?: string;
  name?: string;
  message: string;
}

/**
 * 任意のエラー値から statusCode / code を取り出す
 */
export function describeError(error: unknown): ErrorShape {
  if (typeof error !== "object" || error === null) {
    return { message: String(error) };
  }
  const shape: ErrorShape = {
    message: error instanceof Error ? error.message : String(error),
  };
  if ("statusCode" in error && typeof error.statusCode === "number") {
    shape.statusCode = error.statusCode;
  }
  if ("code" in error && typeof error.code === "string") {
    shape.code = error.code;
  }
  if ("name" in error && typeof error.name === "string") {
    shape.name = error.name;
  }
  return shape;
}

/**
 * エラーを分類
 * 判定順: キャンセル → 404 → 一時的 → 恒久的
 */
export function classifyCloudError(error: unknown): FailureClass {
  if (error instanceof OperationCancelledError) {
    return "cancelled";
  }
  if (error instanceof TransientCloudError) {
    return "transient";
  }
  if (error instanceof GuardError) {
    return "permanent";
  }

  const shape = describeError(error);
  if (shape.name === "AbortError") {
    return "cancelled";
  }
  if (shape.statusCode === 404) {
    return "not_found";
  }
  if (shape.code === "ResourceNotFound" || shape.code === "ResourceGroupNotFound" || shape.code === "NotFound") {
    return "not_found";
  }
  if (shape.statusCode !== undefined && TRANSIENT_STATUS_CODES.has(shape.statusCode)) {
    return "transient";
  }
  if (shape.code !== undefined && TRANSIENT_ERROR_CODES.has(shape.code)) {
    return "transient";
  }
  if (shape.statusCode === undefined && TRANSIENT_MESSAGE_PATTERN.test(shape.message)) {
    return "transient";
  }
  return "permanent";
}

/**
 * 権限不足のエラーか（クロス境界のピアリングで使用）
 */
export function isPermissionDenied(error: unknown): boolean {
  const details = error instanceof GuardError ? error.details : describeError(error);
  const code = error instanceof GuardError ? error.details.cloudCode : describeError(error).code;
  return (
    details.statusCode === 401 ||
    details.statusCode === 403 ||
    code === "AuthorizationFailed" ||
    code === "LinkedAuthorizationFailed"
  );
}

/**
 * n 回目の試行が失敗した後の待機時間
 * @law min(maxDelayMs, baseDelayMs * 2^(attempt-1))、jitter 有効時は [0, その値) の一様乱数
 */
export function backoffDelay(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random
): number {
  const exponential = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
  return policy.jitter ? Math.floor(random() * exponential) : exponential;
}

/**
 * 分類済みのエラーを分類体系のエラーに変換
 */
export function toCloudError(
  error: unknown,
  context: CloudCallContext,
  attempts: number
): GuardError {
  if (error instanceof GuardError) {
    return error;
  }
  const shape = describeError(error);
  const details = {
    resourceKind: context.resourceKind,
    resourceName: context.resourceName,
    operation: context.operation,
    ...(shape.statusCode !== undefined && { statusCode: shape.statusCode }),
    ...(shape.code !== undefined && { cloudCode: shape.code }),
  };
  const target = `${context.operation} ${context.resourceKind} '${context.resourceName}'`;

  switch (classifyCloudError(error)) {
    case "cancelled":
      return new OperationCancelledError(`Cancelled during ${target}`, details);
    case "transient":
      return new TransientCloudError(
        `Failed to ${target} after ${attempts} attempts: ${shape.message}`,
        { ...details, attempts },
        error
      );
    default:
      return new PermanentCloudError(`Failed to ${target}: ${shape.message}`, details, error);
  }
}

/**
 * 一時的な失敗を指数バックオフで再試行しながら実行
 *
 * @law 試行前にシグナルを確認し、中断済みなら OperationCancelledError
 * @law 恒久的な失敗と 404 は再試行せず、そのまま投げる（404 の解釈は呼び出し側）
 */
export async function withRetry<T>(
  operation: (signal: AbortSignal | undefined) => Promise<T>,
  context: CloudCallContext,
  options: RetryOptions = {}
): Promise<T> {
  const policy = options.policy ?? DEFAULT_RETRY_POLICY;
  const log = options.logger ?? defaultLogger;
  const sleep = options.sleep ?? defaultSleep;
  const signal = options.signal;

  for (let attempt = 1; ; attempt++) {
    if (signal?.aborted) {
      throw new OperationCancelledError(
        `Cancelled before ${context.operation} ${context.resourceKind} '${context.resourceName}'`,
        { ...context }
      );
    }

    try {
      return await operation(signal);
    } catch (error) {
      const failureClass = classifyCloudError(error);
      if (failureClass !== "transient" || attempt >= policy.maxAttempts) {
        throw error;
      }

      const waitMs = backoffDelay(attempt, policy, options.random);
      log.warn(
        { ...context, attempt, waitMs, error: describeError(error).message },
        "Transient cloud error, retrying"
      );
      try {
        await sleep(waitMs, signal);
      } catch {
        throw new OperationCancelledError(
          `Cancelled while retrying ${context.operation} ${context.resourceKind} '${context.resourceName}'`,
          { ...context }
        );
      }
    }
  }
}

async function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  await delay(ms, undefined, signal ? { signal } : {});
}
