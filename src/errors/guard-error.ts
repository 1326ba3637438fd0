/**
 * エラー分類
 * CLI 層までそのまま伝播し、code と details を JSON として出力する
 */

import type { ResourceKind, ResourceRef } from "../types/index.js";

export type GuardErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "TRANSIENT_CLOUD_ERROR"
  | "PERMANENT_CLOUD_ERROR"
  | "PARTIAL_PROVISION"
  | "OPERATION_CANCELLED"
  | "CONFIG_ERROR";

/**
 * エラーの詳細情報
 * エラーコードに応じた構造化データを保持
 */
export interface GuardErrorDetails {
  guardId?: string;
  /** VALIDATION_ERROR 時: 問題のある入力項目 */
  field?: string;
  /** クラウドエラー時: 対象リソース */
  resourceKind?: ResourceKind;
  resourceName?: string;
  /** クラウドエラー時: 失敗した操作（get / createOrUpdate / delete など） */
  operation?: string;
  /** クラウドエラー時: HTTP ステータス */
  statusCode?: number;
  /** クラウドエラー時: プロバイダのエラーコード（QuotaExceeded など） */
  cloudCode?: string;
  /** TRANSIENT_CLOUD_ERROR 時: 試行回数 */
  attempts?: number;
  /** PARTIAL_PROVISION 時: 既に存在するリソース */
  resources?: ResourceRef[];
}

/**
 * 基底エラー
 */
export class GuardError extends Error {
  constructor(
    message: string,
    public readonly code: GuardErrorCode,
    public readonly details: GuardErrorDetails = {},
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "GuardError";
  }
}

/** 必須入力の欠落・不正（空の WireGuard 設定など） */
export class ValidationError extends GuardError {
  constructor(message: string, details: GuardErrorDetails = {}) {
    super(message, "VALIDATION_ERROR", details);
    this.name = "ValidationError";
  }
}

/** ガード ID に対応するリソースが見つからない */
export class NotFoundError extends GuardError {
  constructor(message: string, details: GuardErrorDetails = {}) {
    super(message, "NOT_FOUND", details);
    this.name = "NotFoundError";
  }
}

/**
 * 一時的なクラウドエラー（レート制限、5xx、タイムアウト）
 * リトライ層で吸収され、リトライが尽きた場合のみ呼び出し元に届く
 */
export class TransientCloudError extends GuardError {
  constructor(message: string, details: GuardErrorDetails = {}, cause?: unknown) {
    super(message, "TRANSIENT_CLOUD_ERROR", details, cause);
    this.name = "TransientCloudError";
  }
}

/** 恒久的なクラウドエラー（クォータ超過、権限不足、不正パラメータ）。リトライしない */
export class PermanentCloudError extends GuardError {
  constructor(message: string, details: GuardErrorDetails = {}, cause?: unknown) {
    super(message, "PERMANENT_CLOUD_ERROR", details, cause);
    this.name = "PermanentCloudError";
  }
}

/**
 * 一部のリソースのみ作成された
 * オペレータは同じ操作の再実行（冪等に再開）か teardown を選ぶ
 */
export class PartialProvisionError extends GuardError {
  constructor(guardId: string, resources: ResourceRef[], cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Guard '${guardId}' was partially created (${resources.length} resources exist): ${reason}`,
      "PARTIAL_PROVISION",
      { guardId, resources, ...causeDetails(cause) },
      cause
    );
    this.name = "PartialProvisionError";
  }
}

/** 呼び出し元のシグナルで中断された。作成済みのリソースはそのまま残る */
export class OperationCancelledError extends GuardError {
  constructor(message = "Operation was cancelled", details: GuardErrorDetails = {}) {
    super(message, "OPERATION_CANCELLED", details);
    this.name = "OperationCancelledError";
  }
}

/** 設定ファイルの読み込み・検証エラー */
export class ConfigError extends GuardError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIG_ERROR", {}, cause);
    this.name = "ConfigError";
  }
}

/**
 * 原因エラーから resourceKind などを引き継ぐ
 */
function causeDetails(cause: unknown): GuardErrorDetails {
  if (!(cause instanceof GuardError)) {
    return {};
  }
  const { resources: _resources, guardId: _guardId, ...rest } = cause.details;
  return rest;
}

