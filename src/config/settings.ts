/**
 * 設定ファイル（YAML）の読み込みと検証
 *
 * 探索順: --settings → $GUARDCTL_SETTINGS → ./guardctl.yaml → ~/.guardctl/config.yaml → /etc/guardctl/config.yaml
 * Azure の認証情報は環境変数（AZURE_*）がファイルより優先される。
 */

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigError } from "../errors/index.js";

export const SETTINGS_ENV = "GUARDCTL_SETTINGS";

// =============================================================================
// Zod スキーマ定義
// =============================================================================

const CidrSchema = z
  .string()
  .regex(/^(\d{1,3}\.){3}\d{1,3}\/\d{1,2}$/, "must be an IPv4 CIDR");

const AzureSchema = z.object({
  subscriptionId: z.string().min(1),
  tenantId: z.string().min(1).optional(),
  clientId: z.string().min(1).optional(),
  clientSecret: z.string().min(1).optional(),
  location: z.string().min(1).default("westeurope"),
  vmSize: z.string().min(1).default("Standard_B1s"),
  /** Publisher:Offer:SKU:Version */
  image: z
    .string()
    .regex(/^[^:]+:[^:]+:[^:]+:[^:]+$/, "must be Publisher:Offer:SKU:Version")
    .default("Canonical:ubuntu-24_04-lts:server:latest"),
  resourceGroupPrefix: z
    .string()
    .regex(/^[A-Za-z0-9_.-]{1,40}$/, "must be 1-40 characters of letters, digits, '-', '_' or '.'")
    .default("guardctl"),
});

const GuardDefaultsSchema = z
  .object({
    vnetCidr: CidrSchema.default("10.100.0.0/16"),
    subnetCidr: CidrSchema.default("10.100.1.0/24"),
    wireguardPort: z.number().int().min(1).max(65535).default(51820),
    adminUsername: z.string().min(1).default("azureuser"),
  })
  .default({});

const SshSchema = z
  .object({
    publicKeyPath: z.string().min(1).optional(),
  })
  .default({});

const RetrySchema = z
  .object({
    maxAttempts: z.number().int().min(1).max(10).default(4),
    baseDelayMs: z.number().int().min(0).default(500),
    maxDelayMs: z.number().int().min(0).default(8000),
  })
  .default({});

const DiscoverySchema = z
  .object({
    concurrency: z.number().int().min(1).max(32).default(4),
  })
  .default({});

const LoggingSchema = z
  .object({
    level: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  })
  .default({});

export const SettingsSchema = z.object({
  azure: AzureSchema,
  guard: GuardDefaultsSchema,
  ssh: SshSchema,
  retry: RetrySchema,
  discovery: DiscoverySchema,
  logging: LoggingSchema,
});

export type Settings = z.infer<typeof SettingsSchema>;

/** 環境変数と azure.* のキーの対応 */
const AZURE_ENV_OVERRIDES = {
  AZURE_SUBSCRIPTION_ID: "subscriptionId",
  AZURE_TENANT_ID: "tenantId",
  AZURE_CLIENT_ID: "clientId",
  AZURE_CLIENT_SECRET: "clientSecret",
} as const;

type Env = Record<string, string | undefined>;

// =============================================================================
// パース関数
// =============================================================================

/**
 * YAML 文字列を Settings にパースする
 * @param source - エラーメッセージに使う読み込み元
 * @throws ConfigError - パースまたはバリデーション失敗時
 */
export function parseSettings(yaml: string, source: string, env: Env = process.env): Settings {
  let parsed: unknown;
  try {
    parsed = yaml.trim().length > 0 ? parseYaml(yaml) : {};
  } catch (error) {
    throw new ConfigError(`Invalid YAML syntax in ${source}`, error);
  }
  if (parsed === null || parsed === undefined) {
    parsed = {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Settings must be a YAML mapping: ${source}`);
  }

  const result = SettingsSchema.safeParse(applyEnvOverrides(parsed, env));
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `${e.path.join(".")}: ${e.message}`)
      .join("; ");
    throw new ConfigError(`Invalid settings (${source}): ${errors}`);
  }
  return result.data;
}

/**
 * 設定ファイルのパスを解決
 * 明示指定（引数 / 環境変数）はファイルの有無にかかわらずそのまま返す
 */
export async function resolveSettingsPath(
  explicitPath: string | undefined,
  env: Env = process.env,
  cwd: string = process.cwd()
): Promise<string | undefined> {
  const explicit = explicitPath ?? env[SETTINGS_ENV];
  if (explicit) {
    return expandHome(explicit);
  }
  for (const candidate of defaultSettingsPaths(cwd)) {
    if (await fileExists(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

export function defaultSettingsPaths(cwd: string = process.cwd()): string[] {
  return [
    path.join(cwd, "guardctl.yaml"),
    path.join(os.homedir(), ".guardctl", "config.yaml"),
    "/etc/guardctl/config.yaml",
  ];
}

export interface LoadSettingsOptions {
  path?: string | undefined;
  env?: Env;
  cwd?: string;
}

/**
 * 設定を読み込む
 * ファイルが見つからない場合は環境変数とデフォルト値のみで構成する
 */
export async function loadSettings(options: LoadSettingsOptions = {}): Promise<Settings> {
  const env = options.env ?? process.env;
  const settingsPath = await resolveSettingsPath(options.path, env, options.cwd);
  if (!settingsPath) {
    return parseSettings("", "environment", env);
  }

  let content: string;
  try {
    content = await fs.readFile(settingsPath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Failed to read settings: ${settingsPath}`, error);
  }
  return parseSettings(content, settingsPath, env);
}

/**
 * SSH 公開鍵を読み込む
 * ssh.publicKeyPath が未指定なら ~/.ssh/id_ed25519.pub、~/.ssh/id_rsa.pub の順に探す
 */
export async function loadSshPublicKeys(settings: Settings): Promise<string[]> {
  const candidates = settings.ssh.publicKeyPath
    ? [expandHome(settings.ssh.publicKeyPath)]
    : [
        path.join(os.homedir(), ".ssh", "id_ed25519.pub"),
        path.join(os.homedir(), ".ssh", "id_rsa.pub"),
      ];

  for (const candidate of candidates) {
    let content: string;
    try {
      content = await fs.readFile(candidate, "utf-8");
    } catch (error) {
      if (isErrno(error, "ENOENT")) {
        continue;
      }
      throw new ConfigError(`Failed to read SSH public key: ${candidate}`, error);
    }
    const key = content.trim();
    if (key.length === 0) {
      throw new ConfigError(`SSH public key is empty: ${candidate}`);
    }
    return [key];
  }
  throw new ConfigError(`No SSH public key found (tried ${candidates.join(", ")})`);
}

export function expandHome(filePath: string): string {
  if (filePath === "~") {
    return os.homedir();
  }
  return filePath.startsWith("~/") ? path.join(os.homedir(), filePath.slice(2)) : filePath;
}

function applyEnvOverrides(parsed: Record<string, unknown>, env: Env): Record<string, unknown> {
  const azure: Record<string, unknown> = isRecord(parsed.azure) ? { ...parsed.azure } : {};
  for (const [variable, key] of Object.entries(AZURE_ENV_OVERRIDES)) {
    const value = env[variable];
    if (value) {
      azure[key] = value;
    }
  }
  return { ...parsed, azure };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isErrno(error: unknown, code: string): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === code;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
