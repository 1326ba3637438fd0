/**
 * CLI 引数の解析
 */

export type OptionValue = string | boolean | string[];

export interface ParsedArgs {
  command?: string;
  options: Record<string, OptionValue>;
  positionals: string[];
}

export class CliError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = "CliError";
  }
}

/** 値を取らないフラグ */
const BOOLEAN_FLAGS = new Set(["yes", "help"]);

export function parseArgs(args: string[]): ParsedArgs {
  const options: Record<string, OptionValue> = {};
  const positionals: string[] = [];
  let command: string | undefined;

  let i = 0;
  if (args[0] && !args[0].startsWith("-")) {
    command = args[0];
    i = 1;
  }

  for (; i < args.length; i++) {
    const arg = args[i] ?? "";
    if (!arg.startsWith("--")) {
      positionals.push(arg);
      continue;
    }

    const eqIndex = arg.indexOf("=");
    if (eqIndex !== -1) {
      addOption(options, arg.slice(2, eqIndex), arg.slice(eqIndex + 1));
      continue;
    }

    const key = arg.slice(2);
    const next = args[i + 1];
    // "-" は標準入力を表す値として受け付ける
    if (!BOOLEAN_FLAGS.has(key) && next !== undefined && (next === "-" || !next.startsWith("-"))) {
      addOption(options, key, next);
      i++;
      continue;
    }

    addOption(options, key, true);
  }

  return {
    options,
    positionals,
    ...(command !== undefined && { command }),
  };
}

function addOption(options: Record<string, OptionValue>, key: string, value: string | boolean): void {
  const existing = options[key];
  if (existing === undefined) {
    options[key] = value;
    return;
  }
  if (Array.isArray(existing)) {
    if (typeof value === "string") {
      existing.push(value);
    }
    return;
  }
  if (typeof existing === "string" && typeof value === "string") {
    options[key] = [existing, value];
    return;
  }
  options[key] = value;
}

export function getStringOption(options: Record<string, OptionValue>, key: string): string | undefined {
  const value = options[key];
  if (typeof value === "string") {
    return value;
  }
  if (Array.isArray(value)) {
    return value[value.length - 1];
  }
  return undefined;
}

export function requireStringOption(options: Record<string, OptionValue>, key: string): string {
  const value = getStringOption(options, key);
  if (!value) {
    throw new CliError("INVALID_INPUT", `--${key} is required`);
  }
  return value;
}

/**
 * カンマ区切り、または繰り返し指定された値をまとめる
 */
export function getListOption(options: Record<string, OptionValue>, key: string): string[] {
  const value = options[key];
  const raw = typeof value === "string" ? [value] : Array.isArray(value) ? value : [];
  return raw
    .flatMap((entry) => entry.split(","))
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * 秒数の指定を解析
 */
export function parseTimeoutOption(options: Record<string, OptionValue>): number | undefined {
  const value = getStringOption(options, "timeout");
  if (value === undefined) {
    if (options.timeout !== undefined) {
      throw new CliError("INVALID_INPUT", "--timeout requires a number of seconds");
    }
    return undefined;
  }
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new CliError("INVALID_INPUT", "--timeout must be a positive number of seconds");
  }
  return seconds;
}

export function requirePositional(positionals: string[], index: number, label: string): string {
  const value = positionals[index];
  if (!value) {
    throw new CliError("INVALID_INPUT", `${label} is required`);
  }
  return value;
}
