#!/usr/bin/env node
/**
 * guardctl CLI
 * ガードの作成・状態確認・一覧・削除・ピアリング
 *
 * 結果は stdout に JSON、ログは stderr に出力する。
 */

import * as fs from "node:fs/promises";
import { createInterface } from "node:readline/promises";
import type { GuardId, OperationOptions } from "../types/index.js";
import { GuardError } from "../errors/index.js";
import { loadSettings, loadSshPublicKeys } from "../config/index.js";
import { createLogger } from "../logging/index.js";
import { createAzureArmClient } from "../cloud/index.js";
import { AzureGuardProvider } from "../provider/index.js";
import { GuardProvisioner } from "../engine/index.js";
import { isValidGuardId } from "../guard/index.js";
import { VERSION } from "../version.js";
import {
  CliError,
  getListOption,
  getStringOption,
  parseArgs,
  parseTimeoutOption,
  requirePositional,
  requireStringOption,
  type OptionValue,
} from "./args.js";

interface CommandContext {
  provisioner: GuardProvisioner;
  operation: OperationOptions;
}

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv.slice(2));

  if (!parsed.command || parsed.command === "help" || parsed.options.help === true) {
    outputHelp();
    return;
  }
  if (parsed.command === "version") {
    outputJson({ version: VERSION });
    return;
  }

  const controller = new AbortController();
  const onSigint = (): void => controller.abort();
  process.once("SIGINT", onSigint);

  try {
    const timeoutSeconds = parseTimeoutOption(parsed.options);
    const signal =
      timeoutSeconds !== undefined
        ? AbortSignal.any([controller.signal, AbortSignal.timeout(timeoutSeconds * 1000)])
        : controller.signal;

    switch (parsed.command) {
      case "create":
        await commandCreate(await createContext(parsed.options, signal, true), parsed.options);
        break;
      case "status":
        await commandStatus(await createContext(parsed.options, signal), parsed.positionals);
        break;
      case "list":
        await commandList(await createContext(parsed.options, signal));
        break;
      case "teardown":
        await commandTeardown(await createContext(parsed.options, signal), parsed.options, parsed.positionals);
        break;
      case "peer":
        await commandPeer(await createContext(parsed.options, signal), parsed.options, parsed.positionals);
        break;
      case "unpeer":
        await commandUnpeer(await createContext(parsed.options, signal), parsed.options, parsed.positionals);
        break;
      default:
        throw new CliError("INVALID_INPUT", `Unknown command: ${parsed.command}`);
    }
  } catch (error) {
    if (error instanceof CliError) {
      outputError(error.code, error.message, error.details);
    } else if (error instanceof GuardError) {
      outputError(error.code, error.message, error.details);
    } else {
      const message = error instanceof Error ? error.message : "Unknown error";
      outputError("INTERNAL_ERROR", message);
    }
    process.exitCode = 1;
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
}

async function createContext(
  options: Record<string, OptionValue>,
  signal: AbortSignal,
  withSshKeys = false
): Promise<CommandContext> {
  const settings = await loadSettings({ path: getStringOption(options, "settings") });
  const logger = createLogger({ level: settings.logging.level });

  const client = createAzureArmClient(settings.azure, {
    retryPolicy: { ...settings.retry, jitter: true },
    logger,
  });
  const provider = new AzureGuardProvider(client, {
    resourceGroupPrefix: settings.azure.resourceGroupPrefix,
    discoveryConcurrency: settings.discovery.concurrency,
    machine: { adminUsername: settings.guard.adminUsername },
    logger,
  });
  const provisioner = new GuardProvisioner(provider, {
    defaults: {
      location: settings.azure.location,
      vmSize: settings.azure.vmSize,
      image: settings.azure.image,
      vnetCidr: settings.guard.vnetCidr,
      subnetCidr: settings.guard.subnetCidr,
      wireGuardPort: settings.guard.wireguardPort,
    },
    ...(withSshKeys && { sshKeys: await loadSshPublicKeys(settings) }),
    logger,
  });

  return { provisioner, operation: { signal } };
}

// =============================================================================
// Commands
// =============================================================================

async function commandCreate(ctx: CommandContext, options: Record<string, OptionValue>): Promise<void> {
  const configPath = requireStringOption(options, "config");
  const wireGuardConf = configPath === "-" ? await readStdin() : await readFileOption(configPath);
  const location = getStringOption(options, "location");

  const guard = await ctx.provisioner.provision(
    {
      wireGuardConf,
      meshCidrs: getListOption(options, "mesh-cidrs"),
      ...(location !== undefined && { location }),
    },
    ctx.operation
  );
  outputJson(guard);
}

async function commandStatus(ctx: CommandContext, positionals: string[]): Promise<void> {
  const guardId = requireGuardId(positionals);
  outputJson(await ctx.provisioner.getGuard(guardId, ctx.operation));
}

async function commandList(ctx: CommandContext): Promise<void> {
  const guards = await ctx.provisioner.listGuards(ctx.operation);
  outputJson({ guards });
}

async function commandTeardown(
  ctx: CommandContext,
  options: Record<string, OptionValue>,
  positionals: string[]
): Promise<void> {
  const guardId = requireGuardId(positionals);

  if (options.yes !== true) {
    if (!process.stdin.isTTY) {
      throw new CliError("INVALID_INPUT", "--yes is required when stdin is not a terminal");
    }
    const confirmed = await confirm(
      `This deletes guard ${guardId} and every resource in its resource group. Type 'yes' to continue: `
    );
    if (!confirmed) {
      throw new CliError("ABORTED", "Teardown was not confirmed");
    }
  }

  await ctx.provisioner.teardown(guardId, ctx.operation);
  outputJson({ guard_id: guardId, deleted: true });
}

async function commandPeer(
  ctx: CommandContext,
  options: Record<string, OptionValue>,
  positionals: string[]
): Promise<void> {
  const guardId = requireGuardId(positionals);
  const remoteVNetId = requireStringOption(options, "vnet");
  const subnetId = getStringOption(options, "subnet");

  const result = await ctx.provisioner.peer(
    guardId,
    { remoteVNetId, ...(subnetId !== undefined && { subnetId }) },
    ctx.operation
  );
  outputJson(result);
}

async function commandUnpeer(
  ctx: CommandContext,
  options: Record<string, OptionValue>,
  positionals: string[]
): Promise<void> {
  const guardId = requireGuardId(positionals);
  const peeringName = requireStringOption(options, "peering");
  await ctx.provisioner.unpeer(guardId, peeringName, ctx.operation);
  outputJson({ guard_id: guardId, peering_name: peeringName, deleted: true });
}

// =============================================================================
// Helpers
// =============================================================================

function requireGuardId(positionals: string[]): GuardId {
  const value = requirePositional(positionals, 0, "guard id");
  if (!isValidGuardId(value)) {
    throw new CliError("INVALID_INPUT", `Invalid guard id format: ${value}`);
  }
  return value;
}

async function readFileOption(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw new CliError(
      "INVALID_INPUT",
      `Failed to read WireGuard config: ${filePath}`,
      error instanceof Error ? { reason: error.message } : undefined
    );
  }
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf-8");
}

async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  try {
    const answer = await rl.question(question);
    return answer.trim().toLowerCase() === "yes";
  } finally {
    rl.close();
  }
}

function outputJson(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

function outputError(code: string, message: string, details?: unknown): void {
  const errorPayload: { error: { code: string; message: string; details?: unknown } } = {
    error: { code, message },
  };
  if (details !== undefined) {
    errorPayload.error.details = details;
  }
  outputJson(errorPayload);
}

function outputHelp(): void {
  outputJson({
    usage: "guardctl <command> [options]",
    commands: {
      create: "Provision a guard gateway",
      status: "Show a guard reconstructed from cloud resources",
      list: "List all guards",
      teardown: "Delete a guard and its resource group",
      peer: "Peer a guard network with a workload network",
      unpeer: "Remove a peering",
      version: "Print the version",
      help: "Show this help",
    },
    options: {
      common: ["--settings", "--timeout"],
      create: ["--config <path|->", "--mesh-cidrs", "--location"],
      status: ["<guard-id>"],
      teardown: ["<guard-id>", "--yes"],
      peer: ["<guard-id>", "--vnet", "--subnet"],
      unpeer: ["<guard-id>", "--peering"],
    },
    environment: [
      "GUARDCTL_SETTINGS",
      "GUARDCTL_LOG_LEVEL",
      "AZURE_SUBSCRIPTION_ID",
      "AZURE_TENANT_ID",
      "AZURE_CLIENT_ID",
      "AZURE_CLIENT_SECRET",
    ],
  });
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : "Unknown error";
  outputError("INTERNAL_ERROR", message);
  process.exit(1);
});
