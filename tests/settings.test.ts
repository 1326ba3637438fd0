/**
 * 設定ファイルのテスト
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import {
  SETTINGS_ENV,
  expandHome,
  loadSettings,
  loadSshPublicKeys,
  parseSettings,
  resolveSettingsPath,
} from "../src/config/settings.js";
import { ConfigError } from "../src/errors/index.js";

const MINIMAL = "azure:\n  subscriptionId: sub-test\n";

describe("parseSettings", () => {
  it("should fill in defaults", () => {
    const settings = parseSettings(MINIMAL, "test.yaml", {});

    expect(settings).toEqual({
      azure: {
        subscriptionId: "sub-test",
        location: "westeurope",
        vmSize: "Standard_B1s",
        image: "Canonical:ubuntu-24_04-lts:server:latest",
        resourceGroupPrefix: "guardctl",
      },
      guard: {
        vnetCidr: "10.100.0.0/16",
        subnetCidr: "10.100.1.0/24",
        wireguardPort: 51820,
        adminUsername: "azureuser",
      },
      ssh: {},
      retry: { maxAttempts: 4, baseDelayMs: 500, maxDelayMs: 8000 },
      discovery: { concurrency: 4 },
      logging: { level: "info" },
    });
  });

  it("should read every section", () => {
    const yaml = [
      "azure:",
      "  subscriptionId: sub-test",
      "  location: northeurope",
      "  resourceGroupPrefix: mesh",
      "guard:",
      "  wireguardPort: 51999",
      "ssh:",
      "  publicKeyPath: /keys/guard.pub",
      "retry:",
      "  maxAttempts: 2",
      "discovery:",
      "  concurrency: 8",
      "logging:",
      "  level: debug",
    ].join("\n");

    const settings = parseSettings(yaml, "test.yaml", {});

    expect(settings.azure.location).toBe("northeurope");
    expect(settings.azure.resourceGroupPrefix).toBe("mesh");
    expect(settings.guard.wireguardPort).toBe(51999);
    expect(settings.ssh.publicKeyPath).toBe("/keys/guard.pub");
    expect(settings.retry).toEqual({ maxAttempts: 2, baseDelayMs: 500, maxDelayMs: 8000 });
    expect(settings.discovery.concurrency).toBe(8);
    expect(settings.logging.level).toBe("debug");
  });

  it("should let AZURE_* variables override the file", () => {
    const settings = parseSettings(MINIMAL, "test.yaml", {
      AZURE_SUBSCRIPTION_ID: "sub-env",
      AZURE_TENANT_ID: "tenant-test",
      AZURE_CLIENT_ID: "client-test",
      AZURE_CLIENT_SECRET: "test-secret",
    });

    expect(settings.azure.subscriptionId).toBe("sub-env");
    expect(settings.azure.tenantId).toBe("tenant-test");
    expect(settings.azure.clientId).toBe("client-test");
    expect(settings.azure.clientSecret).toBe("test-secret");
  });

  it("should build settings from the environment alone", () => {
    const settings = parseSettings("", "environment", { AZURE_SUBSCRIPTION_ID: "sub-env" });

    expect(settings.azure.subscriptionId).toBe("sub-env");
  });

  it("should require a subscription id", () => {
    expect(() => parseSettings("", "test.yaml", {})).toThrow(
      "Invalid settings (test.yaml): azure.subscriptionId: Required"
    );
  });

  it("should reject out-of-range values", () => {
    expect(() => parseSettings(`${MINIMAL}guard:\n  wireguardPort: 70000\n`, "test.yaml", {})).toThrow(
      ConfigError
    );
    expect(() => parseSettings(`${MINIMAL}guard:\n  vnetCidr: 10.100.0.0\n`, "test.yaml", {})).toThrow(
      "guard.vnetCidr: must be an IPv4 CIDR"
    );
    expect(() => parseSettings(`${MINIMAL}discovery:\n  concurrency: 0\n`, "test.yaml", {})).toThrow(ConfigError);
  });

  it("should reject malformed YAML", () => {
    expect(() => parseSettings("azure: [", "test.yaml", {})).toThrow("Invalid YAML syntax in test.yaml");
  });

  it("should reject a document that is not a mapping", () => {
    expect(() => parseSettings("- azure\n", "test.yaml", {})).toThrow("Settings must be a YAML mapping: test.yaml");
  });
});

describe("settings files", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "guardctl-settings-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should prefer an explicit path over the environment", async () => {
    expect(await resolveSettingsPath("/explicit.yaml", { [SETTINGS_ENV]: "/env.yaml" }, tempDir)).toBe(
      "/explicit.yaml"
    );
    expect(await resolveSettingsPath(undefined, { [SETTINGS_ENV]: "/env.yaml" }, tempDir)).toBe("/env.yaml");
  });

  it("should find guardctl.yaml in the working directory", async () => {
    const file = path.join(tempDir, "guardctl.yaml");
    await fs.writeFile(file, MINIMAL);

    expect(await resolveSettingsPath(undefined, {}, tempDir)).toBe(file);
    expect((await loadSettings({ env: {}, cwd: tempDir })).azure.subscriptionId).toBe("sub-test");
  });

  it("should load the file named by the environment", async () => {
    const file = path.join(tempDir, "custom.yaml");
    await fs.writeFile(file, MINIMAL);

    const settings = await loadSettings({ env: { [SETTINGS_ENV]: file }, cwd: tempDir });

    expect(settings.azure.subscriptionId).toBe("sub-test");
  });

  it("should fail when an explicit file is missing", async () => {
    const file = path.join(tempDir, "missing.yaml");

    await expect(loadSettings({ path: file, env: {}, cwd: tempDir })).rejects.toThrow(
      `Failed to read settings: ${file}`
    );
  });

  it("should read the SSH public key from the configured path", async () => {
    const keyFile = path.join(tempDir, "guard.pub");
    await fs.writeFile(keyFile, "ssh-ed25519 AAAAC3test-key test@example\n");
    const settings = parseSettings(`${MINIMAL}ssh:\n  publicKeyPath: ${keyFile}\n`, "test.yaml", {});

    expect(await loadSshPublicKeys(settings)).toEqual(["ssh-ed25519 AAAAC3test-key test@example"]);
  });

  it("should reject an empty SSH public key", async () => {
    const keyFile = path.join(tempDir, "empty.pub");
    await fs.writeFile(keyFile, "\n");
    const settings = parseSettings(`${MINIMAL}ssh:\n  publicKeyPath: ${keyFile}\n`, "test.yaml", {});

    await expect(loadSshPublicKeys(settings)).rejects.toThrow(`SSH public key is empty: ${keyFile}`);
  });

  it("should report the paths it tried when no key exists", async () => {
    const keyFile = path.join(tempDir, "missing.pub");
    const settings = parseSettings(`${MINIMAL}ssh:\n  publicKeyPath: ${keyFile}\n`, "test.yaml", {});

    await expect(loadSshPublicKeys(settings)).rejects.toThrow(`No SSH public key found (tried ${keyFile})`);
  });
});

describe("expandHome", () => {
  it("should expand a leading tilde", () => {
    expect(expandHome("~/keys/guard.pub")).toBe(path.join(os.homedir(), "keys", "guard.pub"));
    expect(expandHome("~")).toBe(os.homedir());
    expect(expandHome("/etc/guardctl/config.yaml")).toBe("/etc/guardctl/config.yaml");
  });
});
