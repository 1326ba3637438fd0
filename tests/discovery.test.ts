/**
 * Discovery / 状態導出のテスト
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { OperationOptions } from "../src/types/index.js";
import type { ResourceGroupRecord } from "../src/cloud/arm-client.js";
import { deriveGuardStatus, toServerState } from "../src/discovery/status.js";
import { Discovery } from "../src/discovery/discovery.js";
import { encodeGuardTags } from "../src/tags/index.js";
import { NotFoundError, OperationCancelledError, PermanentCloudError } from "../src/errors/index.js";
import { InMemoryArmClient, TEST_SUBSCRIPTION_ID } from "./support/in-memory-arm-client.js";
import {
  CREATED_AT,
  GUARD_A,
  GUARD_B,
  WG_CONF,
  createHarness,
  resourceGroupOf,
  silentLogger,
  type Harness,
} from "./support/fixtures.js";

const RG_A = resourceGroupOf(GUARD_A);
const RG_B = resourceGroupOf(GUARD_B);

describe("deriveGuardStatus", () => {
  it("should derive TearingDown from a deleting boundary", () => {
    expect(
      deriveGuardStatus({ resourceGroupState: "Deleting", vm: { powerState: "running" }, networkComplete: true })
    ).toBe("TearingDown");
  });

  it("should derive PartiallyCreated without a VM", () => {
    expect(deriveGuardStatus({ networkComplete: true })).toBe("PartiallyCreated");
  });

  it("should derive Provisioning while the VM is being created", () => {
    expect(deriveGuardStatus({ vm: { provisioningState: "Creating" }, networkComplete: true })).toBe(
      "Provisioning"
    );
    expect(deriveGuardStatus({ vm: { powerState: "starting" }, networkComplete: false })).toBe("Provisioning");
  });

  it("should derive Active only with a running VM and a complete network", () => {
    expect(deriveGuardStatus({ vm: { powerState: "running" }, networkComplete: true })).toBe("Active");
    expect(deriveGuardStatus({ vm: { powerState: "running" }, networkComplete: false })).toBe(
      "PartiallyCreated"
    );
  });

  it("should derive Stopped for stopped and deallocated VMs", () => {
    expect(deriveGuardStatus({ vm: { powerState: "stopped" }, networkComplete: true })).toBe("Stopped");
    expect(deriveGuardStatus({ vm: { powerState: "deallocated" }, networkComplete: false })).toBe("Stopped");
  });

  it("should derive Unknown for unrecognized VM states", () => {
    expect(deriveGuardStatus({ vm: { powerState: "stopping" }, networkComplete: true })).toBe("Unknown");
  });
});

describe("toServerState", () => {
  it("should map cloud power states", () => {
    expect(toServerState("running")).toBe("running");
    expect(toServerState("deallocating")).toBe("stopped");
    expect(toServerState(undefined, "Creating")).toBe("starting");
    expect(toServerState("running", "Deleting")).toBe("deleting");
    expect(toServerState(undefined)).toBe("unknown");
  });
});

describe("Discovery", () => {
  let harness: Harness;
  let client: InMemoryArmClient;

  beforeEach(() => {
    harness = createHarness([GUARD_A, GUARD_B]);
    client = harness.client;
  });

  async function provision(meshCidrs: string[] = ["10.200.0.0/16"]): Promise<void> {
    await harness.provisioner.provision({ wireGuardConf: WG_CONF, meshCidrs });
  }

  describe("getGuard", () => {
    it("should reconstruct an active guard from tagged resources", async () => {
      await provision();

      const guard = await harness.provisioner.getGuard(GUARD_A);

      const base = `/subscriptions/${TEST_SUBSCRIPTION_ID}/resourceGroups/${RG_A}`;
      expect(guard).toEqual({
        id: GUARD_A,
        provider: "azure",
        location: "westeurope",
        status: "Active",
        public_ip: "203.0.113.1",
        private_ip: "10.100.1.4",
        server_id: `${base}/providers/Microsoft.Compute/virtualMachines/${GUARD_A}-vm`,
        resource_group: RG_A,
        resource_group_id: base,
        vnet_id: `${base}/providers/Microsoft.Network/virtualNetworks/${GUARD_A}-vnet`,
        subnet_id: `${base}/providers/Microsoft.Network/virtualNetworks/${GUARD_A}-vnet/subnets/${GUARD_A}-subnet`,
        nsg_id: `${base}/providers/Microsoft.Network/networkSecurityGroups/${GUARD_A}-nsg`,
        nic_id: `${base}/providers/Microsoft.Network/networkInterfaces/${GUARD_A}-nic`,
        public_ip_id: `${base}/providers/Microsoft.Network/publicIPAddresses/${GUARD_A}-pip`,
        mesh_cidrs: ["10.200.0.0/16"],
        wireguard_port: 51820,
        vm_state: "running",
        metadata: {},
        created_at: CREATED_AT,
        peerings: [],
      });
    });

    it("should return the same view as provision", async () => {
      const created = await harness.provisioner.provision({ wireGuardConf: WG_CONF, meshCidrs: [] });

      expect(await harness.provisioner.getGuard(GUARD_A)).toEqual(created);
    });

    it("should expose unreserved boundary tags as metadata", async () => {
      await provision();
      const group = await client.getResourceGroup(RG_A);
      await client.createOrUpdateResourceGroup(RG_A, {
        location: "westeurope",
        tags: { ...group?.tags, team: "network" },
      });

      const guard = await harness.provisioner.getGuard(GUARD_A);

      expect(guard.metadata).toEqual({ team: "network" });
    });

    it("should report a guard without a VM as PartiallyCreated", async () => {
      await provision();
      client.removeResource("virtual_machine", RG_A, `${GUARD_A}-vm`);

      const guard = await harness.provisioner.getGuard(GUARD_A);

      expect(guard.status).toBe("PartiallyCreated");
      expect(guard.server_id).toBe("");
      expect(guard.vm_state).toBeUndefined();
      expect(guard.public_ip).toBe("203.0.113.1");
    });

    it("should report a missing public IP with empty fields", async () => {
      await provision();
      client.removeResource("public_ip", RG_A, `${GUARD_A}-pip`);

      const guard = await harness.provisioner.getGuard(GUARD_A);

      expect(guard.status).toBe("PartiallyCreated");
      expect(guard.public_ip).toBe("");
      expect(guard.public_ip_id).toBe("");
    });

    it("should report a deallocated VM as Stopped", async () => {
      await provision();
      client.setPowerState(RG_A, `${GUARD_A}-vm`, "deallocated");

      const guard = await harness.provisioner.getGuard(GUARD_A);

      expect(guard.status).toBe("Stopped");
      expect(guard.vm_state).toBe("stopped");
    });

    it("should report a deleting boundary as TearingDown", async () => {
      await provision();
      client.markDeleting(RG_A);

      expect((await harness.provisioner.getGuard(GUARD_A)).status).toBe("TearingDown");
    });

    it("should read the WireGuard port from the NSG rule", async () => {
      await provision();
      await harness.provider.ensureNsgRule({
        guardId: GUARD_A,
        ruleName: "AllowWireGuard",
        priority: 200,
        protocol: "Udp",
        destPort: "51999",
        direction: "Inbound",
      });

      expect((await harness.provisioner.getGuard(GUARD_A)).wireguard_port).toBe(51999);
    });

    it("should fail with NotFound for an unknown guard", async () => {
      await expect(harness.provisioner.getGuard(GUARD_A)).rejects.toBeInstanceOf(NotFoundError);
    });

    it("should fail with NotFound when the boundary belongs to another guard", async () => {
      await client.createOrUpdateResourceGroup(RG_A, {
        location: "westeurope",
        tags: encodeGuardTags({ guardId: GUARD_B, meshCidrs: [] }),
      });

      await expect(harness.provisioner.getGuard(GUARD_A)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("listGuards", () => {
    it("should return an empty list when nothing is managed", async () => {
      client.seedVirtualNetwork("workload-rg", "workload-vnet", {
        location: "westeurope",
        addressPrefix: "10.0.0.0/16",
        subnets: [],
      });

      expect(await harness.provisioner.listGuards()).toEqual([]);
    });

    it("should list every guard sorted by id", async () => {
      await provision();
      await provision(["10.201.0.0/16"]);

      const guards = await harness.provisioner.listGuards();

      expect(guards.map((guard) => guard.id)).toEqual([GUARD_A, GUARD_B]);
      expect(guards.map((guard) => guard.mesh_cidrs)).toEqual([["10.200.0.0/16"], ["10.201.0.0/16"]]);
      expect(guards.every((guard) => guard.status === "Active")).toBe(true);
    });

    it("should keep listing when one guard cannot be reconstructed", async () => {
      await provision();
      await provision();
      client.failOn("getVirtualMachine", new PermanentCloudError("VM read failed"), { name: `${GUARD_B}-vm` });

      const guards = await harness.provisioner.listGuards();

      expect(guards.map((guard) => [guard.id, guard.status])).toEqual([
        [GUARD_A, "Active"],
        [GUARD_B, "Degraded"],
      ]);
      expect(guards[1]?.error).toBe("VM read failed");
      expect(guards[1]?.resource_group).toBe(RG_B);
      expect(guards[1]?.wireguard_port).toBe(51820);
    });

    it("should drop a guard that disappears between listing and reading", async () => {
      class VanishingClient extends InMemoryArmClient {
        override async getResourceGroup(
          name: string,
          options?: OperationOptions
        ): Promise<ResourceGroupRecord | undefined> {
          return name === RG_B ? undefined : super.getResourceGroup(name, options);
        }
      }
      const vanishing = new VanishingClient();
      const discovery = new Discovery(vanishing, { logger: silentLogger });
      for (const guardId of [GUARD_A, GUARD_B]) {
        await vanishing.createOrUpdateResourceGroup(resourceGroupOf(guardId), {
          location: "westeurope",
          tags: encodeGuardTags({ guardId, meshCidrs: [] }),
        });
      }

      const guards = await discovery.listGuards();

      expect(guards.map((guard) => guard.id)).toEqual([GUARD_A]);
      expect(guards[0]?.status).toBe("PartiallyCreated");
    });

    it("should report a managed group with a malformed guard id as degraded", async () => {
      await client.createOrUpdateResourceGroup("guardctl-bogus", {
        location: "westeurope",
        tags: encodeGuardTags({ guardId: "guard-bogus", meshCidrs: ["10.200.0.0/16"] }),
      });

      const guards = await harness.provisioner.listGuards();

      expect(guards).toHaveLength(1);
      expect(guards[0]).toMatchObject({
        id: "guard-bogus",
        status: "Degraded",
        location: "westeurope",
        resource_group: "guardctl-bogus",
        mesh_cidrs: ["10.200.0.0/16"],
        error: "Resource group 'guardctl-bogus' has no valid 'guard-id' tag",
      });
    });

    it("should report a managed group without a guard id under its own name", async () => {
      await client.createOrUpdateResourceGroup("guardctl-orphan", {
        location: "northeurope",
        tags: { "managed-by": "guardctl" },
      });

      const guards = await harness.provisioner.listGuards();

      expect(guards.map((guard) => [guard.id, guard.status, guard.resource_group])).toEqual([
        ["guardctl-orphan", "Degraded", "guardctl-orphan"],
      ]);
      expect(guards[0]?.mesh_cidrs).toEqual([]);
    });

    it("should report a guard whose group name does not match the prefix as degraded", async () => {
      await client.createOrUpdateResourceGroup(`mesh-${GUARD_B}`, {
        location: "westeurope",
        tags: encodeGuardTags({ guardId: GUARD_B, meshCidrs: [] }),
      });

      const guards = await harness.provisioner.listGuards();

      expect(guards.map((guard) => [guard.id, guard.status, guard.resource_group])).toEqual([
        [GUARD_B, "Degraded", `mesh-${GUARD_B}`],
      ]);
      expect(guards[0]?.error).toBe(
        `Resource group 'mesh-${GUARD_B}' does not match the expected name '${RG_B}'`
      );
    });

    it("should propagate cancellation", async () => {
      await provision();
      const controller = new AbortController();
      controller.abort();

      await expect(harness.provisioner.listGuards({ signal: controller.signal })).rejects.toBeInstanceOf(
        OperationCancelledError
      );
    });
  });
});
