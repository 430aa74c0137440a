/**
 * Tests for building units from configuration
 */

import assert from "node:assert/strict";
import { test } from "node:test";
import { BatteryUnit } from "../../../src/services/units/bat.ts";
import { CpuUnit } from "../../../src/services/units/cpu.ts";
import { DiskUnit } from "../../../src/services/units/disk.ts";
import {
  createUnit,
  createUnits,
  listUnitTypes,
  UNIT_TYPES,
} from "../../../src/services/units/factory.ts";
import { GpuUnit } from "../../../src/services/units/gpu.ts";
import { DEFAULT_IP_URL, IpUnit } from "../../../src/services/units/ip.ts";
import { MemoryUnit } from "../../../src/services/units/mem.ts";
import { MissingDependencyUnit } from "../../../src/services/units/missing-dependency.ts";
import { NetUnit } from "../../../src/services/units/net.ts";
import { TimeUnit } from "../../../src/services/units/time.ts";
import { WifiUnit } from "../../../src/services/units/wifi.ts";

test("createUnit - maps each type to its unit", () => {
  assert.ok(createUnit({ type: "mem" }) instanceof MemoryUnit);
  assert.ok(createUnit({ type: "cpu" }) instanceof CpuUnit);
  assert.ok(createUnit({ type: "time" }) instanceof TimeUnit);
  assert.ok(createUnit({ type: "gpu" }) instanceof GpuUnit);
});

test("createUnit - passes common and type options", () => {
  const net = createUnit({ type: "net", interface: "wlan0", name: "wifi", interval: 2000 });
  assert.ok(net instanceof NetUnit);
  assert.equal(net.interface, "wlan0");
  assert.equal(net.name, "wifi");
  assert.equal(net.pollInterval, 2000);

  const disk = createUnit({ type: "disk", disk: "nvme0n1", requires: ["lsblk"] });
  assert.ok(disk instanceof DiskUnit);
  assert.equal(disk.disk, "nvme0n1");
  assert.deepEqual(disk.requires, ["lsblk"]);

  const bat = createUnit({ type: "bat", battery: 1 });
  assert.ok(bat instanceof BatteryUnit);
  assert.equal(bat.battery, 1);
  assert.equal(bat.pollInterval, 5000);

  const wifi = createUnit({ type: "wifi", interface: "wlp3s0" });
  assert.ok(wifi instanceof WifiUnit);
  assert.equal(wifi.interface, "wlp3s0");
  assert.deepEqual(wifi.requires, ["iw"]);

  const ip = createUnit({ type: "ip" });
  assert.ok(ip instanceof IpUnit);
  assert.equal(ip.url, DEFAULT_IP_URL);
});

test("createUnits - keeps order and guards dependencies", async () => {
  const units = await createUnits(
    [{ type: "mem" }, { type: "gpu" }, { type: "disk", disk: "sda" }],
    { exists: (command) => Promise.resolve(command !== "nvidia-smi") },
  );

  assert.deepEqual(units.map((unit) => unit.kind), ["mem", "gpu", "disk"]);
  assert.ok(units[0] instanceof MemoryUnit);
  assert.ok(units[1] instanceof MissingDependencyUnit);
  assert.ok(units[2] instanceof DiskUnit);
});

test("listUnitTypes - every type with a description", () => {
  const types = listUnitTypes();
  assert.deepEqual(types.map((entry) => entry.type), [
    "mem",
    "cpu",
    "time",
    "disk",
    "net",
    "bat",
    "gpu",
    "wifi",
    "ip",
  ]);
  assert.deepEqual(types.map((entry) => entry.type), [...UNIT_TYPES]);
  assert.ok(types.every((entry) => entry.description.length > 0));
});
