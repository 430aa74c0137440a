/**
 * Tests for unit name resolution
 */

import assert from "node:assert/strict";
import { test } from "node:test";
import {
  assignNames,
  findDuplicateName,
  NameRegistry,
} from "../../../src/services/engine/names.ts";
import { MockUnit } from "../../_helpers/mod.ts";

test("NameRegistry - auto names take kind then numbered suffixes", () => {
  const registry = new NameRegistry();
  assert.equal(registry.resolve(undefined, "net"), "net");
  assert.equal(registry.resolve(undefined, "net"), "net_1");
  assert.equal(registry.resolve(undefined, "cpu"), "cpu");
  assert.equal(registry.resolve(undefined, "net"), "net_2");
});

test("NameRegistry - explicit names are verbatim and skip the counter", () => {
  const registry = new NameRegistry();
  assert.equal(registry.resolve("net", "net"), "net");
  assert.equal(registry.resolve(undefined, "net"), "net");
});

test("NameRegistry - reset starts counting again", () => {
  const registry = new NameRegistry();
  registry.resolve(undefined, "disk");
  registry.reset();
  assert.equal(registry.resolve(undefined, "disk"), "disk");
});

test("assignNames - resolves in declaration order", () => {
  const units = [
    new MockUnit({ kind: "disk" }),
    new MockUnit({ kind: "disk", name: "root" }),
    new MockUnit({ kind: "disk" }),
  ];
  assignNames(units);
  assert.deepEqual(units.map((u) => u.name), ["disk", "root", "disk_1"]);
});

test("assignNames - separate registries are independent", () => {
  const a = [new MockUnit({ kind: "cpu" })];
  const b = [new MockUnit({ kind: "cpu" })];
  assignNames(a, new NameRegistry());
  assignNames(b, new NameRegistry());
  assert.equal(a[0]?.name, "cpu");
  assert.equal(b[0]?.name, "cpu");
});

test("findDuplicateName - explicit name colliding with an auto name", () => {
  const units = [
    new MockUnit({ kind: "cpu", name: "cpu" }),
    new MockUnit({ kind: "cpu" }),
  ];
  assignNames(units);
  assert.equal(findDuplicateName(units), "cpu");
});

test("findDuplicateName - null when unique", () => {
  const units = [new MockUnit({ kind: "cpu" }), new MockUnit({ kind: "cpu" })];
  assignNames(units);
  assert.equal(findDuplicateName(units), null);
});
