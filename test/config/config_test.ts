/**
 * Tests for src/config/config.ts
 */

import assert from "node:assert/strict";
import { join } from "node:path";
import { test } from "node:test";
import {
  type Config,
  ConfigError,
  DEFAULT_UNITS,
  defaultConfigPath,
  loadConfig,
  readConfigFile,
  validateConfig,
} from "../../src/config/config.ts";
import { createTempFile, withTempDir } from "../_helpers/mod.ts";

// An empty XDG directory keeps the user's own config out of these tests
const NO_FILE = { XDG_CONFIG_HOME: "/nonexistent/tilebar-test" };

// =============================================================================
// defaultConfigPath
// =============================================================================

test("defaultConfigPath - uses XDG_CONFIG_HOME", () => {
  assert.equal(
    defaultConfigPath({ XDG_CONFIG_HOME: "/xdg" }),
    "/xdg/tilebar/config.json",
  );
});

test("defaultConfigPath - falls back to HOME/.config", () => {
  assert.equal(
    defaultConfigPath({ HOME: "/home/user" }),
    "/home/user/.config/tilebar/config.json",
  );
});

// =============================================================================
// loadConfig priority tests
// =============================================================================

test("loadConfig - defaults without file, env or options", () => {
  const config = loadConfig({}, NO_FILE);
  assert.deepEqual(config, {
    padding: 1,
    lineInterval: 100,
    readTimeout: 5000,
    verbose: false,
    chunk: {},
    units: DEFAULT_UNITS,
    configPath: null,
  });
});

test("loadConfig - env overrides defaults", () => {
  const config = loadConfig({}, {
    ...NO_FILE,
    TILEBAR_PADDING: "2",
    TILEBAR_LINE_INTERVAL: "250",
    TILEBAR_READ_TIMEOUT: "1500",
    TILEBAR_VERBOSE: "1",
  });
  assert.equal(config.padding, 2);
  assert.equal(config.lineInterval, 250);
  assert.equal(config.readTimeout, 1500);
  assert.equal(config.verbose, true);
});

test("loadConfig - CLI options take priority over env", () => {
  const config = loadConfig(
    { padding: 0, lineInterval: 50, verbose: false },
    { ...NO_FILE, TILEBAR_PADDING: "3", TILEBAR_LINE_INTERVAL: "500", TILEBAR_VERBOSE: "true" },
  );
  assert.equal(config.padding, 0);
  assert.equal(config.lineInterval, 50);
  assert.equal(config.verbose, false);
});

test("loadConfig - rejects a non-numeric env value", () => {
  assert.throws(
    () => loadConfig({}, { ...NO_FILE, TILEBAR_PADDING: "wide" }),
    { name: "ConfigError", message: 'TILEBAR_PADDING must be a number, got "wide"' },
  );
});

test("loadConfig - rejects a non-finite env value", () => {
  assert.throws(
    () => loadConfig({}, { ...NO_FILE, TILEBAR_LINE_INTERVAL: "Infinity" }),
    {
      name: "ConfigError",
      message: 'TILEBAR_LINE_INTERVAL must be a number, got "Infinity"',
    },
  );
});

test("loadConfig - reads the file and lets env override it", async () => {
  await withTempDir(async (dir) => {
    const path = await createTempFile(
      dir,
      "bar.json",
      JSON.stringify({
        padding: 4,
        lineInterval: 200,
        chunk: { border: "#000000" },
        units: [{ type: "net", interface: "wlan0", name: "wifi" }],
      }),
    );

    const config = loadConfig({ config: path }, { TILEBAR_PADDING: "2" });
    assert.equal(config.padding, 2);
    assert.equal(config.lineInterval, 200);
    assert.deepEqual(config.chunk, { border: "#000000" });
    assert.deepEqual(config.units, [
      { type: "net", interface: "wlan0", name: "wifi" },
    ]);
    assert.equal(config.configPath, path);
  });
});

test("loadConfig - finds the default file under XDG_CONFIG_HOME", async () => {
  await withTempDir(async (dir) => {
    await createTempFile(
      dir,
      "tilebar/config.json",
      JSON.stringify({ units: [{ type: "time", interval: 500 }] }),
    );

    const config = loadConfig({}, { XDG_CONFIG_HOME: dir });
    assert.deepEqual(config.units, [{ type: "time", interval: 500 }]);
    assert.equal(config.configPath, join(dir, "tilebar", "config.json"));
  });
});

test("loadConfig - an explicit missing file is an error", () => {
  assert.throws(
    () => loadConfig({}, { ...NO_FILE, TILEBAR_CONFIG: "/nonexistent/bar.json" }),
    ConfigError,
  );
});

// =============================================================================
// readConfigFile
// =============================================================================

test("readConfigFile - reports invalid JSON", async () => {
  await withTempDir(async (dir) => {
    const path = await createTempFile(dir, "bad.json", "{ padding: 1 ");
    assert.throws(() => readConfigFile(path), (error: unknown) => {
      assert.ok(error instanceof ConfigError);
      assert.ok(error.message.startsWith(`Cannot read config file ${path}: `));
      return true;
    });
  });
});

test("readConfigFile - lists every schema issue with its path", async () => {
  await withTempDir(async (dir) => {
    const path = await createTempFile(
      dir,
      "bad.json",
      JSON.stringify({
        padding: -1,
        units: [{ type: "net" }, { type: "mem", interval: 0 }],
      }),
    );
    assert.throws(() => readConfigFile(path), (error: unknown) => {
      assert.ok(error instanceof ConfigError);
      const lines = error.message.split("\n");
      assert.equal(lines[0], `Invalid config file ${path}:`);
      assert.ok(lines.some((line) => line.startsWith("  padding: ")));
      assert.ok(lines.some((line) => line.startsWith("  units.0.interface: ")));
      assert.ok(lines.some((line) => line.startsWith("  units.1.interval: ")));
      return true;
    });
  });
});

test("readConfigFile - rejects delays a timer cannot wait", async () => {
  await withTempDir(async (dir) => {
    const path = await createTempFile(
      dir,
      "slow.json",
      JSON.stringify({
        lineInterval: 3e9,
        units: [{ type: "mem", interval: 2147483647 }, { type: "cpu", interval: 3e9 }],
      }),
    );
    assert.throws(() => readConfigFile(path), (error: unknown) => {
      assert.ok(error instanceof ConfigError);
      const lines = error.message.split("\n");
      assert.ok(lines.some((line) => line.startsWith("  lineInterval: ")));
      assert.ok(lines.some((line) => line.startsWith("  units.1.interval: ")));
      assert.ok(!lines.some((line) => line.startsWith("  units.0.interval: ")));
      return true;
    });
  });
});

test("readConfigFile - rejects unknown unit types and keys", async () => {
  await withTempDir(async (dir) => {
    const unknownType = await createTempFile(
      dir,
      "type.json",
      JSON.stringify({ units: [{ type: "weather" }] }),
    );
    const unknownKey = await createTempFile(
      dir,
      "key.json",
      JSON.stringify({ units: [{ type: "cpu", colour: "red" }] }),
    );
    assert.throws(() => readConfigFile(unknownType), ConfigError);
    assert.throws(() => readConfigFile(unknownKey), ConfigError);
  });
});

test("readConfigFile - accepts every unit type", async () => {
  await withTempDir(async (dir) => {
    const units = [
      { type: "mem" },
      { type: "cpu", interval: 500 },
      { type: "time", name: "clock" },
      { type: "disk", disk: "sda", path: "/home" },
      { type: "net", interface: "eth0" },
      { type: "bat", battery: 1 },
      { type: "gpu", requires: ["nvidia-settings"] },
      { type: "wifi", interface: "wlan0" },
      { type: "ip", url: "http://localhost:8080/ip" },
    ];
    const path = await createTempFile(
      dir,
      "all.json",
      JSON.stringify({ units }),
    );
    assert.deepEqual(readConfigFile(path).units, units);
  });
});

// =============================================================================
// validateConfig tests
// =============================================================================

function baseConfig(overrides: Partial<Config> = {}): Config {
  return {
    padding: 1,
    lineInterval: 100,
    readTimeout: 5000,
    verbose: false,
    chunk: {},
    units: DEFAULT_UNITS,
    configPath: null,
    ...overrides,
  };
}

test("validateConfig - valid config passes", () => {
  validateConfig(baseConfig());
});

test("validateConfig - rejects negative padding", () => {
  assert.throws(() => validateConfig(baseConfig({ padding: -1 })), {
    message: "Padding must be a non-negative integer",
  });
});

test("validateConfig - rejects non-positive intervals", () => {
  assert.throws(() => validateConfig(baseConfig({ lineInterval: 0 })), {
    message: "Line interval must be positive",
  });
  assert.throws(() => validateConfig(baseConfig({ readTimeout: -5 })), {
    message: "Read timeout must be positive",
  });
});

test("validateConfig - rejects delays a timer cannot wait", () => {
  assert.throws(() => validateConfig(baseConfig({ lineInterval: 3e9 })), {
    message: "Line interval must be at most 2147483647ms",
  });
  assert.throws(() => validateConfig(baseConfig({ readTimeout: Infinity })), {
    message: "Read timeout must be at most 2147483647ms",
  });
  assert.throws(
    () => validateConfig(baseConfig({ units: [{ type: "mem", interval: 3e9 }] })),
    { message: 'Interval of unit "mem" must be positive and at most 2147483647ms' },
  );
  validateConfig(baseConfig({ lineInterval: 2147483647 }));
});

test("validateConfig - rejects an empty unit list", () => {
  assert.throws(() => validateConfig(baseConfig({ units: [] })), {
    message: "At least one unit is required",
  });
});
