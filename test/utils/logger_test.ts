/**
 * Tests for src/utils/logger.ts
 */

import assert from "node:assert/strict";
import { test } from "node:test";
import { createLogger, describeError } from "../../src/utils/logger.ts";

const FIXED = new Date("2024-05-01T12:00:00.000Z");

function capture(verbose: boolean) {
  const writes: string[] = [];
  const logger = createLogger({
    verbose,
    colors: false,
    now: () => FIXED,
    sink: { write: (chunk: string) => writes.push(chunk) },
  });
  return { logger, writes };
}

test("createLogger - writes timestamped level lines", () => {
  const { logger, writes } = capture(false);
  logger.info("starting");
  logger.warn("slow read");
  assert.deepEqual(writes, [
    "2024-05-01T12:00:00.000Z INFO starting\n",
    "2024-05-01T12:00:00.000Z WARN slow read\n",
  ]);
});

test("createLogger - debug only when verbose", () => {
  const quiet = capture(false);
  quiet.logger.debug("hidden");
  assert.deepEqual(quiet.writes, []);

  const verbose = capture(true);
  verbose.logger.debug("shown");
  assert.deepEqual(verbose.writes, ["2024-05-01T12:00:00.000Z DEBUG shown\n"]);
});

test("createLogger - error appends the cause", () => {
  const { logger, writes } = capture(false);
  logger.error("unit failed", "disk gone");
  assert.deepEqual(writes, [
    "2024-05-01T12:00:00.000Z ERROR unit failed\ndisk gone\n",
  ]);
});

test("describeError - keeps the stack of errors", () => {
  const error = new Error("boom");
  assert.equal(describeError(error), error.stack);
  assert.equal(describeError(42), "42");
});
