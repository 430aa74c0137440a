/**
 * Tests for the chunk serializer and line framing
 */

import assert from "node:assert/strict";
import { test } from "node:test";
import {
  CHUNK_DEFAULTS,
  failedText,
  globalFailureChunk,
  loadingText,
  selfReportedText,
  serializeChunk,
} from "../../../src/services/engine/chunk.ts";
import { encodeHeader, encodeLine } from "../../../src/services/engine/protocol.ts";
import { MockUnit } from "../../_helpers/mod.ts";

const OPTIONS = { padding: 1 };

test("serializeChunk - defaults, name and padded text", () => {
  const unit = new MockUnit({ name: "cpu" });
  assert.equal(
    serializeChunk(unit, "load 5%", OPTIONS),
    '{"full_text":" load 5% ","markup":"pango","border":"#373B41",' +
      '"separator":false,"separator_block_width":0,"name":"cpu"}',
  );
});

test("serializeChunk - padding width", () => {
  const unit = new MockUnit();
  const none = JSON.parse(serializeChunk(unit, "x", { padding: 0 }));
  const three = JSON.parse(serializeChunk(unit, "x", { padding: 3 }));
  assert.equal(none.full_text, "x");
  assert.equal(three.full_text, "   x   ");
});

test("serializeChunk - null or empty text suppresses the element", () => {
  const unit = new MockUnit();
  assert.equal(serializeChunk(unit, null, OPTIONS), "");
  assert.equal(serializeChunk(unit, "", OPTIONS), "");
});

test("serializeChunk - precedence: transient > permanent > globals > defaults", () => {
  const unit = new MockUnit({ name: "net" });
  unit.overrides.setPermanent({ border: "#111111", color: "#222222" });
  unit.overrides.setTransient({ border: "#333333" });

  const chunk = JSON.parse(
    serializeChunk(unit, "up", {
      padding: 1,
      globals: { border: "#444444", color: "#555555", separator: true },
    }),
  );

  assert.equal(chunk.border, "#333333");
  assert.equal(chunk.color, "#222222");
  assert.equal(chunk.separator, true);
  assert.equal(chunk.markup, CHUNK_DEFAULTS.markup);
});

test("serializeChunk - transient overrides last exactly one chunk", () => {
  const unit = new MockUnit();
  unit.overrides.setTransient({ border: "#CC6666", urgent: true });

  const first = JSON.parse(serializeChunk(unit, "a", OPTIONS));
  const second = JSON.parse(serializeChunk(unit, "b", OPTIONS));

  assert.equal(first.border, "#CC6666");
  assert.equal(first.urgent, true);
  assert.equal(second.border, "#373B41");
  assert.equal("urgent" in second, false);
  assert.deepEqual(unit.overrides.transient, {});
});

test("serializeChunk - suppression also consumes transient overrides", () => {
  const unit = new MockUnit();
  unit.overrides.setTransient({ border: "#CC6666" });
  serializeChunk(unit, null, OPTIONS);
  assert.deepEqual(unit.overrides.transient, {});
});

test("serializeChunk - permanent overrides persist until cleared", () => {
  const unit = new MockUnit();
  unit.overrides.setPermanent({ urgent: true });
  assert.equal(JSON.parse(serializeChunk(unit, "a", OPTIONS)).urgent, true);
  assert.equal(JSON.parse(serializeChunk(unit, "b", OPTIONS)).urgent, true);
  unit.overrides.clearPermanent();
  assert.equal("urgent" in JSON.parse(serializeChunk(unit, "c", OPTIONS)), false);
});

test("status texts - loading, failed and self-reported", () => {
  assert.equal(loadingText("mem"), `<span color='#B294BB'>unit "mem" loading</span>`);
  assert.equal(failedText("mem"), `<span color='#A3685A'>unit "mem" failed</span>`);
  assert.equal(selfReportedText("no disk sdb"), "<span color='#A3685A'>no disk sdb</span>");
});

test("globalFailureChunk - red duplicate name message", () => {
  assert.deepEqual(JSON.parse(globalFailureChunk("cpu")), {
    full_text: "<span color='#FF0000'>GLOBAL FAILURE: duplicate unit name cpu</span>",
    markup: "pango",
  });
});

test("encodeHeader - declares click events and opens the array", () => {
  assert.equal(encodeHeader(), '{"version":1,"click_events":true}\n[\n');
});

test("encodeLine - joins chunks and skips suppressed ones", () => {
  assert.equal(encodeLine(['{"a":1}', "", '{"b":2}']), '[{"a":1},{"b":2}],\n');
  assert.equal(encodeLine([]), "[],\n");
});
