/**
 * Tests for src/utils/markup.ts
 */

import assert from "node:assert/strict";
import { test } from "node:test";
import {
  colorify,
  colorizeNumber,
  escapeMarkup,
  formatDuration,
  formatFixed,
  getColor,
  palette,
  pangofy,
  temperatureString,
} from "../../src/utils/markup.ts";

test("pangofy - renders attributes in order", () => {
  assert.equal(
    pangofy("x", { color: "#FFFFFF", background: "#000000" }),
    "<span color='#FFFFFF' background='#000000'>x</span>",
  );
});

test("pangofy - drops undefined attributes", () => {
  assert.equal(pangofy("x", { color: undefined }), "<span>x</span>");
});

test("colorify - wraps text in a color span", () => {
  assert.equal(colorify("ok", palette.green), "<span color='#B5BD68'>ok</span>");
});

test("escapeMarkup - escapes markup characters", () => {
  assert.equal(
    escapeMarkup(`<b>"a" & 'b'</b>`),
    "&lt;b&gt;&quot;a&quot; &amp; &apos;b&apos;&lt;/b&gt;",
  );
});

test("getColor - picks the scale step by breakpoints", () => {
  assert.equal(getColor(0), palette.blue);
  assert.equal(getColor(19.9), palette.blue);
  assert.equal(getColor(20), palette.green);
  assert.equal(getColor(65), palette.orange);
  assert.equal(getColor(100), palette.red);
});

test("getColor - reverse scale for more-is-better values", () => {
  assert.equal(getColor(10, undefined, undefined, true), palette.red);
  assert.equal(getColor(95, undefined, undefined, true), palette.blue);
});

test("formatFixed - right aligns", () => {
  assert.equal(formatFixed(3.14159, 6, 2), "  3.14");
  assert.equal(formatFixed(42, 3, 0), " 42");
});

test("colorizeNumber - formats and colors by custom breakpoints", () => {
  assert.equal(
    colorizeNumber(1.5, 4, 2, [1, 2]),
    `<span color='${palette.green}'>1.50</span>`,
  );
});

test("temperatureString - scales below 100", () => {
  assert.equal(temperatureString(45), `<span color='${palette.green}'> 45</span>`);
  assert.equal(temperatureString(95), `<span color='${palette.red}'> 95</span>`);
});

test("temperatureString - white on red from 100", () => {
  assert.equal(
    temperatureString(101),
    "<span color='#FFFFFF' background='#FF0000'>101</span>",
  );
});

test("formatDuration - hours and minutes", () => {
  assert.equal(formatDuration(0), "00:00");
  assert.equal(formatDuration(3 * 3600 + 7 * 60 + 59), "03:07");
});

test("formatDuration - prefixes days", () => {
  assert.equal(formatDuration(2 * 86400 + 5 * 3600 + 60), "2d 05:01");
});
