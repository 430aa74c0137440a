/**
 * Schema of the JSON configuration file
 */

import { z } from "zod";
import { MAX_TIMER_DELAY } from "../services/engine/wakeup.ts";

/** Milliseconds, bounded by what a timer can wait */
const milliseconds = () => z.number().positive().max(MAX_TIMER_DELAY);

const unitBase = {
  name: z.string().min(1).optional().describe(
    "Name reported to the bar; defaults to the unit type",
  ),
  interval: milliseconds().optional().describe(
    "Poll interval in milliseconds",
  ),
  requires: z.array(z.string().min(1)).optional().describe(
    "Extra executables the unit needs on PATH",
  ),
};

export const unitConfigSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("mem"), ...unitBase }).strict(),
  z.object({ type: z.literal("cpu"), ...unitBase }).strict(),
  z.object({ type: z.literal("time"), ...unitBase }).strict(),
  z.object({
    type: z.literal("disk"),
    ...unitBase,
    disk: z.string().min(1).describe("Block device, e.g. sda"),
    path: z.string().min(1).optional().describe("Mount point for df"),
  }).strict(),
  z.object({
    type: z.literal("net"),
    ...unitBase,
    interface: z.string().min(1).describe("Network interface name"),
  }).strict(),
  z.object({
    type: z.literal("bat"),
    ...unitBase,
    battery: z.number().int().nonnegative().optional().describe(
      "Battery id, as in BAT0",
    ),
  }).strict(),
  z.object({ type: z.literal("gpu"), ...unitBase }).strict(),
  z.object({
    type: z.literal("wifi"),
    ...unitBase,
    interface: z.string().min(1).describe("Wireless interface name"),
  }).strict(),
  z.object({
    type: z.literal("ip"),
    ...unitBase,
    url: z.string().url().optional().describe(
      "Service answering with the public address as plain text",
    ),
  }).strict(),
]);

export type UnitConfig = z.infer<typeof unitConfigSchema>;
export type UnitType = UnitConfig["type"];

export const chunkAttributesSchema = z.record(
  z.union([z.string(), z.number(), z.boolean()]),
);

export const configFileSchema = z.object({
  padding: z.number().int().nonnegative().optional(),
  lineInterval: milliseconds().optional(),
  readTimeout: milliseconds().optional(),
  verbose: z.boolean().optional(),
  chunk: chunkAttributesSchema.optional().describe(
    "Attributes applied to every chunk, below unit overrides",
  ),
  units: z.array(unitConfigSchema).optional(),
}).strict();

export type ConfigFile = z.infer<typeof configFileSchema>;
