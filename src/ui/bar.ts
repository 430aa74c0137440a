/**
 * Status bar session: builds the units from configuration and runs the
 * engine against the host's stdin and stdout until stopped.
 */

import type { Config } from "../config/config.ts";
import { type LineSink, StatusEngine } from "../services/engine/mod.ts";
import { createUnits, type ExecutableLookup } from "../services/units/mod.ts";
import { createLogger, type Logger } from "../utils/logger.ts";

export interface BarSession {
  engine: StatusEngine;
  logger: Logger;
  /** Stop the engine; safe to call more than once */
  stop(): Promise<void>;
}

export interface BarIO {
  output?: LineSink;
  input?: AsyncIterable<string | Uint8Array> | null;
  logger?: Logger;
  exists?: ExecutableLookup;
}

export async function startBar(
  config: Config,
  io: BarIO = {},
): Promise<BarSession> {
  const logger = io.logger ?? createLogger({ verbose: config.verbose });
  if (config.configPath) {
    logger.debug(`Loaded configuration from ${config.configPath}`);
  }

  const units = await createUnits(config.units, { exists: io.exists });
  for (const unit of units) {
    if (unit.requires.length > 0) {
      logger.debug(`${unit.kind} requires ${unit.requires.join(", ")}`);
    }
  }

  const engine = new StatusEngine(units, {
    padding: config.padding,
    lineInterval: config.lineInterval,
    readTimeout: config.readTimeout,
    globals: config.chunk,
    output: io.output,
    input: io.input,
    logger,
  });
  engine.start();

  return {
    engine,
    logger,
    stop: () => engine.stop(),
  };
}
