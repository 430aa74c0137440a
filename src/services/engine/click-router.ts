/**
 * Click router: reads click events from the host and hands each one to the
 * unit it names.
 */

import { z } from "zod";
import type { Unit } from "../../types/unit.ts";
import type { Logger } from "../../utils/logger.ts";
import { silentLogger } from "../../utils/logger.ts";
import { ClickScanner } from "./click-scanner.ts";
import type { Wakeup } from "./wakeup.ts";

export const clickEventSchema = z.object({
  name: z.string(),
  instance: z.string().optional(),
  button: z.number().optional(),
  modifiers: z.array(z.string()).optional(),
  x: z.number().optional(),
  y: z.number().optional(),
  relative_x: z.number().optional(),
  relative_y: z.number().optional(),
  width: z.number().optional(),
  height: z.number().optional(),
}).passthrough();

/** A click event as read from the host, still carrying its target name */
export type RoutedClick = z.infer<typeof clickEventSchema>;

/**
 * Parse one object's text; null when it is not JSON or not a click event
 */
export function parseClick(raw: string): RoutedClick | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = clickEventSchema.safeParse(value);
  return result.success ? result.data : null;
}

export interface ReadClicksOptions {
  scanner?: ClickScanner;
  /** Called with the text of every object that was skipped */
  onSkip?: (raw: string) => void;
}

/**
 * Yield click events from the host's input stream.
 * Malformed objects are skipped; the generator ends with the stream.
 */
export async function* readClicks(
  input: AsyncIterable<string | Uint8Array>,
  options: ReadClicksOptions = {},
): AsyncGenerator<RoutedClick> {
  const scanner = options.scanner ?? new ClickScanner();
  const decoder = new TextDecoder();

  for await (const chunk of input) {
    const text = typeof chunk === "string"
      ? chunk
      : decoder.decode(chunk, { stream: true });

    for (const raw of scanner.push(text)) {
      const click = parseClick(raw);
      if (click) {
        yield click;
      } else {
        options.onSkip?.(raw);
      }
    }
  }
}

/** What the router needs to reach a unit */
export interface ClickTarget {
  unit: Unit;
  wakeup: Wakeup;
}

export class ClickRouter {
  constructor(
    private readonly targets: ReadonlyMap<string, ClickTarget>,
    private readonly logger: Logger = silentLogger,
  ) {}

  /**
   * Run the target's click handler, then wake its loop so the next read
   * already sees the handler's effect.
   * @returns false when no unit has the event's name
   */
  dispatch(event: RoutedClick): boolean {
    const { name, ...click } = event;
    const target = this.targets.get(name);
    if (!target) {
      this.logger.debug(`Ignoring click for unknown unit "${name}"`);
      return false;
    }

    try {
      target.unit.handleClick(click);
    } catch (error) {
      this.logger.error(`Click handler of unit "${name}" threw`, error);
    }
    target.wakeup.signal();
    return true;
  }

  /**
   * Route clicks until `input` ends or `signal` aborts.
   */
  async run(
    input: AsyncIterable<string | Uint8Array>,
    signal?: AbortSignal,
  ): Promise<void> {
    const clicks = readClicks(input, {
      onSkip: (raw) =>
        this.logger.debug(`Skipping malformed click: ${raw.slice(0, 200)}`),
    });

    for await (const event of clicks) {
      if (signal?.aborted) break;
      this.dispatch(event);
    }
  }
}
