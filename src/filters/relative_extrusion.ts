/**
 * Absolute to relative extrusion: every E word of a move becomes the
 * filament advance of that move, and the program switches to M83.
 */

import { formatNumber } from "../gcode/emitter.ts";
import type { GcodeLine } from "../gcode/line.ts";
import type { Program } from "../gcode/program.ts";
import { type Logger, silentLogger } from "../log.ts";
import { MAX_DECIMAL_PLACES } from "../stretch/options.ts";

export interface RelativeExtrusionOptions {
  /** Precision of rewritten E values */
  decimalPlaces?: number;
}

export interface RelativeExtrusionResult {
  lines: string[];
  /** Number of moves whose E word was rewritten */
  converted: number;
}

const MOTION = new Set(["G0", "G1", "G2", "G3"]);

function rebuild(line: GcodeLine, words: readonly string[]): string {
  const code = [line.command, ...words].join(" ");
  return line.comment ? `${code} ${line.comment}` : code;
}

/**
 * Rewrite absolute E values as per-move deltas. Programs already in
 * relative mode pass through. An M83 is inserted before the first
 * converted move when the program never selected a mode itself.
 * @throws RangeError when `decimalPlaces` is not an integer in 0..10
 */
export function toRelativeExtrusion(
  program: Program,
  options: RelativeExtrusionOptions = {},
  logger: Logger = silentLogger,
): RelativeExtrusionResult {
  const places = options.decimalPlaces ?? 5;
  if (!Number.isInteger(places) || places < 0 || places > MAX_DECIMAL_PLACES) {
    throw new RangeError(
      `decimal places must be an integer between 0 and ${MAX_DECIMAL_PLACES} (got ${places})`,
    );
  }
  const lines: string[] = [];
  let absolute = true;
  let modeSelected = false;
  let lastE = 0;
  let converted = 0;

  for (const layer of program.layers) {
    for (const line of layer.lines) {
      if (line.command === "M82") {
        absolute = true;
        modeSelected = true;
        lines.push(line.comment ? `M83 ${line.comment}` : "M83");
        continue;
      }
      if (line.command === "M83") {
        absolute = false;
        modeSelected = true;
      } else if (line.command === "G92" && line.e !== undefined) {
        lastE = line.e;
      } else if (absolute && MOTION.has(line.command) && line.e !== undefined) {
        const delta = line.e - lastE;
        lastE = line.e;
        const words = line.words.map((w) =>
          w[0].toUpperCase() === "E" ? `E${formatNumber(delta, places)}` : w
        );
        if (!modeSelected) {
          lines.push("M83");
          modeSelected = true;
        }
        lines.push(rebuild(line, words));
        converted++;
        continue;
      }
      lines.push(line.raw);
    }
  }

  logger.info(`converted ${converted} moves to relative extrusion`);
  return { lines, converted };
}
