/**
 * Program model: parsed lines grouped into layers.
 */

import { InsufficientHeightError, type MalformedInputError } from "../errors.ts";
import { type Logger, silentLogger } from "../log.ts";
import { type GcodeLine, INITIAL_PARSER_STATE, parseLine } from "./line.ts";
import { isLayerStart } from "./markers.ts";

export interface Layer {
  readonly index: number;
  readonly lines: readonly GcodeLine[];
  /** Z of the first G0-G3 move in the layer */
  readonly z?: number;
  /** Z of the first extruding move in the layer */
  readonly extrusionZ?: number;
}

export interface Program {
  readonly layers: readonly Layer[];
  /** Z of the first layer with extrusion */
  readonly zmin?: number;
  /** Z of the last layer with extrusion */
  readonly zmax?: number;
  /** Numeric words that could not be parsed; they were treated as absent */
  readonly issues: readonly MalformedInputError[];
}

/**
 * Split program text into raw lines. A trailing newline yields a final ""
 * so joining the lines with "\n" restores the text.
 */
export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

function buildLayer(index: number, lines: GcodeLine[]): Layer {
  const move = lines.find((l) => l.kind === "linear" || l.kind === "motion");
  const extruding = lines.find((l) => l.extruding);
  return {
    index,
    lines,
    z: move?.position.z,
    extrusionZ: extruding?.position.z,
  };
}

function withBounds(
  layers: readonly Layer[],
  issues: readonly MalformedInputError[],
): Program {
  const extruded = layers.filter((l) => l.extrusionZ !== undefined);
  return {
    layers,
    zmin: extruded.length > 0 ? extruded[0].extrusionZ : undefined,
    zmax: extruded.length > 0
      ? extruded[extruded.length - 1].extrusionZ
      : undefined,
    issues,
  };
}

/**
 * Parse program text. A layer-start marker opens a new layer; whatever
 * comes before the first marker is layer 0.
 */
export function parseProgram(
  text: string,
  logger: Logger = silentLogger,
): Program {
  const layers: Layer[] = [];
  const issues: MalformedInputError[] = [];
  let current: GcodeLine[] = [];
  let state = INITIAL_PARSER_STATE;

  splitLines(text).forEach((raw, i) => {
    const parsed = parseLine(raw, state, i + 1);
    state = parsed.state;
    for (const issue of parsed.issues) {
      logger.warn(`${issue.message}, word ignored`);
      issues.push(issue);
    }
    if (isLayerStart(parsed.line) && current.length > 0) {
      layers.push(buildLayer(layers.length, current));
      current = [];
    }
    current.push(parsed.line);
  });
  layers.push(buildLayer(layers.length, current));

  const program = withBounds(layers, issues);
  logger.debug(
    `parsed ${layers.length} layers, z ${program.zmin ?? "-"} to ${program.zmax ?? "-"}`,
  );
  return program;
}

/**
 * All lines of a program in document order
 */
export function programLines(program: Program): GcodeLine[] {
  return program.layers.flatMap((layer) => layer.lines);
}

/**
 * Raw text of a program, lines joined with "\n"
 */
export function programText(program: Program): string {
  return programLines(program).map((l) => l.raw).join("\n");
}

/**
 * A program made of layers [start, end). Lines keep their resolved
 * positions, so the range behaves like a complete program.
 */
export function sliceLayers(
  program: Program,
  start: number,
  end: number = program.layers.length,
): Program {
  const layers = program.layers.slice(start, end).map((layer, i) => ({
    ...layer,
    index: i,
  }));
  const lineNumbers = new Set(
    layers.flatMap((layer) => layer.lines.map((l) => l.lineNumber)),
  );
  const issues = program.issues.filter((issue) =>
    lineNumbers.has(issue.lineNumber)
  );
  return withBounds(layers, issues);
}

/**
 * Usable Z span of a program: from the lowest layer above `minZChange`
 * to the last layer with extrusion.
 * @throws InsufficientHeightError when the span is empty
 */
export function requireHeightSpan(
  program: Program,
  minZChange = 0,
): { zmin: number; zmax: number } {
  const low = program.layers.find((l) =>
    l.z !== undefined && l.z > minZChange
  );
  const zmin = low?.z;
  const zmax = program.zmax;
  if (zmin === undefined || zmax === undefined) {
    throw new InsufficientHeightError(
      "Height is too small (no layer found above the minimum height)",
      zmin,
      zmax,
    );
  }
  if (zmin >= zmax) {
    throw new InsufficientHeightError(
      `Height is too small (all operations are below ${minZChange}mm, z span ${zmin} to ${zmax})`,
      zmin,
      zmax,
    );
  }
  return { zmin, zmax };
}
