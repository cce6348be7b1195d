/**
 * Single-line G-code parsing.
 *
 * A line is split into its code part and its comment, the command word is
 * normalized (G01 -> G1) and the X/Y/Z/E/F words are read. Positions are
 * stateful: an axis that is not given keeps the value from the previous
 * motion command, so every parsed line carries the absolute position the
 * machine is at once the line has run.
 */

import { MalformedInputError } from "../errors.ts";

export type LineKind =
  | "linear" // G1: the only moves the stretch pass rewrites
  | "motion" // G0, G2, G3: move the position, never rewritten
  | "activate" // M101
  | "deactivate" // M103
  | "comment" // blank or comment-only
  | "other";

export type Axis = "x" | "y" | "z" | "e" | "f";

export interface Position {
  x: number;
  y: number;
  z: number;
}

export interface GcodeLine {
  /** 1-based line number in the source text */
  readonly lineNumber: number;
  readonly raw: string;
  /** Normalized command word ("G1", "M101"), "" for comment-only lines */
  readonly command: string;
  readonly kind: LineKind;
  /** Words after the command, in source order */
  readonly words: readonly string[];
  /** Comment text including its ";" or "(" delimiter, "" when absent */
  readonly comment: string;
  readonly x?: number;
  readonly y?: number;
  readonly z?: number;
  readonly e?: number;
  readonly f?: number;
  /** Absolute position after the line has run */
  readonly position: Readonly<Position>;
  /** True for a motion line that deposits filament */
  readonly extruding: boolean;
}

/**
 * Machine state threaded from one line to the next while parsing.
 */
export interface ParserState {
  readonly position: Readonly<Position>;
  /** Last absolute E value (accumulated in relative mode) */
  readonly e: number;
  readonly relativeExtrusion: boolean;
  /** Between M101 and M103 */
  readonly extruderOn: boolean;
}

export const INITIAL_PARSER_STATE: ParserState = {
  position: { x: 0, y: 0, z: 0 },
  e: 0,
  relativeExtrusion: false,
  extruderOn: false,
};

export interface ParsedLine {
  line: GcodeLine;
  state: ParserState;
  issues: MalformedInputError[];
}

const MOTION_COMMANDS = new Set(["G0", "G1", "G2", "G3"]);
const FIELD_LETTERS: Record<string, Axis> = {
  X: "x",
  Y: "y",
  Z: "z",
  E: "e",
  F: "f",
};

/**
 * Split a line into its code part and its comment.
 * A "(" comment only counts when it is not at the start of the line, so
 * "(<loop> )" marker lines stay whole and become comment-only lines.
 */
export function splitComment(raw: string): { code: string; comment: string } {
  if (raw.trimStart().startsWith("(")) {
    return { code: "", comment: raw.trim() };
  }
  let cut = raw.length;
  const semicolon = raw.indexOf(";");
  if (semicolon >= 0) cut = semicolon;
  const bracket = raw.indexOf("(");
  if (bracket > 0 && bracket < cut) cut = bracket;
  return { code: raw.slice(0, cut).trim(), comment: raw.slice(cut).trim() };
}

/**
 * Normalize a command word: upper case, leading zeros dropped ("g01" -> "G1")
 */
export function normalizeCommand(word: string): string {
  const match = /^([A-Za-z])0*(\d+)(\.\d+)?$/.exec(word);
  if (!match) return word.toUpperCase();
  return `${match[1].toUpperCase()}${match[2]}${match[3] ?? ""}`;
}

function classify(command: string): LineKind {
  if (command === "") return "comment";
  if (command === "G1") return "linear";
  if (MOTION_COMMANDS.has(command)) return "motion";
  if (command === "M101") return "activate";
  if (command === "M103") return "deactivate";
  return "other";
}

/**
 * Parse one line given the machine state left by the previous line.
 * Numeric words that fail to parse are reported in `issues` and ignored.
 */
export function parseLine(
  raw: string,
  state: ParserState,
  lineNumber: number,
): ParsedLine {
  const { code, comment } = splitComment(raw);
  const tokens = code.length > 0 ? code.split(/\s+/) : [];
  const command = tokens.length > 0 ? normalizeCommand(tokens[0]) : "";
  const words = tokens.slice(1);
  const kind = classify(command);
  const issues: MalformedInputError[] = [];

  const fields: Partial<Record<Axis, number>> = {};
  // First occurrence wins, starting with the word after the command.
  for (const word of words) {
    const axis = FIELD_LETTERS[word[0].toUpperCase()];
    if (axis === undefined || fields[axis] !== undefined) continue;
    const text = word.slice(1);
    const value = text === "" ? Number.NaN : Number(text);
    if (!Number.isFinite(value)) {
      issues.push(new MalformedInputError(lineNumber, word, raw));
      continue;
    }
    fields[axis] = value;
  }

  let { position, e, relativeExtrusion, extruderOn } = state;
  let extruding = false;

  if (MOTION_COMMANDS.has(command)) {
    position = {
      x: fields.x ?? position.x,
      y: fields.y ?? position.y,
      z: fields.z ?? position.z,
    };
    if (fields.e !== undefined) {
      const advance = relativeExtrusion ? fields.e : fields.e - e;
      e = relativeExtrusion ? e + fields.e : fields.e;
      extruding = command !== "G0" && advance > 0;
    }
    extruding = extruding || (extruderOn && command !== "G0");
  } else if (command === "G92") {
    position = {
      x: fields.x ?? position.x,
      y: fields.y ?? position.y,
      z: fields.z ?? position.z,
    };
    e = fields.e ?? e;
  } else if (command === "M82") {
    relativeExtrusion = false;
  } else if (command === "M83") {
    relativeExtrusion = true;
  } else if (kind === "activate") {
    extruderOn = true;
  } else if (kind === "deactivate") {
    extruderOn = false;
  }

  const line: GcodeLine = {
    lineNumber,
    raw,
    command,
    kind,
    words,
    comment,
    ...fields,
    position,
    extruding,
  };

  return {
    line,
    state: { position, e, relativeExtrusion, extruderOn },
    issues,
  };
}
