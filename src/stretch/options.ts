/**
 * Stretch options: defaults, validation and JSON config loading.
 * Ratios are multiples of the edge width found in the program.
 */

import { readFile } from "node:fs/promises";
import { ConfigError } from "../errors.ts";

export interface StretchOptions {
  activateStretch: boolean;
  /** Max stretch of inner shells (loops) over edge width */
  loopStretchRatio: number;
  /** Max stretch of open threads such as infill over edge width */
  pathStretchRatio: number;
  /** Max stretch of inside edges (hole walls); the most important setting */
  edgeInsideStretchRatio: number;
  /** Max stretch of outside edges over edge width */
  edgeOutsideStretchRatio: number;
  crossLimitDistanceRatio: number;
  /** Distance ahead/behind at which the thread direction is read */
  stretchLookaheadRatio: number;
  /** Precision of rewritten moves, unless the program declares its own */
  decimalPlaces: number;
  /** Used when the program has no edge width marker */
  defaultEdgeWidth: number;
  /** Stretch from the first line instead of after the initialization block */
  skipInitialization: boolean;
}

export const DEFAULT_STRETCH_OPTIONS: Required<StretchOptions> = {
  activateStretch: true,
  loopStretchRatio: 0.11,
  pathStretchRatio: 0.0,
  edgeInsideStretchRatio: 0.32,
  edgeOutsideStretchRatio: 0.1,
  crossLimitDistanceRatio: 5.0,
  stretchLookaheadRatio: 2.0,
  decimalPlaces: 3,
  defaultEdgeWidth: 0.4,
  skipInitialization: false,
};

/** Upper bound of `decimalPlaces`, from the options or a program marker */
export const MAX_DECIMAL_PLACES = 10;

const BOOLEAN_KEYS = ["activateStretch", "skipInitialization"] as const;
const NUMBER_KEYS = [
  "loopStretchRatio",
  "pathStretchRatio",
  "edgeInsideStretchRatio",
  "edgeOutsideStretchRatio",
  "crossLimitDistanceRatio",
  "stretchLookaheadRatio",
  "decimalPlaces",
  "defaultEdgeWidth",
] as const;

type BooleanKey = typeof BOOLEAN_KEYS[number];
type NumberKey = typeof NUMBER_KEYS[number];

const BOOLEAN_KEY_SET: ReadonlySet<string> = new Set(BOOLEAN_KEYS);
const NUMBER_KEY_SET: ReadonlySet<string> = new Set(NUMBER_KEYS);

function isBooleanKey(key: string): key is BooleanKey {
  return BOOLEAN_KEY_SET.has(key);
}

function isNumberKey(key: string): key is NumberKey {
  return NUMBER_KEY_SET.has(key);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate untyped input (parsed JSON) into partial options.
 * @throws ConfigError on unknown keys or wrongly typed values
 */
export function parseStretchOptions(
  input: unknown,
  source = "options",
): Partial<StretchOptions> {
  if (!isRecord(input)) {
    throw new ConfigError(`${source}: expected an object`);
  }
  const result: Partial<StretchOptions> = {};
  for (const [key, value] of Object.entries(input)) {
    if (isBooleanKey(key)) {
      if (typeof value !== "boolean") {
        throw new ConfigError(`${source}: "${key}" must be a boolean`);
      }
      result[key] = value;
    } else if (isNumberKey(key)) {
      if (typeof value !== "number" || !Number.isFinite(value)) {
        throw new ConfigError(`${source}: "${key}" must be a finite number`);
      }
      result[key] = value;
    } else {
      throw new ConfigError(`${source}: unknown option "${key}"`);
    }
  }
  return result;
}

/**
 * Merge partial options over the defaults and check the ranges.
 * @throws ConfigError when a value is out of range
 */
export function resolveStretchOptions(
  options: Partial<StretchOptions> = {},
): StretchOptions {
  const resolved: StretchOptions = { ...DEFAULT_STRETCH_OPTIONS, ...options };
  for (const key of NUMBER_KEYS) {
    if (resolved[key] < 0) {
      throw new ConfigError(`"${key}" must not be negative (got ${resolved[key]})`);
    }
  }
  if (!Number.isInteger(resolved.decimalPlaces) || resolved.decimalPlaces > MAX_DECIMAL_PLACES) {
    throw new ConfigError(
      `"decimalPlaces" must be an integer between 0 and ${MAX_DECIMAL_PLACES} (got ${resolved.decimalPlaces})`,
    );
  }
  if (resolved.defaultEdgeWidth <= 0) {
    throw new ConfigError(`"defaultEdgeWidth" must be positive`);
  }
  if (resolved.activateStretch && resolved.stretchLookaheadRatio <= 0) {
    throw new ConfigError(`"stretchLookaheadRatio" must be positive`);
  }
  return resolved;
}

/**
 * Read partial options from a JSON file
 */
export async function loadStretchOptions(
  path: string,
): Promise<Partial<StretchOptions>> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    throw new ConfigError(
      `cannot read config ${path}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(
      `invalid JSON in ${path}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return parseStretchOptions(json, path);
}
