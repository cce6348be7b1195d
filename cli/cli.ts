/**
 * G-code filters - command-line interface
 *
 * Reads a program from a file or stdin, runs one filter over it and
 * writes the result to a file, back in place, or to stdout.
 */

import { parseArgs } from "node:util";
import { readFile, writeFile } from "node:fs/promises";

import {
  collectLayerPaths,
  ConfigError,
  createLogger,
  GcodeError,
  type GradientMode,
  levelFromVerbosity,
  loadStretchOptions,
  type Logger,
  parseProgram,
  renderStretchDebug,
  type StretchOptions,
  stretchProgram,
  temperatureGradient,
  toRelativeExtrusion,
} from "../src/index.ts";

export interface CliIO {
  readText(path: string | undefined): Promise<string>;
  writeText(path: string | undefined, text: string): Promise<void>;
  stderr(line: string): void;
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

export const nodeIO: CliIO = {
  readText: (path) => path === undefined ? readStdin() : readFile(path, "utf8"),
  writeText: async (path, text) => {
    if (path === undefined) {
      process.stdout.write(text);
    } else {
      await writeFile(path, text);
    }
  },
  stderr: (line) => console.error(line),
};

const USAGE = `
G-code filters

Usage:
  gcode-filters stretch  [infile] [outfile] [options]
  gcode-filters tempcal  <start_temp> <end_temp> [infile] [outfile] [options]
  gcode-filters relative [infile] [outfile] [options]

Input defaults to stdin, output to stdout.

Common options:
  -i, --inplace                  Modify the input file in place
  -v, --verbose                  More logging (repeatable)
  -q, --quiet                    Less logging (repeatable)
  -h, --help                     Show this help

stretch:
  --config <file.json>           Stretch options as JSON
  --disable                      Copy the program without stretching
  --loop-stretch-ratio <r>       Loop stretch over edge width (0.11)
  --path-stretch-ratio <r>       Path stretch over edge width (0)
  --edge-inside-stretch-ratio <r>  Inside edge stretch over edge width (0.32)
  --edge-outside-stretch-ratio <r> Outside edge stretch over edge width (0.1)
  --cross-limit-distance-ratio <r> Cross limit distance over edge width (5)
  --stretch-lookahead-ratio <r>  Stretch from distance over edge width (2)
  --edge-width <mm>              Edge width when the program declares none (0.4)
  --decimal-places <n>           Precision of rewritten moves (3)
  --skip-initialization          Stretch without an initialization block
  --debug-png <file.png>         Render one layer before/after stretching
  --debug-layer <n>              Layer rendered by --debug-png (1)

tempcal:
  --min-z-change <mm>            Keep the slicer temperature up to this height (0.1)
  -c, --continuous               Continuous gradient instead of steps
  -s, --steps <n>                Number of steps (10)

relative:
  --decimal-places <n>           Precision of E values (5)

Examples:
  gcode-filters stretch part.gcode part_stretch.gcode --edge-inside-stretch-ratio 0.4
  gcode-filters tempcal 240 200 tower.gcode -s 8
`;

const OPTIONS = {
  help: { type: "boolean", short: "h" },
  verbose: { type: "boolean", short: "v", multiple: true },
  quiet: { type: "boolean", short: "q", multiple: true },
  inplace: { type: "boolean", short: "i" },
  config: { type: "string" },
  disable: { type: "boolean" },
  "loop-stretch-ratio": { type: "string" },
  "path-stretch-ratio": { type: "string" },
  "edge-inside-stretch-ratio": { type: "string" },
  "edge-outside-stretch-ratio": { type: "string" },
  "cross-limit-distance-ratio": { type: "string" },
  "stretch-lookahead-ratio": { type: "string" },
  "edge-width": { type: "string" },
  "decimal-places": { type: "string" },
  "skip-initialization": { type: "boolean" },
  "debug-png": { type: "string" },
  "debug-layer": { type: "string" },
  "min-z-change": { type: "string" },
  continuous: { type: "boolean", short: "c" },
  steps: { type: "string", short: "s" },
} as const;

type ParsedValues = ReturnType<typeof parseArgs<{ options: typeof OPTIONS; allowPositionals: true }>>["values"];

function numberOption(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new ConfigError(`--${name} expects a number (got "${value}")`);
  }
  return parsed;
}

const RATIO_FLAGS = [
  ["loop-stretch-ratio", "loopStretchRatio"],
  ["path-stretch-ratio", "pathStretchRatio"],
  ["edge-inside-stretch-ratio", "edgeInsideStretchRatio"],
  ["edge-outside-stretch-ratio", "edgeOutsideStretchRatio"],
  ["cross-limit-distance-ratio", "crossLimitDistanceRatio"],
  ["stretch-lookahead-ratio", "stretchLookaheadRatio"],
  ["edge-width", "defaultEdgeWidth"],
  ["decimal-places", "decimalPlaces"],
] as const;

/**
 * Stretch options from --config and the flags; flags win
 */
async function stretchOptionsFrom(values: ParsedValues): Promise<Partial<StretchOptions>> {
  const options: Partial<StretchOptions> = values.config
    ? await loadStretchOptions(values.config)
    : {};
  for (const [flag, key] of RATIO_FLAGS) {
    const value = numberOption(flag, values[flag]);
    if (value !== undefined) options[key] = value;
  }
  if (values.disable) options.activateStretch = false;
  if (values["skip-initialization"]) options.skipInitialization = true;
  return options;
}

interface Files {
  input: string | undefined;
  output: string | undefined;
}

function filesFrom(positionals: string[], inplace: boolean): Files {
  const [input, output] = positionals;
  if (inplace) {
    if (input === undefined) {
      throw new ConfigError("--inplace needs an input file");
    }
    return { input, output: input };
  }
  return { input, output };
}

async function runStretch(
  values: ParsedValues,
  files: Files,
  io: CliIO,
  logger: Logger,
): Promise<void> {
  const options = await stretchOptionsFrom(values);
  logger.info("Parsing gcode...");
  const program = parseProgram(await io.readText(files.input), logger);
  const result = stretchProgram(program, options, logger);

  if (values["debug-png"]) {
    const layerIndex = numberOption("debug-layer", values["debug-layer"]) ?? 1;
    const layers = collectLayerPaths(program, layerIndex, result.moves);
    await renderStretchDebug(layers, { filename: values["debug-png"] });
    logger.info(`Saved layer ${layerIndex} debug render to ${values["debug-png"]}`);
  }

  await io.writeText(files.output, result.text);
}

async function runTempcal(
  values: ParsedValues,
  positionals: string[],
  io: CliIO,
  logger: Logger,
): Promise<void> {
  const [start, end, ...rest] = positionals;
  const startTemp = numberOption("start_temp", start);
  const endTemp = numberOption("end_temp", end);
  if (startTemp === undefined || endTemp === undefined) {
    throw new ConfigError("tempcal needs <start_temp> and <end_temp>");
  }
  const files = filesFrom(rest, values.inplace ?? false);
  const mode: GradientMode = values.continuous ? "continuous" : "step";
  const program = parseProgram(await io.readText(files.input), logger);
  const result = temperatureGradient(program, {
    startTemp,
    endTemp,
    mode,
    minZChange: numberOption("min-z-change", values["min-z-change"]),
    steps: numberOption("steps", values.steps),
  }, logger);
  await io.writeText(files.output, result.lines.join("\n"));
}

async function runRelative(
  values: ParsedValues,
  files: Files,
  io: CliIO,
  logger: Logger,
): Promise<void> {
  const program = parseProgram(await io.readText(files.input), logger);
  const result = toRelativeExtrusion(program, {
    decimalPlaces: numberOption("decimal-places", values["decimal-places"]),
  }, logger);
  await io.writeText(files.output, result.lines.join("\n"));
}

/**
 * Run the CLI and return its exit code
 */
export async function runCli(argv: string[], io: CliIO = nodeIO): Promise<number> {
  let parsed;
  try {
    parsed = parseArgs({ args: argv, options: OPTIONS, allowPositionals: true });
  } catch (error) {
    io.stderr(`ERROR:${error instanceof Error ? error.message : String(error)}`);
    io.stderr(USAGE);
    return 1;
  }
  const { values, positionals } = parsed;
  const [command, ...args] = positionals;

  if (values.help || command === undefined) {
    io.stderr(USAGE);
    return values.help ? 0 : 1;
  }

  const logger = createLogger(
    levelFromVerbosity(values.verbose?.length ?? 0, values.quiet?.length ?? 0),
    io.stderr,
  );

  try {
    switch (command) {
      case "stretch":
        await runStretch(values, filesFrom(args, values.inplace ?? false), io, logger);
        break;
      case "tempcal":
        await runTempcal(values, args, io, logger);
        break;
      case "relative":
        await runRelative(values, filesFrom(args, values.inplace ?? false), io, logger);
        break;
      default:
        io.stderr(`ERROR:unknown command "${command}"`);
        io.stderr(USAGE);
        return 1;
    }
  } catch (error) {
    if (error instanceof GcodeError || error instanceof RangeError) {
      logger.error(error.message);
      return 1;
    }
    throw error;
  }
  return 0;
}
