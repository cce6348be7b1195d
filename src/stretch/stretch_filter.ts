/**
 * Stretch filter: widens holes and pushes corners out to compensate for
 * filament contraction.
 *
 * One sequential pass over the program. Lines of the initialization block
 * are copied while the edge width and output precision are read from
 * them; after the block, every linear move of a stretched feature is
 * replaced by a move displaced along the local outward normal.
 */

import { OutputEmitter } from "../gcode/emitter.ts";
import type { GcodeLine } from "../gcode/line.ts";
import {
  decimalPlacesOf,
  edgeWidthOf,
  isInitializationEnd,
} from "../gcode/markers.ts";
import type { Program } from "../gcode/program.ts";
import { type Logger, silentLogger } from "../log.ts";
import {
  type FeatureKind,
  type FeatureState,
  INITIAL_FEATURE_STATE,
  isLoopFeature,
  nextFeatureState,
} from "./feature_state.ts";
import { add, type Point } from "./geometry.ts";
import {
  MAX_DECIMAL_PLACES,
  resolveStretchOptions,
  type StretchOptions,
} from "./options.ts";
import {
  createStretchContext,
  describeContext,
  type StretchContext,
} from "./stretch_context.ts";
import { absoluteStretch, pointOf } from "./stretch_vector.ts";

export interface StretchedMove {
  layerIndex: number;
  /** Index of the move within its layer */
  lineIndex: number;
  lineNumber: number;
  feature: FeatureKind;
  original: Point;
  stretched: Point;
  z: number;
  /** Emitted replacement line */
  text: string;
}

export interface StretchResult {
  lines: readonly string[];
  text: string;
  moves: StretchedMove[];
  /** Undefined when the pass never left the initialization block */
  context?: StretchContext;
}

/**
 * True when the extruder is switched on before the next linear move or
 * deactivate command: the move is the approach to a thread.
 */
export function isJustBeforeExtrusion(
  lines: readonly GcodeLine[],
  index: number,
): boolean {
  for (let i = index + 1; i < lines.length; i++) {
    const { kind } = lines[i];
    if (kind === "linear" || kind === "deactivate") return false;
    if (kind === "activate") return true;
  }
  return false;
}

/**
 * Absolute stretch for the move at `index`, or null when the move is not
 * stretched (extruder off outside an approach, or no stretch for the
 * active feature).
 */
export function stretchForMove(
  lines: readonly GcodeLine[],
  index: number,
  state: FeatureState,
  context: StretchContext,
): Point | null {
  const maxStretch = context.maxStretch[state.kind];
  if (maxStretch <= 0) return null;
  if (!state.extruderActive && !isJustBeforeExtrusion(lines, index)) {
    return null;
  }
  return absoluteStretch(
    lines,
    index,
    isLoopFeature(state.kind),
    context,
    maxStretch,
  );
}

/**
 * Stretch every qualifying linear move of `program`
 */
export function stretchProgram(
  program: Program,
  options: Partial<StretchOptions> = {},
  logger: Logger = silentLogger,
): StretchResult {
  const resolved = resolveStretchOptions(options);
  const emitter = new OutputEmitter(resolved.decimalPlaces);
  const moves: StretchedMove[] = [];

  if (!resolved.activateStretch) {
    logger.info("stretch is not activated, program copied unchanged");
    for (const layer of program.layers) {
      layer.lines.forEach((line) => emitter.passthrough(line));
    }
    return { lines: emitter.output, text: emitter.toText(), moves };
  }

  let edgeWidth: number | undefined;
  let context: StretchContext | undefined;
  let state = INITIAL_FEATURE_STATE;

  const startStretching = () => {
    if (edgeWidth === undefined) {
      logger.info(
        `no edge width declared, using ${resolved.defaultEdgeWidth}mm`,
      );
    }
    const created = createStretchContext(
      edgeWidth ?? resolved.defaultEdgeWidth,
      resolved,
    );
    logger.info(describeContext(created));
    return created;
  };

  if (resolved.skipInitialization) {
    context = startStretching();
  }

  for (const layer of program.layers) {
    const { lines } = layer;
    lines.forEach((line, index) => {
      if (context === undefined) {
        emitter.passthrough(line);
        edgeWidth = edgeWidthOf(line) ?? edgeWidth;
        const places = decimalPlacesOf(line);
        if (places !== undefined && options.decimalPlaces === undefined) {
          if (places > MAX_DECIMAL_PLACES) {
            logger.warn(
              `line ${line.lineNumber}: ${places} decimal places requested, using ${MAX_DECIMAL_PLACES}`,
            );
          }
          emitter.precision = Math.min(places, MAX_DECIMAL_PLACES);
        }
        if (isInitializationEnd(line)) {
          context = startStretching();
        }
        return;
      }

      if (line.kind !== "linear") {
        state = nextFeatureState(state, line);
        emitter.passthrough(line);
        return;
      }

      const stretch = stretchForMove(lines, index, state, context);
      if (stretch === null) {
        emitter.passthrough(line);
        return;
      }

      const original = pointOf(line);
      const stretched = add(original, stretch);
      const text = emitter.rewrittenMove(line, stretched.x, stretched.y);
      moves.push({
        layerIndex: layer.index,
        lineIndex: index,
        lineNumber: line.lineNumber,
        feature: state.kind,
        original,
        stretched,
        z: line.position.z,
        text,
      });
    });
  }

  if (context === undefined) {
    logger.warn(
      "no end of initialization marker found, program copied unchanged",
    );
  } else {
    logger.info(
      `stretched ${moves.length} moves in ${program.layers.length} layers`,
    );
  }

  return { lines: emitter.output, text: emitter.toText(), moves, context };
}
