import type { GcodeLine } from "../gcode/line.ts";
import {
  isEdgeEnd,
  isInnerEdgeBegin,
  isLoopBegin,
  isLoopEnd,
  isOuterEdgeBegin,
} from "../gcode/markers.ts";

/**
 * Structural role of the thread being printed. Each kind has its own
 * maximum stretch; every kind except "path" is a closed loop.
 */
export type FeatureKind = "path" | "loop" | "innerEdge" | "outerEdge";

export interface FeatureState {
  readonly kind: FeatureKind;
  readonly extruderActive: boolean;
}

export const INITIAL_FEATURE_STATE: FeatureState = {
  kind: "path",
  extruderActive: false,
};

/**
 * Loops and edges are closed, so traversal wraps around them
 */
export function isLoopFeature(kind: FeatureKind): boolean {
  return kind !== "path";
}

/**
 * State after `line` has been seen. Linear moves never change the state.
 */
export function nextFeatureState(
  state: FeatureState,
  line: GcodeLine,
): FeatureState {
  switch (line.kind) {
    case "activate":
      return { ...state, extruderActive: true };
    case "deactivate":
      return { kind: "path", extruderActive: false };
    case "comment":
      break;
    default:
      return state;
  }

  if (isLoopBegin(line)) return { ...state, kind: "loop" };
  if (isInnerEdgeBegin(line)) return { ...state, kind: "innerEdge" };
  if (isOuterEdgeBegin(line)) return { ...state, kind: "outerEdge" };
  if (isLoopEnd(line) || isEdgeEnd(line)) return { ...state, kind: "path" };
  return state;
}
