import type { FeatureKind } from "./feature_state.ts";
import type { StretchOptions } from "./options.ts";

/**
 * Absolute distances (mm) derived once per run from the edge width.
 */
export interface StretchContext {
  edgeWidth: number;
  /** Neighbours farther than this only keep the parallel stretch */
  crossLimitDistance: number;
  /** Neighbours closer than this leave the stretch untouched */
  crossLimitDistanceFraction: number;
  /** crossLimitDistance - crossLimitDistanceFraction */
  crossLimitDistanceRemainder: number;
  /** Arc length at which the thread direction is sampled */
  lookaheadDistance: number;
  maxStretch: Readonly<Record<FeatureKind, number>>;
}

export function createStretchContext(
  edgeWidth: number,
  options: StretchOptions,
): StretchContext {
  const crossLimitDistance = edgeWidth * options.crossLimitDistanceRatio;
  const crossLimitDistanceFraction = crossLimitDistance / 3;
  return {
    edgeWidth,
    crossLimitDistance,
    crossLimitDistanceFraction,
    crossLimitDistanceRemainder: crossLimitDistance - crossLimitDistanceFraction,
    lookaheadDistance: edgeWidth * options.stretchLookaheadRatio,
    maxStretch: {
      path: edgeWidth * options.pathStretchRatio,
      loop: edgeWidth * options.loopStretchRatio,
      innerEdge: edgeWidth * options.edgeInsideStretchRatio,
      outerEdge: edgeWidth * options.edgeOutsideStretchRatio,
    },
  };
}

export function describeContext(context: StretchContext): string {
  const m = context.maxStretch;
  return `edge width ${context.edgeWidth}mm, max stretch path=${m.path.toFixed(3)} ` +
    `loop=${m.loop.toFixed(3)} inner=${m.innerEdge.toFixed(3)} outer=${m.outerEdge.toFixed(3)}, ` +
    `lookahead ${context.lookaheadDistance.toFixed(3)}mm, cross limit ${context.crossLimitDistance.toFixed(3)}mm`;
}
