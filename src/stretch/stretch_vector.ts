/**
 * Stretch vector computation for one linear move.
 *
 * The thread direction is sampled a fixed arc length ahead of and behind
 * the move. On a curve both samples point away from the inside of the
 * curve, so their sum approximates the outward normal. The sum is damped,
 * limited against close neighbours and clamped to unit length before it
 * is scaled by the feature's maximum stretch.
 */

import type { GcodeLine } from "../gcode/line.ts";
import {
  add,
  distance,
  lerp,
  magnitude,
  normalize,
  perpendicular,
  type Point,
  project,
  scale,
  subtract,
} from "./geometry.ts";
import type { StretchContext } from "./stretch_context.ts";
import { createCursor, type Cursor } from "./traversal.ts";

/** Damping applied to the sum of the two tangent estimates */
export const STRETCH_DAMPING = 0.8;

export function pointOf(line: GcodeLine): Point {
  return { x: line.position.x, y: line.position.y };
}

/**
 * Unit vector from the point `lookahead` mm along the cursor's path back
 * toward `location`. When the path runs out first, the last point reached
 * is used instead; no point at all gives the zero vector.
 */
export function tangentEstimate(
  location: Point,
  cursor: Cursor,
  lookahead: number,
): Point {
  let last = location;
  let travelled = 0;
  for (let line = cursor.next(); line !== null; line = cursor.next()) {
    const point = pointOf(line);
    const segment = distance(last, point);
    if (travelled + segment >= lookahead) {
      const target = lerp(last, point, (lookahead - travelled) / segment);
      return normalize(subtract(location, target));
    }
    travelled += segment;
    last = point;
  }
  return normalize(subtract(location, last));
}

export interface CrossLimitThresholds {
  crossLimitDistance: number;
  crossLimitDistanceFraction: number;
  crossLimitDistanceRemainder: number;
}

/**
 * Limit `stretch` against the neighbouring point.
 *
 * The stretch is split into a part parallel to (location - neighbour) and
 * a perpendicular part. Within the fraction distance nothing changes.
 * Beyond the cross limit only the parallel part is kept. In between, the
 * perpendicular part is scaled by how far past the fraction distance the
 * neighbour lies.
 */
export function crossLimit(
  stretch: Point,
  location: Point,
  neighbour: Point | null,
  thresholds: CrossLimitThresholds,
): Point {
  if (neighbour === null) return stretch;
  const offset = subtract(location, neighbour);
  const d = magnitude(offset);
  if (d <= thresholds.crossLimitDistanceFraction) return stretch;

  const parallelAxis = scale(offset, 1 / d);
  const parallel = project(stretch, parallelAxis);
  if (d > thresholds.crossLimitDistance) return parallel;

  const cross = project(stretch, perpendicular(parallelAxis));
  const portion = (d - thresholds.crossLimitDistanceFraction) /
    thresholds.crossLimitDistanceRemainder;
  return add(parallel, scale(cross, portion));
}

function firstPoint(cursor: Cursor): Point | null {
  const line = cursor.next();
  return line === null ? null : pointOf(line);
}

/**
 * Relative stretch (length <= 1) for the move at `index` in `lines`
 */
export function relativeStretch(
  lines: readonly GcodeLine[],
  index: number,
  isLoop: boolean,
  context: StretchContext,
): Point {
  const location = pointOf(lines[index]);
  const forward = createCursor(lines, index + 1, isLoop, 1);
  const backward = createCursor(lines, index - 1, isLoop, -1);

  let stretch = scale(
    add(
      tangentEstimate(location, forward, context.lookaheadDistance),
      tangentEstimate(location, backward, context.lookaheadDistance),
    ),
    STRETCH_DAMPING,
  );

  // The neighbour search uses its own cursors: it looks one move away
  // rather than a distance away.
  stretch = crossLimit(
    stretch,
    location,
    firstPoint(createCursor(lines, index + 1, isLoop, 1)),
    context,
  );
  stretch = crossLimit(
    stretch,
    location,
    firstPoint(createCursor(lines, index - 1, isLoop, -1)),
    context,
  );

  return magnitude(stretch) > 1 ? normalize(stretch) : stretch;
}

/**
 * Absolute stretch (mm) for the move at `index`, at most `maxStretch` long
 */
export function absoluteStretch(
  lines: readonly GcodeLine[],
  index: number,
  isLoop: boolean,
  context: StretchContext,
  maxStretch: number,
): Point {
  return scale(relativeStretch(lines, index, isLoop, context), maxStretch);
}
