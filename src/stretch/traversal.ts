/**
 * Directional traversal over one layer's lines.
 *
 * A cursor walks the layer index by index and hands out linear moves.
 * Extrusion boundaries end an open thread; on a closed loop the cursor
 * wraps to the other end of the loop instead. Forward and backward
 * cursors share one implementation and differ only in the boundary rule
 * and the wrap target, both looked up by direction.
 */

import type { GcodeLine } from "../gcode/line.ts";

export type Direction = 1 | -1;

export interface Cursor {
  /** Next linear move, or null once the cursor is exhausted */
  next(): GcodeLine | null;
}

/**
 * True for a linear move that comes before the thread start: scanning
 * forward, another linear move occurs before the extruder is switched on.
 * The move right before the activate command is the thread start point
 * and is not "before extrusion". A scan that finds neither command is
 * treated as extrusion already started.
 */
export function isBeforeExtrusion(
  lines: readonly GcodeLine[],
  index: number,
): boolean {
  let linearMoves = 0;
  for (let i = index + 1; i < lines.length; i++) {
    const { kind } = lines[i];
    if (kind === "linear") linearMoves++;
    if (kind === "activate") return linearMoves > 0;
    if (kind === "deactivate") return false;
  }
  return false;
}

interface DirectionRules {
  isBoundary(lines: readonly GcodeLine[], index: number): boolean;
  /** Index to resume from after wrapping, null when there is none */
  wrapTarget(lines: readonly GcodeLine[], index: number): number | null;
}

const RULES: Record<Direction, DirectionRules> = {
  // Forward: the thread ends at the deactivate command; a loop resumes
  // just after the activate command that opened it.
  1: {
    isBoundary: (lines, index) => lines[index].kind === "deactivate",
    wrapTarget: (lines, index) => {
      for (let i = Math.min(index, lines.length) - 1; i >= 0; i--) {
        if (lines[i].kind === "activate") return i + 1;
      }
      return null;
    },
  },
  // Backward: the thread starts after the previous deactivate command and
  // at its approach move; a loop resumes two lines before its own
  // deactivate command, skipping the closing move that repeats the start.
  "-1": {
    isBoundary: (lines, index) =>
      lines[index].kind === "deactivate" ||
      (lines[index].kind === "linear" && isBeforeExtrusion(lines, index)),
    wrapTarget: (lines, index) => {
      for (let i = Math.max(index, -1) + 1; i < lines.length; i++) {
        if (lines[i].kind === "deactivate") return i - 2;
      }
      return null;
    },
  },
};

/**
 * Create a cursor starting at `startIndex` (which may lie just outside
 * the layer). The cursor never hands out a line twice: coming back to the
 * start index, or wrapping into lines it has already walked, exhausts it.
 */
export function createCursor(
  lines: readonly GcodeLine[],
  startIndex: number,
  isLoop: boolean,
  direction: Direction,
): Cursor {
  const rules = RULES[direction];
  let index = startIndex;
  let exhausted = false;
  let started = false;
  // Hull of the indices walked so far
  let low = Number.POSITIVE_INFINITY;
  let high = Number.NEGATIVE_INFINITY;

  const wrap = (): boolean => {
    if (!isLoop) return false;
    const target = rules.wrapTarget(lines, index);
    if (target === null || target < 0 || target >= lines.length) return false;
    if (target >= low && target <= high) return false;
    index = target;
    return true;
  };

  return {
    next(): GcodeLine | null {
      while (!exhausted) {
        if (index < 0 || index >= lines.length) {
          if (!wrap()) break;
          continue;
        }
        if (started && index === startIndex) break;
        started = true;
        low = Math.min(low, index);
        high = Math.max(high, index);

        if (rules.isBoundary(lines, index)) {
          if (!wrap()) break;
          continue;
        }

        const line = lines[index];
        index += direction;
        if (line.kind === "linear") return line;
      }
      exhausted = true;
      return null;
    },
  };
}
