import assert from "node:assert/strict";
import { test } from "node:test";
import type { GcodeLine } from "../gcode/line.ts";
import { parseProgram } from "../gcode/program.ts";
import { SQUARE_EDGE_LAYER, TWO_SQUARES_LAYER } from "../testing/assert.ts";
import { type Cursor, createCursor, type Direction, isBeforeExtrusion } from "./traversal.ts";

const LINES = parseProgram(SQUARE_EDGE_LAYER.join("\n")).layers[0].lines;

// Corners of the square by line index
const A = "0,0"; // approach, index 2
const P1 = "1,0"; // index 4
const P2 = "1,1"; // index 5
const P3 = "0,1"; // index 6
const P4 = "0,0"; // index 7

function walk(cursor: Cursor): string[] {
  const points: string[] = [];
  for (let line = cursor.next(); line !== null; line = cursor.next()) {
    points.push(`${line.position.x},${line.position.y}`);
  }
  return points;
}

function walkFrom(
  start: number,
  isLoop: boolean,
  direction: Direction,
  lines: readonly GcodeLine[] = LINES,
): string[] {
  return walk(createCursor(lines, start, isLoop, direction));
}

test("isBeforeExtrusion - only moves followed by another move before M101", () => {
  const lines: readonly GcodeLine[] = parseProgram(
    ["G1 X5 Y5", "G1 X0 Y0", "M101", "G1 X1 Y0", "M103"].join("\n"),
  ).layers[0].lines;
  assert.equal(isBeforeExtrusion(lines, 0), true);
  assert.equal(isBeforeExtrusion(lines, 1), false);
  assert.equal(isBeforeExtrusion(lines, 3), false);
});

test("createCursor - forward around a loop stops before the start", () => {
  assert.deepEqual(walkFrom(4, true, 1), [P1, P2, P3, P4]);
  assert.deepEqual(walkFrom(5, true, 1), [P2, P3, P4, P1]);
});

test("createCursor - forward on a path stops at M103", () => {
  assert.deepEqual(walkFrom(5, false, 1), [P2, P3, P4]);
});

test("createCursor - backward includes the approach move", () => {
  assert.deepEqual(walkFrom(6, true, -1), [P3, P2, P1, A]);
  assert.deepEqual(walkFrom(5, true, -1), [P2, P1, A, P3]);
  assert.deepEqual(walkFrom(5, false, -1), [P2, P1, A]);
});

test("createCursor - starting just outside the layer", () => {
  assert.deepEqual(walkFrom(LINES.length, false, 1), []);
  assert.deepEqual(walkFrom(-1, false, -1), []);
});

test("createCursor - every start terminates", () => {
  for (let start = -1; start <= LINES.length; start++) {
    for (const direction of [1, -1] as const) {
      for (const isLoop of [true, false]) {
        const points = walkFrom(start, isLoop, direction);
        assert.ok(points.length <= 5, `start ${start} direction ${direction} gave ${points.length} points`);
      }
    }
  }
});

test("createCursor - exhausted cursor stays exhausted", () => {
  const cursor = createCursor(LINES, 8, false, 1);
  assert.equal(cursor.next(), null);
  assert.equal(cursor.next(), null);
});

// Second square of TWO_SQUARES_LAYER: approach at 11, corners at 13-16
const TWO = parseProgram(TWO_SQUARES_LAYER.join("\n")).layers[0].lines;
const B = "5,0";
const Q1 = "6,0";
const Q2 = "6,1";
const Q3 = "5,1";
const Q4 = "5,0";

test("createCursor - first of two loops never reaches the second", () => {
  assert.deepEqual(walkFrom(5, true, 1, TWO), [P2, P3, P4, P1]);
  assert.deepEqual(walkFrom(6, true, -1, TWO), [P3, P2, P1, A]);
  assert.deepEqual(walkFrom(5, false, 1, TWO), [P2, P3, P4]);
});

test("createCursor - forward on the second loop wraps to its own M101", () => {
  assert.deepEqual(walkFrom(13, true, 1, TWO), [Q1, Q2, Q3, Q4]);
  assert.deepEqual(walkFrom(14, true, 1, TWO), [Q2, Q3, Q4, Q1]);
  assert.deepEqual(walkFrom(14, false, 1, TWO), [Q2, Q3, Q4]);
});

test("createCursor - backward on the second loop stops at the first loop's M103", () => {
  assert.deepEqual(walkFrom(14, false, -1, TWO), [Q2, Q1, B]);
  assert.deepEqual(walkFrom(13, true, -1, TWO), [Q1, B, Q3, Q2]);
  assert.deepEqual(walkFrom(10, true, -1, TWO), [Q3, Q2, Q1, B]);
});
