/**
 * Assertions shared by the tests, on top of node:assert
 */

import assert from "node:assert/strict";
import type { Point } from "../stretch/geometry.ts";

export const EPSILON = 1e-6;

export function assertAlmostEquals(
  actual: number,
  expected: number,
  epsilon = EPSILON,
  message?: string,
): void {
  assert.ok(
    Math.abs(actual - expected) <= epsilon,
    message ?? `expected ${actual} to be within ${epsilon} of ${expected}`,
  );
}

export function assertPointEquals(
  actual: Point,
  expected: Point,
  epsilon = EPSILON,
): void {
  assertAlmostEquals(actual.x, expected.x, epsilon, `x coordinate mismatch: ${actual.x} vs ${expected.x}`);
  assertAlmostEquals(actual.y, expected.y, epsilon, `y coordinate mismatch: ${actual.y} vs ${expected.y}`);
}

/**
 * Initialization block with a declared edge width, as the slicer writes it
 */
export function initializationBlock(edgeWidth = 0.4, decimalPlaces = 3): string[] {
  return [
    "(<extruderInitialization>)",
    `(<decimalPlacesCarried> ${decimalPlaces} )`,
    `(<edgeWidth> ${edgeWidth} )`,
    "(</extruderInitialization>)",
  ];
}

/**
 * A 1 mm square printed as an inner edge, approached from its first corner
 */
export const SQUARE_EDGE_LAYER = [
  "(<layer> 0.2 )",
  "(<edge> inner )",
  "G1 X0.0 Y0.0 Z0.2 F1200.0",
  "M101",
  "G1 X1.0 Y0.0 Z0.2",
  "G1 X1.0 Y1.0 Z0.2",
  "G1 X0.0 Y1.0 Z0.2",
  "G1 X0.0 Y0.0 Z0.2",
  "M103",
  "(</edge>)",
  "(</layer>)",
];

/**
 * Two 1 mm inner-edge squares in one layer, the second 5 mm to the right.
 * The second approach move carries no Z or F word.
 */
export const TWO_SQUARES_LAYER = [
  ...SQUARE_EDGE_LAYER.slice(0, 10),
  "(<edge> inner )",
  "G1 X5.0 Y0.0",
  "M101",
  "G1 X6.0 Y0.0",
  "G1 X6.0 Y1.0",
  "G1 X5.0 Y1.0",
  "G1 X5.0 Y0.0",
  "M103",
  "(</edge>)",
  "(</layer>)",
];
