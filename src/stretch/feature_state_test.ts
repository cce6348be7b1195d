import assert from "node:assert/strict";
import { test } from "node:test";
import { INITIAL_PARSER_STATE, parseLine } from "../gcode/line.ts";
import {
  type FeatureState,
  INITIAL_FEATURE_STATE,
  isLoopFeature,
  nextFeatureState,
} from "./feature_state.ts";

function run(lines: string[]): FeatureState {
  let parser = INITIAL_PARSER_STATE;
  let state = INITIAL_FEATURE_STATE;
  lines.forEach((raw, i) => {
    const parsed = parseLine(raw, parser, i + 1);
    parser = parsed.state;
    state = nextFeatureState(state, parsed.line);
  });
  return state;
}

test("nextFeatureState - markers select the feature", () => {
  assert.deepEqual(run(["(<loop> inner )"]), { kind: "loop", extruderActive: false });
  assert.deepEqual(run(["(<edge> outer )", "M101"]), { kind: "outerEdge", extruderActive: true });
  assert.deepEqual(run(["(<edge> inner )"]), { kind: "innerEdge", extruderActive: false });
  assert.deepEqual(run(["(<loop> inner )", "(</loop>)"]), INITIAL_FEATURE_STATE);
});

test("nextFeatureState - deactivate ends the feature", () => {
  assert.deepEqual(run(["(<edge> inner )", "M101", "M103"]), INITIAL_FEATURE_STATE);
});

test("nextFeatureState - moves and other commands keep the state", () => {
  assert.deepEqual(run(["(<loop> )", "M101", "G1 X1 Y1", "M104 S200"]), {
    kind: "loop",
    extruderActive: true,
  });
});

test("isLoopFeature - everything but paths wraps", () => {
  assert.equal(isLoopFeature("path"), false);
  assert.equal(isLoopFeature("loop"), true);
  assert.equal(isLoopFeature("innerEdge"), true);
  assert.equal(isLoopFeature("outerEdge"), true);
});
