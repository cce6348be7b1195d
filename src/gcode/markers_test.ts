import assert from "node:assert/strict";
import { test } from "node:test";
import { INITIAL_PARSER_STATE, parseLine } from "./line.ts";
import {
  decimalPlacesOf,
  edgeWidthOf,
  isEdgeEnd,
  isInitializationEnd,
  isInnerEdgeBegin,
  isLayerStart,
  isLoopBegin,
  isLoopEnd,
  isOuterEdgeBegin,
} from "./markers.ts";

const line = (raw: string) => parseLine(raw, INITIAL_PARSER_STATE, 1).line;

test("markers - layer start in both dialects", () => {
  assert.equal(isLayerStart(line("(<layer> 0.4 )")), true);
  assert.equal(isLayerStart(line(";LAYER:3")), true);
  assert.equal(isLayerStart(line("(</layer>)")), false);
});

test("markers - feature boundaries", () => {
  assert.equal(isInitializationEnd(line("(</extruderInitialization>)")), true);
  assert.equal(isLoopBegin(line("(<loop> inner )")), true);
  assert.equal(isLoopEnd(line("(</loop>)")), true);
  assert.equal(isOuterEdgeBegin(line("(<edge> outer )")), true);
  assert.equal(isInnerEdgeBegin(line("(<edge> outer )")), false);
  assert.equal(isInnerEdgeBegin(line("(<edge> inner )")), true);
  assert.equal(isEdgeEnd(line("(</edge>)")), true);
  assert.equal(isEdgeEnd(line("(/edge>)")), false);
});

test("edgeWidthOf - reads the declared width", () => {
  assert.equal(edgeWidthOf(line("(<edgeWidth> 0.48 )")), 0.48);
  assert.equal(edgeWidthOf(line("(<edgeWidth> 0 )")), undefined);
  assert.equal(edgeWidthOf(line("G1 X1")), undefined);
});

test("decimalPlacesOf - reads the declared precision", () => {
  assert.equal(decimalPlacesOf(line("(<decimalPlacesCarried> 4 )")), 4);
  assert.equal(decimalPlacesOf(line("(<layer> 0.4 )")), undefined);
});
