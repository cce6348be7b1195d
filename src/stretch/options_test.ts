import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { test } from "node:test";
import { ConfigError } from "../errors.ts";
import {
  DEFAULT_STRETCH_OPTIONS,
  loadStretchOptions,
  parseStretchOptions,
  resolveStretchOptions,
} from "./options.ts";

test("resolveStretchOptions - defaults", () => {
  assert.deepEqual(resolveStretchOptions(), DEFAULT_STRETCH_OPTIONS);
  assert.equal(DEFAULT_STRETCH_OPTIONS.edgeInsideStretchRatio, 0.32);
  assert.equal(DEFAULT_STRETCH_OPTIONS.crossLimitDistanceRatio, 5);
});

test("resolveStretchOptions - overrides win", () => {
  const resolved = resolveStretchOptions({ loopStretchRatio: 0.2, decimalPlaces: 4 });
  assert.equal(resolved.loopStretchRatio, 0.2);
  assert.equal(resolved.decimalPlaces, 4);
  assert.equal(resolved.pathStretchRatio, 0);
});

test("resolveStretchOptions - rejects out of range values", () => {
  assert.throws(() => resolveStretchOptions({ loopStretchRatio: -0.1 }), ConfigError);
  assert.throws(() => resolveStretchOptions({ decimalPlaces: 2.5 }), ConfigError);
  assert.throws(() => resolveStretchOptions({ defaultEdgeWidth: 0 }), ConfigError);
  assert.throws(() => resolveStretchOptions({ stretchLookaheadRatio: 0 }), ConfigError);
  resolveStretchOptions({ stretchLookaheadRatio: 0, activateStretch: false });
});

test("parseStretchOptions - validates keys and types", () => {
  assert.deepEqual(
    parseStretchOptions({ pathStretchRatio: 0.1, activateStretch: false }),
    { pathStretchRatio: 0.1, activateStretch: false },
  );
  assert.throws(() => parseStretchOptions([]), /expected an object/);
  assert.throws(() => parseStretchOptions({ loopRatio: 1 }), /unknown option "loopRatio"/);
  assert.throws(() => parseStretchOptions({ loopStretchRatio: "1" }), /must be a finite number/);
  assert.throws(() => parseStretchOptions({ activateStretch: 1 }), /must be a boolean/);
});

test("loadStretchOptions - reads a JSON file", async () => {
  const dir = await mkdtemp(join(tmpdir(), "stretch-options-"));
  try {
    const good = join(dir, "good.json");
    await writeFile(good, JSON.stringify({ edgeInsideStretchRatio: 0.5 }));
    assert.deepEqual(await loadStretchOptions(good), { edgeInsideStretchRatio: 0.5 });

    const broken = join(dir, "broken.json");
    await writeFile(broken, "{ nope");
    await assert.rejects(loadStretchOptions(broken), ConfigError);
    await assert.rejects(loadStretchOptions(join(dir, "missing.json")), /cannot read config/);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});
