import assert from "node:assert/strict";
import { test } from "node:test";
import { createLogger, levelFromVerbosity } from "./log.ts";

test("createLogger - prints LEVEL:message at or above its level", () => {
  const lines: string[] = [];
  const logger = createLogger("warn", (line) => lines.push(line));
  logger.debug("hidden");
  logger.info("hidden");
  logger.warn("careful");
  logger.error("broken");
  assert.deepEqual(lines, ["WARN:careful", "ERROR:broken"]);
});

test("createLogger - silent prints nothing", () => {
  const lines: string[] = [];
  const logger = createLogger("silent", (line) => lines.push(line));
  logger.error("broken");
  assert.deepEqual(lines, []);
});

test("levelFromVerbosity - maps flag counts to levels", () => {
  assert.equal(levelFromVerbosity(0, 0), "info");
  assert.equal(levelFromVerbosity(1, 0), "debug");
  assert.equal(levelFromVerbosity(3, 0), "debug");
  assert.equal(levelFromVerbosity(0, 1), "warn");
  assert.equal(levelFromVerbosity(0, 2), "error");
  assert.equal(levelFromVerbosity(0, 3), "silent");
  assert.equal(levelFromVerbosity(1, 1), "info");
});
