import assert from "node:assert/strict";
import test from "node:test";

import {
  createLogger,
  parseDebugEnv,
  resolveDebugComponents,
  type DebugComponent,
} from "../src/debug";
import { collectOutput } from "./helpers/fake-runner";

test("debug: parseDebugEnv accepts all and comma lists", () => {
  assert.deepEqual([...parseDebugEnv("all")], ["args", "metadata", "pipeline", "exec"]);
  assert.deepEqual([...parseDebugEnv("1")], ["args", "metadata", "pipeline", "exec"]);
  assert.deepEqual([...parseDebugEnv(" metadata ,exec,bogus")], ["metadata", "exec"]);
  assert.equal(parseDebugEnv("").size, 0);
});

test("debug: resolveDebugComponents prefers explicit configuration over the environment", () => {
  const env = parseDebugEnv("exec");
  assert.deepEqual([...resolveDebugComponents(undefined, env)], ["exec"]);
  assert.equal(resolveDebugComponents(false, env).size, 0);
  assert.equal(resolveDebugComponents(true, env).size, 4);
  assert.deepEqual([...resolveDebugComponents(["pipeline"], env)], ["pipeline"]);
});

test("debug: component lists keep their order", () => {
  const selected: DebugComponent[] = ["metadata", "args"];
  assert.deepEqual([...resolveDebugComponents(selected, new Set())], ["metadata", "args"]);
});

test("debug: logger writes only enabled components and honours quiet", () => {
  const output = collectOutput();
  const logger = createLogger({ quiet: true, debug: ["pipeline"], write: output.write });

  logger.log("Running: cargo build");
  logger.debug("pipeline", "stage compile");
  logger.debug("exec", "spawn cargo build");
  logger.error("Warning: something");

  assert.equal(output.text, "[boot-builder:pipeline] stage compile\nWarning: something\n");
});
