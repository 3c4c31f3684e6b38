import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";

import { createProcessRunner, formatCommand } from "../src/process-runner";

const node = process.execPath;

test("process-runner: run returns the child's exit status", async () => {
  const runner = createProcessRunner();
  const result = await runner.run(node, ["-e", "process.exit(7)"]);
  assert.equal(result.exitCode, 7);
  assert.equal(result.spawnError, undefined);
});

test("process-runner: capture collects stdout", async () => {
  const runner = createProcessRunner();
  const result = await runner.capture(node, ["-e", "process.stdout.write(JSON.stringify({ a: 1 }))"]);
  assert.equal(result.exitCode, 0);
  assert.equal(result.stdout, '{"a":1}');
});

test("process-runner: capture runs in the requested directory", async () => {
  const dir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "boot-builder-runner-")));
  try {
    const runner = createProcessRunner();
    const result = await runner.capture(node, ["-e", "process.stdout.write(process.cwd())"], {
      cwd: dir,
    });
    assert.equal(result.stdout, dir);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

test("process-runner: a missing executable reports exit status 1 with the spawn error", async () => {
  const runner = createProcessRunner();
  const result = await runner.run("boot-builder-no-such-binary", []);
  assert.equal(result.exitCode, 1);
  assert.equal(result.spawnError?.code, "ENOENT");
});

test("process-runner: a process killed by a signal reports exit status 1", async () => {
  const runner = createProcessRunner();
  const result = await runner.run(node, ["-e", "process.kill(process.pid, 'SIGTERM')"]);
  assert.equal(result.exitCode, 1);
  assert.equal(result.signal, "SIGTERM");
});

test("process-runner: formatCommand joins command and arguments", () => {
  assert.equal(formatCommand("cargo", ["build", "--release"]), "cargo build --release");
});
