import assert from "node:assert/strict";
import test from "node:test";

import { parseBuildArgs, type BuildConfig } from "../src/options";
import { bootArtifacts, resolvePaths } from "../src/paths";
import { getDefaultProjectConfig } from "../src/project-config";

function config(argv: string[]): BuildConfig {
  const outcome = parseBuildArgs(argv);
  if (outcome.type !== "config") throw new Error(`unexpected outcome ${outcome.type}`);
  return outcome.config;
}

const project = { ...getDefaultProjectConfig(), binaryName: "kernel", targetTriple: "x86_64-custom" };

test("paths: debug build resolves every path under the project root", () => {
  assert.deepEqual(resolvePaths(config([]), "/deps/bootloader", "/work/os", project), {
    projectDir: "/work/os",
    manifestPath: "/work/os/Cargo.toml",
    targetDir: "/work/os/target",
    outDir: "/work/os/out",
    expectedBinaryPath: "/work/os/target/x86_64-custom/debug/kernel",
    dependencyRootDir: "/deps/bootloader",
    binaryName: "kernel",
  });
});

test("paths: release build selects the release profile directory", () => {
  const paths = resolvePaths(config(["release"]), "/deps/bootloader", "/work/os", project);
  assert.equal(paths.expectedBinaryPath, "/work/os/target/x86_64-custom/release/kernel");
});

test("paths: binary name defaults to the project directory name", () => {
  const paths = resolvePaths(config([]), "/deps/bootloader", "/work/my-kernel/");
  assert.equal(paths.binaryName, "my-kernel");
  assert.equal(
    paths.expectedBinaryPath,
    "/work/my-kernel/target/x86_64-unknown-none/debug/my-kernel"
  );
});

test("paths: root package name is used when the project config sets none", () => {
  const defaults = getDefaultProjectConfig();
  const paths = resolvePaths(config([]), "/deps/bootloader", "/work/os-main", defaults, "os");
  assert.equal(paths.binaryName, "os");
  assert.equal(paths.expectedBinaryPath, "/work/os-main/target/x86_64-unknown-none/debug/os");
});

test("paths: configured binary name wins over the root package name", () => {
  const paths = resolvePaths(config([]), "/deps/bootloader", "/work/os", project, "os");
  assert.equal(paths.binaryName, "kernel");
});

test("paths: resolvePaths is pure", () => {
  const first = resolvePaths(config(["run"]), "/deps/bootloader", "/work/os", project);
  const second = resolvePaths(config(["run"]), "/deps/bootloader", "/work/os", project);
  assert.deepEqual(first, second);
});

test("paths: bootArtifacts names the four disk images after the binary", () => {
  assert.deepEqual(bootArtifacts("/work/os/out", "kernel"), {
    biosImage: "/work/os/out/boot-bios-kernel.img",
    uefiImage: "/work/os/out/boot-uefi-kernel.img",
    uefiEfi: "/work/os/out/boot-uefi-kernel.efi",
    uefiFat: "/work/os/out/boot-uefi-kernel.fat",
  });
});
