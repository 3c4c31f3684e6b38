import fs from "fs";
import path from "path";

import type { Logger } from "./debug";
import type { BuildConfig } from "./options";
import { bootArtifacts, type ResolvedPaths } from "./paths";
import type { ProjectConfig } from "./project-config";
import { formatCommand, type ProcessResult, type ProcessRunner } from "./process-runner";

export type Stage = "ensure-out-dir" | "compile" | "build-image" | "run" | "done";

export type PipelineOptions = {
  runner: ProcessRunner;
  project: Pick<ProjectConfig, "cargoPath" | "qemuPath" | "biosPath">;
  logger: Logger;
};

/** Stage that follows `stage` after it succeeded. */
export function nextStage(stage: Stage, config: BuildConfig): Stage {
  switch (stage) {
    case "ensure-out-dir":
      return "compile";
    case "compile":
      return "build-image";
    case "build-image":
      return config.shouldRun ? "run" : "done";
    case "run":
    case "done":
      return "done";
  }
}

export function buildCompileArgs(config: BuildConfig): string[] {
  const args = ["build"];
  if (config.optimized) {
    args.push("--release");
  }
  return args;
}

export function buildImageArgs(paths: ResolvedPaths): string[] {
  return [
    "builder",
    "--kernel-manifest",
    paths.manifestPath,
    "--kernel-binary",
    paths.expectedBinaryPath,
    "--target-dir",
    paths.targetDir,
    "--out-dir",
    paths.outDir,
  ];
}

/**
 * QEMU arguments for booting the UEFI image.
 *
 * `-s -S` opens the gdb stub on tcp::1234 and halts the CPU until gdb
 * connects.
 */
export function buildEmulatorArgs(config: BuildConfig, biosPath: string, imagePath: string): string[] {
  const args = ["-bios", biosPath, imagePath];
  if (config.waitForDebugger) {
    args.push("-s", "-S");
  }
  return args;
}

function reportSpawnFailure(logger: Logger, command: string, result: ProcessResult) {
  const err = result.spawnError;
  if (!err) return;

  if (err.code === "ENOENT") {
    logger.error(`Error: '${command}' not found.`);
    if (command.includes("qemu")) {
      logger.error("QEMU needs to be installed to use 'run'.");
      logger.error("To install, follow instructions at https://www.qemu.org/download/.");
    }
    return;
  }
  logger.error(`Error: failed to start '${command}': ${err.message}`);
}

function reportArtifacts(paths: ResolvedPaths, logger: Logger) {
  const artifacts = bootArtifacts(paths.outDir, paths.binaryName);
  for (const file of Object.values(artifacts)) {
    if (fs.existsSync(file)) {
      logger.log(`  ${path.relative(paths.projectDir, file)}`);
    } else {
      logger.error(`Warning: expected disk image not found: ${file}`);
    }
  }
}

/**
 * Run the build stages in order and return the exit status.
 *
 * The first failing stage ends the pipeline and its status is returned.
 * The emulator's status is returned unmodified.
 */
export async function runPipeline(
  config: BuildConfig,
  paths: ResolvedPaths,
  options: PipelineOptions
): Promise<number> {
  const { runner, project, logger } = options;

  const exec = async (command: string, args: string[], cwd: string): Promise<number> => {
    logger.log(`Running: ${formatCommand(command, args)}`);
    const result = await runner.run(command, args, { cwd });
    reportSpawnFailure(logger, command, result);
    if (result.signal !== undefined) {
      logger.error(`process exited due to signal ${result.signal}`);
    }
    return result.exitCode;
  };

  const runStage = async (stage: Stage): Promise<number> => {
    switch (stage) {
      case "ensure-out-dir":
        try {
          fs.mkdirSync(paths.outDir, { recursive: true });
          return 0;
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          logger.error(`Failed to create output directory ${paths.outDir}: ${message}`);
          return 1;
        }
      case "compile":
        return exec(project.cargoPath, buildCompileArgs(config), paths.projectDir);
      case "build-image": {
        const status = await exec(project.cargoPath, buildImageArgs(paths), paths.dependencyRootDir);
        if (status === 0) {
          logger.log("Disk images:");
          reportArtifacts(paths, logger);
        }
        return status;
      }
      case "run": {
        const biosPath = path.resolve(paths.projectDir, project.biosPath);
        const image = bootArtifacts(paths.outDir, paths.binaryName).uefiImage;
        if (config.waitForDebugger) {
          logger.log("QEMU is waiting for gdb on tcp::1234");
        }
        return exec(project.qemuPath, buildEmulatorArgs(config, biosPath, image), paths.projectDir);
      }
      case "done":
        return 0;
    }
  };

  let stage: Stage = "ensure-out-dir";
  while (stage !== "done") {
    logger.debug("pipeline", `stage ${stage}`);
    const status = await runStage(stage);
    if (stage === "run") {
      logger.debug("pipeline", `emulator exited with ${status}`);
      return status;
    }
    if (status !== 0) {
      logger.debug("pipeline", `stage ${stage} failed with ${status}`);
      return status;
    }
    stage = nextStage(stage, config);
  }

  return 0;
}
