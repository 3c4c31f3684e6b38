import fs from "fs";
import path from "path";

import { z } from "zod";

export const PROJECT_CONFIG_FILENAME = "boot-builder.json";

export type ProjectConfig = {
  /** kernel binary name (default: root package name, then project directory name) */
  binaryName?: string;
  /** custom target triple the kernel is compiled for */
  targetTriple: string;
  /** manifest file name in the project root */
  manifestFile: string;
  /** name of the dependency that provides the image builder */
  bootloaderDependency: string;
  /** cargo binary path */
  cargoPath: string;
  /** qemu binary path */
  qemuPath: string;
  /** firmware passed to qemu `-bios`, relative to the project root */
  biosPath: string;
  /** suppress progress output */
  quiet: boolean;
};

export class ProjectConfigError extends Error {
  constructor(
    readonly configPath: string,
    message: string
  ) {
    super(message);
    this.name = "ProjectConfigError";
  }
}

const projectConfigFileSchema = z
  .object({
    binaryName: z.string().min(1),
    targetTriple: z.string().min(1),
    manifestFile: z.string().min(1),
    bootloaderDependency: z.string().min(1),
    cargoPath: z.string().min(1),
    qemuPath: z.string().min(1),
    biosPath: z.string().min(1),
    quiet: z.boolean(),
  })
  .partial()
  .strict();

export type ProjectConfigFile = z.infer<typeof projectConfigFileSchema>;

export function getDefaultProjectConfig(): ProjectConfig {
  return {
    targetTriple: "x86_64-unknown-none",
    manifestFile: "Cargo.toml",
    bootloaderDependency: "bootloader",
    cargoPath: "cargo",
    qemuPath: "qemu-system-x86_64",
    biosPath: "bios.bin",
    quiet: false,
  };
}

/**
 * Parse the contents of a `boot-builder.json` file.
 *
 * @throws If the content is not JSON or has unknown or mistyped keys
 */
export function parseProjectConfig(content: string, configPath = PROJECT_CONFIG_FILENAME): ProjectConfigFile {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ProjectConfigError(configPath, `Invalid JSON in ${configPath}: ${message}`);
  }

  const parsed = projectConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ProjectConfigError(configPath, `Invalid ${configPath}: ${issues}`);
  }
  return parsed.data;
}

function envFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === "") return undefined;
  return value === "1" || value.toLowerCase() === "true";
}

/**
 * Load the project configuration.
 *
 * Priority:
 * 1. Environment (`BOOT_BUILDER_CARGO`, `BOOT_BUILDER_QEMU`, `BOOT_BUILDER_QUIET`)
 * 2. `boot-builder.json` in the project root
 * 3. Built-in defaults
 */
export function loadProjectConfig(
  projectDir: string,
  env: NodeJS.ProcessEnv = process.env
): ProjectConfig {
  const config = getDefaultProjectConfig();

  const configPath = path.join(projectDir, PROJECT_CONFIG_FILENAME);
  if (fs.existsSync(configPath)) {
    Object.assign(config, parseProjectConfig(fs.readFileSync(configPath, "utf8"), configPath));
  }

  if (env.BOOT_BUILDER_CARGO) {
    config.cargoPath = env.BOOT_BUILDER_CARGO;
  }
  if (env.BOOT_BUILDER_QEMU) {
    config.qemuPath = env.BOOT_BUILDER_QEMU;
  }
  const quiet = envFlag(env.BOOT_BUILDER_QUIET);
  if (quiet !== undefined) {
    config.quiet = quiet;
  }

  return config;
}
