import path from "path";

import type { BuildConfig } from "./options";
import { getDefaultProjectConfig, type ProjectConfig } from "./project-config";

/** Absolute paths used by the build stages. */
export type ResolvedPaths = {
  projectDir: string;
  manifestPath: string;
  targetDir: string;
  outDir: string;
  expectedBinaryPath: string;
  dependencyRootDir: string;
  binaryName: string;
};

/** Disk images written by the bootloader's builder. */
export type BootArtifacts = {
  biosImage: string;
  uefiImage: string;
  uefiEfi: string;
  uefiFat: string;
};

type PathSettings = Pick<ProjectConfig, "binaryName" | "targetTriple" | "manifestFile">;

export function profileDirName(config: BuildConfig): "debug" | "release" {
  return config.optimized ? "release" : "debug";
}

/**
 * Derive the paths used by the build stages.
 *
 * The binary name is taken from `project.binaryName`, then the root package
 * name reported by cargo, then the project directory name.
 */
export function resolvePaths(
  config: BuildConfig,
  dependencyRootDir: string,
  projectDir: string,
  project: PathSettings = getDefaultProjectConfig(),
  rootPackageName: string | null = null
): ResolvedPaths {
  const root = path.resolve(projectDir);
  const binaryName = project.binaryName ?? rootPackageName ?? path.basename(root);
  const targetDir = path.join(root, "target");

  return {
    projectDir: root,
    manifestPath: path.join(root, project.manifestFile),
    targetDir,
    outDir: path.join(root, "out"),
    expectedBinaryPath: path.join(targetDir, project.targetTriple, profileDirName(config), binaryName),
    dependencyRootDir: path.resolve(dependencyRootDir),
    binaryName,
  };
}

export function bootArtifacts(outDir: string, binaryName: string): BootArtifacts {
  return {
    biosImage: path.join(outDir, `boot-bios-${binaryName}.img`),
    uefiImage: path.join(outDir, `boot-uefi-${binaryName}.img`),
    uefiEfi: path.join(outDir, `boot-uefi-${binaryName}.efi`),
    uefiFat: path.join(outDir, `boot-uefi-${binaryName}.fat`),
  };
}
