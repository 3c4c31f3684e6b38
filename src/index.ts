export { main, renderCliError, type CliDeps } from "./cli";
export {
  parseBuildArgs,
  formatHelp,
  formatUsage,
  UsageError,
  DEFAULT_BUILD_CONFIG,
  type BuildConfig,
  type BuildOption,
  type ParseOutcome,
  type UsageErrorKind,
} from "./options";
export {
  resolveDependencyPath,
  parseDependencyGraph,
  findDependencyPackageId,
  findManifestDir,
  findRootPackageName,
  MetadataError,
  MetadataIntegrityError,
  type DependencyGraph,
  type DependencyNode,
  type DependencyEdge,
  type PackageInfo,
  type MetadataResult,
} from "./metadata";
export { resolvePaths, bootArtifacts, type ResolvedPaths, type BootArtifacts } from "./paths";
export {
  runPipeline,
  nextStage,
  buildCompileArgs,
  buildImageArgs,
  buildEmulatorArgs,
  type Stage,
  type PipelineOptions,
} from "./pipeline";
export {
  createProcessRunner,
  type ProcessRunner,
  type ProcessResult,
  type CapturedProcessResult,
} from "./process-runner";
export {
  loadProjectConfig,
  parseProjectConfig,
  getDefaultProjectConfig,
  ProjectConfigError,
  PROJECT_CONFIG_FILENAME,
  type ProjectConfig,
} from "./project-config";
export { createLogger, parseDebugEnv, type Logger, type DebugComponent } from "./debug";
