import { createLogger, parseDebugEnv, type Logger } from "./debug";
import { MetadataError, resolveDependencyPath } from "./metadata";
import { formatHelp, formatUsage, parseBuildArgs } from "./options";
import { resolvePaths } from "./paths";
import { runPipeline } from "./pipeline";
import { createProcessRunner, type ProcessRunner } from "./process-runner";
import { loadProjectConfig, ProjectConfigError } from "./project-config";

export type CliDeps = {
  /** project root (default: process.cwd()) */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** stdout writer for help and usage text */
  stdout?: (text: string) => void;
  /** stderr writer for progress, warnings and debug output */
  stderr?: (text: string) => void;
  /** process runner (default: child_process based) */
  runner?: ProcessRunner;
};

export function renderCliError(err: unknown, logger: Pick<Logger, "error">) {
  if (err instanceof ProjectConfigError || err instanceof MetadataError) {
    logger.error(err.message);
    return;
  }
  const message = err instanceof Error ? err.message : String(err);
  logger.error(`Internal error: ${message}`);
}

/**
 * Run one build invocation and return the process exit status.
 */
export async function main(argv: string[], deps: CliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(text));
  const stderr = deps.stderr ?? ((text: string) => process.stderr.write(text));
  const env = deps.env ?? process.env;
  const projectDir = deps.cwd ?? process.cwd();

  const outcome = parseBuildArgs(argv);
  if (outcome.type === "help") {
    stdout(`${formatHelp()}\n`);
    return 0;
  }
  if (outcome.type === "error") {
    stdout(`Error: ${outcome.error.message}\n`);
    stdout(`${formatUsage()}\n`);
    return 1;
  }
  const config = outcome.config;

  const debug = [...parseDebugEnv(env.BOOT_BUILDER_DEBUG)];
  let logger: Logger = createLogger({ debug, write: stderr });
  try {
    const project = loadProjectConfig(projectDir, env);
    logger = createLogger({ quiet: project.quiet, debug, write: stderr });
    logger.debug(
      "args",
      `optimized=${config.optimized} run=${config.shouldRun} gdb=${config.waitForDebugger}`
    );

    const runner = deps.runner ?? createProcessRunner(logger);

    // cargo metadata only works from the project root
    const dependency = await resolveDependencyPath(project.bootloaderDependency, {
      runner,
      cargoPath: project.cargoPath,
      cwd: projectDir,
      logger,
    });
    if (!dependency.ok) {
      logger.error(dependency.error.message);
      return 1;
    }

    const paths = resolvePaths(
      config,
      dependency.path,
      projectDir,
      project,
      dependency.rootPackageName
    );
    logger.debug("pipeline", `binary ${paths.expectedBinaryPath}`);

    return await runPipeline(config, paths, { runner, project, logger });
  } catch (err) {
    renderCliError(err, logger);
    return 1;
  }
}
