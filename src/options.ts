/** Validated build options for a single invocation. */
export type BuildConfig = {
  /** build with `--release` (optimizations, no debug info) */
  readonly optimized: boolean;
  /** boot the image in QEMU after a successful build */
  readonly shouldRun: boolean;
  /** make QEMU wait for a gdb connection before executing */
  readonly waitForDebugger: boolean;
};

export type BuildOption = "release" | "run" | "gdb" | "help";

export type UsageErrorKind = "unknown-option" | "duplicate-option" | "invalid-combination";

export class UsageError extends Error {
  constructor(
    readonly kind: UsageErrorKind,
    readonly token: string,
    message: string
  ) {
    super(message);
    this.name = "UsageError";
  }
}

export type ParseOutcome =
  | { type: "config"; config: BuildConfig }
  | { type: "help" }
  | { type: "error"; error: UsageError };

export const DEFAULT_BUILD_CONFIG: BuildConfig = Object.freeze({
  optimized: false,
  shouldRun: false,
  waitForDebugger: false,
});

export function formatUsage(): string {
  return [
    "Usage: boot-builder [options...]",
    "  available options: release, run, gdb, help",
  ].join("\n");
}

export function formatHelp(): string {
  return [
    "Usage: boot-builder [options...]",
    "  options:",
    "     release",
    "         Build the kernel with 'cargo build --release'.",
    "         This enables optimizations and doesn't emit debug info.",
    "     run",
    "         After building the disk image, run it in QEMU.",
    "         QEMU needs to be installed for this to work.",
    "     gdb",
    "         Tells QEMU to wait for a connection from gdb at port 1234",
    "         before starting execution.",
    "         Must be used in conjunction with 'run'.",
    "     help",
    "         Prints this help screen, and then exits.",
    "  configuration:",
    "     boot-builder.json in the project root may set binaryName, targetTriple,",
    "     bootloaderDependency, cargoPath, qemuPath and biosPath.",
    "     targetTriple defaults to x86_64-unknown-none; kernels built for a custom",
    "     target JSON must set targetTriple to that file's name without '.json'.",
  ].join("\n");
}

/**
 * Parse the command-line arguments of a build.
 *
 * Arguments are consumed left to right. `help` wins as soon as it is seen,
 * unless an earlier argument already failed.
 */
export function parseBuildArgs(argv: readonly string[]): ParseOutcome {
  const seen = new Set<BuildOption>();

  const fail = (kind: UsageErrorKind, token: string, message: string): ParseOutcome => ({
    type: "error",
    error: new UsageError(kind, token, message),
  });

  for (const arg of argv) {
    switch (arg) {
      case "help":
        return { type: "help" };
      case "release":
      case "run":
      case "gdb":
        if (seen.has(arg)) {
          return fail("duplicate-option", arg, `Option '${arg}' specified twice`);
        }
        seen.add(arg);
        break;
      default:
        return fail("unknown-option", arg, `Unknown argument '${arg}'`);
    }
  }

  if (seen.has("gdb") && !seen.has("run")) {
    return fail(
      "invalid-combination",
      "gdb",
      "Option 'gdb' specified but not 'run'\n" +
        "       'gdb' must always be used in conjunction with 'run'."
    );
  }

  return {
    type: "config",
    config: Object.freeze({
      optimized: seen.has("release"),
      shouldRun: seen.has("run"),
      waitForDebugger: seen.has("gdb"),
    }),
  };
}
