export type DebugComponent = "args" | "metadata" | "pipeline" | "exec";

export type DebugLogFn = (component: DebugComponent, message: string) => void;

/**
 * Debug configuration
 *
 * - `true`: enable all debug components
 * - `false`: disable all debug components
 * - `DebugComponent[]`: enable only the listed components
 */
export type DebugConfig = boolean | DebugComponent[];

const ALL_COMPONENTS: readonly DebugComponent[] = ["args", "metadata", "pipeline", "exec"];

function isDebugComponent(value: string): value is DebugComponent {
  return ALL_COMPONENTS.some((component) => component === value);
}

/**
 * Parse `BOOT_BUILDER_DEBUG` into a set of debug components.
 *
 * Accepts `1`, `true` or `all` for everything, otherwise a comma separated
 * list of component names. Unknown names are ignored.
 */
export function parseDebugEnv(value = process.env.BOOT_BUILDER_DEBUG): Set<DebugComponent> {
  const flags = new Set<DebugComponent>();
  if (!value) return flags;

  for (const raw of value.split(",")) {
    const token = raw.trim().toLowerCase();
    if (!token) continue;
    if (token === "1" || token === "true" || token === "all") {
      for (const component of ALL_COMPONENTS) flags.add(component);
      continue;
    }
    if (isDebugComponent(token)) {
      flags.add(token);
    }
  }

  return flags;
}

export function resolveDebugComponents(
  debug: DebugConfig | undefined,
  envFlags: Set<DebugComponent> = parseDebugEnv()
): Set<DebugComponent> {
  if (debug === undefined) return new Set(envFlags);
  if (debug === true) return new Set(ALL_COMPONENTS);
  if (debug === false) return new Set();
  return new Set(debug);
}

export type Logger = {
  /** progress output, silenced by `quiet` */
  log: (msg: string) => void;
  /** errors and warnings, always written */
  error: (msg: string) => void;
  /** component-scoped debug output */
  debug: DebugLogFn;
};

export function createLogger(options: {
  quiet?: boolean;
  debug?: DebugConfig;
  write?: (text: string) => void;
} = {}): Logger {
  const write = options.write ?? ((text: string) => process.stderr.write(text));
  const flags = resolveDebugComponents(options.debug);

  return {
    log: options.quiet ? () => {} : (msg: string) => write(`${msg}\n`),
    error: (msg: string) => write(`${msg}\n`),
    debug: (component, message) => {
      if (!flags.has(component)) return;
      write(`[boot-builder:${component}] ${message}\n`);
    },
  };
}
