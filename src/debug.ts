export type DebugFlag = "build" | "exec" | "validate" | "qemu";

/**
 * Debug configuration value
 *
 * - `true`: enable all debug components
 * - `false`: disable all debug components
 * - `string[]`: enable selected components
 */
export type DebugConfig = boolean | ReadonlyArray<DebugFlag>;

export const ALL_DEBUG_FLAGS: ReadonlyArray<DebugFlag> = ["build", "exec", "validate", "qemu"];

/**
 * Component identifier passed to debug log callbacks
 */
export type DebugComponent = DebugFlag | "warn" | "error";

/**
 * Debug log callback invoked with component + message
 */
export type DebugLogFn = (component: DebugComponent, message: string) => void;

/** progress callback used by builders and validators */
export type LogFn = (message: string) => void;

/**
 * Sinks threaded through build and validation code. Library code never
 * writes to the terminal itself.
 */
export type Logger = {
  /** progress messages */
  log: LogFn;
  /** non-fatal problems the user should see */
  warn: LogFn;
  /** component-tagged diagnostics, filtered by the enabled flags */
  debug: (component: DebugFlag, message: string) => void;
};

export function defaultDebugLog(component: DebugComponent, message: string) {
  process.stderr.write(`${formatDebugLine(component, message)}\n`);
}

export function formatDebugLine(component: DebugComponent, message: string) {
  const trimmed = stripTrailingNewline(message);
  return `[${component}] ${trimmed}`;
}

export function stripTrailingNewline(value: string) {
  if (value.endsWith("\r\n")) return value.slice(0, -2);
  if (value.endsWith("\n")) return value.slice(0, -1);
  return value;
}

function isDebugFlag(value: string): value is DebugFlag {
  return value === "build" || value === "exec" || value === "validate" || value === "qemu";
}

export function parseDebugEnv(value: string | undefined = process.env.LEANVM_DEBUG) {
  const flags = new Set<DebugFlag>();
  if (!value) return flags;

  // Allow: "build,exec" as well as "all" / "*".
  for (const entry of value.split(",")) {
    const raw = entry.trim();
    if (!raw) continue;

    if (raw === "*" || raw === "all" || raw === "1" || raw === "true") {
      for (const f of ALL_DEBUG_FLAGS) flags.add(f);
      continue;
    }

    if (isDebugFlag(raw)) {
      flags.add(raw);
    }
  }

  return flags;
}

export function resolveDebugFlags(config: DebugConfig | undefined, envFlags = parseDebugEnv()) {
  if (config === undefined) {
    return envFlags;
  }
  if (config === true) {
    return new Set<DebugFlag>(ALL_DEBUG_FLAGS);
  }
  if (config === false) {
    return new Set<DebugFlag>();
  }

  const out = new Set<DebugFlag>();
  for (const flag of config) {
    if (isDebugFlag(flag)) {
      out.add(flag);
    }
  }
  return out;
}

export function debugFlagsToArray(flags: Set<DebugFlag>): DebugFlag[] {
  return Array.from(flags).sort();
}

export type LoggerOptions = {
  /** print progress messages (default: true) */
  verbose?: boolean;
  /** debug components to enable (default: `LEANVM_DEBUG`) */
  debug?: DebugConfig;
  /** sink for every line (default: stderr) */
  sink?: DebugLogFn;
};

/**
 * Build a logger writing `[component] message` lines to `sink`.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? defaultDebugLog;
  const verbose = options.verbose ?? true;
  const flags = resolveDebugFlags(options.debug);

  return {
    log: verbose
      ? (message) => sink("build", message)
      : () => {},
    warn: (message) => sink("warn", message),
    debug: (component, message) => {
      if (flags.has(component)) sink(component, message);
    },
  };
}

/** logger that drops everything */
export const silentLogger: Logger = {
  log: () => {},
  warn: () => {},
  debug: () => {},
};
