import fs from "fs";
import path from "path";

import type { RetentionFlag, RetentionFlags } from "./build-config";
import { RETENTION_FLAGS } from "./build-config";
import type { LogFn } from "./debug";
import type { ToolRunner } from "./exec";
import { describeToolFailure, toolSucceeded } from "./exec";

// ---------------------------------------------------------------------------
// Component tables
// ---------------------------------------------------------------------------

/** applications never needed by a headless runtime image */
export const ALWAYS_REMOVE: ReadonlyArray<string> = Object.freeze([
  "diameter",
  "eldap",
  "erl_docgen",
  "et",
  "ftp",
  "jinterface",
  "megaco",
  "odbc",
  "snmp",
  "tftp",
  "wx",
  "xmerl",
  "debugger",
  "observer",
  "reltool",
  "common_test",
  "eunit",
  "dialyzer",
  "edoc",
  "erl_interface",
  "parsetools",
  "tools",
]);

/** applications removed unless their retention flag is set */
export const CONDITIONAL_COMPONENTS: Readonly<Record<RetentionFlag, ReadonlyArray<string>>> =
  Object.freeze({
    ssh: Object.freeze(["ssh"]),
    ssl: Object.freeze(["ssl", "public_key"]),
    http: Object.freeze(["inets"]),
    mnesia: Object.freeze(["mnesia"]),
    devTools: Object.freeze(["runtime_tools", "sasl", "syntax_tools"]),
  });

/** applications the runtime cannot start without */
export const NEVER_REMOVE: ReadonlyArray<string> = Object.freeze([
  "kernel",
  "stdlib",
  "compiler",
  "crypto",
  "erts",
  "elixir",
  "logger",
  "iex",
  "mix",
]);

/** approximate installed size in `mb` */
export const COMPONENT_SIZES_MB: Readonly<Record<string, number>> = Object.freeze({
  wx: 15.2,
  debugger: 0.8,
  observer: 2.1,
  dialyzer: 3.5,
  common_test: 4.2,
  eunit: 1.1,
  tools: 2.3,
  xmerl: 2.8,
  eldap: 0.5,
  diameter: 3.1,
  snmp: 4.5,
  megaco: 6.2,
  ssh: 2.1,
  ssl: 3.8,
  inets: 1.9,
  mnesia: 2.4,
});

export const DEFAULT_COMPONENT_SIZE_MB = 0.5;

/** runtime applications a retained application needs at start */
const COMPONENT_DEPENDENCIES: Readonly<Record<string, ReadonlyArray<string>>> = Object.freeze({
  ssl: ["public_key", "crypto"],
  ssh: ["public_key", "crypto"],
  public_key: ["crypto"],
  inets: [],
  observer: ["wx", "runtime_tools", "et"],
  debugger: ["wx"],
  et: ["wx", "runtime_tools"],
  reltool: ["wx", "sasl", "tools"],
  common_test: ["tools", "xmerl", "ssh", "ssl"],
  dialyzer: ["compiler", "syntax_tools"],
  edoc: ["xmerl", "syntax_tools"],
  diameter: ["ssl"],
  eldap: ["ssl"],
  ftp: ["ssl"],
});

export function componentSizeMb(name: string): number {
  return COMPONENT_SIZES_MB[name] ?? DEFAULT_COMPONENT_SIZE_MB;
}

// ---------------------------------------------------------------------------
// Decision
// ---------------------------------------------------------------------------

/**
 * Partition of runtime components for one build.
 */
export type RetentionDecision = Readonly<{
  /** protected components, always kept */
  required: ReadonlyArray<string>;
  /** optional components kept (flagged, promoted, or unstripped) */
  retained: ReadonlyArray<string>;
  /** components deleted from the image, in removal order */
  removed: ReadonlyArray<string>;
  /** components kept only because the application declared them */
  promoted: ReadonlyArray<string>;
  warnings: ReadonlyArray<string>;
}>;

export type RetentionOptions = {
  /** when false nothing is removed (default: true) */
  stripModules?: boolean;
  /** runtime applications the packaged application declares */
  declaredApplications?: ReadonlyArray<string>;
  /** called once per promotion warning */
  warn?: LogFn;
};

/** every component the tables know about, in table order */
function optionalComponents(): string[] {
  const out = [...ALWAYS_REMOVE];
  for (const flag of RETENTION_FLAGS) {
    out.push(...CONDITIONAL_COMPONENTS[flag]);
  }
  return out;
}

/**
 * Default removal list for a flag set: the always-remove table followed by
 * every conditional group whose flag is unset. Never-remove entries are
 * excluded.
 */
export function applicationsToRemove(flags: Partial<RetentionFlags> = {}): string[] {
  const removed = [...ALWAYS_REMOVE];
  for (const flag of RETENTION_FLAGS) {
    if (flags[flag] === true) continue;
    removed.push(...CONDITIONAL_COMPONENTS[flag]);
  }
  const protectedSet = new Set(NEVER_REMOVE);
  return removed.filter((name) => !protectedSet.has(name));
}

function dependencyClosure(roots: Iterable<string>): Set<string> {
  const seen = new Set<string>();
  const queue = [...roots];
  while (queue.length > 0) {
    const name = queue.shift();
    if (name === undefined || seen.has(name)) continue;
    seen.add(name);
    queue.push(...(COMPONENT_DEPENDENCIES[name] ?? []));
  }
  return seen;
}

/**
 * Compute which runtime components an image keeps.
 *
 * Applications the packaged application declares are promoted to retained
 * along with what they depend on, with one warning per promoted component.
 */
export function decideRetention(
  flags: Partial<RetentionFlags> = {},
  options: RetentionOptions = {}
): RetentionDecision {
  const required = [...NEVER_REMOVE];
  const protectedSet = new Set(required);
  const known = optionalComponents();

  if (options.stripModules === false) {
    return freezeDecision({
      required,
      retained: known.filter((name) => !protectedSet.has(name)),
      removed: [],
      promoted: [],
      warnings: [],
    });
  }

  const defaultRemoved = applicationsToRemove(flags);
  const needed = dependencyClosure(options.declaredApplications ?? []);

  const promoted: string[] = [];
  const warnings: string[] = [];
  const removed: string[] = [];
  for (const name of defaultRemoved) {
    if (needed.has(name)) {
      promoted.push(name);
      const warning = `keeping ${name}: required by the application`;
      warnings.push(warning);
      options.warn?.(warning);
      continue;
    }
    removed.push(name);
  }

  const removedSet = new Set(removed);
  const retained = known.filter((name) => !removedSet.has(name) && !protectedSet.has(name));

  return freezeDecision({ required, retained, removed, promoted, warnings });
}

function freezeDecision(decision: {
  required: string[];
  retained: string[];
  removed: string[];
  promoted: string[];
  warnings: string[];
}): RetentionDecision {
  return Object.freeze({
    required: Object.freeze(decision.required),
    retained: Object.freeze(decision.retained),
    removed: Object.freeze(decision.removed),
    promoted: Object.freeze(decision.promoted),
    warnings: Object.freeze(decision.warnings),
  });
}

/**
 * Read retention flags from loosely keyed input such as CLI options or
 * config files. Accepts `ssh`, `keepSsh` and `keep_ssh` spellings; unknown
 * keys are ignored.
 */
export function parseRetentionFlags(input: Record<string, unknown>): Partial<RetentionFlags> {
  const aliases: Record<string, RetentionFlag> = {};
  for (const flag of RETENTION_FLAGS) {
    const snake = flag.replace(/[A-Z]/g, (ch) => `_${ch.toLowerCase()}`);
    const capital = flag[0].toUpperCase() + flag.slice(1);
    aliases[flag] = flag;
    aliases[snake] = flag;
    aliases[`keep${capital}`] = flag;
    aliases[`keep_${snake}`] = flag;
  }

  const out: Partial<RetentionFlags> = {};
  for (const [key, value] of Object.entries(input)) {
    const flag = aliases[key];
    if (flag === undefined || typeof value !== "boolean") continue;
    out[flag] = value;
  }
  return out;
}

/**
 * Estimated savings of stripping with `flags`.
 */
export function estimateSavings(flags: Partial<RetentionFlags> = {}) {
  const removed = applicationsToRemove(flags);
  const savedMb = removed.reduce((total, name) => total + componentSizeMb(name), 0);
  return {
    savedMb: Math.round(savedMb * 10) / 10,
    removedCount: removed.length,
  };
}

// ---------------------------------------------------------------------------
// Application introspection
// ---------------------------------------------------------------------------

function parseAtomList(body: string): string[] {
  const out: string[] = [];
  for (const match of body.matchAll(/:([a-z_][a-zA-Z0-9_]*)/g)) {
    out.push(match[1]);
  }
  return out;
}

/**
 * Runtime applications listed in the project's `mix.exs` under
 * `extra_applications:` or `applications:`.
 */
export function detectAppApplications(appPath: string): string[] {
  const mixFile = path.join(appPath, "mix.exs");
  if (!fs.existsSync(mixFile)) return [];

  const source = fs.readFileSync(mixFile, "utf8");
  const found = new Set<string>();
  for (const match of source.matchAll(/\b(?:extra_)?applications:\s*\[([^\]]*)\]/g)) {
    for (const name of parseAtomList(match[1])) {
      found.add(name);
    }
  }
  return Array.from(found).sort();
}

// ---------------------------------------------------------------------------
// Staging tree pruning
// ---------------------------------------------------------------------------

const PRUNED_DIR_NAMES = new Set(["doc", "src", "examples"]);
const PRUNED_FILE_PATTERN = /\.(html|pdf|md)$/;

export type PruneResult = {
  /** paths deleted, relative to the pruned root */
  removedPaths: string[];
  bytesFreed: number;
};

function treeSize(target: string): number {
  const stat = fs.lstatSync(target);
  if (!stat.isDirectory()) return stat.size;
  let total = 0;
  for (const entry of fs.readdirSync(target)) {
    total += treeSize(path.join(target, entry));
  }
  return total;
}

function removeTracked(root: string, target: string, result: PruneResult) {
  result.bytesFreed += treeSize(target);
  fs.rmSync(target, { recursive: true, force: true });
  result.removedPaths.push(path.relative(root, target));
}

/**
 * Delete removed applications (`lib/<name>-<version>`) and documentation or
 * source files from an installed runtime tree rooted at `erlangRoot`.
 */
export function pruneRuntime(erlangRoot: string, decision: RetentionDecision): PruneResult {
  const result: PruneResult = { removedPaths: [], bytesFreed: 0 };
  const libDir = path.join(erlangRoot, "lib");
  const removed = new Set(decision.removed);

  if (fs.existsSync(libDir)) {
    for (const entry of fs.readdirSync(libDir).sort()) {
      const dash = entry.lastIndexOf("-");
      const name = dash > 0 ? entry.slice(0, dash) : entry;
      if (removed.has(name)) {
        removeTracked(erlangRoot, path.join(libDir, entry), result);
      }
    }
  }

  const walk = (dir: string) => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (PRUNED_DIR_NAMES.has(entry.name)) {
          removeTracked(erlangRoot, full, result);
        } else {
          walk(full);
        }
      } else if (entry.isFile() && PRUNED_FILE_PATTERN.test(entry.name)) {
        removeTracked(erlangRoot, full, result);
      }
    }
  };
  if (fs.existsSync(erlangRoot)) walk(erlangRoot);

  return result;
}

// ---------------------------------------------------------------------------
// Binary and BEAM stripping
// ---------------------------------------------------------------------------

export type StripResult = {
  /** files rewritten, relative to the stripped root */
  files: string[];
  bytesFreed: number;
};

export type BinaryStripResult = StripResult & {
  /** `path: reason` for binaries the host strip could not handle */
  failed: string[];
};

/** chunks the loader needs; debug info, docs and compile info are dropped */
export const BEAM_KEPT_CHUNKS: ReadonlySet<string> = new Set([
  "AtU8",
  "Atom",
  "Code",
  "StrT",
  "ImpT",
  "ExpT",
  "FunT",
  "LitT",
  "LocT",
  "Line",
  "Attr",
  "Type",
  "Meta",
]);

export const STRIP_ARGS: ReadonlyArray<string> = [
  "--strip-all",
  "--remove-section=.comment",
  "--remove-section=.note",
];

const ELF_MAGIC = Buffer.from([0x7f, 0x45, 0x4c, 0x46]);

function regularFiles(root: string): string[] {
  const out: string[] = [];
  const walk = (dir: string) => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) walk(full);
      else if (entry.isFile()) out.push(full);
    }
  };
  if (fs.existsSync(root)) walk(root);
  return out.sort();
}

export function isElfFile(file: string): boolean {
  const fd = fs.openSync(file, "r");
  try {
    const magic = Buffer.alloc(4);
    return fs.readSync(fd, magic, 0, 4, 0) === 4 && magic.equals(ELF_MAGIC);
  } finally {
    fs.closeSync(fd);
  }
}

/**
 * Rebuild a BEAM file keeping only `BEAM_KEPT_CHUNKS`. Returns `null` for
 * anything that is not an uncompressed, well-formed BEAM container.
 */
export function stripBeamChunks(beam: Buffer): Buffer | null {
  if (beam.length < 12 || beam.toString("latin1", 0, 4) !== "FOR1" || beam.toString("latin1", 8, 12) !== "BEAM") {
    return null;
  }
  const end = 8 + beam.readUInt32BE(4);
  if (end > beam.length) return null;

  const kept: Buffer[] = [];
  let offset = 12;
  while (offset + 8 <= end) {
    const id = beam.toString("latin1", offset, offset + 4);
    const size = beam.readUInt32BE(offset + 4);
    const dataEnd = offset + 8 + size;
    if (dataEnd > end) return null;
    const padding = (4 - (size % 4)) % 4;
    if (BEAM_KEPT_CHUNKS.has(id)) {
      kept.push(beam.subarray(offset, dataEnd), Buffer.alloc(padding));
    }
    offset = dataEnd + padding;
  }

  const body = Buffer.concat(kept);
  const header = Buffer.alloc(12);
  header.write("FOR1", 0, "latin1");
  header.writeUInt32BE(4 + body.length, 4);
  header.write("BEAM", 8, "latin1");
  return Buffer.concat([header, body]);
}

/**
 * Strip every `.beam` file below `root` in place.
 */
export function stripBeamFiles(root: string): StripResult {
  const result: StripResult = { files: [], bytesFreed: 0 };
  for (const file of regularFiles(root)) {
    if (!file.endsWith(".beam")) continue;
    const original = fs.readFileSync(file);
    const stripped = stripBeamChunks(original);
    if (!stripped || stripped.length >= original.length) continue;
    fs.writeFileSync(file, stripped);
    result.files.push(path.relative(root, file));
    result.bytesFreed += original.length - stripped.length;
  }
  return result;
}

/**
 * Run `strip` over every ELF file below `root`. Binaries the host tool
 * rejects (typically a foreign architecture) are listed in `failed` and
 * left as they are.
 */
export async function stripElfBinaries(
  root: string,
  runner: ToolRunner,
  options: { timeoutMs?: number } = {}
): Promise<BinaryStripResult> {
  const result: BinaryStripResult = { files: [], bytesFreed: 0, failed: [] };
  for (const file of regularFiles(root)) {
    if (!isElfFile(file)) continue;
    const rel = path.relative(root, file);
    const before = fs.statSync(file).size;
    const argv = ["strip", ...STRIP_ARGS, file];
    const run = await runner.run({ argv, timeoutMs: options.timeoutMs ?? 60_000 });
    if (!toolSucceeded(run)) {
      const stderr = run.stderr.trim();
      result.failed.push(`${rel}: ${describeToolFailure(argv, run)}${stderr ? `: ${stderr}` : ""}`);
      continue;
    }
    result.files.push(rel);
    result.bytesFreed += Math.max(0, before - fs.statSync(file).size);
  }
  return result;
}

/**
 * Shell commands stripping a runtime inside a container image: removed
 * applications and documentation go, binaries and BEAM files are stripped.
 */
export function dockerfileStripCommands(
  decision: RetentionDecision,
  erlangRoot = "/usr/local/lib/erlang",
  elixirRoot = "/usr/local/lib/elixir"
): string[] {
  if (decision.removed.length === 0) return [];
  const targets = decision.removed.map((name) => `${erlangRoot}/lib/${name}-*`);
  return [
    `RUN rm -rf ${targets.join(" ")}`,
    `RUN find ${erlangRoot} \\( -name doc -o -name src -o -name examples \\) -type d -prune -exec rm -rf {} + && \\`,
    `    find ${erlangRoot} \\( -name '*.html' -o -name '*.pdf' -o -name '*.md' \\) -type f -delete`,
    // strip exits non-zero on the shell scripts among the candidates
    "RUN apk add --no-cache binutils && \\",
    `    (find ${erlangRoot} -type f \\( -perm -u+x -o -name '*.so' \\) -exec strip ${STRIP_ARGS.join(" ")} {} + 2>/dev/null || true)`,
    beamStripCommand(`${elixirRoot}/lib/*/ebin/*.beam`, erlangRoot),
  ];
}

/**
 * `RUN` line stripping the BEAM files matching `pattern`, and the whole
 * release under `releaseRoot` when given, with the runtime's own `beam_lib`.
 */
export function beamStripCommand(pattern: string, releaseRoot?: string): string {
  const steps = [
    ...(releaseRoot ? [`{ok, _} = beam_lib:strip_release("${releaseRoot}")`] : []),
    `{ok, _} = beam_lib:strip_files(filelib:wildcard("${pattern}"))`,
    "halt()",
  ];
  return `RUN erl -noshell -eval '${steps.join(", ")}.'`;
}
