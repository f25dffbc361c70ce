import fs from "fs";
import path from "path";

import type { BuildType } from "./build-config";
import { BUILD_TYPES } from "./build-config";
import type { Logger } from "./debug";
import { silentLogger } from "./debug";
import { ConfigurationError } from "./errors";
import type { ToolRunner } from "./exec";
import { LocalToolRunner, describeToolFailure, toolSucceeded } from "./exec";
import { decompressInto, parseCpio } from "./archive";
import { rootfsPartitionOffset } from "./firmware";
import { extractBundle } from "./packager";
import { withLoopMount, withTempDir } from "./scope";

export type SizeCategory = "erts" | "otp" | "elixir" | "application" | "kernel" | "system";

export const SIZE_CATEGORIES: ReadonlyArray<SizeCategory> = [
  "erts",
  "otp",
  "elixir",
  "application",
  "kernel",
  "system",
];

export type ImageFormat = "directory" | "initramfs" | "kernel-bundle" | "container" | "disk-image";

export type SizedFile = Readonly<{ path: string; bytes: number }>;

export type OtpAppSize = Readonly<{ name: string; version: string; bytes: number }>;

export type ImageAnalysis = Readonly<{
  image: string;
  format: ImageFormat;
  /** unpacked size of every regular file */
  totalBytes: number;
  categories: Readonly<Record<SizeCategory, number>>;
  /** largest first */
  otpApps: ReadonlyArray<OtpAppSize>;
  largest: ReadonlyArray<SizedFile>;
}>;

export type AnalyzeOptions = {
  /** strategy that produced the image; inferred from `<type>-vm.tar*` names */
  type?: BuildType;
  runner?: ToolRunner;
  logger?: Logger;
  /** number of files listed in `largest` (default 10) */
  top?: number;
  /** where scratch directories are created (default: the OS temp dir) */
  workParent?: string;
  timeoutMs?: number;
};

const ERLANG_ROOTS = ["usr/local/lib/erlang/", "usr/lib/erlang/", "srv/erlang/"];
const ELIXIR_ROOTS = ["usr/local/lib/elixir/", "usr/lib/elixir/"];
const APPLICATION_ROOTS = ["opt/app/", "app/"];
/** applications shipped with Elixir rather than OTP */
const ELIXIR_APPS = new Set(["elixir", "logger", "mix", "iex", "eex", "ex_unit"]);
const ELIXIR_COMMANDS = new Set(["elixir", "elixirc", "iex", "mix"]);

const S_IFMT = 0o170000;
const S_IFREG = 0o100000;
const WHITEOUT_PREFIX = ".wh.";

/**
 * Split a release directory name such as `stdlib-5.2` into name and version.
 */
export function splitAppDir(dir: string): { name: string; version: string } {
  const match = /^(.+?)-(\d[^-]*)$/.exec(dir);
  return match ? { name: match[1], version: match[2] } : { name: dir, version: "" };
}

/**
 * Category of a file, by its path relative to the image root.
 */
export function classifyPath(file: string): SizeCategory {
  const rel = file.replace(/^\.?\/+/, "");
  if (APPLICATION_ROOTS.some((root) => rel.startsWith(root))) return "application";

  const erlangRoot = ERLANG_ROOTS.find((root) => rel.startsWith(root));
  if (erlangRoot) {
    const rest = rel.slice(erlangRoot.length).split("/");
    if (rest[0] !== "lib" || rest.length < 3) return "erts";
    return ELIXIR_APPS.has(splitAppDir(rest[1]).name) ? "elixir" : "otp";
  }

  if (ELIXIR_ROOTS.some((root) => rel.startsWith(root))) return "elixir";
  const dir = path.posix.dirname(rel);
  if ((dir === "bin" || dir.endsWith("/bin")) && ELIXIR_COMMANDS.has(path.posix.basename(rel))) {
    return "elixir";
  }
  return "system";
}

function otpAppOf(file: string): { name: string; version: string } | null {
  const rel = file.replace(/^\.?\/+/, "");
  const erlangRoot = ERLANG_ROOTS.find((root) => rel.startsWith(root));
  if (!erlangRoot) return null;
  const rest = rel.slice(erlangRoot.length).split("/");
  if (rest[0] !== "lib" || rest.length < 3) return null;
  const app = splitAppDir(rest[1]);
  return ELIXIR_APPS.has(app.name) ? null : app;
}

/**
 * Fold a file list into per-category totals, OTP application sizes and the
 * largest files.
 */
export function summarizeFiles(
  image: string,
  format: ImageFormat,
  files: readonly (SizedFile & { category?: SizeCategory })[],
  top = 10
): ImageAnalysis {
  const categories: Record<SizeCategory, number> = {
    erts: 0,
    otp: 0,
    elixir: 0,
    application: 0,
    kernel: 0,
    system: 0,
  };
  const apps = new Map<string, { name: string; version: string; bytes: number }>();
  let totalBytes = 0;

  for (const file of files) {
    totalBytes += file.bytes;
    categories[file.category ?? classifyPath(file.path)] += file.bytes;
    const app = file.category ? null : otpAppOf(file.path);
    if (!app) continue;
    const key = `${app.name}-${app.version}`;
    const entry = apps.get(key) ?? { ...app, bytes: 0 };
    entry.bytes += file.bytes;
    apps.set(key, entry);
  }

  const bySize = <T extends { bytes: number }>(a: T, b: T, nameA: string, nameB: string) =>
    b.bytes - a.bytes || nameA.localeCompare(nameB);

  return Object.freeze({
    image,
    format,
    totalBytes,
    categories: Object.freeze(categories),
    otpApps: Object.freeze(
      [...apps.values()].sort((a, b) => bySize(a, b, a.name, b.name)).map((app) => Object.freeze(app))
    ),
    largest: Object.freeze(
      [...files]
        .sort((a, b) => bySize(a, b, a.path, b.path))
        .slice(0, top)
        .map((file) => Object.freeze({ path: file.path, bytes: file.bytes }))
    ),
  });
}

/** regular files below `root`, with posix paths relative to it */
export function listTreeFiles(root: string): SizedFile[] {
  const out: SizedFile[] = [];
  const walk = (dir: string) => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) walk(full);
      else if (entry.isFile()) {
        out.push({ path: path.relative(root, full).split(path.sep).join("/"), bytes: fs.statSync(full).size });
      }
    }
  };
  walk(root);
  return out;
}

/** regular files of a newc cpio archive */
export function listCpioFiles(buf: Buffer): SizedFile[] {
  return parseCpio(buf)
    .filter((entry) => (entry.mode & S_IFMT) === S_IFREG)
    .map((entry) => ({ path: entry.name.replace(/^\.?\/+/, ""), bytes: entry.size }));
}

function inferType(image: string): BuildType | undefined {
  const base = path.basename(image);
  return BUILD_TYPES.find((type) => base.startsWith(`${type}-vm.tar`));
}

function detectFormat(image: string, type: BuildType | undefined): ImageFormat {
  if (fs.statSync(image).isDirectory()) return "directory";
  const base = path.basename(image);
  if (base.endsWith(".fw")) {
    throw new ConfigurationError("firmware archives are not analyzed; analyze the .img fwup writes", "image");
  }
  if (base.endsWith(".img")) return "disk-image";
  if (/\.cpio(\.(gz|xz))?$/.test(base)) return "initramfs";
  if (/\.(tar|tgz)(\.(gz|xz))?$/.test(base)) {
    return type === "alpine" ? "container" : "kernel-bundle";
  }
  throw new ConfigurationError(`cannot tell what kind of image ${base} is`, "image");
}

async function untar(runner: ToolRunner, archive: string, destDir: string, timeoutMs: number) {
  fs.mkdirSync(destDir, { recursive: true });
  const argv = ["tar", "-xf", archive, "-C", destDir];
  const result = await runner.run({ argv, timeoutMs });
  if (!toolSucceeded(result)) {
    throw new Error(`${describeToolFailure(argv, result)}: ${result.stderr.trim()}`);
  }
}

/** layer tarballs listed by a saved image's `manifest.json` */
export function manifestLayers(manifest: unknown): string[] {
  if (!Array.isArray(manifest) || manifest.length === 0) {
    throw new Error("manifest.json does not describe an image");
  }
  const first: unknown = manifest[0];
  const layers: unknown = typeof first === "object" && first !== null && "Layers" in first ? first.Layers : undefined;
  if (!Array.isArray(layers) || !layers.every((layer): layer is string => typeof layer === "string")) {
    throw new Error("manifest.json has no layer list");
  }
  return layers;
}

function applyWhiteouts(rootfs: string) {
  const walk = (dir: string) => {
    for (const name of fs.readdirSync(dir)) {
      if (!name.startsWith(WHITEOUT_PREFIX)) continue;
      const hidden = name.slice(WHITEOUT_PREFIX.length);
      // opaque markers only hide lower layers, which share this directory
      if (!hidden.startsWith(WHITEOUT_PREFIX)) {
        fs.rmSync(path.join(dir, hidden), { recursive: true, force: true });
      }
      fs.rmSync(path.join(dir, name), { force: true });
    }
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      if (entry.isDirectory()) walk(path.join(dir, entry.name));
    }
  };
  walk(rootfs);
}

async function containerFiles(tarPath: string, workDir: string, runner: ToolRunner, timeoutMs: number) {
  const imageDir = path.join(workDir, "image");
  const rootfs = path.join(workDir, "rootfs");
  await untar(runner, tarPath, imageDir, timeoutMs);

  const manifestPath = path.join(imageDir, "manifest.json");
  if (!fs.existsSync(manifestPath)) {
    throw new Error(`${path.basename(tarPath)} is not a saved container image (no manifest.json)`);
  }
  for (const layer of manifestLayers(JSON.parse(fs.readFileSync(manifestPath, "utf8")))) {
    await untar(runner, path.join(imageDir, layer), rootfs, timeoutMs);
    applyWhiteouts(rootfs);
  }
  fs.mkdirSync(rootfs, { recursive: true });
  return listTreeFiles(rootfs);
}

async function initramfsFiles(file: string, workDir: string, runner: ToolRunner, timeoutMs: number) {
  fs.mkdirSync(workDir, { recursive: true });
  const cpioPath = await decompressInto(file, workDir, { runner, stage: "package", timeoutMs });
  return listCpioFiles(fs.readFileSync(cpioPath));
}

async function bundleFiles(bundle: string, workDir: string, runner: ToolRunner, timeoutMs: number) {
  const extracted = await extractBundle(bundle, workDir, { runner, timeoutMs });
  const files: (SizedFile & { category?: SizeCategory })[] = [];
  for (const [name, file] of Object.entries(extracted)) {
    if (name.startsWith("initramfs.cpio")) {
      files.push(...(await initramfsFiles(file, path.join(workDir, "initramfs"), runner, timeoutMs)));
    } else if (name.startsWith("rootfs.ext")) {
      files.push(...(await withLoopMount(runner, file, async (mountPoint) => listTreeFiles(mountPoint), { timeoutMs })));
    } else {
      files.push({ path: name, bytes: fs.statSync(file).size, category: "kernel" });
    }
  }
  return files;
}

/**
 * Report where the bytes of a built image go: the runtime system, each OTP
 * application, Elixir, the application and everything else.
 *
 * Accepts an unpacked root directory, an initramfs, a kernel bundle, a saved
 * container image or a raw disk image. Tarballs are told apart by their
 * `<type>-vm.tar*` name unless `type` is given.
 */
export async function analyzeImage(image: string, options: AnalyzeOptions = {}): Promise<ImageAnalysis> {
  if (!fs.existsSync(image)) {
    throw new ConfigurationError(`${image} does not exist`, "image");
  }
  const logger = options.logger ?? silentLogger;
  const runner = options.runner ?? new LocalToolRunner(logger);
  const timeoutMs = options.timeoutMs ?? 120_000;
  const format = detectFormat(image, options.type ?? inferType(image));
  logger.debug("build", `analyzing ${image} as ${format}`);

  if (format === "directory") {
    return summarizeFiles(image, format, listTreeFiles(image), options.top);
  }

  const files = await withTempDir(
    async (workDir) => {
      switch (format) {
        case "initramfs":
          return initramfsFiles(image, workDir, runner, timeoutMs);
        case "kernel-bundle":
          return bundleFiles(image, workDir, runner, timeoutMs);
        case "container": {
          const tarPath = await decompressInto(image, workDir, { runner, stage: "package", timeoutMs });
          return containerFiles(tarPath, workDir, runner, timeoutMs);
        }
        case "disk-image": {
          const offset = rootfsPartitionOffset(image) ?? undefined;
          return withLoopMount(runner, image, async (mountPoint) => listTreeFiles(mountPoint), { offset, timeoutMs });
        }
      }
    },
    { prefix: "leanvm-analyze-", parent: options.workParent }
  );
  return summarizeFiles(image, format, files, options.top);
}

/**
 * Human-readable byte count: bytes, then KB, then MB with one decimal.
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export function formatAnalysis(analysis: ImageAnalysis): string[] {
  const lines = [`${path.basename(analysis.image)} (${analysis.format}): ${formatBytes(analysis.totalBytes)} unpacked`];
  for (const category of SIZE_CATEGORIES) {
    const bytes = analysis.categories[category];
    if (bytes > 0) lines.push(`  ${category.padEnd(12)} ${formatBytes(bytes)}`);
  }
  if (analysis.otpApps.length > 0) {
    lines.push("OTP applications:");
    for (const app of analysis.otpApps) {
      const label = app.version ? `${app.name} ${app.version}` : app.name;
      lines.push(`  ${label.padEnd(24)} ${formatBytes(app.bytes)}`);
    }
  }
  if (analysis.largest.length > 0) {
    lines.push("Largest files:");
    for (const file of analysis.largest) {
      lines.push(`  ${formatBytes(file.bytes).padStart(9)}  ${file.path}`);
    }
  }
  return lines;
}
