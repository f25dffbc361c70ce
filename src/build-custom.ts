/**
 * Custom image builder.
 *
 * Compiles a minimal kernel and a static BusyBox from pinned sources, lifts
 * the runtime out of a throwaway container, and packs everything into an
 * initramfs booted directly by the kernel.
 *
 * External tool dependencies:
 *   - make, gcc, flex, bison, bc: kernel and BusyBox builds
 *   - tar, xz, bzip2: source archives and initramfs compression
 *   - strip: runtime binaries, when stripping is enabled
 *   - docker or podman: runtime extraction
 */

import fs from "fs";
import path from "path";

import { compressFile, writeCpioArchive } from "./archive";
import type { BuildConfig } from "./build-config";
import { withContainer } from "./container";
import { StageFailure } from "./errors";
import type { BuildStage } from "./errors";
import { runStep } from "./exec";
import { fetchCached } from "./fetch";
import {
  APP_DIR,
  ELIXIR_ROOT,
  ERLANG_ROOT,
  generateAppStartScript,
  generateInitScript,
  generateRuntimeWrappers,
  writeExecutable,
} from "./init-script";
import {
  generateKernelProfile,
  kbuildArch,
  kernelImagePath,
  kernelMakeTarget,
  renderKernelConfig,
} from "./kernel-config";
import { pruneRuntime, stripBeamFiles, stripElfBinaries } from "./otp-stripper";
import type { AssemblyOutput, BuildContext, BuildStrategy, ToolRequirement } from "./strategy";
import { runStage } from "./strategy";

// ---------------------------------------------------------------------------
// Pinned sources
// ---------------------------------------------------------------------------

export const DEFAULT_KERNEL_VERSION = "6.6.58";
export const DEFAULT_BUSYBOX_VERSION = "1.36.1";
export const DEFAULT_RUNTIME_IMAGE = "elixir:1.15-alpine";

export function kernelSourceUrl(version: string) {
  const major = version.split(".")[0];
  return `https://cdn.kernel.org/pub/linux/kernel/v${major}.x/linux-${version}.tar.xz`;
}

export function busyboxSourceUrl(version: string) {
  return `https://busybox.net/downloads/busybox-${version}.tar.bz2`;
}

/** directories copied out of the runtime image */
export const RUNTIME_PATHS: ReadonlyArray<string> = [
  ERLANG_ROOT,
  ELIXIR_ROOT,
  "/usr/local/bin",
  "/lib",
  "/usr/lib",
];

/** directories init expects to exist before mounting */
const ROOT_DIRS = ["proc", "sys", "dev", "tmp", "run", "root", "etc"];

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function sourceDirName(archive: string) {
  return path.basename(archive).replace(/\.tar\.(xz|bz2|gz)$/, "");
}

async function fetchAndExtract(ctx: BuildContext, stage: BuildStage, url: string): Promise<string> {
  const archive = await fetchCached(url, ctx.cacheDir, {
    fetcher: ctx.fetcher,
    timeoutMs: ctx.timeouts.downloadMs,
    log: ctx.logger.log,
  });

  const srcParent = path.join(ctx.workDir, "src");
  fs.mkdirSync(srcParent, { recursive: true });
  await runStep(ctx.runner, stage, {
    argv: ["tar", "-xf", archive, "-C", srcParent],
    timeoutMs: ctx.timeouts.extractMs,
  });

  const srcDir = path.join(srcParent, sourceDirName(archive));
  if (!fs.existsSync(srcDir)) {
    throw new StageFailure(stage, `${path.basename(archive)} did not unpack to ${path.basename(srcDir)}`);
  }
  return srcDir;
}

/**
 * Turn a BusyBox defconfig into a static build.
 */
export function enableStaticBusybox(config: string): string {
  if (config.includes("# CONFIG_STATIC is not set")) {
    return config.replace("# CONFIG_STATIC is not set", "CONFIG_STATIC=y");
  }
  if (/^CONFIG_STATIC=y$/m.test(config)) return config;
  return `${config.trimEnd()}\nCONFIG_STATIC=y\n`;
}

/**
 * Keep only shared objects (and the dynamic loader) in a library directory
 * copied from the runtime image.
 */
export function pruneSharedLibraries(libDir: string): void {
  if (!fs.existsSync(libDir)) return;
  for (const entry of fs.readdirSync(libDir, { withFileTypes: true })) {
    const keep = !entry.isDirectory() && /^(ld-|lib).*\.so(\.|$)/.test(entry.name);
    if (!keep) {
      fs.rmSync(path.join(libDir, entry.name), { recursive: true, force: true });
    }
  }
}

// ---------------------------------------------------------------------------
// Stages
// ---------------------------------------------------------------------------

async function buildKernel(ctx: BuildContext, outDir: string): Promise<string> {
  const { arch } = ctx.config.vmOptions;
  const version = ctx.config.vmOptions.kernelVersion ?? DEFAULT_KERNEL_VERSION;
  const srcDir = await fetchAndExtract(ctx, "kernel", kernelSourceUrl(version));
  const make = (...args: string[]) => ["make", `ARCH=${kbuildArch(arch)}`, ...args];

  await runStep(ctx.runner, "kernel", {
    argv: make("tinyconfig"),
    cwd: srcDir,
    timeoutMs: ctx.timeouts.configureMs,
  });

  const fragment = renderKernelConfig(generateKernelProfile({ arch, variant: "qemu" }));
  fs.appendFileSync(path.join(srcDir, ".config"), `\n${fragment}`);

  await runStep(ctx.runner, "kernel", {
    argv: make("olddefconfig"),
    cwd: srcDir,
    timeoutMs: ctx.timeouts.configureMs,
  });
  await runStep(ctx.runner, "kernel", {
    argv: make(`-j${ctx.jobs}`, kernelMakeTarget(arch)),
    cwd: srcDir,
    timeoutMs: ctx.timeouts.compileMs,
  });

  const image = path.join(srcDir, kernelImagePath(arch));
  if (!fs.existsSync(image)) {
    throw new StageFailure("kernel", `build finished without ${kernelImagePath(arch)}`);
  }
  const dest = path.join(outDir, path.basename(image));
  fs.copyFileSync(image, dest);
  return dest;
}

async function buildUserland(ctx: BuildContext, rootDir: string): Promise<void> {
  const version = ctx.config.vmOptions.busyboxVersion ?? DEFAULT_BUSYBOX_VERSION;
  const srcDir = await fetchAndExtract(ctx, "userland", busyboxSourceUrl(version));

  await runStep(ctx.runner, "userland", {
    argv: ["make", "defconfig"],
    cwd: srcDir,
    timeoutMs: ctx.timeouts.configureMs,
  });

  const configPath = path.join(srcDir, ".config");
  if (!fs.existsSync(configPath)) {
    throw new StageFailure("userland", "make defconfig produced no .config");
  }
  fs.writeFileSync(configPath, enableStaticBusybox(fs.readFileSync(configPath, "utf8")));

  await runStep(ctx.runner, "userland", {
    argv: ["make", `-j${ctx.jobs}`],
    cwd: srcDir,
    timeoutMs: ctx.timeouts.compileMs,
  });
  await runStep(ctx.runner, "userland", {
    argv: ["make", `CONFIG_PREFIX=${rootDir}`, "install"],
    cwd: srcDir,
    timeoutMs: ctx.timeouts.installMs,
  });

  if (!fs.existsSync(path.join(rootDir, "bin", "busybox"))) {
    throw new StageFailure("userland", "busybox was not installed");
  }
}

async function installRuntime(ctx: BuildContext, rootDir: string): Promise<void> {
  const engine = ctx.containers();
  const image = ctx.config.vmOptions.runtimeImage ?? DEFAULT_RUNTIME_IMAGE;
  ctx.logger.log(`Copying runtime from ${image}`);

  await withContainer(engine, image, async (containerId) => {
    for (const source of RUNTIME_PATHS) {
      const dest = path.join(rootDir, source);
      fs.mkdirSync(path.dirname(dest), { recursive: true });
      await engine.copyFrom(containerId, source, dest);
    }
  });

  pruneSharedLibraries(path.join(rootDir, "lib"));
  pruneSharedLibraries(path.join(rootDir, "usr", "lib"));

  if (!fs.existsSync(path.join(rootDir, ERLANG_ROOT, "bin"))) {
    throw new StageFailure("runtime", `${image} has no runtime under ${ERLANG_ROOT}`);
  }

  if (ctx.config.stripModules) {
    await stripRuntime(ctx, rootDir);
  }
}

function formatMb(bytes: number) {
  return (bytes / 1024 / 1024).toFixed(1);
}

async function stripRuntime(ctx: BuildContext, rootDir: string): Promise<void> {
  const erlangDir = path.join(rootDir, ERLANG_ROOT);
  const pruned = pruneRuntime(erlangDir, ctx.decision);
  ctx.logger.log(`Removed ${ctx.decision.removed.length} runtime components (${formatMb(pruned.bytesFreed)} MB)`);
  ctx.logger.debug("build", `pruned: ${pruned.removedPaths.join(", ")}`);

  let beamFiles = 0;
  let beamBytes = 0;
  for (const dir of [erlangDir, path.join(rootDir, ELIXIR_ROOT)]) {
    const stripped = stripBeamFiles(dir);
    beamFiles += stripped.files.length;
    beamBytes += stripped.bytesFreed;
  }

  const binaries = await stripElfBinaries(erlangDir, ctx.runner, { timeoutMs: ctx.timeouts.installMs });
  for (const failure of binaries.failed) {
    ctx.logger.warn(`binary left unstripped: ${failure}`);
  }
  ctx.logger.log(
    `Stripped ${beamFiles} BEAM files (${formatMb(beamBytes)} MB) and ${binaries.files.length} binaries (${formatMb(binaries.bytesFreed)} MB)`
  );
}

function installApplication(config: BuildConfig, rootDir: string): void {
  for (const [name, content] of Object.entries(generateRuntimeWrappers())) {
    writeExecutable(path.join(rootDir, name), content);
  }
  if (!config.appPath) return;

  const appDir = path.join(rootDir, APP_DIR);
  fs.cpSync(config.appPath, appDir, {
    recursive: true,
    filter: (source) => path.basename(source) !== ".git",
  });

  const start = path.join(appDir, "start");
  if (!fs.existsSync(start)) {
    writeExecutable(start, generateAppStartScript());
  } else {
    fs.chmodSync(start, 0o755);
  }
}

function writeInit(config: BuildConfig, rootDir: string): void {
  for (const dir of ROOT_DIRS) {
    fs.mkdirSync(path.join(rootDir, dir), { recursive: true });
  }
  writeExecutable(path.join(rootDir, "init"), generateInitScript({ hasApp: config.appPath !== undefined }));
}

async function archiveRoot(ctx: BuildContext, rootDir: string, outDir: string): Promise<string> {
  const cpioPath = path.join(outDir, "initramfs.cpio");
  const count = writeCpioArchive(rootDir, cpioPath);
  ctx.logger.debug("build", `initramfs has ${count} entries`);
  return compressFile(cpioPath, ctx.config.compression, {
    runner: ctx.runner,
    stage: "archive",
    timeoutMs: ctx.timeouts.compressMs,
  });
}

// ---------------------------------------------------------------------------
// Strategy
// ---------------------------------------------------------------------------

export const customStrategy: BuildStrategy = {
  type: "custom",

  requiredTools(config: BuildConfig): ToolRequirement[] {
    const tools: ToolRequirement[] = ["make", "gcc", "flex", "bison", "bc", "tar", "xz", "bzip2"];
    if (config.stripModules) tools.push("strip");
    return [...tools, ["docker", "podman"]];
  },

  async assemble(ctx: BuildContext): Promise<AssemblyOutput> {
    const rootDir = path.join(ctx.workDir, "rootfs");
    const outDir = path.join(ctx.workDir, "out");
    fs.mkdirSync(rootDir, { recursive: true });
    fs.mkdirSync(outDir, { recursive: true });

    const kernel = await runStage(ctx, "kernel", () => buildKernel(ctx, outDir));
    await runStage(ctx, "userland", () => buildUserland(ctx, rootDir));
    await runStage(ctx, "runtime", () => installRuntime(ctx, rootDir));
    await runStage(ctx, "application", async () => installApplication(ctx.config, rootDir));
    await runStage(ctx, "init", async () => writeInit(ctx.config, rootDir));
    const initramfs = await runStage(ctx, "archive", () => archiveRoot(ctx, rootDir, outDir));

    return { kind: "kernel-initramfs", kernel, initramfs };
  },
};
