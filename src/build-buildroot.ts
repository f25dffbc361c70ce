/**
 * Buildroot image builder.
 *
 * Produces a musl based system with the runtime from Buildroot's own
 * package set, a kernel built from the minimal profile as a config fragment,
 * and an ext4 root filesystem. Elixir itself is architecture independent and
 * installed from the upstream precompiled archive through a rootfs overlay.
 */

import fs from "fs";
import path from "path";

import type { Architecture, BuildConfig } from "./build-config";
import { StageFailure } from "./errors";
import { runStep } from "./exec";
import { fetchCached } from "./fetch";
import {
  APP_DIR,
  ELIXIR_ROOT,
  generateAppStartScript,
  generateInitScript,
  generateRuntimeWrappers,
  shSingleQuote,
  writeExecutable,
} from "./init-script";
import { generateKernelProfile, kernelMakeTarget, renderKernelConfig } from "./kernel-config";
import type { RetentionDecision } from "./otp-stripper";
import type { AssemblyOutput, BuildContext, BuildStrategy, ToolRequirement } from "./strategy";
import { runStage } from "./strategy";
import { DEFAULT_KERNEL_VERSION } from "./build-custom";

export const BUILDROOT_VERSION = "2024.02.6";
export const ELIXIR_VERSION = "1.15.7";

/** where the generated init lives on the root filesystem */
export const ROOTFS_INIT_PATH = "/sbin/leanvm-init";

/** erlang install prefix used by Buildroot */
const BUILDROOT_ERLANG_ROOT = "/usr/lib/erlang";

const ROOTFS_BASE_MB = 85;
const ROOTFS_APP_MB = 10;

export function buildrootSourceUrl(version = BUILDROOT_VERSION) {
  return `https://buildroot.org/downloads/buildroot-${version}.tar.xz`;
}

export function elixirArchiveUrl(version = ELIXIR_VERSION) {
  return `https://github.com/elixir-lang/elixir/releases/download/v${version}/elixir-otp-26.zip`;
}

/** root filesystem size, e.g. `85M` */
export function rootfsSize(hasApp: boolean): string {
  return `${hasApp ? ROOTFS_BASE_MB + ROOTFS_APP_MB : ROOTFS_BASE_MB}M`;
}

/** Buildroot symbol for a package name, e.g. `libcurl` → `BR2_PACKAGE_LIBCURL` */
export function buildrootPackageSymbol(name: string): string {
  return `BR2_PACKAGE_${name.toUpperCase().replace(/[^A-Z0-9]/g, "_")}`;
}

export type DefconfigPaths = {
  overlayDir: string;
  postBuildScript: string;
  kernelFragment: string;
};

function archSymbols(arch: Architecture) {
  return arch === "aarch64"
    ? ["BR2_aarch64=y", 'BR2_LINUX_KERNEL_DEFCONFIG="defconfig"']
    : ["BR2_x86_64=y", 'BR2_LINUX_KERNEL_DEFCONFIG="x86_64"'];
}

/**
 * Buildroot defconfig for a build.
 */
export function generateDefconfig(config: BuildConfig, paths: DefconfigPaths): string {
  const { arch } = config.vmOptions;
  const kernelVersion = config.vmOptions.kernelVersion ?? DEFAULT_KERNEL_VERSION;
  const lines = [
    ...archSymbols(arch),
    "BR2_TOOLCHAIN_BUILDROOT_MUSL=y",
    "BR2_TOOLCHAIN_BUILDROOT_CXX=y",
    'BR2_TARGET_GENERIC_HOSTNAME="leanvm"',
    'BR2_TARGET_GENERIC_ISSUE="leanvm"',
    "BR2_INIT_BUSYBOX=y",
    `BR2_ROOTFS_OVERLAY="${paths.overlayDir}"`,
    `BR2_ROOTFS_POST_BUILD_SCRIPT="${paths.postBuildScript}"`,
    "BR2_LINUX_KERNEL=y",
    "BR2_LINUX_KERNEL_CUSTOM_VERSION=y",
    `BR2_LINUX_KERNEL_CUSTOM_VERSION_VALUE="${kernelVersion}"`,
    `BR2_LINUX_KERNEL_CONFIG_FRAGMENT_FILES="${paths.kernelFragment}"`,
    arch === "aarch64" ? "BR2_LINUX_KERNEL_IMAGE=y" : "BR2_LINUX_KERNEL_BZIMAGE=y",
    "BR2_PACKAGE_ERLANG=y",
    "BR2_PACKAGE_NCURSES=y",
    "BR2_PACKAGE_OPENSSL=y",
    "BR2_PACKAGE_ZLIB=y",
    ...config.packages.map((name) => `${buildrootPackageSymbol(name)}=y`),
    "BR2_TARGET_ROOTFS_EXT2=y",
    "BR2_TARGET_ROOTFS_EXT2_4=y",
    `BR2_TARGET_ROOTFS_EXT2_SIZE="${rootfsSize(config.appPath !== undefined)}"`,
    "# BR2_TARGET_ROOTFS_TAR is not set",
  ];
  return lines.join("\n") + "\n";
}

/**
 * Post-build hook removing stripped runtime components from the target tree.
 * Buildroot passes the target directory as the first argument.
 */
export function generatePostBuildScript(decision: RetentionDecision): string {
  const lines = [
    "#!/bin/sh",
    "# generated by leanvm",
    "set -eu",
    'TARGET_DIR="$1"',
    `ERLANG_DIR="$TARGET_DIR${BUILDROOT_ERLANG_ROOT}"`,
  ];
  for (const name of decision.removed) {
    lines.push(`rm -rf "$ERLANG_DIR"/lib/${shSingleQuote(name)}-*`);
  }
  if (decision.removed.length > 0) {
    lines.push(
      `find "$ERLANG_DIR" \\( -name doc -o -name src -o -name examples \\) -type d -prune -exec rm -rf {} +`,
      `find "$ERLANG_DIR" \\( -name '*.html' -o -name '*.pdf' -o -name '*.md' \\) -type f -delete`
    );
  }
  return lines.join("\n") + "\n";
}

async function prepareTree(ctx: BuildContext): Promise<{ srcDir: string; paths: DefconfigPaths }> {
  const boardDir = path.join(ctx.workDir, "board");
  const overlayDir = path.join(boardDir, "overlay");
  fs.mkdirSync(overlayDir, { recursive: true });

  const archive = await fetchCached(buildrootSourceUrl(), ctx.cacheDir, {
    fetcher: ctx.fetcher,
    timeoutMs: ctx.timeouts.downloadMs,
    log: ctx.logger.log,
  });
  const srcParent = path.join(ctx.workDir, "src");
  fs.mkdirSync(srcParent, { recursive: true });
  await runStep(ctx.runner, "userland", {
    argv: ["tar", "-xf", archive, "-C", srcParent],
    timeoutMs: ctx.timeouts.extractMs,
  });
  const srcDir = path.join(srcParent, `buildroot-${BUILDROOT_VERSION}`);
  if (!fs.existsSync(srcDir)) {
    throw new StageFailure("userland", `buildroot sources missing after unpacking ${path.basename(archive)}`);
  }

  const elixirZip = await fetchCached(elixirArchiveUrl(), ctx.cacheDir, {
    fetcher: ctx.fetcher,
    timeoutMs: ctx.timeouts.downloadMs,
    log: ctx.logger.log,
  });
  await runStep(ctx.runner, "userland", {
    argv: ["unzip", "-q", "-o", elixirZip, "-d", path.join(overlayDir, ELIXIR_ROOT)],
    timeoutMs: ctx.timeouts.extractMs,
  });

  const postBuildScript = path.join(boardDir, "post-build.sh");
  writeExecutable(postBuildScript, generatePostBuildScript(ctx.decision));

  const kernelFragment = path.join(boardDir, "kernel.fragment");
  fs.writeFileSync(
    kernelFragment,
    renderKernelConfig(generateKernelProfile({ arch: ctx.config.vmOptions.arch, variant: "qemu" }))
  );

  return { srcDir, paths: { overlayDir, postBuildScript, kernelFragment } };
}

function populateOverlay(config: BuildConfig, overlayDir: string): void {
  writeExecutable(
    path.join(overlayDir, ROOTFS_INIT_PATH),
    generateInitScript({ hasApp: config.appPath !== undefined })
  );

  // buildroot installs erl under /usr/bin but nothing puts elixir on PATH
  for (const [name, content] of Object.entries(generateRuntimeWrappers(BUILDROOT_ERLANG_ROOT))) {
    writeExecutable(path.join(overlayDir, name), content);
  }
  if (!config.appPath) return;

  const appDir = path.join(overlayDir, APP_DIR);
  fs.cpSync(config.appPath, appDir, {
    recursive: true,
    filter: (source) => path.basename(source) !== ".git",
  });
  if (!fs.existsSync(path.join(appDir, "start"))) {
    writeExecutable(path.join(appDir, "start"), generateAppStartScript());
  }
}

export const buildrootStrategy: BuildStrategy = {
  type: "buildroot",

  requiredTools(): ToolRequirement[] {
    return ["make", "gcc", "g++", "tar", "xz", "unzip", "wget", "rsync", "patch", "perl", "cpio", "bc", "file"];
  },

  async assemble(ctx: BuildContext): Promise<AssemblyOutput> {
    const { srcDir, paths } = await runStage(ctx, "userland", () => prepareTree(ctx));
    await runStage(ctx, "application", async () => populateOverlay(ctx.config, paths.overlayDir));

    const buildDir = path.join(ctx.workDir, "output");
    const defconfig = path.join(ctx.workDir, "board", "leanvm_defconfig");
    fs.writeFileSync(defconfig, generateDefconfig(ctx.config, paths));

    return runStage<AssemblyOutput>(ctx, "rootfs", async () => {
      await runStep(ctx.runner, "rootfs", {
        argv: ["make", `O=${buildDir}`, `BR2_DEFCONFIG=${defconfig}`, "defconfig"],
        cwd: srcDir,
        timeoutMs: ctx.timeouts.configureMs,
      });
      await runStep(ctx.runner, "rootfs", {
        argv: ["make", `O=${buildDir}`, `BR2_JLEVEL=${ctx.jobs}`],
        cwd: srcDir,
        timeoutMs: ctx.timeouts.compileMs,
      });

      const imagesDir = path.join(buildDir, "images");
      const kernel = path.join(imagesDir, kernelMakeTarget(ctx.config.vmOptions.arch));
      const rootfs = path.join(imagesDir, "rootfs.ext4");
      for (const file of [kernel, rootfs]) {
        if (!fs.existsSync(file)) {
          throw new StageFailure("rootfs", `buildroot finished without images/${path.basename(file)}`);
        }
      }
      return { kind: "kernel-rootfs", kernel, rootfs };
    });
  },
};
