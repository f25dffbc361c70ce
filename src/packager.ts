import fs from "fs";
import path from "path";

import type { BuildType, Compression } from "./build-config";
import type { ToolRunner } from "./exec";
import type { AssemblyOutput } from "./strategy";
import type { TarSource } from "./archive";
import {
  compressFile,
  compressionExtension,
  decompressInto,
  extractEntries,
  parseTar,
  writeTarArchive,
} from "./archive";
import { bytesToMb } from "./size-estimator";

export type PackageOptions = {
  type: BuildType;
  outputDir: string;
  /** scratch space; the bundle is assembled here before it is moved */
  workDir: string;
  compression: Compression;
  runner?: ToolRunner;
  timeoutMs?: number;
};

export type PackageResult = Readonly<{
  /** final bundle location */
  path: string;
  sizeMb: number;
  /** names inside the bundle */
  entries: ReadonlyArray<string>;
}>;

/**
 * Bundle name for a strategy, e.g. `custom-vm.tar.xz`.
 */
export function bundleFileName(type: BuildType, compression: Compression): string {
  return `${type}-vm.tar${compressionExtension(compression)}`;
}

export function firmwareFileName(target: string) {
  return `nerves-${target}.fw`;
}

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Move `source` into `destDir`, replacing any previous bundle of the same
 * name. Falls back to copy + rename across filesystems.
 */
function moveIntoPlace(source: string, destDir: string): string {
  fs.mkdirSync(destDir, { recursive: true });
  const dest = path.join(destDir, path.basename(source));
  try {
    fs.renameSync(source, dest);
  } catch (err) {
    if (errnoCode(err) !== "EXDEV") throw err;
    const partial = `${dest}.partial`;
    fs.copyFileSync(source, partial);
    fs.renameSync(partial, dest);
    fs.rmSync(source, { force: true });
  }
  return dest;
}

/**
 * Turn assembled outputs into the single distributable bundle and move it
 * into the output directory.
 *
 * Kernel builds become a tar of exactly the boot image and the initramfs or
 * root filesystem; container builds compress the saved image tarball;
 * firmware is copied as is.
 */
export async function packageArtifacts(output: AssemblyOutput, options: PackageOptions): Promise<PackageResult> {
  const stagingDir = path.join(options.workDir, "bundle");
  fs.mkdirSync(stagingDir, { recursive: true });

  let bundle: string;
  let entries: string[];

  switch (output.kind) {
    case "kernel-initramfs":
    case "kernel-rootfs": {
      const second = output.kind === "kernel-initramfs" ? output.initramfs : output.rootfs;
      const sources: TarSource[] = [
        { name: path.basename(output.kernel), path: output.kernel },
        { name: path.basename(second), path: second },
      ];
      const tarPath = path.join(stagingDir, `${options.type}-vm.tar`);
      writeTarArchive(sources, tarPath);
      bundle = await compressFile(tarPath, options.compression, {
        runner: options.runner,
        stage: "package",
        timeoutMs: options.timeoutMs,
      });
      entries = sources.map((source) => source.name);
      break;
    }
    case "container-image": {
      const tarPath = path.join(stagingDir, `${options.type}-vm.tar`);
      fs.copyFileSync(output.tarball, tarPath);
      bundle = await compressFile(tarPath, options.compression, {
        runner: options.runner,
        stage: "package",
        timeoutMs: options.timeoutMs,
      });
      entries = [path.basename(output.tarball)];
      break;
    }
    case "firmware": {
      // .fw files are already compressed archives
      bundle = path.join(stagingDir, firmwareFileName(output.target));
      fs.copyFileSync(output.firmware, bundle);
      entries = [path.basename(output.firmware)];
      break;
    }
  }

  const finalPath = moveIntoPlace(bundle, options.outputDir);
  return Object.freeze({
    path: finalPath,
    sizeMb: bytesToMb(fs.statSync(finalPath).size),
    entries: Object.freeze(entries),
  });
}

/**
 * Unpack a kernel bundle into `destDir`, returning extracted file paths keyed
 * by entry name. The bundle itself is left untouched.
 */
export async function extractBundle(
  bundlePath: string,
  destDir: string,
  options: { runner?: ToolRunner; timeoutMs?: number } = {}
): Promise<Record<string, string>> {
  const tarPath = await decompressInto(bundlePath, destDir, {
    runner: options.runner,
    stage: "package",
    timeoutMs: options.timeoutMs,
  });
  const entries = parseTar(fs.readFileSync(tarPath));
  const filesDir = path.join(destDir, "files");
  const out: Record<string, string> = {};
  for (const file of extractEntries(entries, filesDir)) {
    out[path.relative(filesDir, file)] = file;
  }
  return out;
}
