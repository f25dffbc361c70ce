import fs from "fs";
import os from "os";
import path from "path";

import type { ToolRunner } from "./exec";
import { describeToolFailure, toolSucceeded } from "./exec";

export const WORK_DIR_PREFIX = "leanvm-build-";

/**
 * Create a unique work directory, run `fn` in it and remove it afterwards,
 * whether `fn` resolves or throws.
 */
export async function withTempDir<T>(
  fn: (dir: string) => Promise<T>,
  options: { prefix?: string; parent?: string; keep?: boolean } = {}
): Promise<T> {
  const parent = options.parent ?? os.tmpdir();
  fs.mkdirSync(parent, { recursive: true });
  const dir = fs.mkdtempSync(path.join(parent, options.prefix ?? WORK_DIR_PREFIX));
  try {
    return await fn(dir);
  } finally {
    if (!options.keep) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  }
}

export type LoopMountOptions = {
  /** byte offset of the filesystem inside the image */
  offset?: number;
  timeoutMs?: number;
};

/**
 * Mount a disk image read-only through a loop device for the duration of
 * `fn`. The mount is released on every exit path. A mount point that could
 * not be unmounted is left on disk rather than removed while still mounted.
 */
export async function withLoopMount<T>(
  runner: ToolRunner,
  imagePath: string,
  fn: (mountPoint: string) => Promise<T>,
  options: LoopMountOptions = {}
): Promise<T> {
  const timeoutMs = options.timeoutMs ?? 30_000;
  const mountOpts = ["loop", "ro"];
  if (options.offset) mountOpts.push(`offset=${options.offset}`);
  // read by withTempDir once the body has settled
  const scope = { prefix: "leanvm-mnt-", keep: false };

  return withTempDir(async (mountPoint) => {
    const mountArgv = ["mount", "-o", mountOpts.join(","), imagePath, mountPoint];
    const mounted = await runner.run({ argv: mountArgv, timeoutMs });
    if (!toolSucceeded(mounted)) {
      throw new Error(`${describeToolFailure(mountArgv, mounted)}: ${mounted.stderr.trim()}`);
    }

    let failure: unknown = null;
    try {
      return await fn(mountPoint);
    } catch (err) {
      failure = err;
      throw err;
    } finally {
      const umountArgv = ["umount", mountPoint];
      const unmounted = await runner.run({ argv: umountArgv, timeoutMs });
      if (!toolSucceeded(unmounted)) {
        scope.keep = true;
        // the original error wins
        if (failure === null) {
          throw new Error(
            `${describeToolFailure(umountArgv, unmounted)}: ${unmounted.stderr.trim()} (${mountPoint} is still mounted)`
          );
        }
      }
    }
  }, scope);
}
