import fs from "fs";
import os from "os";
import path from "path";

import type { LogFn } from "./debug";

/**
 * Downloads `url` to `dest`. Implementations must not leave a partial file at
 * `dest` on failure.
 */
export type Fetcher = (url: string, dest: string, timeoutMs: number) => Promise<void>;

export const DEFAULT_DOWNLOAD_TIMEOUT_MS = 10 * 60 * 1000;

export function defaultCacheDir() {
  return path.join(process.env.XDG_CACHE_HOME ?? path.join(os.homedir(), ".cache"), "leanvm");
}

export async function downloadFile(url: string, dest: string, timeoutMs = DEFAULT_DOWNLOAD_TIMEOUT_MS): Promise<void> {
  // Node's built-in `fetch`, no extra dependency needed
  const res = await fetch(url, { redirect: "follow", signal: AbortSignal.timeout(timeoutMs) });

  if (!res.ok) {
    throw new Error(`Failed to download ${url}: HTTP ${res.status}`);
  }

  const buf = Buffer.from(await res.arrayBuffer());
  const partial = `${dest}.part`;
  fs.writeFileSync(partial, buf);
  fs.renameSync(partial, dest);
}

/**
 * Return the cached copy of `url`, downloading it first when missing.
 */
export async function fetchCached(
  url: string,
  cacheDir: string,
  options: { fetcher?: Fetcher; timeoutMs?: number; log?: LogFn } = {}
): Promise<string> {
  const dest = path.join(cacheDir, path.basename(new URL(url).pathname));
  if (fs.existsSync(dest)) {
    options.log?.(`Using cached ${path.basename(dest)}`);
    return dest;
  }

  fs.mkdirSync(cacheDir, { recursive: true });
  options.log?.(`Downloading ${url}`);
  await (options.fetcher ?? downloadFile)(url, dest, options.timeoutMs ?? DEFAULT_DOWNLOAD_TIMEOUT_MS);
  if (!fs.existsSync(dest)) {
    throw new Error(`download of ${url} produced no file`);
  }
  return dest;
}
