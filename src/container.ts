import type { ToolResult, ToolRunner } from "./exec";
import { describeToolFailure, findExecutable, toolSucceeded } from "./exec";
import { tailOutput } from "./errors";

export type ContainerRuntime = "docker" | "podman";

export type ContainerTimeouts = {
  /** image builds and pulls */
  buildMs: number;
  /** save/load of image tarballs */
  transferMs: number;
  /** short commands (create, cp, rm) */
  commandMs: number;
};

export const DEFAULT_CONTAINER_TIMEOUTS: ContainerTimeouts = {
  buildMs: 45 * 60 * 1000,
  transferMs: 15 * 60 * 1000,
  commandMs: 2 * 60 * 1000,
};

/**
 * Raised for any failed container engine call. Callers translate it to a
 * stage or validation failure.
 */
export class ContainerCommandError extends Error {
  readonly output: string;
  readonly timedOut: boolean;

  constructor(message: string, output: string, timedOut: boolean) {
    super(message);
    this.name = "ContainerCommandError";
    this.output = tailOutput(output);
    this.timedOut = timedOut;
  }
}

export type ContainerRunResult = {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
};

/**
 * Operations the builders and validators need from a container engine.
 */
export interface ContainerEngine {
  readonly runtime: ContainerRuntime;
  /** build `contextDir` and tag the result */
  build(contextDir: string, tag: string, timeoutMs?: number): Promise<void>;
  /** export `image` as a tarball */
  save(image: string, outPath: string): Promise<void>;
  /** import a tarball, returning the loaded image reference */
  load(tarball: string): Promise<string>;
  /** create a stopped container, returning its id */
  create(image: string): Promise<string>;
  copyFrom(containerId: string, source: string, dest: string): Promise<void>;
  /** run `command` in a throwaway container; a non-zero exit is not an error */
  run(image: string, command: readonly string[], timeoutMs: number): Promise<ContainerRunResult>;
  removeContainer(containerId: string): Promise<void>;
  removeImage(image: string): Promise<void>;
}

/**
 * Detect available container runtime.
 */
export function detectContainerRuntime(
  preferred?: ContainerRuntime,
  envPath?: string
): ContainerRuntime {
  if (preferred) {
    if (findExecutable(preferred, envPath)) return preferred;
    throw new Error(`Preferred container runtime '${preferred}' not found`);
  }

  // Try docker first, then podman
  for (const runtime of ["docker", "podman"] as const) {
    if (findExecutable(runtime, envPath)) return runtime;
  }

  throw new Error("No container runtime found. Please install Docker or Podman.");
}

/**
 * Image reference from `docker load` / `podman load` output.
 */
export function parseLoadedImage(output: string): string | null {
  for (const line of output.split("\n")) {
    const match = line.match(/Loaded image(?: ID)?\(?s?\)?:\s*(\S+)/);
    if (match) return match[1];
  }
  return null;
}

/**
 * Container engine driven through the docker/podman command line.
 */
export class CliContainerEngine implements ContainerEngine {
  readonly runtime: ContainerRuntime;
  private readonly runner: ToolRunner;
  private readonly timeouts: ContainerTimeouts;

  constructor(runtime: ContainerRuntime, runner: ToolRunner, timeouts: Partial<ContainerTimeouts> = {}) {
    this.runtime = runtime;
    this.runner = runner;
    this.timeouts = { ...DEFAULT_CONTAINER_TIMEOUTS, ...timeouts };
  }

  private async invoke(args: string[], timeoutMs: number): Promise<ToolResult> {
    const argv = [this.runtime, ...args];
    const result = await this.runner.run({ argv, timeoutMs });
    if (!toolSucceeded(result)) {
      throw new ContainerCommandError(
        `${this.runtime} ${args[0]}: ${describeToolFailure(argv, result)}`,
        `${result.stdout}${result.stderr}`,
        result.timedOut
      );
    }
    return result;
  }

  async build(contextDir: string, tag: string, timeoutMs = this.timeouts.buildMs) {
    await this.invoke(["build", "-t", tag, contextDir], timeoutMs);
  }

  async save(image: string, outPath: string) {
    await this.invoke(["save", "-o", outPath, image], this.timeouts.transferMs);
  }

  async load(tarball: string) {
    const result = await this.invoke(["load", "-i", tarball], this.timeouts.transferMs);
    const image = parseLoadedImage(result.stdout);
    if (!image) {
      throw new ContainerCommandError(
        `${this.runtime} load: could not determine the loaded image`,
        result.stdout,
        false
      );
    }
    return image;
  }

  async create(image: string) {
    const result = await this.invoke(["create", image], this.timeouts.buildMs);
    return result.stdout.trim();
  }

  async copyFrom(containerId: string, source: string, dest: string) {
    await this.invoke(["cp", `${containerId}:${source}`, dest], this.timeouts.transferMs);
  }

  async run(image: string, command: readonly string[], timeoutMs: number) {
    const argv = [this.runtime, "run", "--rm", "--network", "none", image, ...command];
    const result = await this.runner.run({ argv, timeoutMs });
    return {
      exitCode: result.exitCode,
      stdout: result.stdout,
      stderr: result.stderr,
      timedOut: result.timedOut,
    };
  }

  async removeContainer(containerId: string) {
    await this.invoke(["rm", "-f", containerId], this.timeouts.commandMs);
  }

  async removeImage(image: string) {
    await this.invoke(["rmi", "-f", image], this.timeouts.commandMs);
  }
}

/**
 * Create a container from `image`, hand its id to `fn`, and remove it on
 * every exit path.
 */
export async function withContainer<T>(
  engine: ContainerEngine,
  image: string,
  fn: (containerId: string) => Promise<T>
): Promise<T> {
  const containerId = await engine.create(image);
  let failed = false;
  try {
    return await fn(containerId);
  } catch (err) {
    failed = true;
    throw err;
  } finally {
    try {
      await engine.removeContainer(containerId);
    } catch (err) {
      // keep the original error when fn already failed
      if (!failed) throw err;
    }
  }
}

/**
 * Load an image tarball for the duration of `fn`, removing the image after.
 */
export async function withLoadedImage<T>(
  engine: ContainerEngine,
  tarball: string,
  fn: (image: string) => Promise<T>
): Promise<T> {
  const image = await engine.load(tarball);
  let failed = false;
  try {
    return await fn(image);
  } catch (err) {
    failed = true;
    throw err;
  } finally {
    try {
      await engine.removeImage(image);
    } catch (err) {
      if (!failed) throw err;
    }
  }
}
