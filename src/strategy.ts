import type { BuildConfig, BuildType } from "./build-config";
import type { ContainerEngine } from "./container";
import type { Logger } from "./debug";
import type { BuildStage } from "./errors";
import { StageFailure, errorMessage } from "./errors";
import type { ToolRunner } from "./exec";
import type { Fetcher } from "./fetch";
import type { RetentionDecision } from "./otp-stripper";

export type StageTimeouts = {
  downloadMs: number;
  /** unpacking source archives */
  extractMs: number;
  /** defconfig / olddefconfig style steps */
  configureMs: number;
  /** full kernel, busybox, buildroot or firmware compiles */
  compileMs: number;
  installMs: number;
  /** container image builds and copies */
  containerMs: number;
  compressMs: number;
};

export const DEFAULT_STAGE_TIMEOUTS: StageTimeouts = {
  downloadMs: 10 * 60 * 1000,
  extractMs: 10 * 60 * 1000,
  configureMs: 5 * 60 * 1000,
  compileMs: 2 * 60 * 60 * 1000,
  installMs: 10 * 60 * 1000,
  containerMs: 45 * 60 * 1000,
  compressMs: 15 * 60 * 1000,
};

/**
 * Everything a strategy may touch while assembling. The work directory is
 * private to one build and removed afterwards.
 */
export type BuildContext = {
  config: BuildConfig;
  workDir: string;
  /** download cache shared between builds */
  cacheDir: string;
  decision: RetentionDecision;
  runner: ToolRunner;
  /** container engine, created on first use */
  containers: () => ContainerEngine;
  fetcher?: Fetcher;
  logger: Logger;
  timeouts: StageTimeouts;
  /** parallel make jobs */
  jobs: number;
  /** wall-clock duration per finished stage, in `ms` */
  stageDurations: Partial<Record<BuildStage, number>>;
};

/**
 * What a strategy hands to the packager, one variant per artifact shape.
 */
export type AssemblyOutput =
  | { kind: "kernel-initramfs"; kernel: string; initramfs: string }
  | { kind: "kernel-rootfs"; kernel: string; rootfs: string }
  | { kind: "container-image"; tarball: string }
  | { kind: "firmware"; firmware: string; target: string };

/** a tool name, or alternatives of which one must exist */
export type ToolRequirement = string | readonly string[];

export interface BuildStrategy {
  readonly type: BuildType;
  /** strategy specific checks, run with the config checks */
  validateConfig?(config: BuildConfig): void;
  /** host tools checked before any work directory is created */
  requiredTools(config: BuildConfig): ToolRequirement[];
  assemble(ctx: BuildContext): Promise<AssemblyOutput>;
}

/**
 * Run one named stage. Errors that are not already a `StageFailure` are
 * reported as a failure of `stage`.
 */
export async function runStage<T>(ctx: BuildContext, stage: BuildStage, fn: () => Promise<T>): Promise<T> {
  ctx.logger.log(`==> ${stage}`);
  const started = Date.now();
  try {
    const result = await fn();
    ctx.stageDurations[stage] = Date.now() - started;
    ctx.logger.debug("build", `${stage} finished in ${Date.now() - started}ms`);
    return result;
  } catch (err) {
    if (err instanceof StageFailure) throw err;
    const output = typeof err === "object" && err !== null && "output" in err && typeof err.output === "string"
      ? err.output
      : "";
    throw new StageFailure(stage, errorMessage(err), output);
  }
}
