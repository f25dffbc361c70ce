/**
 * Build pipeline shared by every strategy.
 *
 *   config → pre-flight tool check → retention decision + estimate →
 *   unique work dir → strategy.assemble → packaging → artifact
 *
 * Nothing is written to the output directory before packaging succeeds and
 * the work directory is removed on every exit path.
 */

import os from "os";

import { alpineStrategy } from "./build-alpine";
import { buildrootStrategy } from "./build-buildroot";
import type { BuildConfig, BuildConfigInput, BuildType, Compression } from "./build-config";
import { resolveBuildConfig } from "./build-config";
import { customStrategy } from "./build-custom";
import { nervesStrategy } from "./build-nerves";
import type { ContainerEngine } from "./container";
import { CliContainerEngine, detectContainerRuntime } from "./container";
import type { Logger } from "./debug";
import { createLogger } from "./debug";
import type { BuildStage } from "./errors";
import { DependencyMissingError } from "./errors";
import type { ToolRunner } from "./exec";
import { LocalToolRunner, findExecutable } from "./exec";
import type { Fetcher } from "./fetch";
import { defaultCacheDir } from "./fetch";
import type { RetentionDecision } from "./otp-stripper";
import { decideRetention, detectAppApplications } from "./otp-stripper";
import { packageArtifacts } from "./packager";
import { withTempDir } from "./scope";
import type { SizeEstimate } from "./size-estimator";
import { estimateSize, formatSizeEstimate } from "./size-estimator";
import type { BuildContext, BuildStrategy, StageTimeouts, ToolRequirement } from "./strategy";
import { DEFAULT_STAGE_TIMEOUTS, runStage } from "./strategy";
import type { ValidationOptions, ValidationReport } from "./validator";
import { ValidationEngine } from "./validator";

export const STRATEGIES: Readonly<Record<BuildType, BuildStrategy>> = Object.freeze({
  alpine: alpineStrategy,
  custom: customStrategy,
  buildroot: buildrootStrategy,
  nerves: nervesStrategy,
});

/**
 * Result of a successful build.
 */
export type BuildArtifact = Readonly<{
  imagePath: string;
  type: BuildType;
  /** measured bundle size */
  sizeMb: number;
  /** size predicted before the build */
  estimate: SizeEstimate;
  metadata: Readonly<{
    entries: ReadonlyArray<string>;
    compression: Compression;
    retention: RetentionDecision;
    stageDurations: Readonly<Partial<Record<BuildStage, number>>>;
  }>;
}>;

export interface BuildOptions {
  runner?: ToolRunner;
  /** container engine (default: docker or podman from `PATH`) */
  containers?: ContainerEngine;
  fetcher?: Fetcher;
  logger?: Logger;
  /** print progress (default: true, ignored when `logger` is set) */
  verbose?: boolean;
  /** download cache (default: ~/.cache/leanvm) */
  cacheDir?: string;
  /** parent of the work directory (default: os tmpdir) */
  workParent?: string;
  /** leave the work directory behind for debugging */
  keepWorkDir?: boolean;
  /** `PATH` used for the pre-flight tool check */
  envPath?: string;
  timeouts?: Partial<StageTimeouts>;
  /** parallel make jobs (default: cpu count) */
  jobs?: number;
}

function describeRequirement(requirement: ToolRequirement) {
  return typeof requirement === "string" ? requirement : requirement.join("|");
}

/**
 * Requirements of `strategy` that cannot be satisfied from `PATH`.
 */
export function findMissingTools(strategy: BuildStrategy, config: BuildConfig, envPath?: string): string[] {
  const missing: string[] = [];
  for (const requirement of strategy.requiredTools(config)) {
    const alternatives = typeof requirement === "string" ? [requirement] : requirement;
    if (!alternatives.some((tool) => findExecutable(tool, envPath) !== null)) {
      missing.push(describeRequirement(requirement));
    }
  }
  return missing;
}

/**
 * Fail with `DependencyMissingError` when a required tool is absent.
 */
export function checkDependencies(strategy: BuildStrategy, config: BuildConfig, envPath?: string): void {
  const missing = findMissingTools(strategy, config, envPath);
  if (missing.length > 0) {
    throw new DependencyMissingError(missing, `${strategy.type} build`);
  }
}

/**
 * Applications the packaged application needs: the configured list merged
 * with what its `mix.exs` declares.
 */
export function declaredApplications(config: BuildConfig): string[] {
  const found = new Set(config.applications);
  if (config.appPath) {
    for (const name of detectAppApplications(config.appPath)) found.add(name);
  }
  return Array.from(found).sort();
}

/**
 * Build an image for `input` and return the packaged artifact.
 */
export async function buildImage(
  input: BuildConfig | BuildConfigInput,
  options: BuildOptions = {}
): Promise<BuildArtifact> {
  const config = resolveBuildConfig(input);
  const strategy = STRATEGIES[config.type];
  strategy.validateConfig?.(config);

  const logger = options.logger ?? createLogger({ verbose: options.verbose });
  checkDependencies(strategy, config, options.envPath);

  const applications = declaredApplications(config);
  const decision = decideRetention(config.retention, {
    stripModules: config.stripModules,
    declaredApplications: applications,
    warn: logger.warn,
  });
  const estimate = estimateSize({ ...config, applications }, decision);
  logger.log(`Building ${config.type} image, estimated ${formatSizeEstimate(estimate)}`);
  if (estimate.low > config.targetSize) {
    logger.warn(`estimated size ${formatSizeEstimate(estimate)} is above the ${config.targetSize} MB target`);
  }

  const runner = options.runner ?? new LocalToolRunner(logger);
  let containers = options.containers ?? null;
  const timeouts = { ...DEFAULT_STAGE_TIMEOUTS, ...options.timeouts };

  return withTempDir(
    async (workDir) => {
      logger.debug("build", `work dir ${workDir}`);
      const ctx: BuildContext = {
        config,
        workDir,
        cacheDir: options.cacheDir ?? defaultCacheDir(),
        decision,
        runner,
        containers: () => {
          if (!containers) {
            containers = new CliContainerEngine(detectContainerRuntime(undefined, options.envPath), runner, {
              buildMs: timeouts.containerMs,
            });
          }
          return containers;
        },
        fetcher: options.fetcher,
        logger,
        timeouts,
        jobs: options.jobs ?? Math.max(1, os.cpus().length),
        stageDurations: {},
      };

      const output = await strategy.assemble(ctx);
      const bundle = await runStage(ctx, "package", () =>
        packageArtifacts(output, {
          type: config.type,
          outputDir: config.outputDir,
          workDir,
          compression: config.compression,
          runner,
          timeoutMs: timeouts.compressMs,
        })
      );

      logger.log(`Wrote ${bundle.path} (${bundle.sizeMb} MB, estimated ${formatSizeEstimate(estimate)})`);

      return Object.freeze({
        imagePath: bundle.path,
        type: config.type,
        sizeMb: bundle.sizeMb,
        estimate,
        metadata: Object.freeze({
          entries: bundle.entries,
          compression: config.compression,
          retention: decision,
          stageDurations: Object.freeze({ ...ctx.stageDurations }),
        }),
      });
    },
    { parent: options.workParent, keep: options.keepWorkDir }
  );
}

/**
 * Build, then validate the result. Validation failures are reported in the
 * returned report; the artifact is kept either way.
 */
export async function buildAndValidate(
  input: BuildConfig | BuildConfigInput,
  options: BuildOptions & { validation?: ValidationOptions } = {}
): Promise<{ artifact: BuildArtifact; report: ValidationReport }> {
  const config = resolveBuildConfig(input);
  const artifact = await buildImage(config, options);
  const engine = new ValidationEngine({
    runner: options.runner,
    containers: options.containers,
    logger: options.logger,
    ...options.validation,
  });
  const report = await engine.validate(artifact.imagePath, config);
  return { artifact, report };
}
