import fs from "fs";
import path from "path";

import type { Architecture, BuildConfig, BuildType } from "./build-config";
import type { ContainerEngine } from "./container";
import { CliContainerEngine, detectContainerRuntime, withLoadedImage } from "./container";
import type { Logger } from "./debug";
import { silentLogger } from "./debug";
import type { ValidationCheck } from "./errors";
import { ValidationFailure, errorMessage } from "./errors";
import type { ToolRunner } from "./exec";
import { LocalToolRunner, missingTools } from "./exec";
import type { FirmwareTool } from "./firmware";
import { FwupTool, missingFirmwareKeys, rootfsPartitionOffset } from "./firmware";
import {
  BOOT_MARKER,
  FUNCTIONAL_DONE,
  FUNCTIONAL_RESULT,
  PROBE_PARAM,
  VERSION_EXPRESSION,
} from "./init-script";
import { ROOTFS_INIT_PATH } from "./build-buildroot";
import { extractBundle } from "./packager";
import type { BootOptions, Emulator } from "./qemu";
import { QemuEmulator, consoleDevice, qemuBinary } from "./qemu";
import { withLoopMount, withTempDir } from "./scope";
import { bytesToMb } from "./size-estimator";

/** how an artifact is booted */
export type ArtifactFormat = "container" | "kernel" | "firmware";

export type BootEvidence = "booted" | "container-probe" | "metadata-only" | "none";

export type CheckStatus = "passed" | "failed" | "skipped";

export type ValidationState = "Exists" | "SizeChecked" | "BootChecked" | "FunctionalChecked" | "Report";

export type ValidationReport = Readonly<{
  imagePath: string;
  type: BuildType;
  exists: boolean;
  sizeAcceptable: boolean;
  bootable: boolean;
  functional: boolean;
  /** ISO 8601 */
  timestamp: string;
  sizeMb: number | null;
  bootEvidence: BootEvidence;
  checks: Readonly<Record<ValidationCheck, CheckStatus>>;
  /** first failed check */
  failure: Readonly<{ check: ValidationCheck; detail: string }> | null;
}>;

export const DEFAULT_SIZE_TOLERANCE = 1.5;
export const DEFAULT_BOOT_TIMEOUT_MS = 60_000;
export const DEFAULT_PROBE_TIMEOUT_MS = 120_000;

const MB = 1024 * 1024;

export type ValidationOptions = {
  /** accepted size as a multiple of the target (default: 1.5) */
  tolerance?: number;
  bootTimeoutMs?: number;
  probeTimeoutMs?: number;
  runner?: ToolRunner;
  containers?: ContainerEngine;
  emulator?: Emulator;
  firmware?: FirmwareTool;
  logger?: Logger;
  /** parent of the scratch directory (default: os tmpdir) */
  workParent?: string;
  now?: () => Date;
};

export function artifactFormat(type: BuildType): ArtifactFormat {
  switch (type) {
    case "alpine":
      return "container";
    case "custom":
    case "buildroot":
      return "kernel";
    case "nerves":
      return "firmware";
  }
}

/**
 * Host tools validation of `type` needs that are not on `PATH`.
 */
export function validateDependencies(type: BuildType, arch: Architecture, envPath?: string): string[] {
  switch (artifactFormat(type)) {
    case "container":
      return missingTools(["docker"], envPath).length === 0 || missingTools(["podman"], envPath).length === 0
        ? []
        : ["docker|podman"];
    case "kernel":
      return missingTools([qemuBinary(arch), "xz"], envPath);
    case "firmware":
      return missingTools(["fwup"], envPath);
  }
}

// ---------------------------------------------------------------------------
// Boot backends
// ---------------------------------------------------------------------------

type CheckOutcome = { ok: true; detail: string } | { ok: false; detail: string };

type Probes = {
  boot(): Promise<CheckOutcome>;
  /** `null` when the format cannot run the functional probe */
  functional(): Promise<CheckOutcome | null>;
};

/**
 * Per-artifact boot session. `open` holds whatever the probes need for the
 * duration of `fn` and releases it afterwards.
 */
interface BootSession {
  readonly evidence: BootEvidence;
  open<T>(fn: (probes: Probes) => Promise<T>): Promise<T>;
}

type SessionDeps = {
  imagePath: string;
  config: BuildConfig;
  workDir: string;
  runner: ToolRunner;
  containers: () => ContainerEngine;
  emulator: Emulator;
  firmware: FirmwareTool;
  bootTimeoutMs: number;
  probeTimeoutMs: number;
  logger: Logger;
};

function describeRun(result: { exitCode: number | null; timedOut: boolean; stderr: string }) {
  if (result.timedOut) return "timed out";
  const stderr = result.stderr.trim();
  return `exited with code ${result.exitCode}${stderr ? `: ${stderr.slice(-500)}` : ""}`;
}

class ContainerSession implements BootSession {
  readonly evidence = "container-probe";
  private readonly deps: SessionDeps;

  constructor(deps: SessionDeps) {
    this.deps = deps;
  }

  open<T>(fn: (probes: Probes) => Promise<T>): Promise<T> {
    const engine = this.deps.containers();
    return withLoadedImage(engine, this.deps.imagePath, (image) =>
      fn({
        boot: () => this.boot(engine, image),
        functional: () => this.functional(engine, image),
      })
    );
  }

  private async boot(engine: ContainerEngine, image: string): Promise<CheckOutcome> {
    const result = await engine.run(
      image,
      ["elixir", "-e", `IO.puts(${JSON.stringify(BOOT_MARKER)})`],
      this.deps.bootTimeoutMs
    );
    if (result.stdout.includes(BOOT_MARKER)) {
      return { ok: true, detail: "runtime started in container" };
    }
    return { ok: false, detail: `boot probe ${describeRun(result)}` };
  }

  private async functional(engine: ContainerEngine, image: string): Promise<CheckOutcome> {
    const result = await engine.run(image, ["elixir", "-e", VERSION_EXPRESSION], this.deps.probeTimeoutMs);
    const version = result.stdout.trim();
    if (result.exitCode === 0 && /^\d+\.\d+/.test(version)) {
      return { ok: true, detail: `elixir ${version}` };
    }
    return { ok: false, detail: `version probe ${describeRun(result)}` };
  }
}

class KernelSession implements BootSession {
  readonly evidence = "booted";
  private files: Record<string, string> | null = null;
  private readonly deps: SessionDeps;

  constructor(deps: SessionDeps) {
    this.deps = deps;
  }

  private async bootOptions(probe: string, marker: string, timeoutMs: number): Promise<BootOptions> {
    if (!this.files) {
      this.files = await extractBundle(this.deps.imagePath, this.deps.workDir, { runner: this.deps.runner });
    }
    const names = Object.keys(this.files);
    const kernelName = names.find((name) => name === "bzImage" || name === "Image");
    const initrdName = names.find((name) => name.startsWith("initramfs.cpio"));
    const rootfsName = names.find((name) => name.startsWith("rootfs.ext"));
    if (!kernelName || (!initrdName && !rootfsName)) {
      throw new Error(`bundle holds ${names.join(", ") || "nothing"}, expected a kernel and a root image`);
    }

    const { arch, memoryMb, cpus } = this.deps.config.vmOptions;
    const append = [`console=${consoleDevice(arch)}`, "panic=-1", `${PROBE_PARAM}=${probe}`];
    if (!initrdName) {
      append.push("root=/dev/vda", "rw", `init=${ROOTFS_INIT_PATH}`);
    }

    return {
      kernelPath: this.files[kernelName],
      initrdPath: initrdName ? this.files[initrdName] : undefined,
      drivePath: !initrdName && rootfsName ? this.files[rootfsName] : undefined,
      append: append.join(" "),
      memoryMb,
      cpus,
      arch,
      marker,
      timeoutMs,
    };
  }

  async boot(): Promise<CheckOutcome> {
    const result = await this.deps.emulator.boot(
      await this.bootOptions("boot", BOOT_MARKER, this.deps.bootTimeoutMs)
    );
    if (result.matched) {
      return { ok: true, detail: `boot marker after ${result.durationMs}ms` };
    }
    if (result.timedOut) {
      return { ok: false, detail: `no boot marker within ${this.deps.bootTimeoutMs}ms` };
    }
    return { ok: false, detail: `emulator exited with code ${result.exitCode} before the boot marker` };
  }

  async functional(): Promise<CheckOutcome> {
    const result = await this.deps.emulator.boot(
      await this.bootOptions("functional", FUNCTIONAL_DONE, this.deps.probeTimeoutMs)
    );
    const match = result.output.match(new RegExp(`${FUNCTIONAL_RESULT} (\\S+)`));
    if (result.matched && match && /^\d+\.\d+/.test(match[1])) {
      return { ok: true, detail: `elixir ${match[1]}` };
    }
    if (result.timedOut) {
      return { ok: false, detail: `functional probe did not finish within ${this.deps.probeTimeoutMs}ms` };
    }
    return { ok: false, detail: "functional probe reported no runtime version" };
  }

  /** extracted files live in the validation work directory */
  open<T>(fn: (probes: Probes) => Promise<T>): Promise<T> {
    return fn(this);
  }
}

class FirmwareSession implements BootSession {
  readonly evidence = "metadata-only";
  private readonly deps: SessionDeps;

  constructor(deps: SessionDeps) {
    this.deps = deps;
  }

  async boot(): Promise<CheckOutcome> {
    const { imagePath } = this.deps;
    if (imagePath.endsWith(".fw")) {
      const metadata = await this.deps.firmware.introspect(imagePath);
      const missing = missingFirmwareKeys(metadata);
      if (missing.length > 0) {
        return { ok: false, detail: `firmware metadata lacks ${missing.join(", ")}` };
      }
      return { ok: true, detail: `${metadata["meta-product"]} ${metadata["meta-version"]}` };
    }

    if (imagePath.endsWith(".img")) {
      const offset = rootfsPartitionOffset(imagePath);
      if (offset === null) {
        return { ok: false, detail: "disk image has no root filesystem partition" };
      }
      const hasRuntime = await withLoopMount(
        this.deps.runner,
        imagePath,
        async (mountPoint) => fs.existsSync(path.join(mountPoint, "srv", "erlang")),
        { offset }
      );
      return hasRuntime
        ? { ok: true, detail: "runtime release found on root filesystem" }
        : { ok: false, detail: "root filesystem has no srv/erlang release" };
    }

    return { ok: false, detail: `unsupported firmware format ${path.extname(imagePath) || "(none)"}` };
  }

  async functional(): Promise<null> {
    return null;
  }

  open<T>(fn: (probes: Probes) => Promise<T>): Promise<T> {
    return fn(this);
  }
}

function openSession(format: ArtifactFormat, deps: SessionDeps): BootSession {
  switch (format) {
    case "container":
      return new ContainerSession(deps);
    case "kernel":
      return new KernelSession(deps);
    case "firmware":
      return new FirmwareSession(deps);
  }
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

/**
 * Walks an artifact through
 * `Exists → SizeChecked → BootChecked → FunctionalChecked → Report`.
 *
 * The first failed check ends the walk; later checks are reported as
 * skipped. Nothing is retried and the artifact is never modified.
 */
export class ValidationEngine {
  private readonly options: ValidationOptions;
  private readonly logger: Logger;
  private readonly runner: ToolRunner;
  private engine: ContainerEngine | null;

  constructor(options: ValidationOptions = {}) {
    this.options = options;
    this.logger = options.logger ?? silentLogger;
    this.runner = options.runner ?? new LocalToolRunner(this.logger);
    this.engine = options.containers ?? null;
  }

  private containers(): ContainerEngine {
    if (!this.engine) {
      this.engine = new CliContainerEngine(detectContainerRuntime(), this.runner);
    }
    return this.engine;
  }

  private enter(state: ValidationState, imagePath: string) {
    this.logger.debug("validate", `${path.basename(imagePath)}: ${state}`);
  }

  async validate(imagePath: string, config: BuildConfig): Promise<ValidationReport> {
    const tolerance = this.options.tolerance ?? DEFAULT_SIZE_TOLERANCE;
    const checks: Record<ValidationCheck, CheckStatus> = {
      exists: "skipped",
      size: "skipped",
      boot: "skipped",
      functional: "skipped",
    };
    let failure: ValidationFailure | null = null;
    let sizeMb: number | null = null;
    let evidence: BootEvidence = "none";

    const fail = (check: ValidationCheck, detail: string) => {
      checks[check] = "failed";
      failure = new ValidationFailure(check, detail);
      this.logger.warn(failure.message);
    };

    const report = (): ValidationReport => {
      this.enter("Report", imagePath);
      const recorded: ValidationFailure | null = failure;
      return Object.freeze({
        imagePath,
        type: config.type,
        exists: checks.exists === "passed",
        sizeAcceptable: checks.size === "passed",
        bootable: checks.boot === "passed",
        functional: checks.functional === "passed",
        timestamp: (this.options.now?.() ?? new Date()).toISOString(),
        sizeMb,
        bootEvidence: evidence,
        checks: Object.freeze({ ...checks }),
        failure: recorded ? Object.freeze({ check: recorded.check, detail: recorded.detail }) : null,
      });
    };

    this.enter("Exists", imagePath);
    if (!fs.existsSync(imagePath) || !fs.statSync(imagePath).isFile()) {
      fail("exists", `${imagePath} does not exist`);
      return report();
    }
    checks.exists = "passed";

    this.enter("SizeChecked", imagePath);
    const bytes = fs.statSync(imagePath).size;
    sizeMb = bytesToMb(bytes);
    const limit = config.targetSize * tolerance;
    if (bytes > limit * MB) {
      // the rounded figure can sit on the limit itself
      const shown = sizeMb > limit ? `${sizeMb}` : (bytes / MB).toFixed(2);
      fail("size", `${shown} MB exceeds ${limit} MB (${tolerance} x target ${config.targetSize} MB)`);
      return report();
    }
    checks.size = "passed";

    const format = artifactFormat(config.type);
    await withTempDir(
      async (workDir) => {
        const session = openSession(format, {
          imagePath,
          config,
          workDir,
          runner: this.runner,
          containers: () => this.containers(),
          emulator: this.options.emulator ?? new QemuEmulator(this.logger),
          firmware: this.options.firmware ?? new FwupTool(this.runner),
          bootTimeoutMs: this.options.bootTimeoutMs ?? DEFAULT_BOOT_TIMEOUT_MS,
          probeTimeoutMs: this.options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS,
          logger: this.logger,
        });

        try {
          await session.open(async (probes) => {
            this.enter("BootChecked", imagePath);
            const boot = await settle(() => probes.boot());
            if (!boot.ok) {
              fail("boot", boot.detail);
              return;
            }
            checks.boot = "passed";
            evidence = session.evidence;
            this.logger.debug("validate", `boot: ${boot.detail}`);

            this.enter("FunctionalChecked", imagePath);
            const functional = await settle(() => probes.functional());
            if (functional === null) {
              this.logger.debug("validate", `functional probe not available for ${format} artifacts`);
              return;
            }
            if (!functional.ok) {
              fail("functional", functional.detail);
              return;
            }
            checks.functional = "passed";
            this.logger.debug("validate", `functional: ${functional.detail}`);
          });
        } catch (err) {
          // acquisition failures count against boot, release failures only warn
          if (checks.boot === "skipped") {
            fail("boot", errorMessage(err));
          } else {
            this.logger.warn(`failed to release validation resources: ${errorMessage(err)}`);
          }
        }
      },
      { prefix: "leanvm-validate-", parent: this.options.workParent }
    );

    return report();
  }
}

/** a thrown error becomes a failed outcome */
async function settle<T extends CheckOutcome | null>(fn: () => Promise<T>): Promise<T | CheckOutcome> {
  try {
    return await fn();
  } catch (err) {
    return { ok: false, detail: errorMessage(err) };
  }
}
