/**
 * Build configuration for lean runtime images.
 *
 * Users can generate a default config with `leanvm init-config`, edit it,
 * and then build with `leanvm build --config <file>`.
 */

import fs from "fs";
import path from "path";

import { ConfigurationError } from "./errors";

export type Architecture = "aarch64" | "x86_64";

/** build strategy */
export type BuildType = "alpine" | "custom" | "buildroot" | "nerves";

export type Compression = "xz" | "gzip" | "none";

export const BUILD_TYPES: ReadonlyArray<BuildType> = ["alpine", "custom", "buildroot", "nerves"];

export const COMPRESSIONS: ReadonlyArray<Compression> = ["xz", "gzip", "none"];

/**
 * Optional runtime component groups kept in the image.
 */
export interface RetentionFlags {
  /** keep the ssh application */
  ssh: boolean;
  /** keep ssl and public_key */
  ssl: boolean;
  /** keep inets (http client/server) */
  http: boolean;
  /** keep the mnesia database */
  mnesia: boolean;
  /** keep runtime_tools, sasl and syntax_tools */
  devTools: boolean;
}

export type RetentionFlag = keyof RetentionFlags;

export const RETENTION_FLAGS: ReadonlyArray<RetentionFlag> = [
  "ssh",
  "ssl",
  "http",
  "mnesia",
  "devTools",
];

/**
 * Guest and toolchain options.
 */
export interface VmOptions {
  /** guest memory in `mb` */
  memoryMb: number;
  /** guest vcpu count */
  cpus: number;
  /** target architecture */
  arch: Architecture;
  /** pinned linux version for custom builds (default: "6.6.58") */
  kernelVersion?: string;
  /** pinned busybox version for custom builds (default: "1.36.1") */
  busyboxVersion?: string;
  /** container image the runtime is taken from (default: "elixir:1.15-alpine") */
  runtimeImage?: string;
  /** nerves target (default: "qemu_arm") */
  nervesTarget?: string;
}

/**
 * Resolved build configuration. Values returned by `resolveBuildConfig` are
 * frozen.
 */
export interface BuildConfig {
  type: BuildType;
  /** size target in `mb` */
  targetSize: number;
  /** application directory baked into the image */
  appPath?: string;
  /** directory receiving the packaged bundle */
  outputDir: string;
  /** extra dependency names (os packages for container builds) */
  packages: readonly string[];
  /** runtime applications the app needs */
  applications: readonly string[];
  /** remove unused runtime components */
  stripModules: boolean;
  compression: Compression;
  retention: Readonly<RetentionFlags>;
  vmOptions: Readonly<VmOptions>;
}

/** user-facing config shape, every field optional */
export type BuildConfigInput = {
  type?: BuildType;
  targetSize?: number;
  appPath?: string;
  outputDir?: string;
  packages?: string[];
  applications?: string[];
  stripModules?: boolean;
  compression?: Compression;
  retention?: Partial<RetentionFlags>;
  vmOptions?: Partial<VmOptions>;
};

export const DEFAULT_TARGET_SIZE_MB = 30;
export const DEFAULT_OUTPUT_DIR = "./build";

/**
 * Get the default build configuration for the current system.
 */
export function getDefaultBuildConfig(): BuildConfig {
  return {
    type: "alpine",
    targetSize: DEFAULT_TARGET_SIZE_MB,
    outputDir: DEFAULT_OUTPUT_DIR,
    packages: [],
    applications: [],
    stripModules: true,
    compression: "xz",
    retention: {
      ssh: false,
      ssl: false,
      http: false,
      mnesia: false,
      devTools: false,
    },
    vmOptions: {
      memoryMb: 256,
      cpus: 1,
      arch: getDefaultArch(),
    },
  };
}

/**
 * Get the default architecture based on the current system.
 */
export function getDefaultArch(): Architecture {
  const arch = process.arch;
  if (arch === "arm64") {
    return "aarch64";
  }
  return "x86_64";
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((entry) => typeof entry === "string");

const isOptionalString = (value: unknown): value is string | undefined =>
  value === undefined || typeof value === "string";

const isOptionalBoolean = (value: unknown): value is boolean | undefined =>
  value === undefined || typeof value === "boolean";

const isPositiveNumber = (value: unknown): value is number =>
  typeof value === "number" && Number.isFinite(value) && value > 0;

const isPositiveInteger = (value: unknown): value is number =>
  isPositiveNumber(value) && Number.isInteger(value);

function isBuildType(value: unknown): value is BuildType {
  return value === "alpine" || value === "custom" || value === "buildroot" || value === "nerves";
}

function isCompression(value: unknown): value is Compression {
  return value === "xz" || value === "gzip" || value === "none";
}

function isArchitecture(value: unknown): value is Architecture {
  return value === "aarch64" || value === "x86_64";
}

function uniqueStrings(values: readonly string[]): string[] {
  return Array.from(new Set(values.map((value) => value.trim()).filter(Boolean)));
}

function readRetention(value: unknown): RetentionFlags {
  const defaults = getDefaultBuildConfig().retention;
  if (value === undefined) return { ...defaults };
  if (!isRecord(value)) {
    throw new ConfigurationError("expected an object", "retention");
  }

  // unknown keys are ignored
  const out: RetentionFlags = { ...defaults };
  for (const flag of RETENTION_FLAGS) {
    const entry = value[flag];
    if (!isOptionalBoolean(entry)) {
      throw new ConfigurationError("expected a boolean", `retention.${flag}`);
    }
    if (entry !== undefined) out[flag] = entry;
  }
  return out;
}

function readVmOptions(value: unknown): VmOptions {
  const defaults = getDefaultBuildConfig().vmOptions;
  if (value === undefined) return { ...defaults };
  if (!isRecord(value)) {
    throw new ConfigurationError("expected an object", "vmOptions");
  }

  const out: VmOptions = { ...defaults };

  if (value.memoryMb !== undefined) {
    if (!isPositiveInteger(value.memoryMb)) {
      throw new ConfigurationError("expected a positive integer", "vmOptions.memoryMb");
    }
    out.memoryMb = value.memoryMb;
  }
  if (value.cpus !== undefined) {
    if (!isPositiveInteger(value.cpus)) {
      throw new ConfigurationError("expected a positive integer", "vmOptions.cpus");
    }
    out.cpus = value.cpus;
  }
  if (value.arch !== undefined) {
    if (!isArchitecture(value.arch)) {
      throw new ConfigurationError(`unsupported architecture ${String(value.arch)}`, "vmOptions.arch");
    }
    out.arch = value.arch;
  }

  for (const key of ["kernelVersion", "busyboxVersion", "runtimeImage", "nervesTarget"] as const) {
    const entry = value[key];
    if (!isOptionalString(entry)) {
      throw new ConfigurationError("expected a string", `vmOptions.${key}`);
    }
    if (entry !== undefined) {
      if (!entry.trim()) {
        throw new ConfigurationError("must not be empty", `vmOptions.${key}`);
      }
      out[key] = entry;
    }
  }

  return out;
}

/**
 * Merge `input` over the defaults, validate it and return a frozen config.
 *
 * Throws `ConfigurationError` on the first invalid field.
 */
export function resolveBuildConfig(input: unknown = {}): BuildConfig {
  if (!isRecord(input)) {
    throw new ConfigurationError("build configuration must be an object");
  }

  const defaults = getDefaultBuildConfig();

  const type = input.type ?? defaults.type;
  if (!isBuildType(type)) {
    throw new ConfigurationError(
      `unknown build type ${JSON.stringify(type)} (expected one of ${BUILD_TYPES.join(", ")})`,
      "type"
    );
  }

  const targetSize = input.targetSize ?? defaults.targetSize;
  if (!isPositiveNumber(targetSize)) {
    throw new ConfigurationError("must be a positive number of mb", "targetSize");
  }

  if (!isOptionalString(input.appPath)) {
    throw new ConfigurationError("expected a string", "appPath");
  }
  let appPath: string | undefined;
  if (input.appPath !== undefined) {
    appPath = path.resolve(input.appPath);
    if (!fs.existsSync(appPath) || !fs.statSync(appPath).isDirectory()) {
      throw new ConfigurationError(`application directory ${input.appPath} does not exist`, "appPath");
    }
  }

  const outputDir = input.outputDir ?? defaults.outputDir;
  if (typeof outputDir !== "string" || !outputDir.trim()) {
    throw new ConfigurationError("expected a non-empty string", "outputDir");
  }

  const packages = input.packages ?? [];
  if (!isStringArray(packages)) {
    throw new ConfigurationError("expected an array of strings", "packages");
  }

  const applications = input.applications ?? [];
  if (!isStringArray(applications)) {
    throw new ConfigurationError("expected an array of strings", "applications");
  }

  const stripModules = input.stripModules ?? defaults.stripModules;
  if (typeof stripModules !== "boolean") {
    throw new ConfigurationError("expected a boolean", "stripModules");
  }

  const compression = input.compression ?? defaults.compression;
  if (!isCompression(compression)) {
    throw new ConfigurationError(
      `unknown compression ${JSON.stringify(compression)} (expected one of ${COMPRESSIONS.join(", ")})`,
      "compression"
    );
  }

  return deepFreeze({
    type,
    targetSize,
    appPath,
    outputDir,
    packages: uniqueStrings(packages),
    applications: uniqueStrings(applications),
    stripModules,
    compression,
    retention: readRetention(input.retention),
    vmOptions: readVmOptions(input.vmOptions),
  });
}

/**
 * Check a build configuration without throwing. Defaults are not applied,
 * so a valid input is not yet a `BuildConfig`; resolve it for that.
 */
export function validateBuildConfig(config: unknown): boolean {
  try {
    resolveBuildConfig(config);
    return true;
  } catch (err) {
    if (err instanceof ConfigurationError) return false;
    throw err;
  }
}

/**
 * Parse and validate a build configuration from JSON.
 */
export function parseBuildConfig(json: string): BuildConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new ConfigurationError(`invalid json: ${err instanceof Error ? err.message : String(err)}`);
  }
  return resolveBuildConfig(parsed);
}

/**
 * Serialize a build configuration to JSON.
 */
export function serializeBuildConfig(config: BuildConfig): string {
  return JSON.stringify(config, null, 2);
}

const BUILD_METHODS: Record<BuildType, string> = {
  alpine: "docker-multi-stage",
  custom: "custom-kernel",
  buildroot: "buildroot-makefile",
  nerves: "nerves-mix",
};

/**
 * Descriptive summary of a configuration, as printed by `leanvm describe`.
 */
export function describeBuildConfig(config: BuildConfig) {
  return {
    architecture: {
      type: config.type,
      arch: config.vmOptions.arch,
      targetSizeMb: config.targetSize,
      compression: config.compression,
    },
    build: {
      method: BUILD_METHODS[config.type],
      stripModules: config.stripModules,
      packages: [...config.packages],
      retention: { ...config.retention },
    },
    runtime: {
      appPath: config.appPath ?? null,
      applications: [...config.applications],
      memoryMb: config.vmOptions.memoryMb,
      cpus: config.vmOptions.cpus,
    },
  };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const entry of Object.values(value)) {
      deepFreeze(entry);
    }
  }
  return value;
}
