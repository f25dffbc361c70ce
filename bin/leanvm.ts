#!/usr/bin/env node
import fs from "fs";

import { analyzeImage, formatAnalysis } from "../src/analyzer";
import { buildAndValidate, buildImage, declaredApplications } from "../src/builder";
import type { Architecture, BuildConfigInput, BuildType, RetentionFlags, VmOptions } from "../src/build-config";
import {
  BUILD_TYPES,
  COMPRESSIONS,
  describeBuildConfig,
  getDefaultBuildConfig,
  resolveBuildConfig,
  serializeBuildConfig,
} from "../src/build-config";
import type { DebugConfig } from "../src/debug";
import { createLogger, debugFlagsToArray, parseDebugEnv } from "../src/debug";
import { ConfigurationError } from "../src/errors";
import type { KernelVariant } from "../src/kernel-config";
import { estimateKernelSize, generateKernelProfile, renderKernelConfig } from "../src/kernel-config";
import {
  componentSizeMb,
  decideRetention,
  estimateSavings,
  parseRetentionFlags,
} from "../src/otp-stripper";
import { estimateSize, formatSizeEstimate } from "../src/size-estimator";
import type { ValidationReport } from "../src/validator";
import { ValidationEngine, validateDependencies } from "../src/validator";

function usage() {
  console.log("Usage: leanvm <command> [options]");
  console.log("Commands:");
  console.log("  build          Build an image");
  console.log("  validate IMAGE Check an existing image against a config");
  console.log("  analyze IMAGE  Break down where the bytes of an image go");
  console.log("  estimate       Print the expected image size");
  console.log("  describe       Print the resolved build plan as JSON");
  console.log("  kernel-config  Print the minimal kernel config fragment");
  console.log("  strip-plan     List the runtime components a build removes");
  console.log("  init-config    Print the default config as JSON");
  console.log("  help           Show this help");
  console.log("\nRun leanvm <command> --help for command-specific flags.");
}

function configUsage(command: string, extra: string[] = []) {
  console.log(`Usage: leanvm ${command} [options]`);
  console.log("Config Options:");
  console.log("  --config FILE            Read a JSON build config (flags override it)");
  console.log(`  --type TYPE              Strategy: ${BUILD_TYPES.join(", ")}`);
  console.log("  --target-size MB         Size target");
  console.log("  --app DIR                Application directory");
  console.log("  --output DIR             Output directory");
  console.log(`  --compression TYPE       ${COMPRESSIONS.join(", ")}`);
  console.log("  --package NAME           Extra dependency (can repeat)");
  console.log("  --application NAME       Runtime application the app needs (can repeat)");
  console.log("  --no-strip               Keep every runtime component");
  console.log("  --keep-ssh, --keep-ssl, --keep-http, --keep-mnesia, --keep-dev-tools");
  console.log("                           Retain an optional component group");
  console.log("  --arch ARCH              aarch64 or x86_64");
  console.log("  --memory MB              Guest memory");
  console.log("  --cpus N                 Guest vCPU count");
  console.log("  --kernel-version VER     Linux version for custom builds");
  console.log("  --runtime-image IMAGE    Container image the runtime is taken from");
  console.log("  --nerves-target TARGET   Nerves target");
  if (extra.length > 0) {
    console.log();
    console.log("Command Options:");
    for (const line of extra) console.log(line);
  }
}

type CommandArgs = {
  input: Record<string, unknown>;
  positional: string[];
  debug?: DebugConfig;
  quiet: boolean;
  keepWorkDir: boolean;
  validate: boolean;
  jobs?: number;
  tolerance?: number;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

function readConfigFile(file: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (err) {
    throw new ConfigurationError(`cannot read ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`${file} must contain a JSON object`);
  }
  return parsed;
}

/** flag values win over file values, nested objects are merged */
function mergeInput(base: Record<string, unknown>, overrides: BuildConfigInput): Record<string, unknown> {
  const nested = (value: unknown, extra: object | undefined) => {
    if (!extra) return value;
    return isRecord(value) ? { ...value, ...extra } : value === undefined ? extra : value;
  };
  return {
    ...base,
    ...overrides,
    retention: nested(base.retention, overrides.retention),
    vmOptions: nested(base.vmOptions, overrides.vmOptions),
  };
}

function parseCommandArgs(command: string, argv: string[], extraUsage: string[] = []): CommandArgs {
  const overrides: BuildConfigInput = {};
  const retention: Partial<RetentionFlags> = {};
  const vmOptions: Partial<VmOptions> = {};
  const packages: string[] = [];
  const applications: string[] = [];
  const positional: string[] = [];
  let configFile: string | undefined;
  const args: CommandArgs = { input: {}, positional, quiet: false, keepWorkDir: false, validate: false };

  const fail: (message: string) => never = (message) => {
    console.error(message);
    configUsage(command, extraUsage);
    process.exit(1);
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const value = () => {
      const next = argv[++i];
      if (next === undefined) fail(`${arg} requires a value`);
      return next;
    };
    const number = () => {
      const parsed = Number(value());
      if (!Number.isFinite(parsed)) fail(`${arg} must be a number`);
      return parsed;
    };

    if (arg.startsWith("--debug")) {
      args.debug = arg === "--debug" ? true : debugFlagsToArray(parseDebugEnv(arg.slice("--debug=".length)));
      continue;
    }
    if (arg.startsWith("--keep-") && arg !== "--keep-work-dir") {
      const flags = parseRetentionFlags({ [arg.slice(2).replace(/-/g, "_")]: true });
      if (Object.keys(flags).length === 0) fail(`Unknown argument: ${arg}`);
      Object.assign(retention, flags);
      continue;
    }

    switch (arg) {
      case "--config":
        configFile = value();
        break;
      case "--type": {
        const type = value();
        const known = BUILD_TYPES.find((entry) => entry === type);
        if (!known) fail(`--type must be one of ${BUILD_TYPES.join(", ")}`);
        overrides.type = known;
        break;
      }
      case "--target-size":
        overrides.targetSize = number();
        break;
      case "--app":
        overrides.appPath = value();
        break;
      case "--output":
        overrides.outputDir = value();
        break;
      case "--compression": {
        const compression = value();
        const known = COMPRESSIONS.find((entry) => entry === compression);
        if (!known) fail(`--compression must be one of ${COMPRESSIONS.join(", ")}`);
        overrides.compression = known;
        break;
      }
      case "--package":
        packages.push(value());
        break;
      case "--application":
        applications.push(value());
        break;
      case "--no-strip":
        overrides.stripModules = false;
        break;
      case "--arch": {
        const arch = value();
        if (arch !== "aarch64" && arch !== "x86_64") fail("--arch must be aarch64 or x86_64");
        vmOptions.arch = arch === "aarch64" ? "aarch64" : "x86_64";
        break;
      }
      case "--memory":
        vmOptions.memoryMb = number();
        break;
      case "--cpus":
        vmOptions.cpus = number();
        break;
      case "--kernel-version":
        vmOptions.kernelVersion = value();
        break;
      case "--runtime-image":
        vmOptions.runtimeImage = value();
        break;
      case "--nerves-target":
        vmOptions.nervesTarget = value();
        break;
      case "--quiet":
      case "-q":
        args.quiet = true;
        break;
      case "--keep-work-dir":
        args.keepWorkDir = true;
        break;
      case "--validate":
        args.validate = true;
        break;
      case "--jobs":
        args.jobs = number();
        break;
      case "--tolerance":
        args.tolerance = number();
        break;
      case "--help":
      case "-h":
        configUsage(command, extraUsage);
        process.exit(0);
      default:
        if (arg.startsWith("-")) fail(`Unknown argument: ${arg}`);
        positional.push(arg);
    }
  }

  if (packages.length > 0) overrides.packages = packages;
  if (applications.length > 0) overrides.applications = applications;
  if (Object.keys(retention).length > 0) overrides.retention = retention;
  if (Object.keys(vmOptions).length > 0) overrides.vmOptions = vmOptions;

  args.input = mergeInput(configFile ? readConfigFile(configFile) : {}, overrides);
  return args;
}

function printReport(report: ValidationReport) {
  console.log(JSON.stringify(report, null, 2));
  if (report.failure) {
    console.error(`${report.failure.check} check failed: ${report.failure.detail}`);
  }
}

async function runBuild(argv: string[]) {
  const args = parseCommandArgs("build", argv, [
    "  --validate               Validate the image after building",
    "  --keep-work-dir          Leave the work directory behind",
    "  --jobs N                 Parallel make jobs",
    "  --quiet, -q              Only print warnings and the result",
    "  --debug[=FLAGS]          Debug output (build,exec,validate,qemu)",
  ]);
  const logger = createLogger({ verbose: !args.quiet, debug: args.debug });
  const options = { logger, keepWorkDir: args.keepWorkDir, jobs: args.jobs };

  const config = resolveBuildConfig(args.input);

  if (!args.validate) {
    const artifact = await buildImage(config, options);
    console.log(artifact.imagePath);
    return;
  }

  const { artifact, report } = await buildAndValidate(config, {
    ...options,
    validation: { logger, tolerance: args.tolerance },
  });
  console.log(artifact.imagePath);
  printReport(report);
  if (report.failure) process.exit(1);
}

async function runValidate(argv: string[]) {
  const args = parseCommandArgs("validate", argv, [
    "  --tolerance N            Accepted size as a multiple of the target (default 1.5)",
    "  --debug[=FLAGS]          Debug output (build,exec,validate,qemu)",
  ]);
  const [imagePath] = args.positional;
  if (!imagePath) {
    console.error("validate requires an image path");
    process.exit(1);
  }

  const config = resolveBuildConfig(args.input);
  const missing = validateDependencies(config.type, config.vmOptions.arch);
  if (missing.length > 0) {
    console.error(`warning: validation tools not found: ${missing.join(", ")}`);
  }

  const engine = new ValidationEngine({
    logger: createLogger({ debug: args.debug }),
    tolerance: args.tolerance,
  });
  const report = await engine.validate(imagePath, config);
  printReport(report);
  if (report.failure) process.exit(1);
}

function runEstimate(argv: string[]) {
  const args = parseCommandArgs("estimate", argv);
  const config = resolveBuildConfig(args.input);
  const decision = decideRetention(config.retention, {
    stripModules: config.stripModules,
    declaredApplications: declaredApplications(config),
  });
  const estimate = estimateSize(config, decision);
  console.log(`${config.type}: ${formatSizeEstimate(estimate)} (target ${config.targetSize}MB)`);
  for (const warning of decision.warnings) {
    console.log(`  ${warning}`);
  }
}

function runDescribe(argv: string[]) {
  const args = parseCommandArgs("describe", argv);
  const config = resolveBuildConfig(args.input);
  console.log(JSON.stringify(describeBuildConfig(config), null, 2));
}

function runStripPlan(argv: string[]) {
  const args = parseCommandArgs("strip-plan", argv);
  const config = resolveBuildConfig(args.input);
  const decision = decideRetention(config.retention, {
    stripModules: config.stripModules,
    declaredApplications: declaredApplications(config),
  });

  console.log("Removed:");
  for (const name of decision.removed) {
    console.log(`  ${name.padEnd(16)} ${componentSizeMb(name).toFixed(1)} MB`);
  }
  console.log("Retained:");
  for (const name of [...decision.required, ...decision.retained]) {
    console.log(`  ${name}`);
  }
  for (const warning of decision.warnings) {
    console.log(`warning: ${warning}`);
  }
  if (config.stripModules) {
    const savings = estimateSavings(config.retention);
    console.log(`Estimated savings: ${savings.savedMb} MB across ${savings.removedCount} components`);
  }
}

function kernelUsage() {
  console.log("Usage: leanvm kernel-config [options]");
  console.log("Options:");
  console.log("  --arch ARCH        aarch64 or x86_64 (default x86_64)");
  console.log("  --variant VARIANT  qemu or container (default qemu)");
  console.log("  --enable OPTION    Enable an extra option (can repeat)");
  console.log("  --disable OPTION   Disable an extra option (can repeat)");
}

function runKernelConfig(argv: string[]) {
  let arch: Architecture = "x86_64";
  let variant: KernelVariant = "qemu";
  const enable: string[] = [];
  const disable: string[] = [];

  const fail: (message: string) => never = (message) => {
    console.error(message);
    kernelUsage();
    process.exit(1);
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const value = () => {
      const next = argv[++i];
      if (next === undefined) fail(`${arg} requires a value`);
      return next;
    };
    switch (arg) {
      case "--arch": {
        const next = value();
        if (next !== "aarch64" && next !== "x86_64") fail("--arch must be aarch64 or x86_64");
        arch = next === "aarch64" ? "aarch64" : "x86_64";
        break;
      }
      case "--variant": {
        const next = value();
        if (next !== "qemu" && next !== "container") fail("--variant must be qemu or container");
        variant = next === "container" ? "container" : "qemu";
        break;
      }
      case "--enable":
        enable.push(value());
        break;
      case "--disable":
        disable.push(value());
        break;
      case "--help":
      case "-h":
        kernelUsage();
        process.exit(0);
      default:
        fail(`Unknown argument: ${arg}`);
    }
  }

  process.stdout.write(renderKernelConfig(generateKernelProfile({ arch, variant, enable, disable })));
  console.error(`estimated compressed kernel: ${estimateKernelSize(variant)}`);
}

function analyzeUsage() {
  console.log("Usage: leanvm analyze IMAGE [options]");
  console.log("IMAGE is a root directory, an initramfs, a kernel bundle, a saved container");
  console.log("image or a raw disk image.");
  console.log("Options:");
  console.log(`  --type TYPE      Strategy that built IMAGE: ${BUILD_TYPES.join(", ")}`);
  console.log("  --top N          Number of largest files to list (default 10)");
  console.log("  --json           Print the analysis as JSON");
  console.log("  --debug[=FLAGS]  Debug output (build,exec,validate,qemu)");
}

async function runAnalyze(argv: string[]) {
  let type: BuildType | undefined;
  let top: number | undefined;
  let json = false;
  let debug: DebugConfig | undefined;
  let imagePath: string | undefined;

  const fail: (message: string) => never = (message) => {
    console.error(message);
    analyzeUsage();
    process.exit(1);
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const value = () => {
      const next = argv[++i];
      if (next === undefined) fail(`${arg} requires a value`);
      return next;
    };
    if (arg.startsWith("--debug")) {
      debug = arg === "--debug" ? true : debugFlagsToArray(parseDebugEnv(arg.slice("--debug=".length)));
      continue;
    }
    switch (arg) {
      case "--type": {
        const next = value();
        const known = BUILD_TYPES.find((entry) => entry === next);
        if (!known) fail(`--type must be one of ${BUILD_TYPES.join(", ")}`);
        type = known;
        break;
      }
      case "--top": {
        const parsed = Number(value());
        if (!Number.isInteger(parsed) || parsed < 0) fail("--top must be a non-negative integer");
        top = parsed;
        break;
      }
      case "--json":
        json = true;
        break;
      case "--help":
      case "-h":
        analyzeUsage();
        process.exit(0);
      default:
        if (arg.startsWith("-") || imagePath) fail(`Unknown argument: ${arg}`);
        imagePath = arg;
    }
  }
  if (!imagePath) fail("analyze requires an image path");

  const analysis = await analyzeImage(imagePath, { type, top, logger: createLogger({ debug }) });
  if (json) {
    console.log(JSON.stringify(analysis, null, 2));
    return;
  }
  for (const line of formatAnalysis(analysis)) console.log(line);
}

function runInitConfig() {
  console.log(serializeBuildConfig(getDefaultBuildConfig()));
}

async function main() {
  const [command, ...args] = process.argv.slice(2);

  if (!command || command === "help" || command === "--help" || command === "-h") {
    usage();
    process.exit(command ? 0 : 1);
  }

  switch (command) {
    case "build":
      await runBuild(args);
      return;
    case "validate":
      await runValidate(args);
      return;
    case "analyze":
      await runAnalyze(args);
      return;
    case "estimate":
      runEstimate(args);
      return;
    case "describe":
      runDescribe(args);
      return;
    case "kernel-config":
      runKernelConfig(args);
      return;
    case "strip-plan":
      runStripPlan(args);
      return;
    case "init-config":
      runInitConfig();
      return;
    default:
      console.error(`Unknown command: ${command}`);
      usage();
      process.exit(1);
  }
}

main().catch((err) => {
  console.error(err.message);
  process.exit(1);
});
