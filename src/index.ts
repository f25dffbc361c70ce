export {
  buildImage,
  buildAndValidate,
  checkDependencies,
  declaredApplications,
  findMissingTools,
  STRATEGIES,
} from "./builder";
export type { BuildArtifact, BuildOptions } from "./builder";

export {
  BUILD_TYPES,
  COMPRESSIONS,
  RETENTION_FLAGS,
  describeBuildConfig,
  getDefaultArch,
  getDefaultBuildConfig,
  parseBuildConfig,
  resolveBuildConfig,
  serializeBuildConfig,
  validateBuildConfig,
} from "./build-config";
export type {
  Architecture,
  BuildConfig,
  BuildConfigInput,
  BuildType,
  Compression,
  RetentionFlag,
  RetentionFlags,
  VmOptions,
} from "./build-config";

export {
  ConfigurationError,
  DependencyMissingError,
  StageFailure,
  ValidationFailure,
} from "./errors";
export type { BuildStage, ValidationCheck } from "./errors";

export {
  ALWAYS_REMOVE,
  CONDITIONAL_COMPONENTS,
  NEVER_REMOVE,
  applicationsToRemove,
  decideRetention,
  detectAppApplications,
  estimateSavings,
  parseRetentionFlags,
  pruneRuntime,
  stripBeamChunks,
  stripBeamFiles,
  stripElfBinaries,
} from "./otp-stripper";
export type { BinaryStripResult, RetentionDecision, RetentionOptions, StripResult } from "./otp-stripper";

export { estimateSize, formatSizeEstimate, STRATEGY_SIZE_TABLES } from "./size-estimator";
export type { SizeEstimate } from "./size-estimator";

export {
  bootEssentialOptions,
  estimateKernelSize,
  generateKernelProfile,
  renderKernelConfig,
} from "./kernel-config";
export type { KernelProfile, KernelProfileOptions, KernelVariant } from "./kernel-config";

export { generateInitScript, BOOT_MARKER } from "./init-script";
export { generateDockerfile } from "./build-alpine";
export { generateDefconfig } from "./build-buildroot";
export { NERVES_TARGETS, RECOMMENDED_NERVES_TARGET } from "./build-nerves";
export { bundleFileName, packageArtifacts, extractBundle } from "./packager";
export type { PackageResult } from "./packager";

export {
  ValidationEngine,
  artifactFormat,
  validateDependencies,
} from "./validator";
export type {
  ArtifactFormat,
  BootEvidence,
  CheckStatus,
  ValidationOptions,
  ValidationReport,
  ValidationState,
} from "./validator";

export { LocalToolRunner } from "./exec";
export type { ToolInvocation, ToolResult, ToolRunner } from "./exec";
export { CliContainerEngine, detectContainerRuntime } from "./container";
export type { ContainerEngine } from "./container";
export { QemuEmulator } from "./qemu";
export type { Emulator, BootOptions } from "./qemu";
export { FwupTool } from "./firmware";
export type { FirmwareTool } from "./firmware";
export { analyzeImage, classifyPath, formatAnalysis } from "./analyzer";
export type { AnalyzeOptions, ImageAnalysis, SizeCategory } from "./analyzer";
export { createLogger } from "./debug";
export type { DebugConfig, DebugFlag, Logger } from "./debug";
