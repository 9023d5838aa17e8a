/**
 * myosevka-build - Iosevka build plan translator and build orchestrator
 * @module myosevka-build
 */

// Types
export * from "./types/index.js";

// Config
export {
  translateConfig,
  translateConfigFile,
  readConfigSource,
  detectDialect,
  translateLegacyIni,
  translateNativeToml,
  loadSettings,
  resolveRuntimePaths,
} from "./config/index.js";
export type { RuntimePaths, Settings } from "./config/index.js";

// Plan
export { emitBuildPlan, renderBuildPlan, BUILD_PLAN_FILE } from "./plan/index.js";

// Exec
export { ZxCommandRunner } from "./exec/index.js";
export type { CommandRunner } from "./exec/index.js";

// Toolchain
export { acquireToolchain } from "./toolchain/index.js";

// Build
export { invokeBuild, selectOutputLayout, OUTPUT_LAYOUTS } from "./build/index.js";
export type { OutputLayout } from "./build/index.js";

// Patch
export { invokePatch, isMonospacePlan, PatchToolCache } from "./patch/index.js";

// Install
export { installArtifacts } from "./install/index.js";

// Pipeline
export {
  runPipeline,
  PipelineError,
  ConfigFormatError,
  ToolAcquisitionError,
  BuildFailedError,
  UnsupportedToolVersionError,
  PatchFailedError,
  CacheRefreshError,
  IOError,
} from "./pipeline/index.js";
export type { PipelineSummary, PlanResult } from "./pipeline/index.js";
