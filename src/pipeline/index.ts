/**
 * Pipeline モジュール
 */

export {
  runPipeline,
  runPlan,
  discoverConfigFiles,
  translateAll,
} from "./driver.js";
export type {
  PipelineDependencies,
  PipelineSummary,
  PlanResult,
  PlanContext,
} from "./driver.js";
export {
  PipelineError,
  ConfigFormatError,
  ToolAcquisitionError,
  BuildFailedError,
  UnsupportedToolVersionError,
  PatchFailedError,
  CacheRefreshError,
  IOError,
  withIO,
} from "./errors.js";
export type { PipelineStage } from "./errors.js";
