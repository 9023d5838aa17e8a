/**
 * 型定義のエクスポート
 */

// Plan
export type { StyleAxis, ConfigDialect, ConfigSource, FontPlan } from "./plan.js";
export { STYLE_AXES } from "./plan.js";

// Toolchain
export type {
  ExternalToolWorkspace,
  GeneratedArtifact,
  PatchToolSource,
  CommandResult,
  CommandOptions,
} from "./toolchain.js";
