/**
 * Config Module
 *
 * Project configuration schema and loading.
 */

export {
  ProjectConfigSchema,
  TreeProjectConfigSchema,
  ToolApprovalConfigSchema,
  LoggingProjectConfigSchema,
  CONFIG_FILE_NAMES,
  type ProjectConfig,
  type TreeProjectConfig,
  type ToolApprovalConfig,
  type LoggingProjectConfig,
  type EffectiveConfig,
  type CLIConfigOptions,
  loadProjectConfigFile,
  findProjectConfig,
  mergeWithCLIOptions,
  loadEffectiveConfig,
} from "./project.js";
