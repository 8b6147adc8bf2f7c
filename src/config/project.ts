/**
 * Project Configuration
 *
 * Schema and loader for sandbox-fs.config.yaml, plus the merge of CLI options
 * and environment overrides into one effective configuration.
 */

import { z } from "zod";
import * as fs from "fs/promises";
import * as path from "path";
import * as yaml from "js-yaml";
import { parseLogLevel, type LogOutputType } from "../logging/index.js";
import { DEFAULT_TREE_MAX_DEPTH, isErrnoException } from "../sandbox/index.js";

/**
 * Schema for the tree walk section.
 */
export const TreeProjectConfigSchema = z.object({
  /** Deepest level whose subdirectories are descended */
  maxDepth: z.number().int().nonnegative().optional(),
  /** Descend into symlinked directories that stay inside the root */
  followSymlinks: z.boolean().optional(),
});

export type TreeProjectConfig = z.infer<typeof TreeProjectConfigSchema>;

/**
 * Per-tool needsApproval overrides.
 */
export const ToolApprovalConfigSchema = z.object({
  read_file: z.boolean().optional(),
  write_file: z.boolean().optional(),
  make_directory: z.boolean().optional(),
  file_exists: z.boolean().optional(),
  list_contents: z.boolean().optional(),
  change_directory: z.boolean().optional(),
  current_directory: z.boolean().optional(),
  directory_tree: z.boolean().optional(),
});

export type ToolApprovalConfig = z.infer<typeof ToolApprovalConfigSchema>;

/**
 * Schema for logging configuration.
 */
export const LoggingProjectConfigSchema = z.object({
  level: z.enum(["silly", "trace", "debug", "info", "warn", "error", "fatal"]).optional(),
  type: z.enum(["pretty", "json", "hidden"]).optional(),
});

export type LoggingProjectConfig = z.infer<typeof LoggingProjectConfigSchema>;

/**
 * Complete project configuration schema.
 */
export const ProjectConfigSchema = z.object({
  /** Sandbox root, relative to the config file's directory */
  root: z.string().min(1).optional(),
  /** Create the root if it does not exist */
  createRoot: z.boolean().optional(),
  tree: TreeProjectConfigSchema.optional(),
  tools: z
    .object({
      approval: ToolApprovalConfigSchema.optional(),
    })
    .optional(),
  logging: LoggingProjectConfigSchema.optional(),
});

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

/**
 * Configuration after CLI options, environment and file have been merged.
 */
export interface EffectiveConfig {
  sandbox: {
    /** Absolute root path (not yet canonicalized) */
    root: string;
    createRoot: boolean;
    tree: {
      maxDepth: number;
      followSymlinks: boolean;
    };
  };
  approval: ToolApprovalConfig;
  logging: {
    minLevel: number;
    type: LogOutputType;
  };
  /** Config file the values came from, if any */
  configPath?: string;
}

/**
 * Options given on the command line.
 */
export interface CLIConfigOptions {
  root?: string;
  config?: string;
  verbose?: boolean;
}

/**
 * Project configuration file names to look for.
 */
export const CONFIG_FILE_NAMES = ["sandbox-fs.config.yaml", "sandbox-fs.config.yml"];

const DEBUG_LEVEL = 2;
const WARN_LEVEL = 4;

/**
 * Load project configuration from a YAML file.
 *
 * An empty file is an empty configuration.
 *
 * @throws Error if the file can't be read, parsed or validated
 */
export async function loadProjectConfigFile(configPath: string): Promise<ProjectConfig> {
  const content = await fs.readFile(configPath, "utf-8");

  let parsed: unknown;
  try {
    parsed = yaml.load(content) ?? {};
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid YAML in ${configPath}: ${reason}`);
  }

  const result = ProjectConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `  - ${issue.path.join(".")}: ${issue.message}`
    ).join("\n");
    throw new Error(`Invalid project config in ${configPath}:\n${issues}`);
  }

  return result.data;
}

/**
 * Find and load project configuration.
 *
 * Searches for sandbox-fs.config.yaml in the given directory
 * and parent directories. A file that exists but is invalid is an error.
 *
 * @returns Config and path if found, null otherwise
 */
export async function findProjectConfig(
  startDir: string
): Promise<{ config: ProjectConfig; configPath: string; projectRoot: string } | null> {
  let currentDir = path.resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const configPath = path.join(currentDir, fileName);
      if (!(await fileExists(configPath))) {
        continue;
      }
      return {
        config: await loadProjectConfigFile(configPath),
        configPath,
        projectRoot: currentDir,
      };
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return false;
    }
    throw error;
  }
}

/**
 * Merge CLI options, environment and project config.
 *
 * Precedence: CLI options > environment > config file > defaults.
 * A root from the file is relative to `projectRoot`; a root from the CLI or
 * environment is relative to `cwd`. Without any root the sandbox is `cwd`.
 */
export function mergeWithCLIOptions(
  projectConfig: ProjectConfig | undefined,
  cliOptions: CLIConfigOptions,
  context: {
    cwd: string;
    projectRoot?: string;
    env?: NodeJS.ProcessEnv;
  }
): EffectiveConfig {
  const config = projectConfig ?? {};
  const env = context.env ?? process.env;
  const envRoot = env.SANDBOX_FS_ROOT?.trim() || undefined;

  let root: string;
  if (cliOptions.root) {
    root = path.resolve(context.cwd, cliOptions.root);
  } else if (envRoot) {
    root = path.resolve(context.cwd, envRoot);
  } else if (config.root) {
    root = path.resolve(context.projectRoot ?? context.cwd, config.root);
  } else {
    root = path.resolve(context.cwd);
  }

  const fileLevel = config.logging?.level ? parseLogLevel(config.logging.level) : undefined;
  const minLevel = cliOptions.verbose
    ? DEBUG_LEVEL
    : parseLogLevel(env.SANDBOX_FS_LOG_LEVEL) ?? fileLevel ?? WARN_LEVEL;

  return {
    sandbox: {
      root,
      createRoot: config.createRoot ?? false,
      tree: {
        maxDepth: config.tree?.maxDepth ?? DEFAULT_TREE_MAX_DEPTH,
        followSymlinks: config.tree?.followSymlinks ?? true,
      },
    },
    approval: { ...config.tools?.approval },
    logging: {
      minLevel,
      type: config.logging?.type ?? "pretty",
    },
  };
}

/**
 * Load the effective configuration for a CLI invocation.
 *
 * Uses the file named by `--config` when given, otherwise searches upward
 * from `cwd`.
 */
export async function loadEffectiveConfig(
  cliOptions: CLIConfigOptions,
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): Promise<EffectiveConfig> {
  if (cliOptions.config) {
    const configPath = path.resolve(cwd, cliOptions.config);
    const config = await loadProjectConfigFile(configPath);
    return {
      ...mergeWithCLIOptions(config, cliOptions, {
        cwd,
        projectRoot: path.dirname(configPath),
        env,
      }),
      configPath,
    };
  }

  const found = await findProjectConfig(cwd);
  if (!found) {
    return mergeWithCLIOptions(undefined, cliOptions, { cwd, env });
  }

  return {
    ...mergeWithCLIOptions(found.config, cliOptions, {
      cwd,
      projectRoot: found.projectRoot,
      env,
    }),
    configPath: found.configPath,
  };
}
