/**
 * Sandbox Configuration Types
 */

import { z } from 'zod';

export const DEFAULT_TREE_MAX_DEPTH = 32;

/** Directory mode for directories the sandbox creates. */
export const DIRECTORY_MODE = 0o700;

export const TreeWalkOptionsSchema = z.object({
  maxDepth: z.number().int().nonnegative().default(DEFAULT_TREE_MAX_DEPTH),
  followSymlinks: z.boolean().default(true),
});

export const SandboxConfigSchema = z.object({
  /** Real filesystem directory that becomes the sandbox root */
  root: z.string().min(1),
  /** Create the root (and its ancestors) when missing. Default: false */
  createRoot: z.boolean().default(false),
  tree: TreeWalkOptionsSchema.default({
    maxDepth: DEFAULT_TREE_MAX_DEPTH,
    followSymlinks: true,
  }),
});

/** Configuration accepted by createSandboxedFileSystem. */
export type SandboxConfig = z.input<typeof SandboxConfigSchema>;

/**
 * Resolved configuration (internal use).
 */
export interface ResolvedSandboxConfig {
  /** Absolute canonical root */
  root: string;
  tree: {
    maxDepth: number;
    followSymlinks: boolean;
  };
}
