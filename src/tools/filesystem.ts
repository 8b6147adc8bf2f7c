/**
 * Filesystem Tools
 *
 * LLM tools over a SandboxedFileSystem.
 * Uses AI SDK's native needsApproval for tool approval.
 */

import { z } from 'zod';
import { tool } from 'ai';
import {
  isSandboxFailure,
  type SandboxedFileSystem,
  type SandboxFailure,
  type SandboxResult,
} from '../sandbox/index.js';

export type FilesystemToolName =
  | 'read_file'
  | 'write_file'
  | 'make_directory'
  | 'file_exists'
  | 'list_contents'
  | 'change_directory'
  | 'current_directory'
  | 'directory_tree';

/**
 * Failed tool call, shaped for the model.
 */
export interface FilesystemToolFailure {
  success: false;
  error: string;
  hint?: string;
  path: string;
}

/**
 * Result returned by filesystem tools.
 */
export type FilesystemToolResult<T extends object> = ({ success: true } & T) | FilesystemToolFailure;

/**
 * Per-tool needsApproval overrides. Unset tools keep their default.
 */
export type ToolApprovalOverrides = Partial<Record<FilesystemToolName, boolean>>;

/**
 * Tools that change the filesystem need approval unless overridden.
 */
export const DEFAULT_TOOL_APPROVAL: Record<FilesystemToolName, boolean> = {
  read_file: false,
  write_file: true,
  make_directory: true,
  file_exists: false,
  list_contents: false,
  change_directory: false,
  current_directory: false,
  directory_tree: false,
};

interface ToolOptions {
  needsApproval?: boolean;
}

const pathDescription =
  'Path inside the sandbox. Relative paths start at the current directory; paths starting with / start at the sandbox root.';

function hintFor(failure: SandboxFailure): string | undefined {
  switch (failure.kind) {
    case 'containment_denied':
      return 'Only paths inside the sandbox are reachable. Use current_directory and list_contents to see what is available.';
    case 'not_found':
      return 'Use list_contents or directory_tree to see which files exist.';
    case 'wrong_type':
      return 'Use list_contents to check whether the entry is a file or a directory.';
    case 'io_failure':
      return failure.code === 'DECODE_FAILED'
        ? 'This file contains binary data and cannot be read as text.'
        : undefined;
  }
}

/**
 * Convert a sandbox failure into a tool failure.
 */
export function toToolFailure(failure: SandboxFailure): FilesystemToolFailure {
  const hint = hintFor(failure);
  return {
    success: false,
    error: failure.message,
    ...(hint ? { hint } : {}),
    path: failure.path,
  };
}

function toToolResult<T extends object, R extends object>(
  result: SandboxResult<T>,
  pick: (payload: T) => R
): FilesystemToolResult<R> {
  if (isSandboxFailure(result)) {
    return toToolFailure(result);
  }
  return { success: true as const, ...pick(result) };
}

const readFileSchema = z.object({
  path: z.string().describe(pathDescription),
});
type ReadFileInput = z.infer<typeof readFileSchema>;

/**
 * Create a read_file tool.
 */
export function createReadFileTool(fs: SandboxedFileSystem, options?: ToolOptions) {
  return {
    ...tool({
      description: 'Read the contents of a UTF-8 text file from the sandbox filesystem. Cannot read binary files.',
      inputSchema: readFileSchema,
      needsApproval: options?.needsApproval ?? DEFAULT_TOOL_APPROVAL.read_file,
      execute: async ({ path }: ReadFileInput) =>
        toToolResult(await fs.readFile(path), ({ path, content }) => ({
          path,
          content,
          size: Buffer.byteLength(content, 'utf-8'),
        })),
    }),
    name: 'read_file' as const,
  };
}

const writeFileSchema = z.object({
  path: z.string().describe(pathDescription),
  content: z.string().describe('Content to write to the file. Replaces any existing content.'),
});
type WriteFileInput = z.infer<typeof writeFileSchema>;

/**
 * Create a write_file tool. Missing parent directories are created.
 */
export function createWriteFileTool(fs: SandboxedFileSystem, options?: ToolOptions) {
  return {
    ...tool({
      description: 'Write text to a file in the sandbox filesystem, creating parent directories as needed',
      inputSchema: writeFileSchema,
      needsApproval: options?.needsApproval ?? DEFAULT_TOOL_APPROVAL.write_file,
      execute: async ({ path, content }: WriteFileInput) =>
        toToolResult(await fs.writeFile(path, content), ({ path, bytesWritten }) => ({
          path,
          bytesWritten,
        })),
    }),
    name: 'write_file' as const,
  };
}

const makeDirectorySchema = z.object({
  path: z.string().describe(pathDescription),
});
type MakeDirectoryInput = z.infer<typeof makeDirectorySchema>;

/**
 * Create a make_directory tool.
 */
export function createMakeDirectoryTool(fs: SandboxedFileSystem, options?: ToolOptions) {
  return {
    ...tool({
      description: 'Create a directory and any missing parents. Succeeds if it already exists.',
      inputSchema: makeDirectorySchema,
      needsApproval: options?.needsApproval ?? DEFAULT_TOOL_APPROVAL.make_directory,
      execute: async ({ path }: MakeDirectoryInput) =>
        toToolResult(await fs.makeDirectory(path), ({ path, created }) => ({ path, created })),
    }),
    name: 'make_directory' as const,
  };
}

const fileExistsSchema = z.object({
  path: z.string().describe(pathDescription),
});
type FileExistsInput = z.infer<typeof fileExistsSchema>;

/**
 * Create a file_exists tool.
 */
export function createFileExistsTool(fs: SandboxedFileSystem, options?: ToolOptions) {
  return {
    ...tool({
      description: 'Check whether a file or directory exists in the sandbox',
      inputSchema: fileExistsSchema,
      needsApproval: options?.needsApproval ?? DEFAULT_TOOL_APPROVAL.file_exists,
      execute: async ({ path }: FileExistsInput) =>
        toToolResult(await fs.exists(path), ({ path, exists }) => ({ path, exists })),
    }),
    name: 'file_exists' as const,
  };
}

const emptySchema = z.object({});

/**
 * Create a list_contents tool for the current directory.
 */
export function createListContentsTool(fs: SandboxedFileSystem, options?: ToolOptions) {
  return {
    ...tool({
      description: 'List the files and directories in the current directory',
      inputSchema: emptySchema,
      needsApproval: options?.needsApproval ?? DEFAULT_TOOL_APPROVAL.list_contents,
      execute: async () =>
        toToolResult(await fs.listContents(), ({ path, entries, count }) => ({
          path,
          entries,
          count,
        })),
    }),
    name: 'list_contents' as const,
  };
}

const changeDirectorySchema = z.object({
  path: z.string().describe(pathDescription),
});
type ChangeDirectoryInput = z.infer<typeof changeDirectorySchema>;

/**
 * Create a change_directory tool.
 */
export function createChangeDirectoryTool(fs: SandboxedFileSystem, options?: ToolOptions) {
  return {
    ...tool({
      description: 'Change the current directory. Relative paths in later calls start from it.',
      inputSchema: changeDirectorySchema,
      needsApproval: options?.needsApproval ?? DEFAULT_TOOL_APPROVAL.change_directory,
      execute: async ({ path }: ChangeDirectoryInput) =>
        toToolResult(await fs.changeDirectory(path), ({ path }) => ({ path })),
    }),
    name: 'change_directory' as const,
  };
}

/**
 * Create a current_directory tool.
 */
export function createCurrentDirectoryTool(fs: SandboxedFileSystem, options?: ToolOptions) {
  return {
    ...tool({
      description: 'Show the current directory, relative to the sandbox root (/)',
      inputSchema: emptySchema,
      needsApproval: options?.needsApproval ?? DEFAULT_TOOL_APPROVAL.current_directory,
      execute: async (): Promise<FilesystemToolResult<{ path: string }>> => ({
        success: true,
        path: fs.currentDirectory(),
      }),
    }),
    name: 'current_directory' as const,
  };
}

export const directoryTreeSchema = z.object({
  path: z.string().default('.').describe(`${pathDescription} Defaults to the current directory.`),
});

/**
 * Create a directory_tree tool.
 */
export function createDirectoryTreeTool(fs: SandboxedFileSystem, options?: ToolOptions) {
  return {
    ...tool({
      description:
        'List every directory under a path. Each key is a directory; its value lists files, then subdirectories marked "(directory)", one per line.',
      inputSchema: directoryTreeSchema,
      needsApproval: options?.needsApproval ?? DEFAULT_TOOL_APPROVAL.directory_tree,
      execute: async ({ path }: { path: string }) =>
        toToolResult(await fs.getDirectoryTree(path), ({ path, tree }) => ({ path, tree })),
    }),
    name: 'directory_tree' as const,
  };
}

export interface FilesystemToolsOptions {
  /** needsApproval overrides, keyed by tool name */
  approval?: ToolApprovalOverrides;
}

/**
 * Create all filesystem tools for a sandbox, keyed by tool name.
 * The result can be passed directly as `tools` to generateText or streamText.
 */
export function createFilesystemTools(fs: SandboxedFileSystem, options: FilesystemToolsOptions = {}) {
  const forTool = (name: FilesystemToolName): ToolOptions => ({
    needsApproval: options.approval?.[name] ?? DEFAULT_TOOL_APPROVAL[name],
  });

  return {
    read_file: createReadFileTool(fs, forTool('read_file')),
    write_file: createWriteFileTool(fs, forTool('write_file')),
    make_directory: createMakeDirectoryTool(fs, forTool('make_directory')),
    file_exists: createFileExistsTool(fs, forTool('file_exists')),
    list_contents: createListContentsTool(fs, forTool('list_contents')),
    change_directory: createChangeDirectoryTool(fs, forTool('change_directory')),
    current_directory: createCurrentDirectoryTool(fs, forTool('current_directory')),
    directory_tree: createDirectoryTreeTool(fs, forTool('directory_tree')),
  };
}

export type FilesystemTools = ReturnType<typeof createFilesystemTools>;
