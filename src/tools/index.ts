/**
 * Filesystem tools for AI SDK agents
 */

export {
  createFilesystemTools,
  createReadFileTool,
  createWriteFileTool,
  createMakeDirectoryTool,
  createFileExistsTool,
  createListContentsTool,
  createChangeDirectoryTool,
  createCurrentDirectoryTool,
  createDirectoryTreeTool,
  directoryTreeSchema,
  toToolFailure,
  DEFAULT_TOOL_APPROVAL,
  type FilesystemToolName,
  type FilesystemToolFailure,
  type FilesystemToolResult,
  type FilesystemTools,
  type FilesystemToolsOptions,
  type ToolApprovalOverrides,
} from "./filesystem.js";
