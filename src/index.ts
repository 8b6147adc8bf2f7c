/**
 * sandbox-fs - Root-confined filesystem access with a virtual working directory
 */

// Sandboxed filesystem
export * from "./sandbox/index.js";

// AI SDK tools over the sandbox
export * from "./tools/index.js";

// Project configuration
export * from "./config/index.js";

// Logging
export * from "./logging/index.js";

// CLI building blocks
export { runCLI, type CLIContext } from "./cli/run.js";
export { runShell, type ShellOptions, type ShellSummary } from "./cli/shell.js";
