#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * One-shot sandbox commands and the interactive shell.
 */

import { realpathSync } from "fs";
import { fileURLToPath } from "url";
import { Command } from "commander";
import { loadEffectiveConfig } from "../config/index.js";
import { createLogger, defaultLogger } from "../logging/index.js";
import { createSandboxedFileSystem, isErrnoException, type SandboxedFileSystem } from "../sandbox/index.js";
import { runSandboxCommand, type CommandIO } from "./commands.js";
import { defaultColors, type Colors } from "./format.js";
import { runShell, type ShellOptions } from "./shell.js";

/**
 * Global options from command line.
 */
interface CLIOptions {
  root?: string;
  config?: string;
  verbose?: boolean;
}

/**
 * Process-level dependencies, replaceable in tests.
 */
export interface CLIContext {
  io?: CommandIO;
  colors?: Colors;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Content for `write` when none is given as arguments */
  readStdin?: () => Promise<string>;
  shell?: Omit<ShellOptions, "colors">;
}

/**
 * Read all of stdin as UTF-8.
 */
async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(chunk);
  }
  return Buffer.concat(chunks).toString("utf-8");
}

const consoleIO: CommandIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

/**
 * Build the sandbox described by the options, config file and environment.
 */
async function openSandbox(options: CLIOptions, context: CLIContext): Promise<SandboxedFileSystem> {
  const config = await loadEffectiveConfig(options, context.cwd, context.env);
  const logger = createLogger({
    name: "sandbox-fs:cli",
    minLevel: config.logging.minLevel,
    type: config.logging.type,
  });

  if (config.configPath) {
    logger.debug("Loaded config", { configPath: config.configPath });
  }

  return createSandboxedFileSystem(config.sandbox, logger);
}

/**
 * Main CLI execution.
 *
 * @returns Process exit code
 */
export async function runCLI(argv: string[] = process.argv, context: CLIContext = {}): Promise<number> {
  const io = context.io ?? consoleIO;
  const colors = context.colors ?? defaultColors;
  let exitCode = 0;

  const program = new Command();

  const guarded = async (task: () => Promise<boolean>) => {
    try {
      if (!(await task())) {
        exitCode = 1;
      }
    } catch (err) {
      io.err(colors.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
      exitCode = 1;
    }
  };

  const execute = (name: string, args: string[]) =>
    guarded(async () => {
      const fs = await openSandbox(program.opts<CLIOptions>(), context);
      return runSandboxCommand(fs, name, args, io, {
        colors,
        readContent: context.readStdin ?? readStdin,
      });
    });

  program
    .name("sandbox-fs")
    .description("Work with files inside a root-confined sandbox")
    .version("0.1.0")
    .option("-r, --root <dir>", "Sandbox root directory (default: from config, SANDBOX_FS_ROOT, or the working directory)")
    .option("-c, --config <file>", "Config file (default: sandbox-fs.config.yaml, searched upward)")
    .option("-v, --verbose", "Verbose logging");

  program
    .command("pwd")
    .description("Show the current directory (always / for one-shot commands)")
    .action(() => execute("pwd", []));

  program
    .command("ls")
    .argument("[dir]", "Directory to list")
    .description("List a directory")
    .action((dir?: string) => execute("ls", dir === undefined ? [] : [dir]));

  program
    .command("cat")
    .argument("<file>", "File to print")
    .description("Print a text file")
    .action((file: string) => execute("cat", [file]));

  program
    .command("write")
    .argument("<file>", "File to write")
    .argument("[content...]", "Text to write (default: read from stdin)")
    .description("Write text to a file, creating parent directories")
    .action((file: string, content: string[]) => execute("write", [file, ...content]));

  program
    .command("mkdir")
    .argument("<dir>", "Directory to create")
    .description("Create a directory and its parents")
    .action((dir: string) => execute("mkdir", [dir]));

  program
    .command("exists")
    .argument("<path>", "Path to check")
    .description("Check whether a path exists")
    .action((target: string) => execute("exists", [target]));

  program
    .command("tree")
    .argument("[dir]", "Directory to start from", ".")
    .description("Show every directory below dir")
    .action((dir: string) => execute("tree", [dir]));

  program
    .command("shell")
    .description("Interactive shell with cd")
    .action(() =>
      guarded(async () => {
        const fs = await openSandbox(program.opts<CLIOptions>(), context);
        await runShell(fs, { ...context.shell, colors });
        return true;
      })
    );

  await program.parseAsync(argv);
  return exitCode;
}

/**
 * True when node was started on this file, directly or through the bin link.
 */
export function isEntryPoint(script: string | undefined = process.argv[1]): boolean {
  if (!script) {
    return false;
  }
  try {
    return realpathSync(script) === realpathSync(fileURLToPath(import.meta.url));
  } catch (error) {
    if (isErrnoException(error)) {
      return false;
    }
    throw error;
  }
}

if (!process.env.VITEST && isEntryPoint()) {
  runCLI().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      defaultLogger.fatal("sandbox-fs crashed", error);
      process.exitCode = 1;
    }
  );
}
