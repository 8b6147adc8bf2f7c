/**
 * Sandbox Commands
 *
 * The commands shared by one-shot CLI invocations and the interactive shell.
 */

import { isSandboxFailure, type SandboxedFileSystem, type SandboxResult } from "../sandbox/index.js";
import {
  defaultColors,
  formatExists,
  formatFailure,
  formatListing,
  formatMakeDirectory,
  formatTree,
  formatWrite,
  type Colors,
} from "./format.js";

/**
 * Where command output goes.
 */
export interface CommandIO {
  out(text: string): void;
  err(text: string): void;
}

export interface CommandOptions {
  colors?: Colors;
  /** Supplies content for `write` when none is given on the line */
  readContent?: () => Promise<string>;
}

/**
 * Usage and description per command, in the order `help` prints them.
 */
export const COMMAND_HELP: Record<string, { usage: string; description: string }> = {
  pwd: { usage: "pwd", description: "Show the current directory" },
  cd: { usage: "cd <dir>", description: "Change the current directory" },
  ls: { usage: "ls [dir]", description: "List a directory (default: current)" },
  cat: { usage: "cat <file>", description: "Print a text file" },
  write: { usage: "write <file> [content...]", description: "Write text to a file" },
  mkdir: { usage: "mkdir <dir>", description: "Create a directory and its parents" },
  exists: { usage: "exists <path>", description: "Check whether a path exists" },
  tree: { usage: "tree [dir]", description: "Show every directory below dir" },
  help: { usage: "help", description: "Show this help" },
  exit: { usage: "exit", description: "Leave the shell" },
};

/**
 * Help text, one aligned line per command.
 */
export function formatHelp(): string {
  const entries = Object.values(COMMAND_HELP);
  const width = Math.max(...entries.map((entry) => entry.usage.length)) + 2;
  return entries.map((entry) => entry.usage.padEnd(width) + entry.description).join("\n");
}

function report<T extends object>(
  result: SandboxResult<T>,
  io: CommandIO,
  colors: Colors,
  render: (payload: T) => string | undefined
): boolean {
  if (isSandboxFailure(result)) {
    io.err(formatFailure(result, colors));
    return false;
  }
  const text = render(result);
  if (text !== undefined) {
    io.out(text);
  }
  return true;
}

function usage(name: string, io: CommandIO, colors: Colors): boolean {
  io.err(colors.red(`Usage: ${COMMAND_HELP[name].usage}`));
  return false;
}

/**
 * Run one command against the sandbox.
 *
 * @returns true when the command succeeded
 */
export async function runSandboxCommand(
  fs: SandboxedFileSystem,
  name: string,
  args: string[],
  io: CommandIO,
  options: CommandOptions = {}
): Promise<boolean> {
  const colors = options.colors ?? defaultColors;

  switch (name) {
    case "pwd":
      io.out(fs.currentDirectory());
      return true;

    case "cd":
      if (args.length !== 1) return usage(name, io, colors);
      return report(await fs.changeDirectory(args[0]), io, colors, () => undefined);

    case "ls":
      if (args.length > 1) return usage(name, io, colors);
      return report(await fs.listContents(args[0]), io, colors, (listing) =>
        formatListing(listing, colors)
      );

    case "cat":
      if (args.length !== 1) return usage(name, io, colors);
      return report(await fs.readFile(args[0]), io, colors, ({ content }) =>
        content.endsWith("\n") ? content.slice(0, -1) : content
      );

    case "write": {
      if (args.length === 0) return usage(name, io, colors);
      const [file, ...words] = args;
      const content =
        words.length > 0 ? words.join(" ") : options.readContent ? await options.readContent() : "";
      return report(await fs.writeFile(file, content), io, colors, (written) =>
        formatWrite(written, colors)
      );
    }

    case "mkdir":
      if (args.length !== 1) return usage(name, io, colors);
      return report(await fs.makeDirectory(args[0]), io, colors, (made) =>
        formatMakeDirectory(made, colors)
      );

    case "exists":
      if (args.length !== 1) return usage(name, io, colors);
      return report(await fs.exists(args[0]), io, colors, (result) => formatExists(result, colors));

    case "tree":
      if (args.length > 1) return usage(name, io, colors);
      return report(await fs.getDirectoryTree(args[0] ?? "."), io, colors, (result) =>
        formatTree(result, colors)
      );

    case "help":
      io.out(formatHelp());
      return true;

    default:
      io.err(colors.red(`Unknown command: ${name}. Type help for a list of commands.`));
      return false;
  }
}
