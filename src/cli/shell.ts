/**
 * Interactive Shell
 *
 * A read-eval-print loop over one sandbox, so `cd` carries over between lines.
 */

import * as readline from "readline";
import type { Readable, Writable } from "stream";
import type { SandboxedFileSystem } from "../sandbox/index.js";
import { runSandboxCommand } from "./commands.js";
import { defaultColors, type Colors } from "./format.js";
import { parseShellLine, ShellParseError, type ParsedLine } from "./shell-parser.js";

export interface ShellOptions {
  input?: Readable;
  output?: Writable;
  errorOutput?: Writable;
  colors?: Colors;
  /** Show a prompt before each line. Default: whether input is a TTY */
  prompt?: boolean;
}

/**
 * Counts of lines run by the shell.
 */
export interface ShellSummary {
  commands: number;
  failures: number;
}

/**
 * Run the shell until `exit`/`quit` or end of input.
 */
export async function runShell(fs: SandboxedFileSystem, options: ShellOptions = {}): Promise<ShellSummary> {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  const errorOutput = options.errorOutput ?? process.stderr;
  const colors = options.colors ?? defaultColors;
  const showPrompt = options.prompt ?? ("isTTY" in input && input.isTTY === true);

  const io = {
    out: (text: string) => output.write(text + "\n"),
    err: (text: string) => errorOutput.write(text + "\n"),
  };

  const rl = readline.createInterface({ input, output, terminal: showPrompt });
  const summary: ShellSummary = { commands: 0, failures: 0 };

  const prompt = () => {
    if (showPrompt) {
      rl.setPrompt(colors.cyan(`sandbox:${fs.currentDirectory()}$ `));
      rl.prompt();
    }
  };

  try {
    prompt();
    for await (const line of rl) {
      let parsed: ParsedLine | null;
      try {
        parsed = parseShellLine(line);
      } catch (error) {
        if (!(error instanceof ShellParseError)) {
          throw error;
        }
        io.err(colors.red(`Error: ${error.message}`));
        summary.failures++;
        prompt();
        continue;
      }

      if (parsed) {
        if (parsed.name === "exit" || parsed.name === "quit") {
          break;
        }
        summary.commands++;
        const ok = await runSandboxCommand(fs, parsed.name, parsed.args, io, { colors });
        if (!ok) {
          summary.failures++;
        }
      }
      prompt();
    }
  } finally {
    rl.close();
  }

  return summary;
}
