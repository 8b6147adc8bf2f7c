/**
 * CLI Output Formatting
 *
 * Renders sandbox results as terminal text.
 */

import pc from "picocolors";
import type {
  SandboxFailure,
  ListPayload,
  TreePayload,
  ExistsPayload,
  WritePayload,
  MakeDirectoryPayload,
} from "../sandbox/index.js";

export type Colors = ReturnType<typeof pc.createColors>;

/** Colors used when stdout supports them. */
export const defaultColors: Colors = pc;

/**
 * Failure line, in red.
 */
export function formatFailure(failure: SandboxFailure, colors: Colors = defaultColors): string {
  return colors.red(`Error: ${failure.message}`);
}

/**
 * One entry per line; directories end in "/" and are shown in blue.
 */
export function formatListing(listing: ListPayload, colors: Colors = defaultColors): string {
  if (listing.count === 0) {
    return colors.dim("(empty)");
  }
  return listing.entries
    .map((entry) => (entry.type === "directory" ? colors.blue(`${entry.name}/`) : entry.name))
    .join("\n");
}

/**
 * Each directory as a bold heading followed by its indented listing.
 */
export function formatTree(result: TreePayload, colors: Colors = defaultColors): string {
  const sections: string[] = [];
  for (const [directory, listing] of Object.entries(result.tree)) {
    const lines = listing === "" ? [colors.dim("(empty)")] : listing.split("\n");
    sections.push([colors.bold(directory), ...lines.map((line) => `  ${line}`)].join("\n"));
  }
  return sections.join("\n");
}

export function formatExists(result: ExistsPayload, colors: Colors = defaultColors): string {
  return result.exists
    ? `${result.path}: ${colors.green("exists")}`
    : `${result.path}: ${colors.yellow("does not exist")}`;
}

export function formatWrite(result: WritePayload, colors: Colors = defaultColors): string {
  const unit = result.bytesWritten === 1 ? "byte" : "bytes";
  return colors.green(`Wrote ${result.bytesWritten} ${unit} to ${result.path}`);
}

export function formatMakeDirectory(result: MakeDirectoryPayload, colors: Colors = defaultColors): string {
  return result.created
    ? colors.green(`Created ${result.path}`)
    : colors.dim(`Already exists: ${result.path}`);
}
