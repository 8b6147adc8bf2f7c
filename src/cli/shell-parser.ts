/**
 * Shell Line Parser
 *
 * Splits a line typed at the sandbox shell into a command name and arguments.
 * Supports single and double quotes and backslash escapes.
 */

/**
 * Parsed shell line.
 */
export interface ParsedLine {
  /** Command name */
  name: string;
  /** Positional arguments */
  args: string[];
}

/**
 * Error thrown when a line cannot be tokenized.
 */
export class ShellParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ShellParseError";
  }
}

/**
 * Parse a shell line. Returns null for blank lines and `#` comments.
 *
 * @throws ShellParseError on an unclosed quote or trailing backslash
 */
export function parseShellLine(line: string): ParsedLine | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return null;
  }

  const tokens = tokenize(trimmed);
  if (tokens.length === 0) {
    return null;
  }

  const [name, ...args] = tokens;
  return { name, args };
}

/**
 * Tokenize a line.
 *
 * Whitespace separates tokens unless quoted or escaped. Inside single quotes
 * every character is literal; inside double quotes a backslash escapes the
 * next character. Adjacent quoted and unquoted parts join into one token,
 * and `""` yields an empty token.
 */
export function tokenize(input: string): string[] {
  const tokens: string[] = [];
  let current = "";
  let hasToken = false;
  let inQuote: string | null = null;
  let quoteStartPos = -1;
  let escape = false;

  for (let i = 0; i < input.length; i++) {
    const char = input[i];

    if (escape) {
      current += char;
      escape = false;
      continue;
    }

    if (char === "\\" && inQuote !== "'") {
      escape = true;
      hasToken = true;
      continue;
    }

    if (inQuote) {
      if (char === inQuote) {
        inQuote = null;
        quoteStartPos = -1;
      } else {
        current += char;
      }
      continue;
    }

    if (char === '"' || char === "'") {
      inQuote = char;
      quoteStartPos = i;
      hasToken = true;
      continue;
    }

    if (char === " " || char === "\t") {
      if (hasToken) {
        tokens.push(current);
        current = "";
        hasToken = false;
      }
      continue;
    }

    current += char;
    hasToken = true;
  }

  if (inQuote) {
    throw new ShellParseError(
      `Unclosed ${inQuote === '"' ? "double" : "single"} quote at position ${quoteStartPos}`
    );
  }

  if (escape) {
    throw new ShellParseError("Trailing backslash at end of input");
  }

  if (hasToken) {
    tokens.push(current);
  }

  return tokens;
}
