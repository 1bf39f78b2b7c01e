/**
 * Command Parser
 *
 * Splits a prompt line into a command word and its operand.
 * The operand is everything after the first run of whitespace, so names
 * with spaces work unquoted (`touch my file.txt`). A fully quoted operand
 * has its quotes removed.
 */

/**
 * Parsed prompt line.
 */
export interface ParsedCommandLine {
  /** Command word (or menu choice) */
  name: string;
  /** Remainder of the line, unquoted; empty when absent */
  operand: string;
  /** Original raw input */
  raw: string;
}

/**
 * Error thrown when command parsing fails.
 */
export class CommandParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CommandParseError";
  }
}

/**
 * Parse one line of input.
 *
 * @returns null for blank input
 * @throws CommandParseError for an operand with an unclosed quote
 */
export function parseCommandLine(input: string): ParsedCommandLine | null {
  const trimmed = input.trim();
  if (!trimmed) {
    return null;
  }

  const boundary = trimmed.search(/\s/);
  if (boundary === -1) {
    return { name: trimmed, operand: "", raw: input };
  }

  const name = trimmed.slice(0, boundary);
  const operand = unquote(trimmed.slice(boundary).trim());
  return { name, operand, raw: input };
}

/**
 * Strip one pair of matching quotes surrounding the whole operand.
 */
export function unquote(operand: string): string {
  const quote = operand[0];
  if (quote !== '"' && quote !== "'") {
    return operand;
  }
  if (operand.length < 2 || !operand.endsWith(quote)) {
    throw new CommandParseError(
      `Unclosed ${quote === '"' ? "double" : "single"} quote in: ${operand}`
    );
  }
  return operand.slice(1, -1);
}
