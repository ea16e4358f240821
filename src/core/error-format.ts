/*
Purpose: reduce unknown errors to a summary the CLI can lay out, and to one-line messages for reports.
Assumptions: UserFacingError carries title, hint and next; anything else is summarized by its message.
Usage: renderCliError builds on summarizeError(err, { debug }).
*/

import { UserFacingError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorSummary = {
  title: string;
  // Only user-facing errors carry a message separate from the title.
  message?: string;
  hint?: string;
  next?: string;
  // Filled in debug mode only.
  code?: string;
  causes: string[];
  stack?: string;
};

export type Palette = {
  error(text: string): string;
  warn(text: string): string;
  info(text: string): string;
  dim(text: string): string;
  strong(text: string): string;
};

const MAX_CAUSE_DEPTH = 5;

// =============================================================================
// MESSAGES
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function summarizeError(error: unknown, options: { debug: boolean }): ErrorSummary {
  const summary: ErrorSummary =
    error instanceof UserFacingError
      ? { title: error.title, message: error.message, hint: error.hint, next: error.next, causes: [] }
      : { title: formatErrorMessage(error), causes: [] };

  if (!options.debug) return summary;

  if (error instanceof UserFacingError) summary.code = error.code;
  summary.causes = causeChain(error);
  if (error instanceof Error && error.stack) summary.stack = error.stack;
  return summary;
}

// Each link reads "<name>: <message>", outermost first.
export function causeChain(error: unknown): string[] {
  const chain: string[] = [];
  const seen = new Set<unknown>([error]);
  let current = readCause(error);

  while (current !== undefined && !seen.has(current) && chain.length < MAX_CAUSE_DEPTH) {
    seen.add(current);
    chain.push(current instanceof Error ? `${current.name}: ${current.message}` : String(current));
    current = readCause(current);
  }
  return chain;
}

// =============================================================================
// COLOR
// =============================================================================

export function resolveColorEnabled(input: {
  stream: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  if (input.stream.isTTY !== true) return false;
  if (input.useColor !== undefined) return input.useColor;
  return process.env.NO_COLOR === undefined;
}

export function createPalette(enabled: boolean): Palette {
  if (!enabled) {
    const plain = (text: string): string => text;
    return { error: plain, warn: plain, info: plain, dim: plain, strong: plain };
  }

  const bold = sgr(1, 22);
  const red = sgr(31, 39);
  return {
    error: (text) => bold(red(text)),
    warn: sgr(33, 39),
    info: sgr(36, 39),
    dim: sgr(2, 22),
    strong: bold,
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function sgr(open: number, close: number): (text: string) => string {
  return (text) => `\u001b[${open}m${text}\u001b[${close}m`;
}

function readCause(error: unknown): unknown {
  if (typeof error !== "object" || error === null || !("cause" in error)) return undefined;
  return error.cause;
}
