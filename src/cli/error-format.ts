/*
Purpose: lay out errors for the terminal as a "stagegate:" headline with indented detail lines.
Assumptions: stderr is the default stream; non-TTY output is never colored.
Usage: console.error(renderCliError(err, { debug }));
*/

import {
  createPalette,
  resolveColorEnabled,
  summarizeError,
} from "../core/error-format.js";

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

const INDENT = "  ";

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const summary = summarizeError(error, { debug: options.debug ?? false });
  const paint = createPalette(
    resolveColorEnabled({ stream: options.stream ?? process.stderr, useColor: options.useColor }),
  );

  const lines = [`${paint.error("stagegate:")} ${paint.strong(summary.title)}`];
  if (summary.message) lines.push(`${INDENT}${summary.message}`);
  if (summary.hint) lines.push(`${INDENT}${paint.warn("hint:")} ${summary.hint}`);
  if (summary.next) lines.push(`${INDENT}${paint.info("next:")} ${summary.next}`);

  if (summary.code) lines.push(paint.dim(`${INDENT}code: ${summary.code}`));
  for (const cause of summary.causes) {
    lines.push(paint.dim(`${INDENT}caused by: ${cause}`));
  }
  if (summary.stack) {
    lines.push(`${INDENT}${paint.dim("stack:")}`);
    for (const frame of summary.stack.split("\n")) {
      lines.push(paint.dim(`${INDENT}${INDENT}${frame.trim()}`));
    }
  }

  return lines.join("\n");
}

