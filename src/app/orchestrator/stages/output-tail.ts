const DEFAULT_TAIL_LINES = 20;

export function outputTail(output: string, lines = DEFAULT_TAIL_LINES): string[] {
  const all = output.split(/\r?\n/);
  while (all.length > 0 && all[all.length - 1] === "") all.pop();
  return all.slice(-lines);
}
