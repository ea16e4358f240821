import { ChangeDetectionError } from "../core/errors.js";

import { git, refExists } from "./git.js";

// =============================================================================
// TYPES
// =============================================================================

export type RevisionRange =
  | { kind: "range"; base: string; head: string }
  | { kind: "full-history"; reason: string };

export interface ChangeDetector {
  listChangedFiles(range: Extract<RevisionRange, { kind: "range" }>): Promise<string[]>;
}

// =============================================================================
// PUBLIC API
// =============================================================================

export class GitChangeDetector implements ChangeDetector {
  constructor(private readonly repoPath: string) {}

  async listChangedFiles(range: { base: string; head: string }): Promise<string[]> {
    for (const ref of [range.base, range.head]) {
      if (!(await refExists(this.repoPath, ref))) {
        throw new ChangeDetectionError(
          `Revision ${ref} cannot be resolved in ${this.repoPath}; is the history fetched?`,
        );
      }
    }

    try {
      // Three-dot diff: changes on head since it forked from base.
      const diff = await git(this.repoPath, [
        "diff",
        "--name-only",
        "--no-renames",
        `${range.base}...${range.head}`,
      ]);
      return parseNameOnlyOutput(diff.stdout);
    } catch (err) {
      throw new ChangeDetectionError(
        `Failed to diff ${range.base}...${range.head} in ${this.repoPath}`,
        err,
      );
    }
  }
}

export function parseNameOnlyOutput(stdout: string): string[] {
  const files = new Set<string>();

  for (const line of stdout.split("\n")) {
    const trimmed = line.trim();
    if (trimmed.length === 0) continue;
    files.add(normalizePath(unquoteGitPath(trimmed)));
  }

  return Array.from(files)
    .filter((file) => file.length > 0 && !file.endsWith("/"))
    .sort();
}

// =============================================================================
// INTERNALS
// =============================================================================

// git quotes paths with unusual characters unless core.quotePath=false.
function unquoteGitPath(value: string): string {
  if (value.length < 2 || !value.startsWith('"') || !value.endsWith('"')) {
    return value;
  }
  return value.slice(1, -1).replace(/\\(["\\])/g, "$1");
}

function normalizePath(filePath: string): string {
  return filePath.replace(/\\/g, "/").replace(/^\.\//, "");
}
