/*
Two-pass component matcher: include globs first, exclude globs subtract afterwards.
Assumes repo-relative POSIX paths (as produced by git diff --name-only).
*/

import { minimatch, type MinimatchOptions } from "minimatch";

import type { ComponentDefinition } from "../../../core/pipeline.js";

const MATCH_OPTIONS: MinimatchOptions = { dot: true };

export function matchesAnyGlob(filePath: string, globs: readonly string[]): boolean {
  return globs.some((glob) => minimatch(filePath, glob, MATCH_OPTIONS));
}

export function matchesComponent(filePath: string, component: ComponentDefinition): boolean {
  if (!matchesAnyGlob(filePath, component.include)) return false;
  return !matchesAnyGlob(filePath, component.exclude);
}

export function selectComponentFiles(
  files: readonly string[],
  component: ComponentDefinition,
): string[] {
  return files.filter((file) => matchesComponent(file, component));
}
