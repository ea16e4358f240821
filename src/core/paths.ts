import os from "node:os";
import path from "node:path";

import { slugify } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type PathsContext = {
  stagegateHome: string;
};

export type ResolveStagegateHomeOptions = {
  stagegateHome?: string;
  repoPath?: string;
};

// =============================================================================
// CONTEXT
// =============================================================================

export function resolveStagegateHome(opts: ResolveStagegateHomeOptions = {}): string {
  if (opts.stagegateHome) {
    return path.resolve(opts.stagegateHome);
  }

  if (process.env.STAGEGATE_HOME) {
    return path.resolve(process.env.STAGEGATE_HOME);
  }

  if (opts.repoPath) {
    return path.join(path.resolve(opts.repoPath), ".stagegate");
  }

  return path.join(os.homedir(), ".stagegate");
}

export function createPathsContext(opts: ResolveStagegateHomeOptions): PathsContext {
  return { stagegateHome: resolveStagegateHome(opts) };
}

// =============================================================================
// PATH HELPERS
// =============================================================================

export function defaultPipelineConfigPath(repoPath: string): string {
  return path.join(path.resolve(repoPath), ".stagegate", "pipeline.yaml");
}

export function logsBaseDir(pipeline: string, paths: PathsContext): string {
  return path.join(paths.stagegateHome, "logs", pipeline);
}

export function runLogPath(pipeline: string, runId: string, paths: PathsContext): string {
  return path.join(logsBaseDir(pipeline, paths), `run-${runId}.jsonl`);
}

export function runReportsDir(pipeline: string, paths: PathsContext): string {
  return path.join(paths.stagegateHome, "runs", pipeline);
}

export function runReportPath(pipeline: string, runId: string, paths: PathsContext): string {
  return path.join(runReportsDir(pipeline, paths), `${runId}.json`);
}

export function concurrencyDir(paths: PathsContext): string {
  return path.join(paths.stagegateHome, "concurrency");
}

export function concurrencyLeasePath(groupKey: string, paths: PathsContext): string {
  return path.join(concurrencyDir(paths), `${slugify(groupKey)}.json`);
}
