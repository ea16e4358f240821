import { loadPipelineConfig, type LoadedPipeline } from "../core/config-loader.js";
import { createPathsContext, defaultPipelineConfigPath, type PathsContext } from "../core/paths.js";

// =============================================================================
// CONFIG DISCOVERY (CLI)
//
// An explicit --config wins; otherwise <cwd>/.stagegate/pipeline.yaml.
// State (logs, reports, leases) lives under STAGEGATE_HOME or <repo>/.stagegate.
// =============================================================================

export type LoadPipelineForCliArgs = {
  explicitConfigPath?: string;
  cwd?: string;
};

export type CliPipeline = {
  loaded: LoadedPipeline;
  paths: PathsContext;
};

export function loadPipelineForCli(args: LoadPipelineForCliArgs): CliPipeline {
  const cwd = args.cwd ?? process.cwd();
  const configPath = args.explicitConfigPath ?? defaultPipelineConfigPath(cwd);
  const loaded = loadPipelineConfig(configPath);

  return {
    loaded,
    paths: createPathsContext({ repoPath: loaded.config.repo_path }),
  };
}
