import { buildRunContext } from "../app/orchestrator/run-context.js";
import { runPipeline, type RunResult } from "../app/orchestrator/run/run-engine.js";
import { exitCodeForOutcome } from "../app/orchestrator/run/run-outcome.js";
import { formatErrorMessage } from "../core/error-format.js";
import {
  ChangeDetectionError,
  ConfigError,
  DockerError,
  GitError,
  type UserFacingErrorCode,
  UserFacingError,
  USER_FACING_ERROR_CODES,
} from "../core/errors.js";
import { DOCKER_UNAVAILABLE_HINT } from "../docker/docker.js";

import { loadPipelineForCli } from "./config.js";
import { resolveRunInputs, type RunInputFlags } from "./run-inputs.js";
import { createRunStopSignalHandler } from "./signal-handlers.js";

export type RunCommandOptions = RunInputFlags & {
  config?: string;
  notify?: boolean;
  targetOutput?: boolean;
};

export async function runCommand(opts: RunCommandOptions): Promise<void> {
  try {
    const { loaded, paths } = loadPipelineForCli({ explicitConfigPath: opts.config });
    const inputs = resolveRunInputs(opts, process.env);
    const context = buildRunContext({
      loaded,
      paths,
      options: {
        ...inputs,
        notify: opts.notify ?? true,
        echoTargetOutput: opts.targetOutput ?? true,
      },
    });

    console.log(
      `Run ${context.runId}: ${context.pipeline.name} (${context.trigger}) on ${context.ref}`,
    );

    const stopHandler = createRunStopSignalHandler({
      onSignal: (signal) => {
        console.log(`Received ${signal}. Cancelling run ${context.runId}; the instance is torn down before exit.`);
      },
    });

    let result: RunResult;
    try {
      result = await runPipeline(context, { signal: stopHandler.signal });
    } finally {
      stopHandler.cleanup();
      context.logger.close();
    }

    printRunSummary(result);
    process.exitCode = exitCodeForOutcome(result.outcome);
  } catch (error) {
    throw normalizeRunCommandError(error);
  }
}

function printRunSummary(result: RunResult): void {
  const { report } = result;
  for (const stage of report.stages) {
    const detail = stage.status === "skipped" ? ` (${stage.reason ?? "skipped"})` : "";
    console.log(`- ${stage.stage}: ${stage.status}${detail}`);
  }
  for (const error of report.errors) {
    console.log(`! ${error}`);
  }

  const reason = report.outcome.cancel_reason ? ` (${report.outcome.cancel_reason})` : "";
  console.log(`Run ${result.runId} finished with status: ${result.outcome}${reason}`);
  console.log(`Report: ${result.reportPath}`);
}

// =============================================================================
// ERROR NORMALIZATION
// =============================================================================

const RUN_COMMAND_FAILURE_TITLE = "Run command failed.";
const RUN_COMMAND_GIT_HINT =
  "Fetch enough history for the base revision (e.g. `fetch-depth: 0`), or pass --base explicitly.";

function normalizeRunCommandError(error: unknown): UserFacingError {
  if (error instanceof UserFacingError) {
    return new UserFacingError({
      code: error.code,
      title: error.code === USER_FACING_ERROR_CODES.config ? error.title : RUN_COMMAND_FAILURE_TITLE,
      message: error.message,
      hint: error.hint ?? resolveRunCommandHint(error),
      next: error.next,
      cause: error.cause ?? error,
    });
  }

  return new UserFacingError({
    code: resolveCommandErrorCode(error),
    title: RUN_COMMAND_FAILURE_TITLE,
    message: formatErrorMessage(error),
    hint: resolveRunCommandHint(error),
    cause: error,
  });
}

function resolveRunCommandHint(error: unknown): string | undefined {
  if (error instanceof DockerError) return DOCKER_UNAVAILABLE_HINT;
  if (error instanceof GitError || error instanceof ChangeDetectionError) return RUN_COMMAND_GIT_HINT;
  return undefined;
}

function resolveCommandErrorCode(error: unknown): UserFacingErrorCode {
  if (error instanceof ConfigError) return USER_FACING_ERROR_CODES.config;
  if (error instanceof DockerError) return USER_FACING_ERROR_CODES.docker;
  if (error instanceof GitError || error instanceof ChangeDetectionError) {
    return USER_FACING_ERROR_CODES.git;
  }
  return USER_FACING_ERROR_CODES.run;
}
