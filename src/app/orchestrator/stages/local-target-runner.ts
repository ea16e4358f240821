/**
 * LocalTargetRunner runs build targets as child processes in the instance workdir.
 * Purpose: invoke `<build.command> <target>` and report only success or failure.
 * Assumptions: the target's own output is opaque; only the tail is kept for the run log.
 * Usage: new LocalTargetRunner({ command: ["make"] }).runTarget(input)
 */

import { execa } from "execa";

import { logOrchestratorEvent } from "../../../core/logger.js";
import { outputToString } from "../../../git/git.js";
import type { BuildTargetRunner, TargetRunInput, TargetRunResult } from "../ports.js";

import { outputTail } from "./output-tail.js";

export type LocalTargetRunnerOptions = {
  command: readonly string[];
  // Mirror target output to this process's stdout/stderr as it runs.
  echo?: boolean;
};

export class LocalTargetRunner implements BuildTargetRunner {
  private readonly command: readonly string[];
  private readonly echo: boolean;

  constructor(opts: LocalTargetRunnerOptions) {
    this.command = opts.command;
    this.echo = opts.echo ?? false;
  }

  async runTarget(input: TargetRunInput): Promise<TargetRunResult> {
    const [file, ...baseArgs] = this.command;
    const args = [...baseArgs, input.target];

    const subprocess = execa(file, args, {
      cwd: input.instance.workdir,
      env: { ...process.env, ...input.env },
      stdin: "ignore",
      all: true,
      reject: false,
      cancelSignal: input.signal,
      timeout: input.timeoutMs,
    });
    if (this.echo) {
      subprocess.stdout?.pipe(process.stdout, { end: false });
      subprocess.stderr?.pipe(process.stderr, { end: false });
    }
    const result = await subprocess;

    if (input.logger) {
      logOrchestratorEvent(input.logger, "stage.output", {
        stage: input.stage,
        command: [file, ...args].join(" "),
        exit_code: result.exitCode ?? null,
        tail: outputTail(outputToString(result.all)),
      });
    }

    if (result.isCanceled) {
      return { success: false, cancelled: true, errorMessage: `Target ${input.target} was cancelled` };
    }
    if (result.timedOut) {
      return {
        success: false,
        timedOut: true,
        errorMessage: `Target ${input.target} timed out after ${input.timeoutMs ?? 0}ms`,
      };
    }
    if (result.failed) {
      return {
        success: false,
        exitCode: result.exitCode,
        errorMessage: result.shortMessage ?? `Target ${input.target} failed`,
      };
    }
    return { success: true, exitCode: result.exitCode ?? 0 };
  }
}
