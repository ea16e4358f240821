/**
 * DockerTargetRunner runs build targets inside the run's instance container.
 * Purpose: exec `<build.command> <target>` in the container the platform provisioned.
 * Assumptions: the handle id is the container id; the container stays running between stages.
 * Usage: new DockerTargetRunner({ command: ["make"] }).runTarget(input)
 */

import { formatErrorMessage } from "../../../core/error-format.js";
import { logOrchestratorEvent } from "../../../core/logger.js";
import { DockerManager } from "../../../docker/manager.js";
import type { BuildTargetRunner, TargetRunInput, TargetRunResult } from "../ports.js";

import { outputTail } from "./output-tail.js";

export type DockerTargetRunnerOptions = {
  command: readonly string[];
  manager?: DockerManager;
};

export class DockerTargetRunner implements BuildTargetRunner {
  private readonly command: readonly string[];
  private readonly manager: DockerManager;

  constructor(opts: DockerTargetRunnerOptions) {
    this.command = opts.command;
    this.manager = opts.manager ?? new DockerManager();
  }

  async runTarget(input: TargetRunInput): Promise<TargetRunResult> {
    const command = [...this.command, input.target];
    const controller = new AbortController();
    const onAbort = (): void => controller.abort(input.signal.reason);
    input.signal.addEventListener("abort", onAbort, { once: true });

    let timedOut = false;
    const timer =
      input.timeoutMs !== undefined
        ? setTimeout(() => {
            timedOut = true;
            controller.abort("timeout");
          }, input.timeoutMs)
        : undefined;

    try {
      const container = this.manager.getContainer(input.instance.id);
      const result = await this.manager.execInContainer(container, command, {
        env: { ...input.env },
        workdir: input.instance.workdir,
        signal: controller.signal,
      });

      if (input.logger) {
        logOrchestratorEvent(input.logger, "stage.output", {
          stage: input.stage,
          command: command.join(" "),
          exit_code: result.exitCode,
          tail: outputTail(`${result.stdout}${result.stderr}`),
        });
      }

      if (result.exitCode === 0) return { success: true, exitCode: 0 };
      return {
        success: false,
        exitCode: result.exitCode,
        errorMessage: `Command failed with exit code ${result.exitCode}: ${command.join(" ")}`,
      };
    } catch (err) {
      if (timedOut) {
        return {
          success: false,
          timedOut: true,
          errorMessage: `Target ${input.target} timed out after ${input.timeoutMs ?? 0}ms`,
        };
      }
      if (input.signal.aborted) {
        return { success: false, cancelled: true, errorMessage: `Target ${input.target} was cancelled` };
      }
      return { success: false, errorMessage: formatErrorMessage(err) };
    } finally {
      clearTimeout(timer);
      input.signal.removeEventListener("abort", onAbort);
    }
  }
}
