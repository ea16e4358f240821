/**
 * LocalRunnerPlatform uses the local repo checkout as the runner instance.
 * Purpose: run pipelines on the current host with the same lifecycle as remote instances.
 * Assumptions: nothing is created on start, so stop has nothing to release.
 * Usage: new LocalRunnerPlatform({ repoPath }).start(request, signal)
 */

import { ProvisioningError } from "../../../core/errors.js";
import { pathExists } from "../../../core/utils.js";
import type { RunnerHandle, RunnerPlatform, RunnerStartRequest } from "../ports.js";

export class LocalRunnerPlatform implements RunnerPlatform {
  readonly kind = "local";
  private readonly repoPath: string;

  constructor(opts: { repoPath: string }) {
    this.repoPath = opts.repoPath;
  }

  async start(request: RunnerStartRequest, _signal: AbortSignal): Promise<RunnerHandle> {
    if (!(await pathExists(this.repoPath))) {
      throw new ProvisioningError(
        `Repository path ${this.repoPath} does not exist`,
        request.profile.name,
      );
    }

    return {
      id: `local-${request.runId}`,
      label: `local:${this.repoPath}`,
      workdir: this.repoPath,
    };
  }

  async stop(_handle: RunnerHandle): Promise<void> {
    // No-op for local execution.
  }
}
