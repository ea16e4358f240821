/**
 * DockerRunnerPlatform provisions one labelled container per run.
 * Purpose: give each run an isolated instance sized by its profile (CPU, memory, GPUs).
 * Assumptions: the repo checkout is bind-mounted at the build workdir; the image has the toolchain.
 * Usage: new DockerRunnerPlatform({ repoPath, workdir }).start(request, signal)
 */

import { ProvisioningError } from "../../../core/errors.js";
import { DEFAULT_CPU_PERIOD, type ContainerSpec } from "../../../docker/docker.js";
import { DockerManager } from "../../../docker/manager.js";
import { buildInstanceContainerName, buildInstanceLabels } from "../../../docker/names.js";
import type { RunnerHandle, RunnerPlatform, RunnerProfile, RunnerStartRequest } from "../ports.js";

export type DockerRunnerPlatformOptions = {
  repoPath: string;
  workdir: string;
  manager?: DockerManager;
  readyPollMs?: number;
};

// Keeps the container alive so targets can exec into it.
const IDLE_COMMAND = ["sleep", "infinity"];

export class DockerRunnerPlatform implements RunnerPlatform {
  readonly kind = "docker";
  private readonly repoPath: string;
  private readonly workdir: string;
  private readonly manager: DockerManager;
  private readonly readyPollMs?: number;

  constructor(opts: DockerRunnerPlatformOptions) {
    this.repoPath = opts.repoPath;
    this.workdir = opts.workdir;
    this.manager = opts.manager ?? new DockerManager();
    this.readyPollMs = opts.readyPollMs;
  }

  async start(request: RunnerStartRequest, signal: AbortSignal): Promise<RunnerHandle> {
    const { profile } = request;
    if (!profile.image) {
      throw new ProvisioningError(`Instance profile "${profile.name}" has no image`, profile.name);
    }

    if (!(await this.manager.imageExists(profile.image))) {
      throw new ProvisioningError(
        `Docker image not found: ${profile.image}. Pull it with "docker pull ${profile.image}" and retry.`,
        profile.name,
      );
    }

    const names = { pipeline: request.pipeline, runId: request.runId, profile: profile.name };
    const spec: ContainerSpec = {
      name: buildInstanceContainerName(names),
      image: profile.image,
      env: {},
      binds: [{ hostPath: this.repoPath, containerPath: this.workdir, mode: "rw" }],
      workdir: this.workdir,
      labels: buildInstanceLabels(names),
      cmd: IDLE_COMMAND,
      resources: toResources(profile),
    };

    const container = await this.manager.createContainer(spec);
    const handle: RunnerHandle = { id: container.id, label: spec.name, workdir: this.workdir };
    try {
      await this.manager.startContainer(container);
      await this.manager.waitUntilRunning(container, signal, this.readyPollMs);
    } catch (err) {
      await this.manager.stopContainer(container.id);
      throw err;
    }
    return handle;
  }

  async stop(handle: RunnerHandle): Promise<void> {
    await this.manager.stopContainer(handle.id);
  }
}

function toResources(profile: RunnerProfile): ContainerSpec["resources"] {
  return {
    memoryBytes: profile.memoryMb !== undefined ? profile.memoryMb * 1024 * 1024 : undefined,
    cpuQuota: profile.cpus !== undefined ? Math.round(profile.cpus * DEFAULT_CPU_PERIOD) : undefined,
    cpuPeriod: profile.cpus !== undefined ? DEFAULT_CPU_PERIOD : undefined,
    gpus: profile.gpus,
  };
}
