import path from "node:path";
import type { Readable } from "node:stream";

import Docker from "dockerode";

import { DockerError, UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

export const DEFAULT_CPU_PERIOD = 100_000;

export type ContainerSpec = {
  name: string;
  image: string;
  env: Record<string, string | undefined>;
  binds: Array<{ hostPath: string; containerPath: string; mode: "rw" | "ro" }>;
  workdir: string;
  labels?: Record<string, string>;
  // Optional: override command
  cmd?: string[];
  networkMode?: "bridge" | "none" | "host";
  resources?: {
    memoryBytes?: number;
    cpuQuota?: number;
    cpuPeriod?: number;
    gpus?: number;
  };
};

// The slices of the dockerode API this project calls; dockerode's own classes satisfy them.
export type ExecApi = {
  start(opts: { hijack: boolean; stdin: boolean }): Promise<Readable>;
  inspect(): Promise<{ ExitCode: number | null }>;
};

export type ContainerApi = {
  id: string;
  start(): Promise<unknown>;
  stop(opts?: { t?: number }): Promise<unknown>;
  remove(opts?: { force?: boolean }): Promise<unknown>;
  inspect(): Promise<{ Id: string; State: { Running: boolean; Status: string } }>;
  exec(opts: Docker.ExecCreateOptions): Promise<ExecApi>;
};

export type ImageApi = {
  inspect(): Promise<unknown>;
};

export type DockerApi = {
  createContainer(opts: Docker.ContainerCreateOptions): Promise<ContainerApi>;
  getContainer(id: string): ContainerApi;
  getImage(name: string): ImageApi;
};

export function dockerClient(): Docker {
  return new Docker();
}

// A 404 means the image is not present locally; any other failure is the daemon's.
export async function imageExists(docker: DockerApi, imageName: string): Promise<boolean> {
  try {
    await docker.getImage(imageName).inspect();
    return true;
  } catch (err) {
    if (isDockerStatus(err, 404)) return false;
    throw new DockerError(`Failed to inspect image ${imageName}: ${describe(err)}`, err);
  }
}

export async function createContainer(docker: DockerApi, spec: ContainerSpec): Promise<ContainerApi> {
  try {
    const Env = Object.entries(spec.env)
      .filter(([, v]) => v !== undefined)
      .map(([k, v]) => `${k}=${v}`);

    const Binds = spec.binds.map((b) => `${path.resolve(b.hostPath)}:${b.containerPath}:${b.mode}`);

    const hostConfig: Docker.ContainerCreateOptions["HostConfig"] = {
      Binds,
      NetworkMode: spec.networkMode ?? "bridge",
      AutoRemove: false,
    };

    if (spec.resources?.memoryBytes !== undefined) {
      hostConfig.Memory = spec.resources.memoryBytes;
    }
    if (spec.resources?.cpuQuota !== undefined) {
      hostConfig.CpuQuota = spec.resources.cpuQuota;
      hostConfig.CpuPeriod = spec.resources.cpuPeriod ?? DEFAULT_CPU_PERIOD;
    }
    if (spec.resources?.gpus !== undefined && spec.resources.gpus > 0) {
      hostConfig.DeviceRequests = [
        { Driver: "nvidia", Count: spec.resources.gpus, Capabilities: [["gpu"]] },
      ];
    }

    return await docker.createContainer({
      Image: spec.image,
      name: spec.name,
      Env,
      WorkingDir: spec.workdir,
      Cmd: spec.cmd,
      Labels: spec.labels,
      HostConfig: hostConfig,
    });
  } catch (err) {
    throw createContainerUserFacingError(spec.name, err);
  }
}

export async function startContainer(container: ContainerApi): Promise<void> {
  try {
    await container.start();
  } catch (err) {
    throw createStartContainerUserFacingError(err);
  }
}

// Stop then remove; a container that is already stopped (304) or gone (404) counts as done.
export async function stopAndRemoveContainer(container: ContainerApi): Promise<void> {
  try {
    await container.stop({ t: 10 });
  } catch (err) {
    if (!isDockerStatus(err, 304) && !isDockerStatus(err, 404)) {
      throw new DockerError(`Failed to stop container ${container.id}: ${describe(err)}`, err);
    }
  }

  try {
    await container.remove({ force: true });
  } catch (err) {
    if (!isDockerStatus(err, 404) && !isDockerStatus(err, 409)) {
      throw new DockerError(`Failed to remove container ${container.id}: ${describe(err)}`, err);
    }
  }
}

export function isDockerStatus(err: unknown, statusCode: number): boolean {
  return (
    typeof err === "object" && err !== null && "statusCode" in err && err.statusCode === statusCode
  );
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

export const DOCKER_UNAVAILABLE_HINT =
  "Start the Docker daemon and retry, or set instance.platform to local to run without Docker.";

const DOCKER_RUN_HINT = "Check that the instance profile image and resources are valid, then retry.";

type DockerRunErrorDetails = {
  message: string;
  code?: string;
  reason?: string;
};

function createContainerUserFacingError(name: string, err: unknown): UserFacingError {
  const details = resolveDockerRunErrorDetails(err);
  const detail = details.reason || details.message || "Unknown docker error.";
  const dockerError = new DockerError(`Failed to create container ${name}: ${detail}`, err);

  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.docker,
    title: "Docker container creation failed.",
    message: `Unable to create Docker container ${name}.`,
    hint: isDockerUnavailableError(details) ? DOCKER_UNAVAILABLE_HINT : DOCKER_RUN_HINT,
    cause: dockerError,
  });
}

function createStartContainerUserFacingError(err: unknown): UserFacingError {
  const details = resolveDockerRunErrorDetails(err);
  const detail = details.reason || details.message || "Unknown docker error.";
  const dockerError = new DockerError(`Failed to start container: ${detail}`, err);

  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.docker,
    title: "Docker container start failed.",
    message: "Unable to start the Docker container.",
    hint: isDockerUnavailableError(details) ? DOCKER_UNAVAILABLE_HINT : DOCKER_RUN_HINT,
    cause: dockerError,
  });
}

function resolveDockerRunErrorDetails(err: unknown): DockerRunErrorDetails {
  if (!err || typeof err !== "object") {
    return { message: String(err) };
  }

  const message = "message" in err && typeof err.message === "string" ? err.message : String(err);
  const code = "code" in err && typeof err.code === "string" ? err.code : undefined;
  const reason = "reason" in err && typeof err.reason === "string" ? err.reason : undefined;

  return { message, code, reason };
}

function isDockerUnavailableError(details: DockerRunErrorDetails): boolean {
  if (details.code === "ENOENT" || details.code === "ECONNREFUSED") {
    return true;
  }

  const text = `${details.message}\n${details.reason ?? ""}`.toLowerCase();
  return (
    text.includes("cannot connect to the docker daemon") ||
    text.includes("is the docker daemon running") ||
    text.includes("error during connect") ||
    text.includes("docker.sock") ||
    text.includes("connect econnrefused") ||
    text.includes("connect enoent")
  );
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
