import type Docker from "dockerode";
import { describe, expect, it } from "vitest";

import { ProvisioningError } from "../../../core/errors.js";
import type { ContainerApi, DockerApi, ExecApi } from "../../../docker/docker.js";
import { DockerManager } from "../../../docker/manager.js";

import { DockerRunnerPlatform } from "./docker-runner-platform.js";

class TrackingContainer implements ContainerApi {
  readonly id = "c-42";
  readonly calls: string[] = [];

  async start(): Promise<void> {
    this.calls.push("start");
  }

  async stop(): Promise<void> {
    this.calls.push("stop");
  }

  async remove(): Promise<void> {
    this.calls.push("remove");
  }

  async inspect(): Promise<{ Id: string; State: { Running: boolean; Status: string } }> {
    return { Id: this.id, State: { Running: true, Status: "running" } };
  }

  async exec(): Promise<ExecApi> {
    throw new Error("not used");
  }
}

class TrackingDocker implements DockerApi {
  readonly created: Docker.ContainerCreateOptions[] = [];
  readonly container = new TrackingContainer();

  constructor(private readonly images: string[] = ["cuda:12"]) {}

  async createContainer(opts: Docker.ContainerCreateOptions): Promise<ContainerApi> {
    this.created.push(opts);
    return this.container;
  }

  getContainer(): ContainerApi {
    return this.container;
  }

  getImage(name: string): { inspect(): Promise<unknown> } {
    return {
      inspect: async () => {
        if (!this.images.includes(name)) {
          throw Object.assign(new Error(`no such image: ${name}`), { statusCode: 404 });
        }
        return { Id: `sha256:${name}` };
      },
    };
  }
}

function makePlatform(docker: TrackingDocker): DockerRunnerPlatform {
  return new DockerRunnerPlatform({
    repoPath: "/repo",
    workdir: "/workspace",
    manager: new DockerManager({ docker, demux: () => undefined }),
    readyPollMs: 1,
  });
}

describe("DockerRunnerPlatform", () => {
  it("creates a labelled container sized by the profile", async () => {
    const docker = new TrackingDocker();
    const platform = makePlatform(docker);

    const handle = await platform.start(
      {
        runId: "run-7",
        pipeline: "fast-tests",
        profile: { name: "gpu", image: "cuda:12", cpus: 4, memoryMb: 1024, gpus: 1 },
      },
      new AbortController().signal,
    );

    expect(handle).toEqual({ id: "c-42", label: "sg-fast-tests-run-7-gpu", workdir: "/workspace" });
    const opts = docker.created[0];
    expect(opts.Image).toBe("cuda:12");
    expect(opts.Cmd).toEqual(["sleep", "infinity"]);
    expect(opts.Labels).toEqual({
      "stagegate.run_id": "run-7",
      "stagegate.pipeline": "fast-tests",
      "stagegate.profile": "gpu",
    });
    expect(opts.HostConfig?.Binds).toEqual(["/repo:/workspace:rw"]);
    expect(opts.HostConfig?.CpuQuota).toBe(400_000);
    expect(opts.HostConfig?.Memory).toBe(1024 * 1024 * 1024);
    expect(opts.HostConfig?.DeviceRequests).toEqual([
      { Driver: "nvidia", Count: 1, Capabilities: [["gpu"]] },
    ]);
    expect(docker.container.calls).toEqual(["start"]);
  });

  it("requires an image on the profile", async () => {
    const platform = makePlatform(new TrackingDocker());

    await expect(
      platform.start(
        { runId: "run-7", pipeline: "fast-tests", profile: { name: "bare", gpus: 0 } },
        new AbortController().signal,
      ),
    ).rejects.toBeInstanceOf(ProvisioningError);
  });

  it("fails with a pull hint when the image is not present", async () => {
    const docker = new TrackingDocker([]);
    const platform = makePlatform(docker);

    const error = await platform
      .start(
        { runId: "run-7", pipeline: "fast-tests", profile: { name: "gpu", image: "cuda:12", gpus: 1 } },
        new AbortController().signal,
      )
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProvisioningError);
    expect(error).toMatchObject({
      message: 'Docker image not found: cuda:12. Pull it with "docker pull cuda:12" and retry.',
      profile: "gpu",
    });
    expect(docker.created).toHaveLength(0);
  });

  it("stops and removes the container on teardown", async () => {
    const docker = new TrackingDocker();
    const platform = makePlatform(docker);

    await platform.stop({ id: "c-42", label: "sg", workdir: "/workspace" });

    expect(docker.container.calls).toEqual(["stop", "remove"]);
  });
});
