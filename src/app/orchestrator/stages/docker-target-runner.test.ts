import { PassThrough, type Readable, type Writable } from "node:stream";

import type Docker from "dockerode";
import { describe, expect, it } from "vitest";

import type { ContainerApi, DockerApi, ExecApi } from "../../../docker/docker.js";
import { DockerManager } from "../../../docker/manager.js";

import { DockerTargetRunner } from "./docker-target-runner.js";

class ScriptedExec implements ExecApi {
  constructor(private readonly exitCode: number) {}

  async start(): Promise<Readable> {
    const stream = new PassThrough();
    queueMicrotask(() => {
      stream.write("building\n");
      stream.end();
    });
    return stream;
  }

  async inspect(): Promise<{ ExitCode: number | null }> {
    return { ExitCode: this.exitCode };
  }
}

class ScriptedContainer implements ContainerApi {
  readonly execCalls: Docker.ExecCreateOptions[] = [];

  constructor(
    readonly id: string,
    private readonly exitCode: number,
  ) {}

  async start(): Promise<void> {}
  async stop(): Promise<void> {}
  async remove(): Promise<void> {}

  async inspect(): Promise<{ Id: string; State: { Running: boolean; Status: string } }> {
    return { Id: this.id, State: { Running: true, Status: "running" } };
  }

  async exec(opts: Docker.ExecCreateOptions): Promise<ExecApi> {
    this.execCalls.push(opts);
    return new ScriptedExec(this.exitCode);
  }
}

function makeRunner(container: ScriptedContainer): DockerTargetRunner {
  const docker: DockerApi = {
    createContainer: async () => container,
    getContainer: () => container,
    getImage: () => ({ inspect: async () => ({}) }),
  };
  const demux = (raw: Readable, stdout: Writable): void => {
    raw.pipe(stdout);
  };
  return new DockerTargetRunner({
    command: ["make", "-C", "tfhe"],
    manager: new DockerManager({ docker, demux }),
  });
}

describe("DockerTargetRunner", () => {
  it("execs the target in the instance container", async () => {
    const container = new ScriptedContainer("c-1", 0);

    const result = await makeRunner(container).runTarget({
      instance: { id: "c-1", label: "sg", workdir: "/workspace" },
      stage: "core",
      target: "test_core",
      env: { FAST_TESTS: "TRUE" },
      signal: new AbortController().signal,
    });

    expect(result).toEqual({ success: true, exitCode: 0 });
    expect(container.execCalls[0].Cmd).toEqual(["make", "-C", "tfhe", "test_core"]);
    expect(container.execCalls[0].Env).toEqual(["FAST_TESTS=TRUE"]);
    expect(container.execCalls[0].WorkingDir).toBe("/workspace");
  });

  it("reports a non-zero exit as failure", async () => {
    const container = new ScriptedContainer("c-1", 2);

    const result = await makeRunner(container).runTarget({
      instance: { id: "c-1", label: "sg", workdir: "/workspace" },
      stage: "core",
      target: "test_core",
      env: {},
      signal: new AbortController().signal,
    });

    expect(result).toEqual({
      success: false,
      exitCode: 2,
      errorMessage: "Command failed with exit code 2: make -C tfhe test_core",
    });
  });
});
