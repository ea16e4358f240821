import { PassThrough, type Readable, type Writable } from "node:stream";

import type Docker from "dockerode";

import { DockerError } from "../core/errors.js";

import {
  type ContainerApi,
  type ContainerSpec,
  type DockerApi,
  createContainer as createDockerContainer,
  dockerClient,
  imageExists,
  startContainer as startDockerContainer,
  stopAndRemoveContainer,
} from "./docker.js";

export type Demuxer = (stream: Readable, stdout: Writable, stderr: Writable) => void;

export type ExecOptions = {
  env?: Record<string, string | undefined>;
  workdir?: string;
  signal?: AbortSignal;
};

export type ExecResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

const RUNNING_POLL_MS = 500;

export class DockerManager {
  private readonly docker: DockerApi;
  private readonly demux: Demuxer;

  constructor(opts: { docker?: DockerApi; demux?: Demuxer } = {}) {
    if (opts.docker) {
      this.docker = opts.docker;
      this.demux = opts.demux ?? pipeStdoutOnly;
    } else {
      const client = dockerClient();
      this.docker = client;
      this.demux = opts.demux ?? modemDemuxer(client);
    }
  }

  async imageExists(imageName: string): Promise<boolean> {
    return imageExists(this.docker, imageName);
  }

  async createContainer(spec: ContainerSpec): Promise<ContainerApi> {
    return createDockerContainer(this.docker, spec);
  }

  async startContainer(container: ContainerApi): Promise<void> {
    await startDockerContainer(container);
  }

  getContainer(id: string): ContainerApi {
    return this.docker.getContainer(id);
  }

  async waitUntilRunning(
    container: ContainerApi,
    signal: AbortSignal,
    pollMs = RUNNING_POLL_MS,
  ): Promise<void> {
    for (;;) {
      const info = await container.inspect();
      if (info.State.Running) return;
      if (info.State.Status === "exited" || info.State.Status === "dead") {
        throw new DockerError(`Container ${container.id} exited before it was ready`);
      }
      if (signal.aborted) {
        throw new DockerError(`Stopped waiting for container ${container.id}`, signal.reason);
      }
      await new Promise((resolve) => setTimeout(resolve, pollMs));
    }
  }

  async execInContainer(
    container: ContainerApi,
    command: string[],
    opts: ExecOptions = {},
  ): Promise<ExecResult> {
    try {
      const exec = await container.exec({
        Cmd: command,
        Env: normalizeEnv(opts.env),
        AttachStdout: true,
        AttachStderr: true,
        WorkingDir: opts.workdir,
        Tty: false,
      });

      const stdout = new PassThrough();
      const stderr = new PassThrough();

      const stream = await exec.start({ hijack: true, stdin: false });
      const onAbort = (): void => {
        stream.destroy(new DockerError("Exec aborted", opts.signal?.reason));
      };
      opts.signal?.addEventListener("abort", onAbort, { once: true });

      try {
        pipeExecStream(stream, stdout, stderr, this.demux);

        const [stdoutText, stderrText] = await Promise.all([
          collectStream(stdout),
          collectStream(stderr),
        ]);

        const inspect = await exec.inspect();
        return { exitCode: inspect.ExitCode ?? -1, stdout: stdoutText, stderr: stderrText };
      } finally {
        opts.signal?.removeEventListener("abort", onAbort);
      }
    } catch (err) {
      if (err instanceof DockerError) throw err;
      throw new DockerError(
        `Failed to exec in container: ${err instanceof Error ? err.message : String(err)}`,
        err,
      );
    }
  }

  async stopContainer(id: string): Promise<void> {
    await stopAndRemoveContainer(this.docker.getContainer(id));
  }
}

function modemDemuxer(client: Docker): Demuxer {
  return (stream, stdout, stderr) => client.modem.demuxStream(stream, stdout, stderr);
}

function pipeStdoutOnly(stream: Readable, stdout: Writable): void {
  stream.pipe(stdout);
}

function normalizeEnv(env?: Record<string, string | undefined>): string[] | undefined {
  if (!env) return undefined;
  return Object.entries(env)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${value}`);
}

function pipeExecStream(
  stream: Readable,
  stdout: PassThrough,
  stderr: PassThrough,
  demux: Demuxer,
): void {
  demux(stream, stdout, stderr);

  const close = (): void => {
    stdout.end();
    stderr.end();
  };

  stream.on("end", close);
  stream.on("close", close);
  stream.on("error", (err) => {
    stdout.destroy(err);
    stderr.destroy(err);
  });
}

function collectStream(stream: PassThrough): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    stream.on("data", (chunk: Buffer | string) => {
      chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
    });
    stream.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    stream.on("error", reject);
  });
}
