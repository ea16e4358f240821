/**
 * RunContext + default adapters for pipeline runs.
 * Purpose: centralize run-scoped values and injected ports to avoid globals.
 * Assumptions: ports are thin adapters over core modules and are overrideable for tests.
 * Usage: const ctx = buildRunContext({ loaded, options, paths }); await runPipeline(ctx, { signal }).
 */

import type { LoadedPipeline } from "../../core/config-loader.js";
import type { InstanceConfig, PipelineConfig } from "../../core/config.js";
import { JsonlLogger } from "../../core/logger.js";
import { runLogPath, type PathsContext } from "../../core/paths.js";
import type { PipelineDefinition } from "../../core/pipeline.js";
import { defaultRunId, isoNow } from "../../core/utils.js";
import { GitChangeDetector, type RevisionRange } from "../../git/changes.js";

import { resolveConcurrencyGroup, type ConcurrencyGroup } from "./concurrency/concurrency-group.js";
import { FileConcurrencyRegistry } from "./concurrency/file-registry.js";
import type { TriggerKind } from "./gating/gate-resolver.js";
import { DockerRunnerPlatform } from "./instances/docker-runner-platform.js";
import { LocalRunnerPlatform } from "./instances/local-runner-platform.js";
import { ConsoleSink } from "./notify/console-sink.js";
import { SlackWebhookSink } from "./notify/slack-sink.js";
import type { NotificationSink, OrchestratorPorts, RunnerProfile } from "./ports.js";
import { DockerTargetRunner } from "./stages/docker-target-runner.js";
import { LocalTargetRunner } from "./stages/local-target-runner.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunContextOptions = {
  runId?: string;
  trigger: TriggerKind;
  base?: string;
  head?: string;
  ref: string;
  runUrl?: string;
  ciRunUrl?: string;
  label?: string;
  notify?: boolean;
  echoTargetOutput?: boolean;
};

export type RunContext = {
  runId: string;
  pipeline: PipelineDefinition;
  config: PipelineConfig;
  paths: PathsContext;
  ports: OrchestratorPorts;
  logger: JsonlLogger;
  trigger: TriggerKind;
  range: RevisionRange;
  ref: string;
  link?: string;
  // Set when the pipeline gates pull requests on an approval label.
  approval: ApprovalGate | null;
  notify: boolean;
  group: ConcurrencyGroup;
  profile: RunnerProfile;
  provisionTimeoutMs: number;
  orphanStopGraceMs: number;
};

export type ApprovalGate = {
  label: string;
  granted: boolean;
};

export type BuildRunContextInput = {
  loaded: LoadedPipeline;
  options: RunContextOptions;
  paths: PathsContext;
  ports?: Partial<OrchestratorPorts>;
  logger?: JsonlLogger;
};

const ZERO_SHA = /^0+$/;

// =============================================================================
// PUBLIC API
// =============================================================================

export function buildRunContext(input: BuildRunContextInput): RunContext {
  const { loaded, options, paths } = input;
  const { config, pipeline } = loaded;
  const runId = options.runId ?? defaultRunId();

  const ports: OrchestratorPorts = {
    ...createDefaultPorts({ config, paths, echoTargetOutput: options.echoTargetOutput ?? false }),
    ...input.ports,
  };

  return {
    runId,
    pipeline,
    config,
    paths,
    ports,
    logger:
      input.logger ??
      new JsonlLogger(runLogPath(pipeline.name, runId, paths), {
        runId,
        now: () => ports.clock.isoNow(),
      }),
    trigger: options.trigger,
    range: resolveRevisionRange({ base: options.base, head: options.head }),
    ref: options.ref,
    link: resolveRunLink(
      options.runUrl ?? config.notifications.run_url ?? options.ciRunUrl,
      runId,
    ),
    approval: resolveApprovalGate(config.approval_label, options.trigger, options.label),
    notify: options.notify ?? true,
    group: resolveConcurrencyGroup({
      config: config.concurrency,
      workflow: pipeline.workflow,
      ref: options.ref,
    }),
    profile: resolveRunnerProfile(config.instance),
    provisionTimeoutMs: config.instance.provision_timeout_seconds * 1000,
    orphanStopGraceMs: config.instance.orphan_stop_grace_seconds * 1000,
  };
}

export function createDefaultPorts(input: {
  config: PipelineConfig;
  paths: PathsContext;
  echoTargetOutput: boolean;
}): OrchestratorPorts {
  const { config, paths } = input;
  const docker = config.instance.platform === "docker";

  return {
    changeDetector: new GitChangeDetector(config.repo_path),
    platform: docker
      ? new DockerRunnerPlatform({ repoPath: config.repo_path, workdir: config.build.workdir })
      : new LocalRunnerPlatform({ repoPath: config.repo_path }),
    targetRunner: docker
      ? new DockerTargetRunner({ command: config.build.command })
      : new LocalTargetRunner({ command: config.build.command, echo: input.echoTargetOutput }),
    concurrency: new FileConcurrencyRegistry({ paths }),
    notificationSinks: createNotificationSinks(config),
    clock: { now: () => new Date(), isoNow },
  };
}

export function createNotificationSinks(config: PipelineConfig): NotificationSink[] {
  const sinks: NotificationSink[] = [];
  const { notifications } = config;

  if (notifications.console) {
    sinks.push(new ConsoleSink());
  }
  // An unset webhook (e.g. `${SLACK_WEBHOOK:-}`) disables the sink.
  if (notifications.slack && notifications.slack.webhook_url) {
    sinks.push(
      new SlackWebhookSink({
        webhookUrl: notifications.slack.webhook_url,
        channel: notifications.slack.channel || undefined,
        username: notifications.slack.username || undefined,
        iconUrl: notifications.slack.icon_url || undefined,
        timeoutMs: notifications.slack.timeout_seconds * 1000,
      }),
    );
  }
  return sinks;
}

// Only pull requests wait for approval.
export function resolveApprovalGate(
  approvalLabel: string | undefined,
  trigger: TriggerKind,
  label: string | undefined,
): ApprovalGate | null {
  if (!approvalLabel || trigger !== "pull-request") return null;
  return { label: approvalLabel, granted: label === approvalLabel };
}

export function resolveRevisionRange(input: { base?: string; head?: string }): RevisionRange {
  const head = input.head || "HEAD";
  if (!input.base) {
    return { kind: "full-history", reason: "no base revision" };
  }
  if (ZERO_SHA.test(input.base)) {
    return { kind: "full-history", reason: "base revision is the null commit" };
  }
  return { kind: "range", base: input.base, head };
}

export function resolveRunLink(template: string | undefined, runId: string): string | undefined {
  if (!template) return undefined;
  return template.split("{run_id}").join(runId);
}

export function resolveRunnerProfile(instance: InstanceConfig): RunnerProfile {
  const profile = instance.profiles[instance.profile];
  return {
    name: instance.profile,
    image: profile?.image,
    cpus: profile?.cpus,
    memoryMb: profile?.memory_mb,
    gpus: profile?.gpus ?? 0,
  };
}
