import { z } from "zod";

// =============================================================================
// SCHEMA
// =============================================================================

const GlobListSchema = z.array(z.string().min(1)).min(1);

const StageSchema = z
  .object({
    name: z.string().min(1),
    target: z.string().min(1),
    components: z.array(z.string().min(1)).default([]),
    shared_dependencies: z.boolean().default(true),
    always_run: z.boolean().default(false),
    needs: z.array(z.string().min(1)).default([]),
    env: z.record(z.string()).default({}),
    timeout_minutes: z.number().positive().optional(),
    monitored: z.boolean().default(true),
  })
  .strict();

const InstanceProfileSchema = z
  .object({
    image: z.string().min(1).optional(),
    cpus: z.number().positive().optional(),
    memory_mb: z.number().int().positive().optional(),
    gpus: z.number().int().nonnegative().default(0),
  })
  .strict();

const InstanceSchema = z
  .object({
    platform: z.enum(["local", "docker"]).default("local"),
    profile: z.string().min(1).default("default"),
    provision_timeout_seconds: z.number().int().positive().default(600),
    orphan_stop_grace_seconds: z.number().nonnegative().default(30),
    profiles: z.record(InstanceProfileSchema).default({}),
  })
  .strict();

const BuildSchema = z
  .object({
    command: z.array(z.string().min(1)).min(1).default(["make"]),
    workdir: z.string().min(1).default("/workspace"),
  })
  .strict();

export const ConcurrencySchema = z
  .object({
    group: z.string().min(1).default("{workflow}_{ref}"),
    policy: z.enum(["cancel-in-progress", "protect-branches"]).default("cancel-in-progress"),
    protected_branches: z.array(z.string().min(1)).default(["main"]),
    on_protected: z.enum(["wait", "reject"]).default("wait"),
    wait_timeout_seconds: z.number().int().positive().default(3600),
  })
  .strict();

const SlackSchema = z
  .object({
    webhook_url: z.string().default(""),
    channel: z.string().optional(),
    username: z.string().optional(),
    icon_url: z.string().optional(),
    timeout_seconds: z.number().positive().default(10),
  })
  .strict();

const NotificationsSchema = z
  .object({
    run_url: z.string().optional(),
    console: z.boolean().default(true),
    slack: SlackSchema.optional(),
  })
  .strict();

export const PipelineConfigSchema = z
  .object({
    name: z.string().min(1),
    workflow: z.string().min(1).optional(),
    repo_path: z.string().min(1).default("."),
    shared_component: z.string().min(1).optional(),
    approval_label: z.string().min(1).optional(),
    components: z.record(GlobListSchema),
    stages: z.array(StageSchema).min(1),
    instance: InstanceSchema.default({}),
    build: BuildSchema.default({}),
    concurrency: ConcurrencySchema.default({}),
    notifications: NotificationsSchema.default({}),
  })
  .strict();

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type StageConfig = z.infer<typeof StageSchema>;
export type InstanceConfig = z.infer<typeof InstanceSchema>;
export type InstanceProfileConfig = z.infer<typeof InstanceProfileSchema>;
export type ConcurrencyConfig = z.infer<typeof ConcurrencySchema>;
export type NotificationsConfig = z.infer<typeof NotificationsSchema>;
export type SlackConfig = z.infer<typeof SlackSchema>;
