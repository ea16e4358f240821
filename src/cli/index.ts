import { Command } from "commander";

import { gatesCommand } from "./gates.js";
import { runCommand } from "./run.js";
import { statusCommand } from "./status.js";
import { validateCommand } from "./validate.js";

type GlobalFlags = {
  config?: string;
  debug?: boolean;
};

type RunFlags = {
  trigger?: string;
  base?: string;
  head?: string;
  ref?: string;
  runId?: string;
  runUrl?: string;
  label?: string;
  notify: boolean;
  targetOutput: boolean;
};

type GatesFlags = Omit<RunFlags, "notify" | "targetOutput" | "runId" | "runUrl" | "label"> & {
  format: string;
};

export function buildCli(): Command {
  const program = new Command();
  const globals = (): GlobalFlags => program.opts<GlobalFlags>();

  program
    .name("stagegate")
    .description("Change-gated CI pipeline orchestrator (ephemeral runner instances)")
    .version("0.1.0")
    .option(
      "--config <path>",
      "Pipeline config path (defaults to .stagegate/pipeline.yaml in the current directory)",
    )
    .option("--debug", "Show stack traces and error causes", false);

  program
    .command("run")
    .description("Run the pipeline: gate stages on changes, provision, run targets, tear down")
    .option("--trigger <kind>", "pull-request | manual | push | schedule (default: from GITHUB_EVENT_NAME)")
    .option("--base <rev>", "Base revision for change detection (default: origin/$GITHUB_BASE_REF)")
    .option("--head <rev>", "Head revision for change detection (default: $GITHUB_SHA or HEAD)")
    .option("--ref <ref>", "Git ref for the concurrency group (default: $GITHUB_REF)")
    .option("--run-id <id>", "Run id (default: $GITHUB_RUN_ID or a timestamp)")
    .option("--run-url <url>", "Run link for notifications; {run_id} is substituted")
    .option("--label <name>", "Label added by the triggering event (default: from $GITHUB_EVENT_PATH)")
    .option("--no-notify", "Do not send failure notifications")
    .option("--no-target-output", "Do not echo target output to the console")
    .action(async (opts: RunFlags) => {
      await runCommand({ ...opts, config: globals().config });
    });

  program
    .command("gates")
    .description("Resolve stage gates for a revision range without running anything")
    .option("--trigger <kind>", "pull-request | manual | push | schedule (default: from GITHUB_EVENT_NAME)")
    .option("--base <rev>", "Base revision for change detection")
    .option("--head <rev>", "Head revision for change detection")
    .option("--format <format>", "table | github (github also appends to $GITHUB_OUTPUT)", "table")
    .action(async (opts: GatesFlags) => {
      await gatesCommand({ ...opts, config: globals().config });
    });

  program
    .command("validate")
    .description("Validate the pipeline config and print the stage order")
    .action(async () => {
      await validateCommand({ config: globals().config });
    });

  program
    .command("status")
    .description("Show a stored run report")
    .option("--run-id <id>", "Run id (default: latest)")
    .action(async (opts: { runId?: string }) => {
      await statusCommand({ config: globals().config, runId: opts.runId });
    });

  return program;
}
