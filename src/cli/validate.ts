import type { PipelineDefinition } from "../core/pipeline.js";

import { loadPipelineForCli } from "./config.js";

export async function validateCommand(opts: { config?: string }): Promise<void> {
  const { loaded } = loadPipelineForCli({ explicitConfigPath: opts.config });
  console.log(`Pipeline config OK: ${loaded.configPath}`);
  for (const line of formatStageOrder(loaded.pipeline)) {
    console.log(line);
  }
}

export function formatStageOrder(pipeline: PipelineDefinition): string[] {
  const lines = [
    `Pipeline ${pipeline.name}: ${pipeline.components.length} component(s), ${pipeline.stages.length} stage(s)`,
  ];

  pipeline.stages.forEach((stage, index) => {
    const details: string[] = [`target ${stage.target}`];
    if (stage.components.length > 0) details.push(`components ${stage.components.join(",")}`);
    if (stage.needs.length > 0) details.push(`needs ${stage.needs.join(",")}`);
    if (stage.alwaysRun) details.push("always runs");
    if (!stage.monitored) details.push("unmonitored");
    lines.push(`  ${index + 1}. ${stage.name} (${details.join("; ")})`);
  });

  return lines;
}
