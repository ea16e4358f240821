import { describe, expect, it } from "vitest";

import { PipelineConfigSchema } from "../core/config.js";
import { buildPipelineDefinition } from "../core/pipeline.js";

import { formatStageOrder } from "./validate.js";

describe("formatStageOrder", () => {
  it("prints stages in execution order with their wiring", () => {
    const pipeline = buildPipelineDefinition(
      PipelineConfigSchema.parse({
        name: "fast-tests",
        components: { shortint: ["shortint/**"], integer: ["integer/**"] },
        stages: [
          { name: "shortint", target: "test_shortint", components: ["shortint"], needs: ["gen-keys"] },
          { name: "gen-keys", target: "gen_keys_cache", components: ["shortint", "integer"] },
          { name: "lint", target: "lint", always_run: true, monitored: false },
        ],
      }),
    );

    expect(formatStageOrder(pipeline)).toEqual([
      "Pipeline fast-tests: 2 component(s), 3 stage(s)",
      "  1. gen-keys (target gen_keys_cache; components shortint,integer)",
      "  2. shortint (target test_shortint; components shortint; needs gen-keys)",
      "  3. lint (target lint; always runs; unmonitored)",
    ]);
  });
});
