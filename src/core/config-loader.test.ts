import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { fileURLToPath } from "node:url";

import { afterEach, describe, expect, it } from "vitest";

import { loadPipelineConfig } from "./config-loader.js";
import { ConfigError, UserFacingError } from "./errors.js";

const EXAMPLE_PIPELINE = fileURLToPath(
  new URL("../../examples/fast-tests.pipeline.yaml", import.meta.url),
);

const ENV_VARS = ["STAGEGATE_TEST_WEBHOOK", "STAGEGATE_TEST_CHANNEL"] as const;

const tempRoots: string[] = [];

afterEach(() => {
  for (const dir of tempRoots) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempRoots.length = 0;
  for (const key of ENV_VARS) {
    delete process.env[key];
  }
});

function writeConfig(contents: string): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "stagegate-config-"));
  tempRoots.push(root);
  const configPath = path.join(root, ".stagegate", "pipeline.yaml");
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, contents, "utf8");
  return configPath;
}

const BASE_CONFIG = `
name: fast-tests
repo_path: ..
shared_component: dependencies
components:
  dependencies: [Cargo.toml, "vendor/**"]
  core: ["src/core/**"]
  wasm: ["src/**", "!src/c_api/**", "!src/boolean/**"]
stages:
  - name: core
    target: test_core
    components: [core]
  - name: wasm
    target: test_wasm
    components: [wasm]
    env:
      FAST_TESTS: "TRUE"
`;

describe("loadPipelineConfig", () => {
  it("applies defaults and resolves repo_path against the config directory", () => {
    const configPath = writeConfig(BASE_CONFIG);

    const { config, pipeline } = loadPipelineConfig(configPath);

    expect(config.repo_path).toBe(path.dirname(path.dirname(configPath)));
    expect(config.instance.platform).toBe("local");
    expect(config.instance.provision_timeout_seconds).toBe(600);
    expect(config.build.command).toEqual(["make"]);
    expect(config.concurrency.policy).toBe("cancel-in-progress");
    expect(config.concurrency.group).toBe("{workflow}_{ref}");
    expect(pipeline.workflow).toBe("fast-tests");
    expect(pipeline.sharedComponent).toBe("dependencies");
    expect(config.approval_label).toBeUndefined();
    expect(config.instance.orphan_stop_grace_seconds).toBe(30);
  });

  it("reads the approval label", () => {
    const { config } = loadPipelineConfig(writeConfig(`approval_label: approved\n${BASE_CONFIG}`));

    expect(config.approval_label).toBe("approved");
  });

  it("splits negated globs into exclude lists", () => {
    const { pipeline } = loadPipelineConfig(writeConfig(BASE_CONFIG));

    const wasm = pipeline.components.find((component) => component.name === "wasm");
    expect(wasm).toEqual({
      name: "wasm",
      include: ["src/**"],
      exclude: ["src/c_api/**", "src/boolean/**"],
    });
  });

  it("maps stage fields onto definitions with defaults", () => {
    const { pipeline } = loadPipelineConfig(writeConfig(BASE_CONFIG));

    expect(pipeline.stages[1]).toEqual({
      name: "wasm",
      target: "test_wasm",
      components: ["wasm"],
      sharedDependencies: true,
      alwaysRun: false,
      needs: [],
      env: { FAST_TESTS: "TRUE" },
      timeoutMs: undefined,
      monitored: true,
    });
  });

  it("expands env references and falls back for optional ones", () => {
    process.env.STAGEGATE_TEST_WEBHOOK = "https://hooks.example.test/placeholder";
    const configPath = writeConfig(`${BASE_CONFIG}
notifications:
  slack:
    webhook_url: "\${STAGEGATE_TEST_WEBHOOK}"
    channel: "\${STAGEGATE_TEST_CHANNEL:-#ci}"
`);

    const { config } = loadPipelineConfig(configPath);

    expect(config.notifications.slack).toEqual({
      webhook_url: "https://hooks.example.test/placeholder",
      channel: "#ci",
      timeout_seconds: 10,
    });
  });

  it("reports missing env references with their location", () => {
    const configPath = writeConfig(`${BASE_CONFIG}
notifications:
  slack:
    webhook_url: "\${STAGEGATE_TEST_WEBHOOK}"
`);

    let caught: unknown;
    try {
      loadPipelineConfig(configPath);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(UserFacingError);
    const cause = caught instanceof UserFacingError ? caught.cause : undefined;
    expect(cause).toBeInstanceOf(ConfigError);
    expect(cause instanceof ConfigError ? cause.message : "").toBe(
      `Environment variable STAGEGATE_TEST_WEBHOOK is not set but is referenced in ${configPath} (notifications.slack.webhook_url).`,
    );
  });

  it("throws a user-facing error when the file is missing", () => {
    const missing = path.join(os.tmpdir(), "stagegate-missing", "pipeline.yaml");

    expect(() => loadPipelineConfig(missing)).toThrow(UserFacingError);
    expect(() => loadPipelineConfig(missing)).toThrow(`Pipeline config not found at ${missing}.`);
  });

  it("formats schema issues by path", () => {
    const configPath = writeConfig(`
name: broken
components:
  core: ["src/**"]
stages:
  - name: core
    components: [core]
instance:
  platform: kubernetes
`);

    expect(() => loadPipelineConfig(configPath)).toThrow(
      [
        `Pipeline config at ${configPath} is invalid.`,
        "stages.0.target: Required",
        `instance.platform: Expected one of "local", "docker", received "kubernetes"`,
      ].join("\n"),
    );
  });

  it("rejects stages that reference undeclared components", () => {
    const configPath = writeConfig(`
name: broken
components:
  core: ["src/**"]
stages:
  - name: integer
    target: test_integer
    components: [integer]
`);

    expect(() => loadPipelineConfig(configPath)).toThrow(
      'Stage "integer" references unknown components: integer',
    );
  });

  it("includes YAML error locations", () => {
    const configPath = writeConfig("name: [unterminated\n");

    expect(() => loadPipelineConfig(configPath)).toThrow(/\(line \d+, column \d+\)/);
  });

  it("loads the bundled example pipeline", () => {
    const { config, pipeline } = loadPipelineConfig(EXAMPLE_PIPELINE);

    expect(pipeline.workflow).toBe("cargo-tests");
    expect(pipeline.stages.map((stage) => stage.name)).toEqual([
      "csprng",
      "core_crypto",
      "gen-keys",
      "shortint",
      "integer",
      "boolean",
      "wasm",
      "zk",
      "user-docs",
    ]);
    expect(config.instance.profiles["cpu-big"]?.gpus).toBe(0);
    expect(config.concurrency.on_protected).toBe("wait");
    expect(config.notifications.run_url).toBeUndefined();
  });
});
