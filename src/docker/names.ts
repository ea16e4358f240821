/*
Purpose: centralize Docker container naming and labels for runner instances.
Assumptions: run ids are unique per pipeline; names must be Docker-friendly.
Usage: buildInstanceContainerName({ pipeline, runId, profile }).
*/

const CONTAINER_NAME_LIMIT = 120;

export const INSTANCE_LABELS = {
  runId: "stagegate.run_id",
  pipeline: "stagegate.pipeline",
  profile: "stagegate.profile",
} as const;

export type InstanceContainerNameInput = {
  pipeline: string;
  runId: string;
  profile: string;
};

export function buildInstanceContainerName(values: InstanceContainerNameInput): string {
  const raw = `sg-${values.pipeline}-${values.runId}-${values.profile}`;
  return raw.replace(/[^a-zA-Z0-9_.-]/g, "-").slice(0, CONTAINER_NAME_LIMIT);
}

export function buildInstanceLabels(values: InstanceContainerNameInput): Record<string, string> {
  return {
    [INSTANCE_LABELS.runId]: values.runId,
    [INSTANCE_LABELS.pipeline]: values.pipeline,
    [INSTANCE_LABELS.profile]: values.profile,
  };
}
