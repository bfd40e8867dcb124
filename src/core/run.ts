import type { PipelineRunId, RunKey, StageRunId } from "./ids.js";
import type { JsonObject } from "./json.js";

export type PipelineRunStatus = "running" | "succeeded" | "failed";

export type StageRunStatus = "queued" | "running" | "succeeded" | "failed" | "skipped" | "cancelled";

export interface PipelineRunRecord {
  runId: PipelineRunId;
  pipelineVersion: string;
  paramsHash: `sha256:${string}`;
  settingsHash: `sha256:${string}`;
  params: JsonObject;
  status: PipelineRunStatus;
  createdAt: string;
  finishedAt: string | null;
  error: string | null;
  summary: JsonObject | null;
}

export interface StageRunRecord {
  stageRunId: StageRunId;
  runId: PipelineRunId;
  stage: string;
  key: RunKey;
  status: StageRunStatus;
  cpus: number;
  memoryMb: number | null;
  createdAt: string;
  startedAt: string | null;
  finishedAt: string | null;
  exitCode: number | null;
  error: string | null;
  logPath: string | null;
}

export interface StageEventRecord {
  kind: string;
  message: string | null;
  data: JsonObject | null;
  ts: string;
}
