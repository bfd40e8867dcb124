import type { ColumnType, Generated, JSONColumnType } from "kysely";

type OptionalNullable<T> = ColumnType<T | null, T | null | undefined, T | null>;
type JsonObject = Record<string, unknown>;
type Json = JSONColumnType<JsonObject, JsonObject, JsonObject>;
type JsonNullable = JSONColumnType<JsonObject | null, JsonObject | null | undefined, JsonObject | null>;
type Timestamp = ColumnType<Date | string, string | undefined, string>;

export interface PipelineRunsTable {
  run_id: string;
  pipeline_version: string;
  params_hash: string;
  settings_hash: string;
  params: Json;
  status: string;
  created_at: Generated<Timestamp>;
  finished_at: OptionalNullable<string>;
  error: OptionalNullable<string>;
  summary: JsonNullable;
}

export interface StageRunsTable {
  stage_run_id: string;
  run_id: string;
  stage: string;
  run_key: string;
  status: string;
  cpus: number;
  memory_mb: OptionalNullable<number>;
  created_at: Generated<Timestamp>;
  started_at: OptionalNullable<string>;
  finished_at: OptionalNullable<string>;
  exit_code: OptionalNullable<number>;
  error: OptionalNullable<string>;
  log_path: OptionalNullable<string>;
}

export interface StageInputsTable {
  stage_run_id: string;
  channel: string;
  path: string;
}

export interface StageOutputsTable {
  stage_run_id: string;
  channel: string;
  path: string;
  published_path: OptionalNullable<string>;
}

export interface StageEventsTable {
  event_id: string;
  stage_run_id: string;
  ts: Generated<Timestamp>;
  kind: string;
  message: OptionalNullable<string>;
  data: JsonNullable;
}

export interface DB {
  pipeline_runs: PipelineRunsTable;
  stage_runs: StageRunsTable;
  stage_inputs: StageInputsTable;
  stage_outputs: StageOutputsTable;
  stage_events: StageEventsTable;
}
