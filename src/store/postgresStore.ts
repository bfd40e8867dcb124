import type { Kysely, Selectable } from "kysely";
import type { PipelineRunId, RunKey, StageRunId } from "../core/ids.js";
import { newEventId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type {
  PipelineRunRecord,
  PipelineRunStatus,
  StageEventRecord,
  StageRunRecord,
  StageRunStatus
} from "../core/run.js";
import type { DB, StageRunsTable } from "../db/types.js";

function toIso(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string") return value;
  return new Date(String(value)).toISOString();
}

function toIsoOrNull(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  return toIso(value);
}

function toStageRunRecord(row: Selectable<StageRunsTable>): StageRunRecord {
  return {
    stageRunId: row.stage_run_id as StageRunId,
    runId: row.run_id as PipelineRunId,
    stage: row.stage,
    key: row.run_key as RunKey,
    status: row.status as StageRunStatus,
    cpus: row.cpus,
    memoryMb: row.memory_mb,
    createdAt: toIso(row.created_at),
    startedAt: toIsoOrNull(row.started_at),
    finishedAt: toIsoOrNull(row.finished_at),
    exitCode: row.exit_code,
    error: row.error,
    logPath: row.log_path
  };
}

export class PostgresStore {
  constructor(private readonly db: Kysely<DB>) {}

  async createPipelineRun(input: {
    runId: PipelineRunId;
    pipelineVersion: string;
    paramsHash: `sha256:${string}`;
    settingsHash: `sha256:${string}`;
    params: JsonObject;
  }): Promise<void> {
    await this.db
      .insertInto("pipeline_runs")
      .values({
        run_id: input.runId,
        pipeline_version: input.pipelineVersion,
        params_hash: input.paramsHash,
        settings_hash: input.settingsHash,
        params: input.params,
        status: "running"
      })
      .execute();
  }

  async finishPipelineRun(
    runId: PipelineRunId,
    input: { status: Exclude<PipelineRunStatus, "running">; error: string | null; summary: JsonObject | null }
  ): Promise<void> {
    await this.db
      .updateTable("pipeline_runs")
      .set({
        status: input.status,
        error: input.error,
        summary: input.summary,
        finished_at: new Date().toISOString()
      })
      .where("run_id", "=", runId)
      .execute();
  }

  async getPipelineRun(runId: PipelineRunId): Promise<PipelineRunRecord | null> {
    const row = await this.db.selectFrom("pipeline_runs").selectAll().where("run_id", "=", runId).executeTakeFirst();
    if (!row) return null;
    return {
      runId: row.run_id as PipelineRunId,
      pipelineVersion: row.pipeline_version,
      paramsHash: row.params_hash as `sha256:${string}`,
      settingsHash: row.settings_hash as `sha256:${string}`,
      params: row.params as JsonObject,
      status: row.status as PipelineRunStatus,
      createdAt: toIso(row.created_at),
      finishedAt: toIsoOrNull(row.finished_at),
      error: row.error,
      summary: (row.summary as JsonObject | null) ?? null
    };
  }

  async createStageRun(input: {
    stageRunId: StageRunId;
    runId: PipelineRunId;
    stage: string;
    key: RunKey;
    status: StageRunStatus;
    cpus: number;
    memoryMb: number | null;
  }): Promise<void> {
    await this.db
      .insertInto("stage_runs")
      .values({
        stage_run_id: input.stageRunId,
        run_id: input.runId,
        stage: input.stage,
        run_key: input.key,
        status: input.status,
        cpus: input.cpus,
        memory_mb: input.memoryMb
      })
      .execute();
  }

  async updateStageRun(
    stageRunId: StageRunId,
    patch: Partial<{
      status: StageRunStatus;
      startedAt: string | null;
      finishedAt: string | null;
      exitCode: number | null;
      error: string | null;
      logPath: string | null;
    }>
  ): Promise<void> {
    const values: Partial<{
      status: string;
      started_at: string | null;
      finished_at: string | null;
      exit_code: number | null;
      error: string | null;
      log_path: string | null;
    }> = {};

    if (patch.status !== undefined) values.status = patch.status;
    if (patch.startedAt !== undefined) values.started_at = patch.startedAt;
    if (patch.finishedAt !== undefined) values.finished_at = patch.finishedAt;
    if (patch.exitCode !== undefined) values.exit_code = patch.exitCode;
    if (patch.error !== undefined) values.error = patch.error;
    if (patch.logPath !== undefined) values.log_path = patch.logPath;

    if (!Object.keys(values).length) return;
    await this.db.updateTable("stage_runs").set(values).where("stage_run_id", "=", stageRunId).execute();
  }

  async addStageInput(stageRunId: StageRunId, channel: string, filePath: string): Promise<void> {
    await this.db.insertInto("stage_inputs").values({ stage_run_id: stageRunId, channel, path: filePath }).execute();
  }

  async addStageOutput(stageRunId: StageRunId, channel: string, filePath: string, publishedPath: string | null): Promise<void> {
    await this.db
      .insertInto("stage_outputs")
      .values({ stage_run_id: stageRunId, channel, path: filePath, published_path: publishedPath })
      .execute();
  }

  async addStageEvent(stageRunId: StageRunId, kind: string, message: string | null, data: JsonObject | null): Promise<void> {
    await this.db
      .insertInto("stage_events")
      .values({ event_id: newEventId(), stage_run_id: stageRunId, kind, message, data })
      .execute();
  }

  async listStageRuns(runId: PipelineRunId): Promise<StageRunRecord[]> {
    const rows = await this.db
      .selectFrom("stage_runs")
      .selectAll()
      .where("run_id", "=", runId)
      .orderBy("created_at", "asc")
      .orderBy("stage_run_id", "asc")
      .execute();
    return rows.map(toStageRunRecord);
  }

  async listStageEvents(stageRunId: StageRunId): Promise<StageEventRecord[]> {
    const rows = await this.db
      .selectFrom("stage_events")
      .select(["kind", "message", "data", "ts"])
      .where("stage_run_id", "=", stageRunId)
      .orderBy("event_id", "asc")
      .execute();
    return rows.map((r) => ({
      kind: r.kind,
      message: r.message,
      data: (r.data as JsonObject | null) ?? null,
      ts: toIso(r.ts)
    }));
  }

  async listStageOutputs(stageRunId: StageRunId): Promise<Array<{ channel: string; path: string; publishedPath: string | null }>> {
    const rows = await this.db
      .selectFrom("stage_outputs")
      .select(["channel", "path", "published_path"])
      .where("stage_run_id", "=", stageRunId)
      .orderBy("channel", "asc")
      .execute();
    return rows.map((r) => ({ channel: r.channel, path: r.path, publishedPath: r.published_path }));
  }
}
