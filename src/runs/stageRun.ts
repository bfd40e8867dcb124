import type { PipelineRunId, RunKey, StageRunId } from "../core/ids.js";
import { newStageRunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { StageRunStatus } from "../core/run.js";
import type { PostgresStore } from "../store/postgresStore.js";

/** Ledger handle for one stage instance (one stage, one run key). */
export class StageRun {
  readonly stageRunId: StageRunId;

  constructor(
    private readonly store: PostgresStore,
    private readonly info: {
      runId: PipelineRunId;
      stage: string;
      key: RunKey;
      cpus: number;
      memoryMb: number | null;
    }
  ) {
    this.stageRunId = newStageRunId();
  }

  async queue(): Promise<void> {
    await this.store.createStageRun({
      stageRunId: this.stageRunId,
      runId: this.info.runId,
      stage: this.info.stage,
      key: this.info.key,
      status: "queued",
      cpus: this.info.cpus,
      memoryMb: this.info.memoryMb
    });
  }

  async start(): Promise<void> {
    const now = new Date().toISOString();
    await this.store.updateStageRun(this.stageRunId, { status: "running", startedAt: now });
    await this.event("stage.started", `${this.info.stage} key=${this.info.key}`, {
      now,
      cpus: this.info.cpus,
      memory_mb: this.info.memoryMb
    });
  }

  async event(kind: string, message: string, data: JsonObject | null): Promise<void> {
    await this.store.addStageEvent(this.stageRunId, kind, message, data);
  }

  async linkInput(channel: string, filePath: string): Promise<void> {
    await this.store.addStageInput(this.stageRunId, channel, filePath);
  }

  async linkOutput(channel: string, filePath: string, publishedPath: string | null): Promise<void> {
    await this.store.addStageOutput(this.stageRunId, channel, filePath, publishedPath);
  }

  async setLogPath(logPath: string): Promise<void> {
    await this.store.updateStageRun(this.stageRunId, { logPath });
  }

  async finishSuccess(): Promise<void> {
    await this.finish("succeeded", null, null);
  }

  async finishFailure(error: string, exitCode: number | null): Promise<void> {
    await this.finish("failed", error, exitCode);
  }

  async finishSkipped(reason: string): Promise<void> {
    await this.finish("skipped", reason, null);
  }

  async finishCancelled(reason: string): Promise<void> {
    await this.finish("cancelled", reason, null);
  }

  private async finish(
    status: Exclude<StageRunStatus, "queued" | "running">,
    error: string | null,
    exitCode: number | null
  ): Promise<void> {
    await this.event(`stage.${status}`, error ? `${status}: ${error}` : status, error ? { error } : null);
    await this.store.updateStageRun(this.stageRunId, {
      status,
      finishedAt: new Date().toISOString(),
      error,
      exitCode
    });
  }
}
