import { errorMessage } from "../core/errors.js";
import type { PipelineRunId, RunKey, StageRunId } from "../core/ids.js";
import type { ResourceBudget } from "../execution/resourceBudget.js";
import { StageRun } from "../runs/stageRun.js";
import type { PostgresStore } from "../store/postgresStore.js";
import { ChannelStore } from "./channels.js";
import type { StageExecutor } from "./executor.js";
import { joinByKey } from "./join.js";
import type { StageGraph } from "./stageGraph.js";
import type { BoundArtifact, StageDefinition } from "./types.js";

export type InstanceStatus = "succeeded" | "failed" | "skipped" | "cancelled";

export interface StageInstanceResult {
  stage: string;
  key: RunKey;
  stageRunId: StageRunId;
  status: InstanceStatus;
  outputs: BoundArtifact[];
  error: Error | null;
  logPath: string;
}

export interface KeyOutcome {
  key: RunKey;
  status: "succeeded" | "failed";
  failedStage: string | null;
  error: Error | null;
}

export interface GraphRunResult {
  instances: StageInstanceResult[];
  keys: KeyOutcome[];
}

export interface GraphRunOptions {
  runId: PipelineRunId;
  graph: StageGraph;
  store: PostgresStore;
  executor: StageExecutor;
  budget: ResourceBudget;
  // Artifacts bound to the graph's source channels; their keys define the instances.
  sources: readonly BoundArtifact[];
  progress?: (line: string) => void;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Runs every (stage, key) instance as soon as its inputs for that key are bound and the
 * resource budget allows. A failure stops the rest of that key's chain; other keys carry on.
 */
export async function runStageGraph(opts: GraphRunOptions): Promise<GraphRunResult> {
  const { graph, store, executor, budget, runId } = opts;
  const progress = opts.progress ?? (() => undefined);
  const channels = new ChannelStore();
  const keyFailures = new Map<RunKey, { stage: string; error: Error }>();

  const keys: RunKey[] = [];
  for (const source of opts.sources) {
    if (!graph.sources.includes(source.channel)) {
      throw new Error(`not a source channel of this graph: ${source.channel}`);
    }
    channels.bind(source);
    if (!keys.includes(source.key)) keys.push(source.key);
  }
  // A source channel without a file for some key can never be bound.
  for (const key of keys) {
    for (const channel of graph.sources) {
      if (!channels.peek(channel, key)) {
        channels.fail(channel, key, new Error(`no ${channel} input for key ${key}`));
      }
    }
  }

  const abortKey = (key: RunKey, stage: string, error: Error) => {
    if (!keyFailures.has(key)) keyFailures.set(key, { stage, error });
  };

  const failUnsettledOutputs = (stage: StageDefinition, key: RunKey, error: Error) => {
    for (const out of stage.outputs) {
      if (!channels.peek(out.channel, key)) channels.fail(out.channel, key, error);
    }
  };

  const runInstance = async (stage: StageDefinition, key: RunKey): Promise<StageInstanceResult> => {
    const alloc = executor.allocation(stage);
    const run = new StageRun(store, { runId, stage: stage.name, key, cpus: alloc.cpus, memoryMb: alloc.memoryMb });
    const base = { stage: stage.name, key, stageRunId: run.stageRunId, logPath: executor.logPathFor(stage, key) };

    try {
      await run.queue();

      const settled = await Promise.all(stage.inputs.map((channel) => channels.whenSettled(channel, key)));
      for (const value of settled) {
        if (!value.ok) {
          failUnsettledOutputs(stage, key, value.error);
          await run.finishSkipped(`upstream failed: ${value.error.message}`);
          progress(`[${stage.name}] ${key}: skipped (upstream failed)`);
          return { ...base, status: "skipped", outputs: [], error: value.error };
        }
      }

      let inputs: Record<string, BoundArtifact>;
      try {
        inputs = joinByKey(
          stage.name,
          key,
          stage.inputs,
          settled.flatMap((v) => (v.ok ? [v.artifact] : []))
        );
      } catch (err) {
        const error = toError(err);
        abortKey(key, stage.name, error);
        failUnsettledOutputs(stage, key, error);
        await run.finishFailure(error.message, null);
        progress(`[${stage.name}] ${key}: failed: ${error.message}`);
        return { ...base, status: "failed", outputs: [], error };
      }

      const cancel = async (): Promise<StageInstanceResult> => {
        const failure = keyFailures.get(key);
        const error = failure?.error ?? new Error(`key ${key} aborted`);
        failUnsettledOutputs(stage, key, error);
        await run.finishCancelled(`key aborted after ${failure?.stage ?? "an earlier"} failure`);
        progress(`[${stage.name}] ${key}: cancelled`);
        return { ...base, status: "cancelled", outputs: [], error };
      };

      if (keyFailures.has(key)) return await cancel();

      const release = await budget.acquire(alloc);
      try {
        if (keyFailures.has(key)) return await cancel();

        progress(`[${stage.name}] ${key}: running (cpus=${alloc.cpus})`);
        const execution = await executor.execute(run, stage, key, inputs);
        for (const artifact of execution.outputs) channels.bind(artifact);
        progress(`[${stage.name}] ${key}: succeeded`);
        return { ...base, status: "succeeded", outputs: execution.outputs, error: null };
      } catch (err) {
        const error = toError(err);
        abortKey(key, stage.name, error);
        failUnsettledOutputs(stage, key, error);
        progress(`[${stage.name}] ${key}: failed: ${error.message}`);
        return { ...base, status: "failed", outputs: [], error };
      } finally {
        release();
      }
    } catch (err) {
      // Ledger or workspace trouble outside the tool run: settle outputs so downstream never waits forever.
      const error = toError(err);
      abortKey(key, stage.name, error);
      failUnsettledOutputs(stage, key, error);
      throw error;
    }
  };

  const tasks: Array<Promise<StageInstanceResult>> = [];
  for (const key of keys) {
    for (const stage of graph.order) tasks.push(runInstance(stage, key));
  }

  const settled = await Promise.allSettled(tasks);
  const instances: StageInstanceResult[] = [];
  const infraErrors: Error[] = [];
  for (const s of settled) {
    if (s.status === "fulfilled") instances.push(s.value);
    else infraErrors.push(toError(s.reason));
  }
  const [firstInfraError] = infraErrors;
  if (firstInfraError) {
    throw new Error(`stage graph aborted: ${errorMessage(firstInfraError)}`, { cause: firstInfraError });
  }

  const outcomes = keys.map((key): KeyOutcome => {
    const failure = keyFailures.get(key);
    return failure
      ? { key, status: "failed", failedStage: failure.stage, error: failure.error }
      : { key, status: "succeeded", failedStage: null, error: null };
  });

  return { instances, keys: outcomes };
}
