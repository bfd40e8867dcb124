import path from "path";
import { glob } from "glob";
import { anchorResources, resolveResources, type ResourceBundle, type ResourceOverrides } from "./config/resolveResources.js";
import type { ResourceTables } from "./config/resourceTables.js";
import type { BackendKind, PipelineSettings } from "./config/settings.js";
import { ConfigurationError, errorMessage } from "./core/errors.js";
import { newPipelineRunId, runKeyFromFileName, type PipelineRunId, type RunKey } from "./core/ids.js";
import type { JsonObject } from "./core/json.js";
import { InSilicoRunner } from "./execution/backends/inSilico.js";
import { LocalProcessRunner } from "./execution/backends/localProcess.js";
import type { RunnerBackend } from "./execution/backends/types.js";
import { ResourceBudget } from "./execution/resourceBudget.js";
import { createPipelineWorkspace } from "./execution/workspace.js";
import { StageExecutor } from "./graph/executor.js";
import { runStageGraph, type KeyOutcome, type StageInstanceResult } from "./graph/scheduler.js";
import type { BoundArtifact } from "./graph/types.js";
import { aggregateReport, type AggregateReport } from "./report/aggregator.js";
import { deriveCanonicalParamsHash } from "./runs/runIdentity.js";
import { Channels, variantCallingGraph } from "./stages/index.js";
import type { PostgresStore } from "./store/postgresStore.js";
import { PIPELINE_VERSION } from "./version.js";

export interface PipelineOptions {
  // File path or glob pattern; one run key per matching file.
  reads: string;
  genome: string;
  kit: string | null;
  overrides: ResourceOverrides;
  snpEffDatabase: string | null;
  outDir: string;
  keepIntermediates: boolean;
  keepWork: boolean;
}

export interface PipelineDeps {
  settings: PipelineSettings;
  tables: ResourceTables;
  store: PostgresStore;
  // Replaces the backend named in settings.
  backend?: RunnerBackend;
  progress?: (line: string) => void;
}

export interface PipelineSummary {
  runId: PipelineRunId;
  status: "succeeded" | "failed";
  outDir: string;
  resources: ResourceBundle;
  keys: KeyOutcome[];
  instances: StageInstanceResult[];
  report: AggregateReport | null;
  warnings: string[];
}

export function backendFor(kind: BackendKind): RunnerBackend {
  return kind === "in_silico" ? new InSilicoRunner() : new LocalProcessRunner();
}

/** Expands `reads` into source artifacts, one per run key. */
export async function discoverInputs(reads: string): Promise<BoundArtifact[]> {
  const files = (await glob(reads, { absolute: true, nodir: true })).sort();
  if (!files.length) {
    throw new ConfigurationError("NoInputFiles", ["reads"], `no input files match --reads ${reads}`);
  }

  const seen = new Map<RunKey, string>();
  const sources: BoundArtifact[] = [];
  for (const file of files) {
    const key = runKeyFromFileName(path.basename(file));
    const other = seen.get(key);
    if (other) {
      throw new ConfigurationError("DuplicateRunKey", [key], `run key ${key} derived from both ${other} and ${file}`);
    }
    seen.set(key, file);
    sources.push({ channel: Channels.rawCalls, key, path: file, producer: "input" });
  }
  return sources;
}

function resourcePaths(resources: ResourceBundle): Record<string, string> {
  const paths: Record<string, string> = {};
  for (const [field, value] of Object.entries(resources.paths)) {
    if (typeof value === "string") paths[field] = value;
  }
  return paths;
}

function paramsRecord(options: PipelineOptions, resources: ResourceBundle, settings: PipelineSettings): JsonObject {
  return {
    reads: options.reads,
    genome: resources.genome,
    kit: resources.kit,
    snpeff_db: resources.snpEffDatabase,
    resources: resourcePaths(resources),
    outdir: path.resolve(options.outDir),
    keep_intermediates: options.keepIntermediates,
    keep_work: options.keepWork,
    backend: settings.backend(),
    max_cpus: settings.budget().maxCpus
  };
}

function summaryRecord(summary: Omit<PipelineSummary, "resources" | "instances">): JsonObject {
  return {
    keys: summary.keys.map((k) => ({
      key: k.key,
      status: k.status,
      failed_stage: k.failedStage,
      error: k.error ? k.error.message : null
    })),
    report: summary.report ? summary.report.reportPath : null,
    warnings: summary.warnings
  };
}

/**
 * Resolves resources, discovers inputs, runs every stage for every key and aggregates the
 * report. Configuration problems throw before anything is recorded or executed.
 */
export async function runVariantPipeline(options: PipelineOptions, deps: PipelineDeps): Promise<PipelineSummary> {
  const { settings, store } = deps;
  const progress = deps.progress ?? (() => undefined);

  const resources = anchorResources(
    resolveResources(
      { genome: options.genome, kit: options.kit, overrides: options.overrides, snpEffDatabase: options.snpEffDatabase },
      deps.tables
    ),
    process.cwd()
  );
  const sources = await discoverInputs(options.reads);
  const graph = variantCallingGraph();
  graph.assertResourcesAvailable(resources);

  const workspace = await createPipelineWorkspace(options.outDir);
  const backend = deps.backend ?? backendFor(settings.backend());
  const params = paramsRecord(options, resources, settings);
  const runId = newPipelineRunId();
  await store.createPipelineRun({
    runId,
    pipelineVersion: PIPELINE_VERSION,
    paramsHash: deriveCanonicalParamsHash(params),
    settingsHash: settings.settingsHash,
    params
  });
  progress(`run ${runId}: ${sources.length} input(s), backend ${backend.kind}, results in ${workspace.outDir}`);

  try {
    const budget = settings.budget();
    const executor = new StageExecutor({
      settings,
      backend,
      resources,
      workspace,
      keepIntermediates: options.keepIntermediates
    });
    const result = await runStageGraph({
      runId,
      graph,
      store,
      executor,
      budget: new ResourceBudget(budget.maxCpus, budget.maxMemoryMb),
      sources,
      progress
    });

    const warnings: string[] = [];
    let report: AggregateReport | null = null;
    try {
      report = await aggregateReport({
        runId,
        graph,
        result,
        workspace,
        settings,
        backend,
        resourcesSummary: {
          genome: resources.genome,
          kit: resources.kit ?? "(explicit)",
          snpeff_db: resources.snpEffDatabase,
          ...resourcePaths(resources)
        }
      });
      warnings.push(...report.warnings);
    } catch (err) {
      warnings.push(`report aggregation failed: ${errorMessage(err)}`);
    }

    if (!options.keepWork) await workspace.removeWorkDir();

    const status = result.keys.every((k) => k.status === "succeeded") ? "succeeded" : "failed";
    const summary: PipelineSummary = {
      runId,
      status,
      outDir: workspace.outDir,
      resources,
      keys: result.keys,
      instances: result.instances,
      report,
      warnings
    };
    const failedKeys = result.keys.filter((k) => k.status === "failed").map((k) => k.key);
    await store.finishPipelineRun(runId, {
      status,
      error: failedKeys.length ? `failed keys: ${failedKeys.join(", ")}` : null,
      summary: summaryRecord(summary)
    });
    return summary;
  } catch (err) {
    await store.finishPipelineRun(runId, { status: "failed", error: errorMessage(err), summary: null });
    throw err;
  }
}
