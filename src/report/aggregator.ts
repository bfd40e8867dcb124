import { promises as fs } from "fs";
import path from "path";
import type { PipelineSettings, ToolName } from "../config/settings.js";
import { stableJsonStringify } from "../core/canonicalJson.js";
import { errorMessage } from "../core/errors.js";
import type { PipelineRunId } from "../core/ids.js";
import type { RunnerBackend } from "../execution/backends/types.js";
import type { PipelineWorkspace } from "../execution/workspace.js";
import type { GraphRunResult } from "../graph/scheduler.js";
import type { StageGraph } from "../graph/stageGraph.js";
import { PIPELINE_NAME, PIPELINE_VERSION } from "../version.js";
import { probeVersions, type ToolLogs } from "./versions.js";

export const REPORT_FILE = "pipeline_report.txt";
export const VERSIONS_FILE = "software_versions.json";
export const MULTIQC_DIR = "MultiQC";

export interface AggregateReport {
  reportPath: string;
  versionsPath: string;
  multiqcReportPath: string | null;
  versions: Record<string, string>;
  warnings: string[];
}

export interface AggregateInput {
  runId: PipelineRunId;
  graph: StageGraph;
  result: GraphRunResult;
  workspace: PipelineWorkspace;
  settings: PipelineSettings;
  backend: RunnerBackend;
  resourcesSummary: Record<string, string>;
}

async function readLog(logPath: string): Promise<string | null> {
  try {
    return await fs.readFile(logPath, "utf8");
  } catch {
    return null;
  }
}

async function runMultiqc(input: AggregateInput, warnings: string[]): Promise<{ reportPath: string | null; log: string | null }> {
  const ws = input.workspace;
  const outDir = ws.resultDir(MULTIQC_DIR);
  const args = [ws.outDir, "-o", outDir, "-f"];
  const argv = [...input.settings.toolArgv("multiqc"), ...args];
  try {
    await fs.mkdir(outDir, { recursive: true });
    const res = await input.backend.execute({ tool: "multiqc", argv, args, cwd: ws.outDir }, { threads: 1, memoryMb: null });
    const log = [`$ ${argv.join(" ")}`, `[exit ${res.exitCode}]`, res.stdout.trimEnd(), res.stderr.trimEnd()].join("\n") + "\n";
    await fs.writeFile(path.join(outDir, "multiqc.log"), log, "utf8");
    if (res.exitCode !== 0) {
      warnings.push(`multiqc failed (exit ${res.exitCode})`);
      return { reportPath: null, log };
    }
    return { reportPath: path.join(outDir, "multiqc_report.html"), log };
  } catch (err) {
    warnings.push(`multiqc could not run: ${errorMessage(err)}`);
    return { reportPath: null, log: null };
  }
}

function pad(s: string, n: number): string {
  return s.length >= n ? s : s + " ".repeat(n - s.length);
}

function renderReport(input: AggregateInput, versions: Record<string, string>, warnings: string[]): string {
  const { result } = input;
  const lines: string[] = [
    `${PIPELINE_NAME} ${PIPELINE_VERSION}`,
    `run: ${input.runId}`,
    `results: ${input.workspace.outDir}`,
    "",
    "== Resources"
  ];
  for (const [k, v] of Object.entries(input.resourcesSummary)) lines.push(`${pad(k, 14)} ${v}`);

  lines.push("", "== Samples");
  for (const k of result.keys) {
    lines.push(
      k.status === "succeeded"
        ? `${pad(k.key, 24)} succeeded`
        : `${pad(k.key, 24)} FAILED at ${k.failedStage ?? "?"}: ${k.error?.message ?? "unknown error"}`
    );
  }

  lines.push("", "== Stage instances");
  for (const stage of input.graph.order) {
    for (const inst of result.instances.filter((i) => i.stage === stage.name)) {
      const outs = inst.outputs.map((o) => path.basename(o.path)).join(", ");
      lines.push(`${pad(stage.name, 20)} ${pad(inst.key, 24)} ${pad(inst.status, 10)} ${outs}`);
    }
  }

  lines.push("", "== Software versions");
  for (const [tool, version] of Object.entries(versions)) lines.push(`${pad(tool, 14)} ${version}`);

  if (warnings.length) {
    lines.push("", "== Warnings");
    for (const w of warnings) lines.push(`- ${w}`);
  }
  return lines.join("\n") + "\n";
}

/**
 * Post-hoc summary over every stage instance of every key. Never throws for a missing log or
 * an unparseable version; those become warnings.
 */
export async function aggregateReport(input: AggregateInput): Promise<AggregateReport> {
  const warnings: string[] = [];
  const byTool = new Map<ToolName, string[]>();

  for (const inst of input.result.instances) {
    if (inst.status !== "succeeded" && inst.status !== "failed") continue;
    const text = await readLog(inst.logPath);
    if (text === null) {
      if (inst.status === "succeeded") warnings.push(`log missing for ${inst.stage} [${inst.key}]`);
      continue;
    }
    const tool = input.graph.stage(inst.stage).tool;
    byTool.set(tool, [...(byTool.get(tool) ?? []), text]);
  }

  let multiqcReportPath: string | null = null;
  if (input.settings.multiqcEnabled()) {
    const mq = await runMultiqc(input, warnings);
    multiqcReportPath = mq.reportPath;
    if (mq.log) byTool.set("multiqc", [...(byTool.get("multiqc") ?? []), mq.log]);
  }

  const toolLogs: ToolLogs[] = [...byTool.entries()].map(([tool, logs]) => ({ tool, logs }));
  const probed = probeVersions(toolLogs);
  for (const failure of probed.failures) warnings.push(failure.message);

  const versions: Record<string, string> = { [PIPELINE_NAME]: PIPELINE_VERSION, ...probed.versions };

  const versionsPath = path.join(input.workspace.infoDir, VERSIONS_FILE);
  const reportPath = path.join(input.workspace.infoDir, REPORT_FILE);
  await fs.writeFile(versionsPath, stableJsonStringify(versions, 2) + "\n", "utf8");
  await fs.writeFile(reportPath, renderReport(input, versions, warnings), "utf8");

  return { reportPath, versionsPath, multiqcReportPath, versions, warnings };
}
