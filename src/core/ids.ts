import { monotonicFactory } from "ulid";
import { ConfigurationError } from "./errors.js";

export type PipelineRunId = `run_${string}`;
export type StageRunId = `srun_${string}`;
export type EventId = `evt_${string}`;

// Identifies one sample across every stage; doubles as the output file prefix.
export type RunKey = string & { readonly __runKey: true };

const RUN_KEY_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

// Monotonic so ids created within the same millisecond still sort in creation order.
const nextUlid = monotonicFactory();

function prefixed(prefix: string): `${string}_${string}` {
  return `${prefix}_${nextUlid()}` as const;
}

export function newPipelineRunId(): PipelineRunId {
  return prefixed("run") as PipelineRunId;
}

export function newStageRunId(): StageRunId {
  return prefixed("srun") as StageRunId;
}

export function newEventId(): EventId {
  return prefixed("evt") as EventId;
}

export function toRunKey(raw: string): RunKey {
  if (!RUN_KEY_PATTERN.test(raw)) {
    throw new ConfigurationError("InvalidRunKey", [], `invalid run key: ${JSON.stringify(raw)}`);
  }
  return raw as RunKey;
}

const CALL_FILE_SUFFIXES = [".g.vcf.gz", ".g.vcf", ".gvcf.gz", ".gvcf", ".vcf.gz", ".vcf"];

/** Derives the run key from a raw variant-call file name, e.g. `patient1.g.vcf` → `patient1`. */
export function runKeyFromFileName(fileName: string): RunKey {
  const base = fileName.split(/[\\/]/).pop() ?? fileName;
  const suffix = CALL_FILE_SUFFIXES.find((s) => base.toLowerCase().endsWith(s));
  return toRunKey(suffix ? base.slice(0, base.length - suffix.length) : base);
}
