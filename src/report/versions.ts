import type { ToolName } from "../config/settings.js";
import { VersionProbeFailure } from "../core/errors.js";

export const NOT_RUN = "N/A";
export const UNKNOWN_VERSION = "unknown";

export interface VersionProbe {
  tool: ToolName;
  label: string;
  pattern: RegExp;
}

export const VERSION_PROBES: readonly VersionProbe[] = [
  { tool: "gatk", label: "GATK", pattern: /Genome Analysis Toolkit \(GATK\) v?([0-9][\w.-]*)/ },
  { tool: "snpeff", label: "SnpEff", pattern: /SnpEff version SnpEff ([0-9][\w.-]*)/ },
  { tool: "multiqc", label: "MultiQC", pattern: /This is MultiQC v?([0-9][\w.-]*)|multiqc, version ([0-9][\w.-]*)/ }
];

export interface ToolLogs {
  tool: ToolName;
  logs: readonly string[];
}

export interface VersionProbeResult {
  versions: Record<string, string>;
  failures: VersionProbeFailure[];
}

export function probeVersion(probe: VersionProbe, logs: readonly string[]): string | null {
  for (const text of logs) {
    const m = probe.pattern.exec(text);
    const version = m?.slice(1).find((g) => typeof g === "string" && g.length > 0);
    if (version) return version;
  }
  return null;
}

/**
 * Tool label → version. A tool with no logs never ran (`N/A`); one that ran but never
 * printed a recognisable version degrades to `unknown`.
 */
export function probeVersions(inputs: readonly ToolLogs[]): VersionProbeResult {
  const versions: Record<string, string> = {};
  const failures: VersionProbeFailure[] = [];

  for (const probe of VERSION_PROBES) {
    const logs = inputs.filter((i) => i.tool === probe.tool).flatMap((i) => i.logs);
    if (!logs.length) {
      versions[probe.label] = NOT_RUN;
      continue;
    }
    const version = probeVersion(probe, logs);
    if (version) {
      versions[probe.label] = version;
    } else {
      versions[probe.label] = UNKNOWN_VERSION;
      failures.push(new VersionProbeFailure(probe.label));
    }
  }

  return { versions, failures };
}
