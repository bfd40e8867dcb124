import { describe, expect, it } from "vitest";
import { VersionProbeFailure } from "../src/core/errors.js";
import { NOT_RUN, probeVersion, probeVersions, UNKNOWN_VERSION, VERSION_PROBES } from "../src/report/versions.js";

function probe(label: string) {
  const p = VERSION_PROBES.find((v) => v.label === label);
  if (!p) throw new Error(`no probe ${label}`);
  return p;
}

describe("version probes", () => {
  it("reads each tool's version banner", () => {
    expect(probeVersion(probe("GATK"), ["INFO  10:01:02,123 HelpFormatter - The Genome Analysis Toolkit (GATK) v3.8-1-0-gf15c1c3ef, Compiled 2018"])).toBe(
      "3.8-1-0-gf15c1c3ef"
    );
    expect(probeVersion(probe("SnpEff"), ["SnpEff version SnpEff 4.3t (build 2017-11-24 10:18), by Pablo Cingolani"])).toBe("4.3t");
    expect(probeVersion(probe("MultiQC"), ["[INFO   ]         multiqc : This is MultiQC v1.9"])).toBe("1.9");
    expect(probeVersion(probe("MultiQC"), ["multiqc, version 1.14"])).toBe("1.14");
  });

  it("takes the first log that carries a version", () => {
    expect(probeVersion(probe("SnpEff"), ["nothing here", "SnpEff version SnpEff 5.1d (build x)"])).toBe("5.1d");
  });

  it("degrades to unknown when a tool ran without a banner and N/A when it never ran", () => {
    const result = probeVersions([
      { tool: "gatk", logs: ["INFO  HelpFormatter - The Genome Analysis Toolkit (GATK) v3.8-1-0-gf15c1c3ef"] },
      { tool: "snpeff", logs: ["java.lang.OutOfMemoryError"] }
    ]);
    expect(result.versions).toEqual({ GATK: "3.8-1-0-gf15c1c3ef", SnpEff: UNKNOWN_VERSION, MultiQC: NOT_RUN });
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0]).toBeInstanceOf(VersionProbeFailure);
    expect(result.failures[0]?.message).toBe("no version string found for SnpEff");
  });
});
