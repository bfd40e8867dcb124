import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../src/core/errors.js";
import { toRunKey } from "../src/core/ids.js";
import { resolveResources } from "../src/config/resolveResources.js";
import { StageGraph } from "../src/graph/stageGraph.js";
import type { StageDefinition } from "../src/graph/types.js";
import { Channels, SOURCE_CHANNELS, variantCallingGraph, variantCallingStages } from "../src/stages/index.js";
import { testTables, thrown } from "./helpers.js";

function stage(name: string, inputs: string[], outputs: string[]): StageDefinition {
  return {
    name,
    dir: name.toLowerCase(),
    tool: "gatk",
    inputs,
    requires: [],
    outputs: outputs.map((channel) => ({ channel, fileName: (key) => `${key}_${channel}`, publish: "always" })),
    commands: () => []
  };
}

describe("StageGraph", () => {
  it("orders the variant calling stages and exposes the fan-out", () => {
    const graph = variantCallingGraph();
    expect(graph.order.map((s) => s.name)).toEqual([
      "GenotypeGVCFs",
      "SelectVariants",
      "RecalibrateSNPs",
      "RecalibrateIndels",
      "CombineVariants",
      "SnpEff",
      "VariantAnnotator",
      "VariantEval"
    ]);
    expect(graph.producerOf(Channels.rawCalls)).toBe("<source>");
    expect(graph.producerOf(Channels.combinedVcf)).toBe("CombineVariants");
    expect(graph.consumersOf(Channels.combinedVcf)).toEqual(["SnpEff", "VariantAnnotator", "VariantEval"]);
    expect(graph.consumersOf(Channels.snpRecal)).toEqual([]);
  });

  it("orders by dependencies, not declaration", () => {
    const graph = StageGraph.create([stage("C", ["b"], ["c"]), stage("A", ["src"], ["a"]), stage("B", ["a"], ["b"])], ["src"]);
    expect(graph.order.map((s) => s.name)).toEqual(["A", "B", "C"]);
  });

  it("rejects a channel with two producers", () => {
    const err = thrown(() => StageGraph.create([stage("A", ["src"], ["x"]), stage("B", ["src"], ["x"])], ["src"]));
    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err).toHaveProperty("message", "channel x produced by both A and B");
  });

  it("rejects an input nothing produces", () => {
    const err = thrown(() => StageGraph.create([stage("A", ["missing"], ["a"])], ["src"]));
    expect(err).toHaveProperty("message", "stage A consumes missing, which nothing produces");
  });

  it("rejects cycles", () => {
    const err = thrown(() =>
      StageGraph.create([stage("A", ["src", "b"], ["a"]), stage("B", ["a"], ["b"])], ["src"])
    );
    expect(err).toMatchObject({ code: "InvalidGraph" });
    expect(err).toHaveProperty("message", "stage graph has a cycle through: A, B");
  });

  it("rejects duplicate stage names", () => {
    expect(() => StageGraph.create([stage("A", ["src"], ["a"]), stage("A", ["src"], ["b"])], ["src"])).toThrow(
      "duplicate stage name: A"
    );
  });

  it("collects required resources in stage order", () => {
    expect(variantCallingGraph().requiredResources()).toEqual([
      "gfasta",
      "dbsnp",
      "omni",
      "thousandg",
      "mills",
      "target_bed"
    ]);
  });

  it("fails before execution when a required resource is missing", () => {
    const bundle = resolveResources(
      { genome: "GRCh37", kit: "custom", overrides: { bait: "/data/b.il", target: "/data/t.il" } },
      testTables()
    );
    const err = thrown(() => variantCallingGraph().assertResourcesAvailable(bundle));
    expect(err).toMatchObject({ code: "MissingResource", missing: ["target_bed"] });
    expect(err).toHaveProperty("message", "missing resources: target_bed (needed by VariantEval)");
  });

  it("names every stage's outputs from the key alone", () => {
    const names = variantCallingStages.flatMap((s) => s.outputs.map((o) => o.fileName(toRunKey("patient1"))));
    expect(names).toEqual([
      "patient1_gvcf.vcf",
      "patient1_snp.vcf",
      "patient1_indels.vcf",
      "patient1_snp.recal",
      "patient1_snp.tranches",
      "patient1_filtered_snp.vcf",
      "patient1_indels.recal",
      "patient1_indels.tranches",
      "patient1_filtered_indels.vcf",
      "patient1_combined_filtered.vcf",
      "patient1_combined_filtered_snpEff.ann.vcf",
      "patient1_snpEff_summary.html",
      "patient1_snpEff_stats.csv",
      "patient1_combined_filtered_annotated.vcf",
      "patient1_combined_filtered.eval"
    ]);
    expect(SOURCE_CHANNELS).toEqual(["raw_calls"]);
  });
});
