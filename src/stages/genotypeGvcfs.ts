import type { StageDefinition } from "../graph/types.js";
import { Channels } from "./channels.js";

export const genotypeGvcfsStage: StageDefinition = {
  name: "GenotypeGVCFs",
  dir: "gatk_genotype",
  tool: "gatk",
  inputs: [Channels.rawCalls],
  requires: ["gfasta", "dbsnp"],
  outputs: [{ channel: Channels.gvcf, fileName: (key) => `${key}_gvcf.vcf`, publish: "intermediate" }],
  commands: (ctx) => [
    {
      args: [
        "-T", "GenotypeGVCFs",
        "-R", ctx.resource("gfasta"),
        "--variant", ctx.input(Channels.rawCalls),
        "-nt", String(ctx.cpus),
        "-o", ctx.output(Channels.gvcf),
        "--dbsnp", ctx.resource("dbsnp")
      ]
    }
  ]
};
