import type { StageDefinition } from "../graph/types.js";
import { Channels } from "./channels.js";

export const variantAnnotatorStage: StageDefinition = {
  name: "VariantAnnotator",
  dir: "gatk_annotate",
  tool: "gatk",
  inputs: [Channels.combinedVcf, Channels.snpEffVcf],
  requires: ["gfasta", "dbsnp"],
  outputs: [
    { channel: Channels.annotatedVcf, fileName: (key) => `${key}_combined_filtered_annotated.vcf`, publish: "always" }
  ],
  commands: (ctx) => [
    {
      args: [
        "-T", "VariantAnnotator",
        "-R", ctx.resource("gfasta"),
        "-A", "SnpEff",
        "--variant", ctx.input(Channels.combinedVcf),
        "--snpEffFile", ctx.input(Channels.snpEffVcf),
        "--dbsnp", ctx.resource("dbsnp"),
        "--alwaysAppendDbsnpId",
        "-o", ctx.output(Channels.annotatedVcf)
      ]
    }
  ]
};
