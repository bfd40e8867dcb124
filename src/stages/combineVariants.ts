import type { StageDefinition } from "../graph/types.js";
import { Channels } from "./channels.js";

export const combineVariantsStage: StageDefinition = {
  name: "CombineVariants",
  dir: "gatk_combine",
  tool: "gatk",
  inputs: [Channels.filteredSnpVcf, Channels.filteredIndelVcf],
  requires: ["gfasta"],
  outputs: [
    { channel: Channels.combinedVcf, fileName: (key) => `${key}_combined_filtered.vcf`, publish: "always" }
  ],
  commands: (ctx) => [
    {
      args: [
        "-T", "CombineVariants",
        "-R", ctx.resource("gfasta"),
        "--variant", ctx.input(Channels.filteredSnpVcf),
        "--variant", ctx.input(Channels.filteredIndelVcf),
        "--genotypemergeoption", "UNSORTED",
        "-o", ctx.output(Channels.combinedVcf)
      ]
    }
  ]
};
