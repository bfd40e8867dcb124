import type { StageDefinition } from "../graph/types.js";
import { Channels } from "./channels.js";

export const snpEffStage: StageDefinition = {
  name: "SnpEff",
  dir: "snpeff",
  tool: "snpeff",
  inputs: [Channels.combinedVcf],
  requires: [],
  outputs: [
    { channel: Channels.snpEffVcf, fileName: (key) => `${key}_combined_filtered_snpEff.ann.vcf`, publish: "always" },
    { channel: Channels.snpEffSummary, fileName: (key) => `${key}_snpEff_summary.html`, publish: "always" },
    { channel: Channels.snpEffStats, fileName: (key) => `${key}_snpEff_stats.csv`, publish: "always" }
  ],
  commands: (ctx) => [
    {
      args: [
        "-v",
        "-csvStats", ctx.output(Channels.snpEffStats),
        "-stats", ctx.output(Channels.snpEffSummary),
        ctx.resources.snpEffDatabase,
        ctx.input(Channels.combinedVcf)
      ],
      stdoutTo: ctx.output(Channels.snpEffVcf)
    }
  ]
};
