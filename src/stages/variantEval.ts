import type { StageDefinition } from "../graph/types.js";
import { Channels } from "./channels.js";

const EVALUATION_MODULES = ["CompOverlap", "CountVariants", "TiTvVariantEvaluator", "ValidationReport", "IndelSummary"];

export const variantEvalStage: StageDefinition = {
  name: "VariantEval",
  dir: "gatk_evaluate",
  tool: "gatk",
  inputs: [Channels.combinedVcf],
  requires: ["gfasta", "dbsnp", "target_bed"],
  outputs: [{ channel: Channels.evalReport, fileName: (key) => `${key}_combined_filtered.eval`, publish: "always" }],
  commands: (ctx) => [
    {
      args: [
        "-T", "VariantEval",
        "-R", ctx.resource("gfasta"),
        "--eval", ctx.input(Channels.combinedVcf),
        "--dbsnp", ctx.resource("dbsnp"),
        "-o", ctx.output(Channels.evalReport),
        "-L", ctx.resource("target_bed"),
        "-noEV",
        ...EVALUATION_MODULES.flatMap((m) => ["-EV", m]),
        "-nt", String(ctx.cpus)
      ]
    }
  ]
};
