import type { StageDefinition } from "../graph/types.js";
import { Channels } from "./channels.js";

// Everything that is not a plain SNP goes down the indel branch.
const INDEL_BRANCH_TYPES = ["INDEL", "MIXED", "MNP", "SYMBOLIC", "NO_VARIATION"];

export const selectVariantsStage: StageDefinition = {
  name: "SelectVariants",
  dir: "gatk_select",
  tool: "gatk",
  inputs: [Channels.gvcf],
  requires: ["gfasta"],
  outputs: [
    { channel: Channels.snpVcf, fileName: (key) => `${key}_snp.vcf`, publish: "intermediate" },
    { channel: Channels.indelVcf, fileName: (key) => `${key}_indels.vcf`, publish: "intermediate" }
  ],
  commands: (ctx) => {
    const common = ["-T", "SelectVariants", "-R", ctx.resource("gfasta"), "--variant", ctx.input(Channels.gvcf)];
    return [
      {
        args: [...common, "-o", ctx.output(Channels.snpVcf), "--selectTypeToInclude", "SNP"]
      },
      {
        args: [
          ...common,
          "-o", ctx.output(Channels.indelVcf),
          ...INDEL_BRANCH_TYPES.flatMap((t) => ["--selectTypeToInclude", t])
        ]
      }
    ];
  }
};
