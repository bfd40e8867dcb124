import type { ResourceField } from "../config/resourceTables.js";
import type { ChannelName, StageCommand, StageContext, StageDefinition } from "../graph/types.js";
import { Channels } from "./channels.js";

interface TrainingResource {
  name: string;
  field: ResourceField;
  known: boolean;
  training: boolean;
  truth: boolean;
  prior: string;
}

interface RecalibrationBranch {
  name: string;
  dir: string;
  mode: "SNP" | "INDEL";
  input: ChannelName;
  recal: ChannelName;
  tranches: ChannelName;
  output: ChannelName;
  suffix: string;
  annotations: string[];
  trainingSet: TrainingResource[];
  truthSensitivity: string;
}

function resourceArgs(ctx: StageContext, set: TrainingResource[]): string[] {
  return set.flatMap((r) => [
    `-resource:${r.name},known=${r.known},training=${r.training},truth=${r.truth},prior=${r.prior}`,
    ctx.resource(r.field)
  ]);
}

function recalibrationStage(branch: RecalibrationBranch): StageDefinition {
  return {
    name: branch.name,
    dir: branch.dir,
    tool: "gatk",
    inputs: [branch.input],
    requires: ["gfasta", ...new Set(branch.trainingSet.map((r) => r.field))],
    outputs: [
      { channel: branch.recal, fileName: (key) => `${key}_${branch.suffix}.recal`, publish: "intermediate" },
      { channel: branch.tranches, fileName: (key) => `${key}_${branch.suffix}.tranches`, publish: "intermediate" },
      { channel: branch.output, fileName: (key) => `${key}_filtered_${branch.suffix}.vcf`, publish: "always" }
    ],
    commands: (ctx): StageCommand[] => {
      const reference = ctx.resource("gfasta");
      const input = ctx.input(branch.input);
      const recal = ctx.output(branch.recal);
      const tranches = ctx.output(branch.tranches);
      return [
        {
          args: [
            "-T", "VariantRecalibrator",
            "-R", reference,
            "-input", input,
            "-recalFile", recal,
            "-tranchesFile", tranches,
            ...resourceArgs(ctx, branch.trainingSet),
            ...branch.annotations.flatMap((a) => ["-an", a]),
            "-mode", branch.mode,
            "--maxGaussians", "4",
            "-nt", String(ctx.cpus)
          ]
        },
        {
          args: [
            "-T", "ApplyRecalibration",
            "-R", reference,
            "-input", input,
            "-recalFile", recal,
            "-tranchesFile", tranches,
            "-mode", branch.mode,
            "--ts_filter_level", branch.truthSensitivity,
            "-o", ctx.output(branch.output)
          ]
        }
      ];
    }
  };
}

export const recalibrateSnpsStage = recalibrationStage({
  name: "RecalibrateSNPs",
  dir: "gatk_recalibrate_snp",
  mode: "SNP",
  input: Channels.snpVcf,
  recal: Channels.snpRecal,
  tranches: Channels.snpTranches,
  output: Channels.filteredSnpVcf,
  suffix: "snp",
  annotations: ["QD", "FS", "MQ"],
  trainingSet: [
    { name: "omni", field: "omni", known: false, training: true, truth: true, prior: "12.0" },
    { name: "1000G", field: "thousandg", known: false, training: true, truth: false, prior: "10.0" },
    { name: "dbsnp", field: "dbsnp", known: true, training: false, truth: false, prior: "2.0" }
  ],
  truthSensitivity: "99.5"
});

export const recalibrateIndelsStage = recalibrationStage({
  name: "RecalibrateIndels",
  dir: "gatk_recalibrate_indel",
  mode: "INDEL",
  input: Channels.indelVcf,
  recal: Channels.indelRecal,
  tranches: Channels.indelTranches,
  output: Channels.filteredIndelVcf,
  suffix: "indels",
  annotations: ["QD", "FS", "ReadPosRankSum"],
  trainingSet: [
    { name: "mills", field: "mills", known: true, training: true, truth: true, prior: "12.0" },
    { name: "dbsnp", field: "dbsnp", known: true, training: false, truth: false, prior: "2.0" }
  ],
  truthSensitivity: "99.0"
});
