import type { StageDefinition } from "../graph/types.js";
import { StageGraph } from "../graph/stageGraph.js";
import { SOURCE_CHANNELS } from "./channels.js";
import { combineVariantsStage } from "./combineVariants.js";
import { genotypeGvcfsStage } from "./genotypeGvcfs.js";
import { recalibrateIndelsStage, recalibrateSnpsStage } from "./recalibrate.js";
import { selectVariantsStage } from "./selectVariants.js";
import { snpEffStage } from "./snpEff.js";
import { variantAnnotatorStage } from "./variantAnnotator.js";
import { variantEvalStage } from "./variantEval.js";

export const variantCallingStages: StageDefinition[] = [
  genotypeGvcfsStage,
  selectVariantsStage,
  recalibrateSnpsStage,
  recalibrateIndelsStage,
  combineVariantsStage,
  snpEffStage,
  variantAnnotatorStage,
  variantEvalStage
];

export function variantCallingGraph(): StageGraph {
  return StageGraph.create(variantCallingStages, SOURCE_CHANNELS);
}

export { Channels, SOURCE_CHANNELS } from "./channels.js";
export {
  combineVariantsStage,
  genotypeGvcfsStage,
  recalibrateIndelsStage,
  recalibrateSnpsStage,
  selectVariantsStage,
  snpEffStage,
  variantAnnotatorStage,
  variantEvalStage
};
