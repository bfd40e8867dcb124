export const PIPELINE_NAME = "variantflow";
export const PIPELINE_VERSION = "0.3.0";
