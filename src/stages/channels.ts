export const Channels = {
  rawCalls: "raw_calls",
  gvcf: "gvcf",
  snpVcf: "snp_vcf",
  indelVcf: "indel_vcf",
  snpRecal: "snp_recal",
  snpTranches: "snp_tranches",
  filteredSnpVcf: "filtered_snp_vcf",
  indelRecal: "indel_recal",
  indelTranches: "indel_tranches",
  filteredIndelVcf: "filtered_indel_vcf",
  combinedVcf: "combined_vcf",
  snpEffVcf: "snpeff_vcf",
  snpEffSummary: "snpeff_summary",
  snpEffStats: "snpeff_stats",
  annotatedVcf: "annotated_vcf",
  evalReport: "eval_report"
} as const;

export const SOURCE_CHANNELS = [Channels.rawCalls] as const;
