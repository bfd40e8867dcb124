import { promises as fs } from "fs";
import path from "path";
import { floatBetween, seedFrom } from "../deterministic.js";
import {
  appendInfo,
  formatVcf,
  infoValue,
  NON_REF,
  parseVcf,
  variantType,
  type VcfFile,
  type VcfRecord
} from "../../vcf/records.js";
import type { ExecutionResources, ExecutionResult, RunnerBackend, ToolInvocation } from "./types.js";

export const IN_SILICO_VERSIONS = {
  gatk: "3.8-1-0-gf15c1c3ef",
  snpeff: "4.3t",
  multiqc: "1.9"
} as const;

class ToolExit extends Error {
  constructor(
    readonly exitCode: number,
    message: string
  ) {
    super(message);
  }
}

interface ToolOutcome {
  stdout: string;
  stderr: string[];
}

function optionValues(args: string[], ...names: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const a = args[i];
    if (a !== undefined && names.includes(a)) {
      const v = args[i + 1];
      if (v === undefined) throw new ToolExit(1, `Argument ${a} has no value`);
      out.push(v);
      i++;
    }
  }
  return out;
}

function requiredOption(args: string[], ...names: string[]): string {
  const [v] = optionValues(args, ...names);
  if (v === undefined) throw new ToolExit(1, `Argument with name '${names[0]}' is missing.`);
  return v;
}

async function readVcf(cwd: string, p: string): Promise<VcfFile> {
  let text: string;
  try {
    text = await fs.readFile(path.resolve(cwd, p), "utf8");
  } catch {
    throw new ToolExit(1, `ERROR MESSAGE: Couldn't read file ${p} because file does not exist`);
  }
  return parseVcf(text);
}

async function writeText(cwd: string, p: string, text: string): Promise<void> {
  await fs.writeFile(path.resolve(cwd, p), text, "utf8");
}

function withSource(file: VcfFile, source: string): string[] {
  const meta = file.header.filter((l) => l.startsWith("##"));
  const columns = file.header.filter((l) => !l.startsWith("##"));
  return [...meta, `##source=${source}`, ...columns];
}

async function runGatk(args: string[], cwd: string): Promise<ToolOutcome> {
  const walker = requiredOption(args, "-T", "--analysis_type");
  const stderr = [`INFO  HelpFormatter - The Genome Analysis Toolkit (GATK) v${IN_SILICO_VERSIONS.gatk}`];

  switch (walker) {
    case "GenotypeGVCFs": {
      const input = await readVcf(cwd, requiredOption(args, "--variant", "-V"));
      const records: VcfRecord[] = [];
      for (const r of input.records) {
        const alt = r.alt.filter((a) => a !== NON_REF);
        if (alt.length) records.push({ ...r, alt });
      }
      await writeText(cwd, requiredOption(args, "-o", "--out"), formatVcf({ header: withSource(input, walker), records }));
      break;
    }
    case "SelectVariants": {
      const input = await readVcf(cwd, requiredOption(args, "--variant", "-V"));
      const types = new Set(optionValues(args, "--selectTypeToInclude", "-selectType"));
      const records = types.size ? input.records.filter((r) => types.has(variantType(r))) : input.records;
      await writeText(cwd, requiredOption(args, "-o", "--out"), formatVcf({ header: withSource(input, walker), records }));
      break;
    }
    case "VariantRecalibrator": {
      const input = await readVcf(cwd, requiredOption(args, "-input", "--input"));
      const mode = requiredOption(args, "-mode", "--mode");
      if (!optionValues(args, "-an", "--use_annotation").length) {
        throw new ToolExit(1, "No annotations were specified with -an");
      }
      const recal = input.records.map((r) => {
        const lod = floatBetween(seedFrom([r.chrom, String(r.pos), mode]), 0, -5, 15).toFixed(4);
        return `${r.chrom}\t${r.pos}\t.\tN\t<VQSR>\t.\t.\tVQSLOD=${lod}`;
      });
      await writeText(
        cwd,
        requiredOption(args, "-recalFile", "--recal_file"),
        ["##fileformat=VCFv4.2", "#CHROM\tPOS\tID\tREF\tALT\tQUAL\tFILTER\tINFO", ...recal].join("\n") + "\n"
      );
      await writeText(
        cwd,
        requiredOption(args, "-tranchesFile", "--tranches_file"),
        `# Variant quality score tranches file\ntargetTruthSensitivity,numKnown,numNovel,model\n99.00,0,${input.records.length},${mode}\n`
      );
      break;
    }
    case "ApplyRecalibration": {
      const input = await readVcf(cwd, requiredOption(args, "-input", "--input"));
      const recal = await readVcf(cwd, requiredOption(args, "-recalFile", "--recal_file"));
      const lods = new Map(recal.records.map((r) => [`${r.chrom}:${r.pos}`, infoValue(r.info, "VQSLOD") ?? "0"]));
      const records = input.records.map((r) => ({
        ...r,
        filter: r.filter === "." ? "PASS" : r.filter,
        info: appendInfo(r.info, `VQSLOD=${lods.get(`${r.chrom}:${r.pos}`) ?? "0"}`)
      }));
      await writeText(cwd, requiredOption(args, "-o", "--out"), formatVcf({ header: withSource(input, walker), records }));
      break;
    }
    case "CombineVariants": {
      const inputs = optionValues(args, "--variant", "-V");
      if (!inputs.length) throw new ToolExit(1, "Argument with name '--variant' is missing.");
      const files = await Promise.all(inputs.map((p) => readVcf(cwd, p)));
      const [first] = files;
      if (!first) throw new ToolExit(1, "no inputs");
      const chromOrder: string[] = [];
      const records = files.flatMap((f) => f.records);
      for (const r of records) if (!chromOrder.includes(r.chrom)) chromOrder.push(r.chrom);
      records.sort((a, b) => chromOrder.indexOf(a.chrom) - chromOrder.indexOf(b.chrom) || a.pos - b.pos);
      await writeText(cwd, requiredOption(args, "-o", "--out"), formatVcf({ header: withSource(first, walker), records }));
      break;
    }
    case "VariantAnnotator": {
      const input = await readVcf(cwd, requiredOption(args, "--variant", "-V"));
      const [snpEffPath] = optionValues(args, "--snpEffFile");
      const ann = new Map<string, string>();
      if (snpEffPath) {
        const snpEff = await readVcf(cwd, snpEffPath);
        for (const r of snpEff.records) {
          const v = infoValue(r.info, "ANN");
          if (v) ann.set(`${r.chrom}:${r.pos}`, v);
        }
      }
      const records = input.records.map((r) => {
        const v = ann.get(`${r.chrom}:${r.pos}`);
        return v ? { ...r, info: appendInfo(r.info, `SNPEFF_ANN=${v}`) } : r;
      });
      await writeText(cwd, requiredOption(args, "-o", "--out"), formatVcf({ header: withSource(input, walker), records }));
      break;
    }
    case "VariantEval": {
      const input = await readVcf(cwd, requiredOption(args, "--eval", "-eval"));
      const counts = new Map<string, number>();
      for (const r of input.records) {
        const t = variantType(r);
        counts.set(t, (counts.get(t) ?? 0) + 1);
      }
      const lines = [
        "#:GATKReport.v1.1:1",
        "#:GATKTable:CountVariants:Counts of variants",
        "CountVariants  nVariantLoci  nSNPs  nInsertions_or_Deletions",
        `CountVariants  ${input.records.length}  ${counts.get("SNP") ?? 0}  ${counts.get("INDEL") ?? 0}`
      ];
      await writeText(cwd, requiredOption(args, "-o", "--out"), lines.join("\n") + "\n");
      break;
    }
    default:
      throw new ToolExit(1, `Invalid command line: Malformed walker argument: Could not find walker with name: ${walker}`);
  }

  stderr.push(`INFO  ProgressMeter - Total runtime 0.01 secs`);
  return { stdout: "", stderr };
}

async function runSnpEff(args: string[], cwd: string): Promise<ToolOutcome> {
  const stderr = [`SnpEff version SnpEff ${IN_SILICO_VERSIONS.snpeff} (build 2017-11-24 10:18), by Pablo Cingolani`];
  const positional: string[] = [];
  const valued = new Set(["-c", "-config", "-csvStats", "-stats", "-s", "-i", "-o", "-dataDir"]);
  for (let i = 0; i < args.length; i++) {
    const a = args[i];
    if (a === undefined) continue;
    if (valued.has(a)) {
      i++;
      continue;
    }
    if (!a.startsWith("-")) positional.push(a);
  }
  const [database, vcfPath] = positional.slice(-2);
  if (!database || !vcfPath) throw new ToolExit(255, "Usage: snpEff [eff] [options] genome_version [input_file]");

  const input = await readVcf(cwd, vcfPath);
  const records = input.records.map((r) => {
    const effect = variantType(r) === "SNP" ? "missense_variant" : "frameshift_variant";
    return { ...r, info: appendInfo(r.info, `ANN=${r.alt[0] ?? "."}|${effect}|MODERATE`) };
  });

  const [csvStats] = optionValues(args, "-csvStats");
  if (csvStats) await writeText(cwd, csvStats, `# Summary table\nGenome,${database}\nNumber_of_variants_processed,${records.length}\n`);
  const [htmlStats] = optionValues(args, "-stats", "-s");
  if (htmlStats) await writeText(cwd, htmlStats, `<html><body><h1>SnpEff summary</h1><p>${records.length} variants</p></body></html>\n`);

  const header = withSource(input, `SnpEff ${IN_SILICO_VERSIONS.snpeff}`);
  return { stdout: formatVcf({ header, records }), stderr };
}

async function runMultiqc(args: string[], cwd: string): Promise<ToolOutcome> {
  const outDir = requiredOption(args, "-o", "--outdir");
  const searchDirs = args.filter((a, i) => !a.startsWith("-") && args[i - 1] !== "-o" && args[i - 1] !== "--outdir");
  const dest = path.resolve(cwd, outDir);
  await fs.mkdir(dest, { recursive: true });
  await writeText(
    dest,
    "multiqc_report.html",
    `<html><body><h1>MultiQC report</h1><p>searched: ${searchDirs.join(", ")}</p></body></html>\n`
  );
  return { stdout: `[INFO   ]         multiqc : This is MultiQC v${IN_SILICO_VERSIONS.multiqc}\n`, stderr: [] };
}

/**
 * Emulates the wrapped tools in-process over small VCF files: dry runs and tests exercise
 * the full stage graph without GATK or SnpEff installed.
 */
export class InSilicoRunner implements RunnerBackend<"in_silico"> {
  readonly kind = "in_silico" as const;

  async execute(invocation: ToolInvocation, _resources: ExecutionResources): Promise<ExecutionResult> {
    const startedAt = new Date().toISOString();
    let exitCode = 0;
    let stdout = "";
    let stderr = "";

    try {
      const outcome =
        invocation.tool === "gatk"
          ? await runGatk(invocation.args, invocation.cwd)
          : invocation.tool === "snpeff"
            ? await runSnpEff(invocation.args, invocation.cwd)
            : await runMultiqc(invocation.args, invocation.cwd);
      stderr = outcome.stderr.join("\n") + "\n";
      if (invocation.stdoutPath) {
        await fs.writeFile(invocation.stdoutPath, outcome.stdout, "utf8");
        stdout = `[stdout written to ${invocation.stdoutPath}]\n`;
      } else {
        stdout = outcome.stdout;
      }
    } catch (err) {
      if (!(err instanceof ToolExit)) throw err;
      exitCode = err.exitCode;
      stderr = `${err.message}\n`;
    }

    return { exitCode, stdout, stderr, startedAt, finishedAt: new Date().toISOString() };
  }
}
