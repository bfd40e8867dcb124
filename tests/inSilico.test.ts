import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import os from "os";
import path from "path";
import { IN_SILICO_VERSIONS, InSilicoRunner } from "../src/execution/backends/inSilico.js";
import type { ToolInvocation } from "../src/execution/backends/types.js";
import type { ToolName } from "../src/config/settings.js";
import { appendInfo, formatRecord, infoValue, parseVcf, variantType, type VcfRecord } from "../src/vcf/records.js";
import { writeCalls } from "./helpers.js";

function record(ref: string, alt: string[]): VcfRecord {
  return { chrom: "chr1", pos: 1, id: ".", ref, alt, qual: ".", filter: ".", info: ".", samples: [] };
}

describe("vcf records", () => {
  it("classifies variant types", () => {
    expect(variantType(record("A", ["G"]))).toBe("SNP");
    expect(variantType(record("AT", ["A"]))).toBe("INDEL");
    expect(variantType(record("AC", ["GT"]))).toBe("MNP");
    expect(variantType(record("A", ["G", "AT"]))).toBe("MIXED");
    expect(variantType(record("A", ["<DEL>"]))).toBe("SYMBOLIC");
    expect(variantType(record("A", ["<NON_REF>"]))).toBe("NO_VARIATION");
    expect(variantType(record("A", []))).toBe("NO_VARIATION");
  });

  it("parses and formats records", () => {
    const file = parseVcf("##fileformat=VCFv4.2\n#CHROM\tPOS\tID\tREF\tALT\tQUAL\tFILTER\tINFO\nchr2\t15\trs1\tG\t.\t.\tPASS\tDP=3\n");
    expect(file.header).toEqual(["##fileformat=VCFv4.2", "#CHROM\tPOS\tID\tREF\tALT\tQUAL\tFILTER\tINFO"]);
    expect(file.records).toHaveLength(1);
    expect(file.records[0]).toMatchObject({ chrom: "chr2", pos: 15, id: "rs1", alt: [] });
    expect(formatRecord(record("A", []))).toBe("chr1\t1\t.\tA\t.\t.\t.\t.");
    expect(() => parseVcf("chr1\t1\t.\tA\n")).toThrow("malformed VCF record (4 columns)");
  });

  it("reads and extends INFO columns", () => {
    expect(appendInfo(".", "VQSLOD=1.5")).toBe("VQSLOD=1.5");
    expect(appendInfo("DP=10", "VQSLOD=1.5")).toBe("DP=10;VQSLOD=1.5");
    expect(infoValue("DP=10;DB;ANN=G|missense_variant", "ANN")).toBe("G|missense_variant");
    expect(infoValue("DP=10;DB", "DB")).toBe("");
    expect(infoValue("DP=10", "AF")).toBeNull();
  });
});

describe("InSilicoRunner", () => {
  const runner = new InSilicoRunner();
  let dir = "";

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "variantflow-insilico-"));
    await writeCalls(dir, "raw.g.vcf", [
      ["chr1", 200, "C", "T,<NON_REF>"],
      ["chr1", 100, "A", "G,<NON_REF>"],
      ["chr2", 300, "AT", "A,<NON_REF>"],
      ["chr2", 400, "G", "<NON_REF>"]
    ]);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const run = (tool: ToolName, args: string[], stdoutPath?: string) => {
    const invocation: ToolInvocation = { tool, argv: [tool, ...args], args, cwd: dir };
    if (stdoutPath) invocation.stdoutPath = stdoutPath;
    return runner.execute(invocation, { threads: 1, memoryMb: null });
  };

  const records = async (name: string) => parseVcf(await readFile(path.join(dir, name), "utf8")).records;

  it("GenotypeGVCFs drops reference blocks and NON_REF alleles", async () => {
    const res = await run("gatk", ["-T", "GenotypeGVCFs", "-R", "ref.fa", "--variant", "raw.g.vcf", "-o", "gt.vcf"]);
    expect(res.exitCode).toBe(0);
    expect(res.stderr.split("\n")[0]).toBe(`INFO  HelpFormatter - The Genome Analysis Toolkit (GATK) v${IN_SILICO_VERSIONS.gatk}`);
    const out = await records("gt.vcf");
    expect(out.map((r) => [r.pos, r.alt])).toEqual([
      [200, ["T"]],
      [100, ["G"]],
      [300, ["A"]]
    ]);
    const header = parseVcf(await readFile(path.join(dir, "gt.vcf"), "utf8")).header;
    expect(header[1]).toBe("##source=GenotypeGVCFs");
  });

  it("SelectVariants and CombineVariants split and rejoin by position", async () => {
    await run("gatk", ["-T", "GenotypeGVCFs", "--variant", "raw.g.vcf", "-o", "gt.vcf"]);
    await run("gatk", ["-T", "SelectVariants", "--variant", "gt.vcf", "-o", "snp.vcf", "--selectTypeToInclude", "SNP"]);
    await run("gatk", ["-T", "SelectVariants", "--variant", "gt.vcf", "-o", "indel.vcf", "--selectTypeToInclude", "INDEL"]);
    expect((await records("snp.vcf")).map((r) => r.pos)).toEqual([200, 100]);
    expect((await records("indel.vcf")).map((r) => r.pos)).toEqual([300]);

    const res = await run("gatk", ["-T", "CombineVariants", "--variant", "snp.vcf", "--variant", "indel.vcf", "-o", "all.vcf"]);
    expect(res.exitCode).toBe(0);
    expect((await records("all.vcf")).map((r) => `${r.chrom}:${r.pos}`)).toEqual(["chr1:100", "chr1:200", "chr2:300"]);
  });

  it("recalibration is deterministic and marks records PASS", async () => {
    const train = ["-T", "VariantRecalibrator", "-input", "raw.g.vcf", "-recalFile", "x.recal", "-tranchesFile", "x.tranches", "-an", "QD", "-mode", "SNP"];
    await run("gatk", train);
    const first = await readFile(path.join(dir, "x.recal"), "utf8");
    await run("gatk", train);
    expect(await readFile(path.join(dir, "x.recal"), "utf8")).toBe(first);
    expect(await readFile(path.join(dir, "x.tranches"), "utf8")).toBe(
      "# Variant quality score tranches file\ntargetTruthSensitivity,numKnown,numNovel,model\n99.00,0,4,SNP\n"
    );

    const res = await run("gatk", ["-T", "ApplyRecalibration", "-input", "raw.g.vcf", "-recalFile", "x.recal", "-o", "f.vcf"]);
    expect(res.exitCode).toBe(0);
    const out = await records("f.vcf");
    expect(out.map((r) => r.filter)).toEqual(["PASS", "PASS", "PASS", "PASS"]);
    expect(out.every((r) => /^DP=10;VQSLOD=-?\d+\.\d{4}$/.test(r.info))).toBe(true);
  });

  it("VariantRecalibrator needs annotations", async () => {
    const res = await run("gatk", ["-T", "VariantRecalibrator", "-input", "raw.g.vcf", "-recalFile", "x.recal", "-tranchesFile", "x.tranches", "-mode", "SNP"]);
    expect(res).toMatchObject({ exitCode: 1, stderr: "No annotations were specified with -an\n" });
  });

  it("SnpEff streams the annotated VCF to the stdout file", async () => {
    await run("gatk", ["-T", "GenotypeGVCFs", "--variant", "raw.g.vcf", "-o", "gt.vcf"]);
    const annPath = path.join(dir, "ann.vcf");
    const res = await run("snpeff", ["-v", "-csvStats", "s.csv", "-stats", "s.html", "GRCh37.75", "gt.vcf"], annPath);
    expect(res.exitCode).toBe(0);
    expect(res.stdout).toBe(`[stdout written to ${annPath}]\n`);
    expect(res.stderr).toContain(`SnpEff version SnpEff ${IN_SILICO_VERSIONS.snpeff} (build`);

    const ann = parseVcf(await readFile(annPath, "utf8")).records;
    expect(ann.map((r) => r.info)).toEqual([
      "DP=10;ANN=T|missense_variant|MODERATE",
      "DP=10;ANN=G|missense_variant|MODERATE",
      "DP=10;ANN=A|frameshift_variant|MODERATE"
    ]);
    expect(await readFile(path.join(dir, "s.csv"), "utf8")).toBe("# Summary table\nGenome,GRCh37.75\nNumber_of_variants_processed,3\n");
  });

  it("MultiQC writes its report into the output directory", async () => {
    const res = await run("multiqc", [dir, "-o", "mq", "-f"]);
    expect(res.stdout).toBe(`[INFO   ]         multiqc : This is MultiQC v${IN_SILICO_VERSIONS.multiqc}\n`);
    expect(await readFile(path.join(dir, "mq", "multiqc_report.html"), "utf8")).toContain(`searched: ${dir}`);
  });

  it("reports tool errors as exit codes", async () => {
    expect(await run("gatk", ["-T", "Nope"])).toMatchObject({
      exitCode: 1,
      stderr: "Invalid command line: Malformed walker argument: Could not find walker with name: Nope\n"
    });
    expect(await run("gatk", ["-T", "SelectVariants", "--variant", "missing.vcf", "-o", "x.vcf"])).toMatchObject({
      exitCode: 1,
      stderr: "ERROR MESSAGE: Couldn't read file missing.vcf because file does not exist\n"
    });
    expect(await run("snpeff", ["-v", "gt.vcf"])).toMatchObject({ exitCode: 255 });
  });
});
