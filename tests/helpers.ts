import { mkdir, writeFile } from "fs/promises";
import path from "path";
import type * as pg from "pg";
import { parseResourceTables, type ResourceTables } from "../src/config/resourceTables.js";
import { PipelineSettings, type SettingsFile } from "../src/config/settings.js";
import { applySqlFile } from "../src/db/bootstrap.js";
import { createDb, createMemoryPool } from "../src/db/connection.js";
import { PostgresStore } from "../src/store/postgresStore.js";

export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected a throw");
}

export async function rejected(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error("expected a rejection");
}

export function testSettings(patch: Partial<SettingsFile> = {}): PipelineSettings {
  return new PipelineSettings({
    version: 1,
    backend: "in_silico",
    budget: { max_cpus: 4 },
    tools: { gatk: ["gatk"], snpeff: ["snpEff"], multiqc: ["multiqc"] },
    multiqc: { enabled: true },
    ...patch
  });
}

export function testTables(): ResourceTables {
  return parseResourceTables(
    {
      version: 1,
      reference_root: "/refs",
      default_kit: "agilent_v5",
      kits: {
        agilent_v5: { bait: "kits/v5_baits.il", target: "kits/v5_targets.il", target_bed: "kits/v5_targets.bed" },
        twist_core: { bait: "kits/tw_baits.il", target: "kits/tw_targets.il", target_bed: "kits/tw_targets.bed" }
      },
      genomes: {
        GRCh37: {
          gfasta: "GRCh37/genome.fa",
          bwa_index: "GRCh37/bwa/genome.fa",
          dbsnp: "GRCh37/dbsnp.vcf",
          thousandg: "GRCh37/1000G.vcf",
          mills: "GRCh37/mills.vcf",
          omni: "GRCh37/omni.vcf",
          snpeff_db: "GRCh37.75"
        }
      }
    },
    "test tables"
  );
}

export async function memoryStore(): Promise<{ store: PostgresStore; pool: pg.Pool; close: () => Promise<void> }> {
  const pool = createMemoryPool();
  await applySqlFile(pool, path.resolve("db/schema.sql"));
  const db = createDb(pool);
  return { store: new PostgresStore(db), pool, close: () => db.destroy() };
}

export const VCF_COLUMNS = "#CHROM\tPOS\tID\tREF\tALT\tQUAL\tFILTER\tINFO\tFORMAT\tSAMPLE";

/** Writes a small raw-calls file; each row is [chrom, pos, ref, alt]. */
export async function writeCalls(dir: string, fileName: string, rows: Array<[string, number, string, string]>): Promise<string> {
  await mkdir(dir, { recursive: true });
  const lines = [
    "##fileformat=VCFv4.2",
    VCF_COLUMNS,
    ...rows.map(([chrom, pos, ref, alt]) => [chrom, String(pos), ".", ref, alt, "50", ".", "DP=10", "GT", "0/1"].join("\t"))
  ];
  const filePath = path.join(dir, fileName);
  await writeFile(filePath, lines.join("\n") + "\n", "utf8");
  return filePath;
}
