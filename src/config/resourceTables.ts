import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";
import { ConfigurationError } from "../core/errors.js";
import { expandEnvToken } from "./envTokens.js";

export const KIT_FIELDS = ["bait", "target", "target_bed"] as const;
export const GENOME_FIELDS = ["dbsnp", "thousandg", "mills", "omni", "gfasta", "bwa_index"] as const;
export const RESOURCE_FIELDS = [...GENOME_FIELDS, ...KIT_FIELDS] as const;

export type KitField = (typeof KIT_FIELDS)[number];
export type GenomeField = (typeof GENOME_FIELDS)[number];
export type ResourceField = (typeof RESOURCE_FIELDS)[number];

const zPath = z.string().min(1);

const zKitEntry = z.object({
  bait: zPath,
  target: zPath,
  target_bed: zPath
});

const zGenomeEntry = z.object({
  dbsnp: zPath,
  thousandg: zPath,
  mills: zPath,
  omni: zPath,
  gfasta: zPath,
  bwa_index: zPath,
  snpeff_db: z.string().min(1).optional()
});

const zResourceTablesFile = z.object({
  version: z.literal(1),
  reference_root: z.string().optional(),
  default_kit: z.string().min(1).optional(),
  kits: z.record(z.string(), zKitEntry).default({}),
  genomes: z.record(z.string(), zGenomeEntry).default({})
});

export type KitEntry = z.infer<typeof zKitEntry>;
export type GenomeEntry = z.infer<typeof zGenomeEntry>;

export interface ResourceTables {
  defaultKit: string | null;
  kits: Record<string, KitEntry>;
  genomes: Record<string, GenomeEntry>;
}

function rooted(root: string | null, p: string): string {
  if (!root || path.isAbsolute(p)) return p;
  return path.join(root, p);
}

export function parseResourceTables(raw: unknown, source: string): ResourceTables {
  const parsed = zResourceTablesFile.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError("InvalidConfig", [], `invalid resource tables at ${source}: ${z.prettifyError(parsed.error)}`);
  }
  const file = parsed.data;
  let root: string | null = null;
  if (file.reference_root) {
    root = expandEnvToken(file.reference_root);
    if (!root) {
      throw new ConfigurationError(
        "InvalidConfig",
        ["reference_root"],
        `reference_root ${file.reference_root} is not set in the environment (${source})`
      );
    }
  }

  const kits: Record<string, KitEntry> = {};
  for (const [name, kit] of Object.entries(file.kits)) {
    kits[name] = {
      bait: rooted(root, kit.bait),
      target: rooted(root, kit.target),
      target_bed: rooted(root, kit.target_bed)
    };
  }

  const genomes: Record<string, GenomeEntry> = {};
  for (const [name, genome] of Object.entries(file.genomes)) {
    const entry: GenomeEntry = {
      dbsnp: rooted(root, genome.dbsnp),
      thousandg: rooted(root, genome.thousandg),
      mills: rooted(root, genome.mills),
      omni: rooted(root, genome.omni),
      gfasta: rooted(root, genome.gfasta),
      bwa_index: rooted(root, genome.bwa_index)
    };
    if (genome.snpeff_db) entry.snpeff_db = genome.snpeff_db;
    genomes[name] = entry;
  }

  if (file.default_kit && !kits[file.default_kit]) {
    throw new ConfigurationError("InvalidConfig", [], `default_kit ${file.default_kit} is not defined under kits (${source})`);
  }

  return { defaultKit: file.default_kit ?? null, kits, genomes };
}

export async function loadResourceTables(filePath: string): Promise<ResourceTables> {
  const raw = await fs.readFile(filePath, "utf8");
  return parseResourceTables(YAML.parse(raw) as unknown, filePath);
}
