import path from "path";
import { ConfigurationError } from "../core/errors.js";
import {
  GENOME_FIELDS,
  KIT_FIELDS,
  RESOURCE_FIELDS,
  type ResourceField,
  type ResourceTables
} from "./resourceTables.js";

export type ResourceOverrides = Partial<Record<ResourceField, string>>;

export interface ResourceBundle {
  readonly genome: string;
  readonly kit: string | null;
  readonly paths: Readonly<Partial<Record<ResourceField, string>>>;
  readonly snpEffDatabase: string;
}

export interface ResolveResourcesInput {
  genome: string;
  kit: string | null;
  overrides: ResourceOverrides;
  snpEffDatabase?: string | null;
}

function supplied(overrides: ResourceOverrides, field: ResourceField): string | null {
  const v = overrides[field];
  return typeof v === "string" && v.length > 0 ? v : null;
}

function flagName(field: ResourceField): string {
  return `--${field.replace(/_/g, "-")}`;
}

export function resolveResources(input: ResolveResourcesInput, tables: ResourceTables): ResourceBundle {
  const kitName = input.kit ?? tables.defaultKit;
  const kitEntry = kitName ? tables.kits[kitName] : undefined;
  if (!kitEntry) {
    const missing = (["bait", "target"] as const).filter((f) => !supplied(input.overrides, f));
    if (missing.length) {
      const what = kitName ? `kit ${kitName} is not in the kit table` : `no kit given`;
      throw new ConfigurationError(
        "MissingKitConfig",
        [...missing],
        `${what}; supply ${missing.map(flagName).join(" and ")} explicitly`
      );
    }
  }

  const genomeEntry = tables.genomes[input.genome];
  if (!genomeEntry) {
    const missing = GENOME_FIELDS.filter((f) => !supplied(input.overrides, f));
    if (missing.length) {
      throw new ConfigurationError(
        "MissingGenomeConfig",
        [...missing],
        `genome ${input.genome} is not in the genome table; supply ${missing.map(flagName).join(", ")} explicitly`
      );
    }
  }

  const paths: Partial<Record<ResourceField, string>> = {};
  if (kitEntry) {
    for (const f of KIT_FIELDS) paths[f] = kitEntry[f];
  }
  if (genomeEntry) {
    for (const f of GENOME_FIELDS) paths[f] = genomeEntry[f];
  }
  for (const f of RESOURCE_FIELDS) {
    const v = supplied(input.overrides, f);
    if (v) paths[f] = v;
  }

  return {
    genome: input.genome,
    kit: kitName ?? null,
    paths,
    snpEffDatabase: input.snpEffDatabase || genomeEntry?.snpeff_db || input.genome
  };
}

/** Resolves relative resource paths against the launch directory; tools run in their own work dirs. */
export function anchorResources(bundle: ResourceBundle, baseDir: string): ResourceBundle {
  const paths: Partial<Record<ResourceField, string>> = {};
  for (const f of RESOURCE_FIELDS) {
    const p = bundle.paths[f];
    if (p) paths[f] = path.resolve(baseDir, p);
  }
  return { ...bundle, paths };
}

export function missingResources(bundle: ResourceBundle, fields: Iterable<ResourceField>): ResourceField[] {
  const out: ResourceField[] = [];
  for (const f of fields) {
    if (!bundle.paths[f] && !out.includes(f)) out.push(f);
  }
  return out;
}

export function requireResource(bundle: ResourceBundle, field: ResourceField): string {
  const p = bundle.paths[field];
  if (!p) {
    throw new ConfigurationError("MissingResource", [field], `resource ${field} is not configured (use ${flagName(field)})`);
  }
  return p;
}
