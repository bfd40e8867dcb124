import { BACKEND_KINDS, type BackendKind } from "../config/settings.js";
import { RESOURCE_FIELDS, type ResourceField } from "../config/resourceTables.js";
import type { ResourceOverrides } from "../config/resolveResources.js";

export interface CliArgs {
  help: boolean;
  reads: string;
  genome: string;
  kit: string | null;
  overrides: ResourceOverrides;
  snpEffDatabase: string | null;
  outDir: string;
  configPath: string | null;
  resourcesPath: string | null;
  backend: BackendKind | null;
  maxCpus: number | null;
  keepIntermediates: boolean;
  keepWork: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

const BOOLEAN_FLAGS = new Set(["help", "keep-intermediates", "keep-work"]);
const VALUE_FLAGS = new Set([
  "reads",
  "genome",
  "kit",
  "snpeff-db",
  "outdir",
  "config",
  "resources",
  "backend",
  "max-cpus",
  ...RESOURCE_FIELDS.map(flagOf)
]);

function flagOf(field: ResourceField): string {
  return field.replace(/_/g, "-");
}

export function usage(): string {
  return [
    "usage:",
    "  variantflow --reads <file|glob> --genome <name> [--kit <name>] [--outdir <dir>] [options]",
    "",
    "resources (override the genome and kit tables):",
    "  --gfasta --bwa-index --dbsnp --thousandg --mills --omni",
    "  --bait --target --target-bed --snpeff-db",
    "",
    "options:",
    "  --outdir <dir>            results directory (default: results)",
    "  --config <file>           pipeline settings (default: config/pipeline.yaml)",
    "  --resources <file>        genome and kit tables (default: config/resources.yaml)",
    `  --backend <kind>          ${BACKEND_KINDS.join(" | ")}`,
    "  --max-cpus <n>            global CPU budget",
    "  --keep-intermediates      publish intermediate files too",
    "  --keep-work               keep <outdir>/work after the run",
    "",
    "env:",
    "  VARIANTFLOW_CONFIG, VARIANTFLOW_RESOURCES (defaults for --config and --resources)",
    "  DATABASE_URL (optional run ledger; in-memory when unset)",
    ""
  ].join("\n");
}

function parseArgs(argv: string[]): Record<string, string | boolean> {
  const out: Record<string, string | boolean> = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a) continue;
    if (!a.startsWith("--")) throw new CliUsageError(`unexpected arg: ${a}`);
    const key = a.slice(2);
    if (BOOLEAN_FLAGS.has(key)) {
      out[key] = true;
      continue;
    }
    if (!VALUE_FLAGS.has(key)) throw new CliUsageError(`unknown option: ${a}`);
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) throw new CliUsageError(`missing value for --${key}`);
    out[key] = next;
    i++;
  }
  return out;
}

function isBackendKind(value: string): value is BackendKind {
  return BACKEND_KINDS.some((k) => k === value);
}

export function parseCliArgs(argv: string[]): CliArgs {
  const args = parseArgs(argv);
  const str = (key: string): string | null => {
    const v = args[key];
    return typeof v === "string" ? v : null;
  };
  const flag = (key: string): boolean => args[key] === true;

  if (flag("help")) {
    return {
      help: true,
      reads: "",
      genome: "",
      kit: null,
      overrides: {},
      snpEffDatabase: null,
      outDir: "results",
      configPath: null,
      resourcesPath: null,
      backend: null,
      maxCpus: null,
      keepIntermediates: false,
      keepWork: false
    };
  }

  const reads = str("reads");
  const genome = str("genome");
  const missing = [reads === null ? "--reads" : null, genome === null ? "--genome" : null].filter(
    (m): m is string => m !== null
  );
  if (reads === null || genome === null) {
    throw new CliUsageError(`missing required option(s): ${missing.join(", ")}\n\n${usage()}`);
  }

  const backendRaw = str("backend");
  let backend: BackendKind | null = null;
  if (backendRaw !== null) {
    if (!isBackendKind(backendRaw)) {
      throw new CliUsageError(`invalid --backend: ${backendRaw} (expected ${BACKEND_KINDS.join(" or ")})`);
    }
    backend = backendRaw;
  }

  const maxCpusRaw = str("max-cpus");
  let maxCpus: number | null = null;
  if (maxCpusRaw !== null) {
    maxCpus = Number(maxCpusRaw);
    if (!Number.isInteger(maxCpus) || maxCpus < 1) throw new CliUsageError(`invalid --max-cpus: ${maxCpusRaw}`);
  }

  const overrides: ResourceOverrides = {};
  for (const field of RESOURCE_FIELDS) {
    const v = str(flagOf(field));
    if (v !== null) overrides[field] = v;
  }

  return {
    help: false,
    reads,
    genome,
    kit: str("kit"),
    overrides,
    snpEffDatabase: str("snpeff-db"),
    outDir: str("outdir") ?? "results",
    configPath: str("config"),
    resourcesPath: str("resources"),
    backend,
    maxCpus,
    keepIntermediates: flag("keep-intermediates"),
    keepWork: flag("keep-work")
  };
}
