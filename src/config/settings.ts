import { promises as fs } from "fs";
import YAML from "yaml";
import * as z from "zod/v4";
import { ConfigurationError } from "../core/errors.js";
import { sha256Prefixed, stableJsonStringify } from "../core/canonicalJson.js";
import { expandEnvToken } from "./envTokens.js";

export const TOOL_NAMES = ["gatk", "snpeff", "multiqc"] as const;
export type ToolName = (typeof TOOL_NAMES)[number];

export const BACKEND_KINDS = ["local_process", "in_silico"] as const;
export type BackendKind = (typeof BACKEND_KINDS)[number];

const zStageResources = z.object({
  cpus: z.number().int().min(1).optional(),
  memory_mb: z.number().int().min(1).optional()
});

const zSettingsFile = z.object({
  version: z.literal(1),
  backend: z.enum(BACKEND_KINDS).default("local_process"),
  budget: z.object({
    max_cpus: z.number().int().min(1),
    max_memory_mb: z.number().int().min(1).optional()
  }),
  defaults: z
    .object({
      cpus: z.number().int().min(1).default(1),
      memory_mb: z.number().int().min(1).optional()
    })
    .default({ cpus: 1 }),
  stages: z.record(z.string(), zStageResources).default({}),
  tools: z.object({
    gatk: z.array(z.string().min(1)).min(1),
    snpeff: z.array(z.string().min(1)).min(1),
    multiqc: z.array(z.string().min(1)).min(1)
  }),
  multiqc: z.object({ enabled: z.boolean().default(true) }).default({ enabled: true })
});

export type SettingsFile = z.input<typeof zSettingsFile>;
type SettingsConfig = z.output<typeof zSettingsFile>;

export interface StageAllocation {
  cpus: number;
  memoryMb: number | null;
}

function expandArgv(tool: ToolName, argv: string[]): string[] {
  return argv.map((token) => {
    const v = expandEnvToken(token);
    if (v === null) {
      throw new ConfigurationError("InvalidConfig", [token], `tools.${tool}: environment variable for ${token} is not set`);
    }
    return v;
  });
}

export class PipelineSettings {
  readonly settingsHash: `sha256:${string}`;
  private readonly config: SettingsConfig;

  constructor(raw: unknown, source = "<inline>") {
    const parsed = zSettingsFile.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError("InvalidConfig", [], `invalid pipeline settings at ${source}: ${z.prettifyError(parsed.error)}`);
    }
    this.config = parsed.data;
    this.settingsHash = sha256Prefixed(stableJsonStringify(this.config));

    for (const [stage, res] of Object.entries(this.config.stages)) {
      this.checkWithinBudget(stage, res.cpus ?? this.config.defaults.cpus, res.memory_mb ?? null);
    }
    this.checkWithinBudget("defaults", this.config.defaults.cpus, this.config.defaults.memory_mb ?? null);
  }

  static async loadFromFile(filePath: string): Promise<PipelineSettings> {
    const raw = await fs.readFile(filePath, "utf8");
    return new PipelineSettings(YAML.parse(raw) as unknown, filePath);
  }

  private checkWithinBudget(scope: string, cpus: number, memoryMb: number | null): void {
    if (cpus > this.config.budget.max_cpus) {
      throw new ConfigurationError(
        "InvalidConfig",
        [],
        `${scope}: cpus=${cpus} exceeds budget.max_cpus=${this.config.budget.max_cpus}`
      );
    }
    const maxMem = this.config.budget.max_memory_mb;
    if (maxMem !== undefined && memoryMb !== null && memoryMb > maxMem) {
      throw new ConfigurationError("InvalidConfig", [], `${scope}: memory_mb=${memoryMb} exceeds budget.max_memory_mb=${maxMem}`);
    }
  }

  /** Copy with a different CPU budget, as passed on the command line. */
  withMaxCpus(maxCpus: number): PipelineSettings {
    return new PipelineSettings({ ...this.config, budget: { ...this.config.budget, max_cpus: maxCpus } }, "--max-cpus");
  }

  withBackend(backend: BackendKind): PipelineSettings {
    return new PipelineSettings({ ...this.config, backend }, "--backend");
  }

  backend(): BackendKind {
    return this.config.backend;
  }

  budget(): { maxCpus: number; maxMemoryMb: number | null } {
    return { maxCpus: this.config.budget.max_cpus, maxMemoryMb: this.config.budget.max_memory_mb ?? null };
  }

  stageAllocation(stageName: string): StageAllocation {
    const res = this.config.stages[stageName];
    return {
      cpus: res?.cpus ?? this.config.defaults.cpus,
      memoryMb: res?.memory_mb ?? this.config.defaults.memory_mb ?? null
    };
  }

  toolArgv(tool: ToolName): string[] {
    return expandArgv(tool, this.config.tools[tool]);
  }

  multiqcEnabled(): boolean {
    return this.config.multiqc.enabled;
  }
}
