import type { ResourceField } from "../config/resourceTables.js";
import { missingResources, type ResourceBundle } from "../config/resolveResources.js";
import { ConfigurationError } from "../core/errors.js";
import type { ChannelName, StageDefinition } from "./types.js";

function invalid(message: string): ConfigurationError {
  return new ConfigurationError("InvalidGraph", [], message);
}

export class StageGraph {
  private readonly producers = new Map<ChannelName, string>();
  private readonly consumers = new Map<ChannelName, string[]>();
  private readonly byName = new Map<string, StageDefinition>();
  readonly order: readonly StageDefinition[];

  private constructor(
    readonly stages: readonly StageDefinition[],
    readonly sources: readonly ChannelName[]
  ) {
    for (const source of sources) {
      if (this.producers.has(source)) throw invalid(`source channel declared twice: ${source}`);
      this.producers.set(source, "<source>");
    }

    const dirs = new Set<string>();
    for (const stage of stages) {
      if (this.byName.has(stage.name)) throw invalid(`duplicate stage name: ${stage.name}`);
      if (dirs.has(stage.dir)) throw invalid(`duplicate stage dir: ${stage.dir}`);
      this.byName.set(stage.name, stage);
      dirs.add(stage.dir);

      for (const out of stage.outputs) {
        const existing = this.producers.get(out.channel);
        if (existing) throw invalid(`channel ${out.channel} produced by both ${existing} and ${stage.name}`);
        this.producers.set(out.channel, stage.name);
      }
    }

    for (const stage of stages) {
      if (!stage.inputs.length) throw invalid(`stage ${stage.name} declares no inputs`);
      for (const input of stage.inputs) {
        if (!this.producers.has(input)) throw invalid(`stage ${stage.name} consumes ${input}, which nothing produces`);
        const list = this.consumers.get(input) ?? [];
        list.push(stage.name);
        this.consumers.set(input, list);
      }
    }

    this.order = this.topologicalOrder();
  }

  static create(stages: readonly StageDefinition[], sources: readonly ChannelName[]): StageGraph {
    return new StageGraph(stages, sources);
  }

  // Kahn's algorithm; ties keep declaration order so the order is stable.
  private topologicalOrder(): StageDefinition[] {
    const remaining = new Map<string, number>();
    for (const stage of this.stages) {
      const upstream = new Set(stage.inputs.map((c) => this.producers.get(c)).filter((p) => p && p !== "<source>"));
      remaining.set(stage.name, upstream.size);
    }

    const order: StageDefinition[] = [];
    const done = new Set<string>();
    while (order.length < this.stages.length) {
      const next = this.stages.find((s) => !done.has(s.name) && remaining.get(s.name) === 0);
      if (!next) {
        const stuck = this.stages.filter((s) => !done.has(s.name)).map((s) => s.name);
        throw invalid(`stage graph has a cycle through: ${stuck.join(", ")}`);
      }
      order.push(next);
      done.add(next.name);

      const downstream = new Set(next.outputs.flatMap((o) => this.consumers.get(o.channel) ?? []));
      for (const name of downstream) remaining.set(name, (remaining.get(name) ?? 0) - 1);
    }
    return order;
  }

  stage(name: string): StageDefinition {
    const s = this.byName.get(name);
    if (!s) throw new Error(`unknown stage: ${name}`);
    return s;
  }

  producerOf(channel: ChannelName): string | null {
    return this.producers.get(channel) ?? null;
  }

  consumersOf(channel: ChannelName): readonly string[] {
    return this.consumers.get(channel) ?? [];
  }

  requiredResources(): ResourceField[] {
    const out: ResourceField[] = [];
    for (const stage of this.order) {
      for (const f of stage.requires) if (!out.includes(f)) out.push(f);
    }
    return out;
  }

  assertResourcesAvailable(bundle: ResourceBundle): void {
    const missing = missingResources(bundle, this.requiredResources());
    if (missing.length) {
      const users = missing.map((f) => {
        const stages = this.order.filter((s) => s.requires.includes(f)).map((s) => s.name);
        return `${f} (needed by ${stages.join(", ")})`;
      });
      throw new ConfigurationError("MissingResource", missing, `missing resources: ${users.join("; ")}`);
    }
  }
}
