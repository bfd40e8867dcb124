import type { ResourceField } from "../config/resourceTables.js";
import type { ResourceBundle } from "../config/resolveResources.js";
import type { ToolName } from "../config/settings.js";
import type { RunKey } from "../core/ids.js";

export type ChannelName = string;

export type PublishMode = "always" | "intermediate";

export interface StageOutputDecl {
  channel: ChannelName;
  // Derived from the instance's own key only.
  fileName(key: RunKey): string;
  publish: PublishMode;
}

export interface StageCommand {
  args: string[];
  // File name (in the instance work dir) that receives the tool's stdout.
  stdoutTo?: string;
}

export interface StageContext {
  key: RunKey;
  resources: ResourceBundle;
  cpus: number;
  memoryMb: number | null;
  /** Absolute path bound to an input channel for this key. */
  input(channel: ChannelName): string;
  /** Resolved resource path; validated before any stage runs. */
  resource(field: ResourceField): string;
  /** File name of one of this stage's declared outputs. */
  output(channel: ChannelName): string;
}

export interface StageDefinition {
  name: string;
  // Results subdirectory, also used for the work and log layout.
  dir: string;
  // The one binary every command of this stage invokes.
  tool: ToolName;
  inputs: readonly ChannelName[];
  requires: readonly ResourceField[];
  outputs: readonly StageOutputDecl[];
  commands(ctx: StageContext): StageCommand[];
}

/** One file bound to a channel for one run key. Write-once. */
export interface BoundArtifact {
  channel: ChannelName;
  key: RunKey;
  path: string;
  producer: string;
}
