import type { BackendKind, ToolName } from "../../config/settings.js";

export interface ExecutionResources {
  threads: number;
  memoryMb: number | null;
}

export interface ExecutionResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  startedAt: string;
  finishedAt: string;
}

export interface ToolInvocation {
  tool: ToolName;
  // Full argv: the configured tool prefix followed by `args`.
  argv: string[];
  // The stage's own arguments, without the tool prefix.
  args: string[];
  cwd: string;
  // When set, stdout goes to this file instead of being captured.
  stdoutPath?: string;
  env?: Record<string, string>;
}

export interface RunnerBackend<K extends BackendKind = BackendKind> {
  kind: K;
  execute(invocation: ToolInvocation, resources: ExecutionResources): Promise<ExecutionResult>;
}
