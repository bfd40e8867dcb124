import type { RunKey } from "./ids.js";

export type ConfigurationErrorCode =
  | "MissingKitConfig"
  | "MissingGenomeConfig"
  | "MissingResource"
  | "InvalidConfig"
  | "InvalidRunKey"
  | "NoInputFiles"
  | "DuplicateRunKey"
  | "InvalidGraph";

export class ConfigurationError extends Error {
  constructor(
    readonly code: ConfigurationErrorCode,
    readonly missing: string[],
    message: string
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class MissingUpstreamArtifact extends Error {
  constructor(
    readonly stage: string,
    readonly key: RunKey,
    readonly channel: string,
    message?: string
  ) {
    super(message ?? `${stage} [${key}]: input channel ${channel} was never bound`);
    this.name = "MissingUpstreamArtifact";
  }
}

export class ExternalToolFailure extends Error {
  constructor(
    readonly stage: string,
    readonly key: RunKey,
    readonly exitCode: number,
    readonly argv: string[],
    readonly stdout: string,
    readonly stderr: string
  ) {
    super(`${stage} [${key}]: ${argv[0] ?? "tool"} failed (exit ${exitCode})`);
    this.name = "ExternalToolFailure";
  }
}

export class MissingStageOutput extends Error {
  constructor(
    readonly stage: string,
    readonly key: RunKey,
    readonly channel: string,
    readonly filePath: string
  ) {
    super(`${stage} [${key}]: declared output ${channel} missing: ${filePath}`);
    this.name = "MissingStageOutput";
  }
}

export class VersionProbeFailure extends Error {
  constructor(readonly tool: string) {
    super(`no version string found for ${tool}`);
    this.name = "VersionProbeFailure";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
