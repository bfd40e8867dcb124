import { promises as fs } from "fs";
import path from "path";
import type { ResourceField } from "../config/resourceTables.js";
import { requireResource, type ResourceBundle } from "../config/resolveResources.js";
import type { PipelineSettings, StageAllocation } from "../config/settings.js";
import { errorMessage, ExternalToolFailure, MissingStageOutput, MissingUpstreamArtifact } from "../core/errors.js";
import type { RunKey } from "../core/ids.js";
import type { ExecutionResult, RunnerBackend, ToolInvocation } from "../execution/backends/types.js";
import type { PipelineWorkspace } from "../execution/workspace.js";
import type { StageRun } from "../runs/stageRun.js";
import type { BoundArtifact, ChannelName, StageContext, StageDefinition } from "./types.js";

export interface StageExecution {
  outputs: BoundArtifact[];
  logPath: string;
}

async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    const st = await fs.lstat(filePath);
    return st.isFile();
  } catch {
    return false;
  }
}

function renderArgv(argv: string[]): string {
  return argv.map((a) => (/^[A-Za-z0-9_./:=,+@%-]+$/.test(a) ? a : JSON.stringify(a))).join(" ");
}

export class StageExecutor {
  constructor(
    private readonly deps: {
      settings: PipelineSettings;
      backend: RunnerBackend;
      resources: ResourceBundle;
      workspace: PipelineWorkspace;
      keepIntermediates: boolean;
    }
  ) {}

  allocation(stage: StageDefinition): StageAllocation {
    return this.deps.settings.stageAllocation(stage.name);
  }

  logPathFor(stage: StageDefinition, key: RunKey): string {
    return this.deps.workspace.logPath(stage.dir, key);
  }

  private context(stage: StageDefinition, key: RunKey, inputs: Record<ChannelName, BoundArtifact>): StageContext {
    const alloc = this.allocation(stage);
    const resources = this.deps.resources;
    return {
      key,
      resources,
      cpus: alloc.cpus,
      memoryMb: alloc.memoryMb,
      input: (channel: ChannelName) => {
        const artifact = inputs[channel];
        if (!artifact) throw new MissingUpstreamArtifact(stage.name, key, channel);
        return artifact.path;
      },
      resource: (field: ResourceField) => requireResource(resources, field),
      output: (channel: ChannelName) => {
        const decl = stage.outputs.find((o) => o.channel === channel);
        if (!decl) throw new Error(`${stage.name} declares no output channel ${channel}`);
        return decl.fileName(key);
      }
    };
  }

  /**
   * Runs one stage instance to completion: every command in order, then output verification
   * and publishing. Records start, success and failure on `run`.
   */
  async execute(
    run: StageRun,
    stage: StageDefinition,
    key: RunKey,
    inputs: Record<ChannelName, BoundArtifact>
  ): Promise<StageExecution> {
    const ws = this.deps.workspace;
    const alloc = this.allocation(stage);
    const logPath = this.logPathFor(stage, key);
    const log: string[] = [];

    await run.start();
    try {
      for (const channel of stage.inputs) {
        const artifact = inputs[channel];
        if (!artifact) throw new MissingUpstreamArtifact(stage.name, key, channel);
        await run.linkInput(channel, artifact.path);
      }

      const workDir = await ws.freshInstanceDir(stage.dir, key);
      const commands = stage.commands(this.context(stage, key, inputs));
      await fs.mkdir(path.dirname(logPath), { recursive: true });
      await run.setLogPath(logPath);

      try {
        for (const command of commands) {
          const prefix = this.deps.settings.toolArgv(stage.tool);
          const invocation: ToolInvocation = {
            tool: stage.tool,
            argv: [...prefix, ...command.args],
            args: command.args,
            cwd: workDir
          };
          if (command.stdoutTo) invocation.stdoutPath = path.join(workDir, command.stdoutTo);

          log.push(`$ ${renderArgv(invocation.argv)}${command.stdoutTo ? ` > ${command.stdoutTo}` : ""}`);
          await run.event("exec.command", stage.tool, { argv: invocation.argv, cwd: workDir });

          let result: ExecutionResult;
          try {
            result = await this.deps.backend.execute(invocation, { threads: alloc.cpus, memoryMb: alloc.memoryMb });
          } catch (err) {
            // Could not start the tool at all (e.g. ENOENT); reported like a shell would.
            const stderr = errorMessage(err);
            log.push(`[exit 127]`, stderr);
            throw new ExternalToolFailure(stage.name, key, 127, invocation.argv, "", stderr);
          }

          log.push(`[exit ${result.exitCode}] started=${result.startedAt} finished=${result.finishedAt}`);
          if (result.stdout) log.push("--- stdout ---", result.stdout.trimEnd());
          if (result.stderr) log.push("--- stderr ---", result.stderr.trimEnd());
          await run.event("exec.result", `exit=${result.exitCode}`, {
            backend: this.deps.backend.kind,
            started_at: result.startedAt,
            finished_at: result.finishedAt,
            stderr: result.stderr.slice(-4096)
          });

          if (result.exitCode !== 0) {
            throw new ExternalToolFailure(stage.name, key, result.exitCode, invocation.argv, result.stdout, result.stderr);
          }
        }
      } finally {
        await fs.writeFile(logPath, log.join("\n") + "\n", "utf8");
      }

      const outputs: BoundArtifact[] = [];
      for (const decl of stage.outputs) {
        const fileName = decl.fileName(key);
        const filePath = path.join(workDir, fileName);
        if (!(await isRegularFile(filePath))) {
          throw new MissingStageOutput(stage.name, key, decl.channel, filePath);
        }

        let publishedPath: string | null = null;
        if (decl.publish === "always" || this.deps.keepIntermediates) {
          publishedPath = ws.resultPath(stage.dir, fileName);
          await fs.mkdir(path.dirname(publishedPath), { recursive: true });
          await fs.copyFile(filePath, publishedPath);
        }

        await run.linkOutput(decl.channel, filePath, publishedPath);
        outputs.push({ channel: decl.channel, key, path: filePath, producer: stage.name });
      }

      await run.finishSuccess();
      return { outputs, logPath };
    } catch (err) {
      await run.finishFailure(errorMessage(err), err instanceof ExternalToolFailure ? err.exitCode : null);
      throw err;
    }
  }
}
