import { spawn } from "child_process";
import { createWriteStream } from "fs";
import { finished } from "stream/promises";
import type { ExecutionResources, ExecutionResult, RunnerBackend, ToolInvocation } from "./types.js";

const MAX_CAPTURE_BYTES = 1024 * 1024;

function appendLimited(chunks: Buffer[], chunk: Buffer, state: { bytes: number; truncated: boolean }): void {
  if (state.truncated) return;
  const next = state.bytes + chunk.byteLength;
  if (next > MAX_CAPTURE_BYTES) {
    const keep = Math.max(0, MAX_CAPTURE_BYTES - state.bytes);
    if (keep > 0) chunks.push(chunk.subarray(0, keep));
    state.bytes = MAX_CAPTURE_BYTES;
    state.truncated = true;
    return;
  }
  chunks.push(chunk);
  state.bytes = next;
}

export class LocalProcessRunner implements RunnerBackend<"local_process"> {
  readonly kind = "local_process" as const;

  async execute(invocation: ToolInvocation, resources: ExecutionResources): Promise<ExecutionResult> {
    const [command, ...args] = invocation.argv;
    if (!command) throw new Error("local_process argv must be non-empty");
    const startedAt = new Date().toISOString();

    const threads = String(resources.threads);
    const child = spawn(command, args, {
      cwd: invocation.cwd,
      env: {
        ...process.env,
        OMP_NUM_THREADS: threads,
        OPENBLAS_NUM_THREADS: threads,
        ...invocation.env
      },
      stdio: ["ignore", "pipe", "pipe"] as const
    });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    const stdoutState = { bytes: 0, truncated: false };
    const stderrState = { bytes: 0, truncated: false };

    const stdoutFile = invocation.stdoutPath ? createWriteStream(invocation.stdoutPath) : null;
    if (stdoutFile) {
      child.stdout.pipe(stdoutFile);
    } else {
      child.stdout.on("data", (chunk: Buffer) => appendLimited(stdoutChunks, chunk, stdoutState));
    }
    child.stderr.on("data", (chunk: Buffer) => appendLimited(stderrChunks, chunk, stderrState));

    let exitCode: number;
    try {
      exitCode = await new Promise<number>((resolve, reject) => {
        child.on("error", reject);
        stdoutFile?.on("error", reject);
        child.on("close", (code: number | null, signal: NodeJS.Signals | null) => {
          if (code !== null) resolve(code);
          else resolve(signal ? 128 : 1);
        });
      });
    } catch (err) {
      stdoutFile?.destroy();
      if (child.exitCode === null && child.signalCode === null) child.kill();
      throw err;
    }
    if (stdoutFile) await finished(stdoutFile);

    const finishedAt = new Date().toISOString();

    const stdout = stdoutFile
      ? `[stdout written to ${invocation.stdoutPath}]\n`
      : Buffer.concat(stdoutChunks).toString("utf8") + (stdoutState.truncated ? "\n[stdout truncated]\n" : "");
    const stderr = Buffer.concat(stderrChunks).toString("utf8") + (stderrState.truncated ? "\n[stderr truncated]\n" : "");

    return { exitCode, stdout, stderr, startedAt, finishedAt };
  }
}
