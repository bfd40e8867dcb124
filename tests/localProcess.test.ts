import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import os from "os";
import path from "path";
import { LocalProcessRunner } from "../src/execution/backends/localProcess.js";
import { rejected } from "./helpers.js";

describe("LocalProcessRunner", () => {
  const runner = new LocalProcessRunner();
  let dir = "";

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "variantflow-local-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const node = (script: string, stdoutPath?: string) => {
    const args = ["-e", script];
    return runner.execute(
      { tool: "gatk", argv: [process.execPath, ...args], args, cwd: dir, ...(stdoutPath ? { stdoutPath } : {}) },
      { threads: 3, memoryMb: null }
    );
  };

  it("captures output, exit code and thread environment", async () => {
    const res = await node("process.stdout.write(process.env.OMP_NUM_THREADS); process.stderr.write('warn'); process.exit(3)");
    expect(res).toMatchObject({ exitCode: 3, stdout: "3", stderr: "warn" });
  });

  it("runs in the invocation's directory", async () => {
    const res = await node("process.stdout.write(process.cwd())");
    expect(path.basename(res.stdout)).toBe(path.basename(dir));
  });

  it("streams stdout to a file when asked", async () => {
    const target = path.join(dir, "out.vcf");
    const res = await node("process.stdout.write('##fileformat=VCFv4.2\\n')", target);
    expect(res.exitCode).toBe(0);
    expect(res.stdout).toBe(`[stdout written to ${target}]\n`);
    expect(await readFile(target, "utf8")).toBe("##fileformat=VCFv4.2\n");
  });

  it("rejects when the stdout file cannot be opened", async () => {
    const target = path.join(dir, "missing", "out.vcf");
    const err = await rejected(node("process.stdout.write('x'); setTimeout(() => undefined, 2000)", target));
    expect(err).toHaveProperty("code", "ENOENT");
    expect(err).toHaveProperty("path", target);
  });

  it("rejects when the executable cannot be started", async () => {
    const err = await rejected(
      runner.execute(
        { tool: "gatk", argv: ["variantflow-no-such-binary"], args: [], cwd: dir },
        { threads: 1, memoryMb: null }
      )
    );
    expect(err).toHaveProperty("code", "ENOENT");
  });
});
