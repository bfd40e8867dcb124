import { promises as fs } from "fs";
import path from "path";
import type { RunKey } from "../core/ids.js";

export interface PipelineWorkspace {
  outDir: string;
  workDir: string;
  infoDir: string;
  resultDir(stageDir: string): string;
  resultPath(stageDir: string, name: string): string;
  logPath(stageDir: string, key: RunKey): string;
  // Creates an empty work directory for one stage instance, clearing leftovers from earlier runs.
  freshInstanceDir(stageDir: string, key: RunKey): Promise<string>;
  removeWorkDir(): Promise<void>;
}

function safeJoin(baseDir: string, name: string): string {
  const joined = path.join(baseDir, name);
  const rel = path.relative(baseDir, joined);
  if (rel.startsWith("..") || path.isAbsolute(rel)) {
    throw new Error(`unsafe workspace path: ${name}`);
  }
  return joined;
}

export async function createPipelineWorkspace(outDir: string): Promise<PipelineWorkspace> {
  const root = path.resolve(outDir);
  const workDir = path.join(root, "work");
  const infoDir = path.join(root, "pipeline_info");

  await fs.mkdir(workDir, { recursive: true });
  await fs.mkdir(infoDir, { recursive: true });

  const resultDir = (stageDir: string) => safeJoin(root, stageDir);

  return {
    outDir: root,
    workDir,
    infoDir,
    resultDir,
    resultPath: (stageDir: string, name: string) => safeJoin(resultDir(stageDir), name),
    logPath: (stageDir: string, key: RunKey) => safeJoin(safeJoin(resultDir(stageDir), "logs"), `${key}.log`),
    freshInstanceDir: async (stageDir: string, key: RunKey) => {
      const dir = safeJoin(safeJoin(workDir, stageDir), key);
      await fs.rm(dir, { recursive: true, force: true });
      await fs.mkdir(dir, { recursive: true });
      return dir;
    },
    removeWorkDir: async () => {
      await fs.rm(workDir, { recursive: true, force: true });
    }
  };
}
