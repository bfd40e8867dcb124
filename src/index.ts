#!/usr/bin/env node
import { CliUsageError, parseCliArgs, usage } from "./cli/args.js";
import { loadResourceTables } from "./config/resourceTables.js";
import { PipelineSettings } from "./config/settings.js";
import { errorMessage } from "./core/errors.js";
import { applySqlFile } from "./db/bootstrap.js";
import { createDb, createMemoryPool, createPgPool } from "./db/connection.js";
import { runVariantPipeline } from "./pipeline.js";
import { PostgresStore } from "./store/postgresStore.js";
import { PIPELINE_NAME, PIPELINE_VERSION } from "./version.js";

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(usage());
    return;
  }

  const configPath = args.configPath ?? process.env.VARIANTFLOW_CONFIG ?? "config/pipeline.yaml";
  const resourcesPath = args.resourcesPath ?? process.env.VARIANTFLOW_RESOURCES ?? "config/resources.yaml";
  const autoSchema = (process.env.AUTO_SCHEMA ?? "true").toLowerCase() !== "false";

  let settings = await PipelineSettings.loadFromFile(configPath);
  if (args.backend) settings = settings.withBackend(args.backend);
  if (args.maxCpus !== null) settings = settings.withMaxCpus(args.maxCpus);
  const tables = await loadResourceTables(resourcesPath);

  const url = process.env.DATABASE_URL;
  const pool = url ? createPgPool(url) : createMemoryPool();
  const db = createDb(pool);

  try {
    if (!url || autoSchema) await applySqlFile(pool);
    const store = new PostgresStore(db);
    process.stderr.write(`${PIPELINE_NAME} ${PIPELINE_VERSION}\n`);
    const summary = await runVariantPipeline(
      {
        reads: args.reads,
        genome: args.genome,
        kit: args.kit,
        overrides: args.overrides,
        snpEffDatabase: args.snpEffDatabase,
        outDir: args.outDir,
        keepIntermediates: args.keepIntermediates,
        keepWork: args.keepWork
      },
      { settings, tables, store, progress: (line) => process.stderr.write(`${line}\n`) }
    );

    for (const w of summary.warnings) console.error(`warning: ${w}`);
    for (const k of summary.keys) {
      console.error(k.status === "succeeded" ? `${k.key}: ok` : `${k.key}: FAILED at ${k.failedStage}: ${errorMessage(k.error)}`);
    }
    if (summary.report) console.error(`report: ${summary.report.reportPath}`);
    console.error(`run ${summary.runId} ${summary.status}`);
    if (summary.status !== "succeeded") process.exitCode = 1;
  } finally {
    await db.destroy();
  }
}

main().catch((err) => {
  console.error(err instanceof CliUsageError ? err.message : errorMessage(err));
  process.exitCode = 1;
});
