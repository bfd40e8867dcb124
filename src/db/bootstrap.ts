import { promises as fs } from "fs";
import { fileURLToPath } from "url";
import type * as pg from "pg";

// src/db from sources, dist/src/db once built.
const SCHEMA_CANDIDATES = ["../../db/schema.sql", "../../../db/schema.sql"].map((rel) =>
  fileURLToPath(new URL(rel, import.meta.url))
);

export async function defaultSchemaPath(): Promise<string> {
  for (const candidate of SCHEMA_CANDIDATES) {
    try {
      await fs.access(candidate);
      return candidate;
    } catch {
      continue;
    }
  }
  throw new Error(`ledger schema not found (looked in ${SCHEMA_CANDIDATES.join(", ")})`);
}

export async function applySqlFile(pool: pg.Pool, filePath?: string): Promise<void> {
  const sql = await fs.readFile(filePath ?? (await defaultSchemaPath()), "utf8");
  if (!sql.trim()) return;
  await pool.query(sql);
}
