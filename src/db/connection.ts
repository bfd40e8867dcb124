import * as pg from "pg";
import { newDb } from "pg-mem";
import { Kysely, PostgresDialect } from "kysely";
import type { DB } from "./types.js";

export function createPgPool(databaseUrl: string): pg.Pool {
  return new pg.Pool({ connectionString: databaseUrl });
}

/** Ledger for runs without DATABASE_URL: lives as long as the process. */
export function createMemoryPool(): pg.Pool {
  const mem = newDb({ autoCreateForeignKeyIndices: true });
  const adapter = mem.adapters.createPg();
  return new adapter.Pool() as unknown as pg.Pool;
}

export function createDb(pool: pg.Pool): Kysely<DB> {
  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool })
  });
}
