import * as pg from "pg";
import { newDb } from "pg-mem";
import { Kysely, PostgresDialect } from "kysely";
import type { DB } from "./types.js";

export function createPgPool(databaseUrl: string): pg.Pool {
  return new pg.Pool({ connectionString: databaseUrl });
}

/** In-process Postgres stand-in, used when no DATABASE_URL is configured. */
export function createMemoryPool(): pg.Pool {
  const mem = newDb({ autoCreateForeignKeyIndices: true });
  const adapter = mem.adapters.createPg();
  return new adapter.Pool() as unknown as pg.Pool;
}

export function createLedgerPool(databaseUrl: string | undefined): { pool: pg.Pool; mode: "postgres" | "pg-mem" } {
  if (databaseUrl) return { pool: createPgPool(databaseUrl), mode: "postgres" };
  return { pool: createMemoryPool(), mode: "pg-mem" };
}

export function createDb(pool: pg.Pool): Kysely<DB> {
  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool })
  });
}
