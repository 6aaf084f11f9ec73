import { drizzle } from 'drizzle-orm/node-postgres';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import pg from 'pg';
import { config } from '../config/index.js';
import * as schema from './schema/index.js';

const { Pool } = pg;

/**
 * Any Drizzle Postgres database carrying our schema. The server runs on
 * node-postgres; tests hand services an in-process PGlite instance.
 */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;

export function createPool(connectionString: string = config.databaseUrl): pg.Pool {
  return new Pool({ connectionString });
}

export function createDatabase(pool: pg.Pool): Database {
  return drizzle(pool, { schema });
}
