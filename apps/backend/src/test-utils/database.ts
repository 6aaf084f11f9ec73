import { PGlite } from '@electric-sql/pglite';
import { sql } from 'drizzle-orm';
import { drizzle } from 'drizzle-orm/pglite';
import { bootstrapSchema } from '../db/bootstrap.js';
import type { Database } from '../db/index.js';
import * as schema from '../db/schema/index.js';
import { users } from '../db/schema/index.js';

// In-process Postgres for tests. One instance per test file; tables are
// truncated between tests.

export interface TestDatabase {
  db: Database;
  close(): Promise<void>;
}

export async function createTestDatabase(): Promise<TestDatabase> {
  const client = new PGlite();
  const db = drizzle(client, { schema });
  await bootstrapSchema(db);
  return {
    db,
    close: () => client.close(),
  };
}

export async function resetDatabase(db: Database): Promise<void> {
  await db.execute(
    sql`TRUNCATE bundle_files, bundles, files, settings, users RESTART IDENTITY CASCADE`,
  );
}

/** Insert a user directly, skipping password hashing. */
export async function insertUser(db: Database, username: string): Promise<{ id: string }> {
  const [row] = await db
    .insert(users)
    .values({
      username,
      email: `${username}@example.com`,
      passwordHash: 'not-a-real-hash',
    })
    .returning({ id: users.id });
  if (!row) {
    throw new Error(`Failed to insert test user ${username}`);
  }
  return row;
}
