import { eq, sql } from 'drizzle-orm';
import { pgSchema, text } from 'drizzle-orm/pg-core';
import type { Database } from './index.js';

const informationSchema = pgSchema('information_schema');
const catalogTables = informationSchema.table('tables', {
  tableName: text('table_name').notNull(),
  tableSchema: text('table_schema').notNull(),
});

// Mirrors ./schema. Every statement is idempotent so bootstrap can run on
// each start.
const statements = [
  `CREATE TABLE IF NOT EXISTS users (
    id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
    username VARCHAR(64) NOT NULL UNIQUE,
    email VARCHAR(255) NOT NULL UNIQUE,
    password_hash TEXT NOT NULL,
    created_at TIMESTAMPTZ NOT NULL DEFAULT now()
  )`,
  `CREATE TABLE IF NOT EXISTS files (
    id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
    storage_name VARCHAR(512) NOT NULL UNIQUE,
    original_filename VARCHAR(255) NOT NULL,
    user_id UUID NOT NULL REFERENCES users(id),
    is_public BOOLEAN NOT NULL DEFAULT false,
    share_token VARCHAR(64) NOT NULL UNIQUE,
    uploaded_at TIMESTAMPTZ NOT NULL DEFAULT now(),
    size_bytes BIGINT NOT NULL,
    file_type VARCHAR(32) NOT NULL,
    download_count INTEGER NOT NULL DEFAULT 0,
    transaction_number TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS bundles (
    id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
    name VARCHAR(255) NOT NULL,
    transaction_number VARCHAR(255) NOT NULL,
    user_id UUID NOT NULL REFERENCES users(id),
    is_public BOOLEAN NOT NULL DEFAULT false,
    share_token VARCHAR(64) NOT NULL UNIQUE,
    created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
    download_count INTEGER NOT NULL DEFAULT 0
  )`,
  `CREATE TABLE IF NOT EXISTS bundle_files (
    bundle_id UUID NOT NULL REFERENCES bundles(id) ON DELETE CASCADE,
    file_id UUID NOT NULL REFERENCES files(id) ON DELETE CASCADE,
    PRIMARY KEY (bundle_id, file_id)
  )`,
  `CREATE TABLE IF NOT EXISTS settings (
    id SERIAL PRIMARY KEY,
    logo_filename VARCHAR(512) NOT NULL,
    updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
  )`,
  `CREATE INDEX IF NOT EXISTS users_username_idx ON users(username)`,
  `CREATE INDEX IF NOT EXISTS users_email_idx ON users(email)`,
  `CREATE INDEX IF NOT EXISTS files_share_token_idx ON files(share_token)`,
  `CREATE INDEX IF NOT EXISTS files_user_id_idx ON files(user_id)`,
  `CREATE INDEX IF NOT EXISTS bundles_share_token_idx ON bundles(share_token)`,
  `CREATE INDEX IF NOT EXISTS bundles_user_id_idx ON bundles(user_id)`,
  `CREATE INDEX IF NOT EXISTS bundle_files_file_id_idx ON bundle_files(file_id)`,
];

export const REQUIRED_TABLES = ['users', 'files', 'bundles', 'bundle_files', 'settings'] as const;

export async function bootstrapSchema(db: Database): Promise<void> {
  await db.transaction(async (tx) => {
    for (const statement of statements) {
      await tx.execute(sql.raw(statement));
    }
  });
}

/** Names of required tables missing from the public schema. */
export async function findMissingTables(db: Database): Promise<string[]> {
  const rows = await db
    .select({ tableName: catalogTables.tableName })
    .from(catalogTables)
    .where(eq(catalogTables.tableSchema, 'public'));
  const present = new Set(rows.map((row) => row.tableName));
  return REQUIRED_TABLES.filter((table) => !present.has(table));
}
