import {
  pgTable,
  uuid,
  varchar,
  boolean,
  integer,
  timestamp,
  primaryKey,
  index,
} from 'drizzle-orm/pg-core';
import { users } from './user.js';
import { files } from './file.js';

// Bundles table: a named set of one owner's files shared under its own token.
export const bundles = pgTable(
  'bundles',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    name: varchar('name', { length: 255 }).notNull(),
    transactionNumber: varchar('transaction_number', { length: 255 }).notNull(),
    userId: uuid('user_id')
      .notNull()
      .references(() => users.id),
    isPublic: boolean('is_public').notNull().default(false),
    shareToken: varchar('share_token', { length: 64 }).notNull().unique(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    downloadCount: integer('download_count').notNull().default(0),
  },
  (table) => [
    index('bundles_share_token_idx').on(table.shareToken),
    index('bundles_user_id_idx').on(table.userId),
  ],
);

// BundleFiles join table: membership only, no payload.
// ON DELETE CASCADE on both sides: deleting a bundle or a file removes its rows.
export const bundleFiles = pgTable(
  'bundle_files',
  {
    bundleId: uuid('bundle_id')
      .notNull()
      .references(() => bundles.id, { onDelete: 'cascade' }),
    fileId: uuid('file_id')
      .notNull()
      .references(() => files.id, { onDelete: 'cascade' }),
  },
  (table) => [
    primaryKey({ columns: [table.bundleId, table.fileId] }),
    index('bundle_files_file_id_idx').on(table.fileId),
  ],
);

export type BundleRow = typeof bundles.$inferSelect;
export type NewBundleRow = typeof bundles.$inferInsert;
export type BundleFileRow = typeof bundleFiles.$inferSelect;
