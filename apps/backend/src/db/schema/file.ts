import {
  pgTable,
  uuid,
  varchar,
  text,
  boolean,
  integer,
  bigint,
  timestamp,
  index,
} from 'drizzle-orm/pg-core';
import { users } from './user.js';

// Files table: one row per uploaded blob.
// storageName is the blob key on disk and never leaves the server.
// shareToken is issued at upload and never changes.
export const files = pgTable(
  'files',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    storageName: varchar('storage_name', { length: 512 }).notNull().unique(),
    originalFilename: varchar('original_filename', { length: 255 }).notNull(),
    userId: uuid('user_id')
      .notNull()
      .references(() => users.id),
    isPublic: boolean('is_public').notNull().default(false),
    shareToken: varchar('share_token', { length: 64 }).notNull().unique(),
    uploadedAt: timestamp('uploaded_at', { withTimezone: true }).defaultNow().notNull(),
    sizeBytes: bigint('size_bytes', { mode: 'number' }).notNull(),
    // Lowercase extension without the dot
    fileType: varchar('file_type', { length: 32 }).notNull(),
    downloadCount: integer('download_count').notNull().default(0),
    transactionNumber: text('transaction_number'),
  },
  (table) => [
    // Anonymous access is keyed by token
    index('files_share_token_idx').on(table.shareToken),
    // Dashboard listing
    index('files_user_id_idx').on(table.userId),
  ],
);

export type FileRow = typeof files.$inferSelect;
export type NewFileRow = typeof files.$inferInsert;
