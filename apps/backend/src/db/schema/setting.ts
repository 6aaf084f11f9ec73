import { pgTable, serial, varchar, timestamp } from 'drizzle-orm/pg-core';

// Settings table: append-only history of logo changes.
// The current logo is the row with the greatest id.
export const settings = pgTable('settings', {
  id: serial('id').primaryKey(),
  logoFilename: varchar('logo_filename', { length: 512 }).notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
});

export type SettingRow = typeof settings.$inferSelect;
