import { pgTable, uuid, varchar, text, timestamp, index } from 'drizzle-orm/pg-core';

// Users table: accounts that own files and bundles.
// Users are never deleted, so owner FKs elsewhere do not cascade.
export const users = pgTable(
  'users',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    username: varchar('username', { length: 64 }).notNull().unique(),
    // Stored lower-cased
    email: varchar('email', { length: 255 }).notNull().unique(),
    passwordHash: text('password_hash').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    // Login accepts either identifier
    index('users_username_idx').on(table.username),
    index('users_email_idx').on(table.email),
  ],
);

export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;
