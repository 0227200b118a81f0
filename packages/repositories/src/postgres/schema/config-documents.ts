import { pgTable, text, timestamp } from 'drizzle-orm/pg-core';

/**
 * Config documents table - one row per config scope owner.
 */
export const configDocuments = pgTable('config_documents', {
  ownerId: text('owner_id').primaryKey(), // "patchwork", or a participant's manifest id
  content: text('content').notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});
