import { pgTable, uuid, varchar, boolean, timestamp, index, uniqueIndex } from 'drizzle-orm/pg-core';

/**
 * Drizzle schema for the `journal_outputs` table.
 *
 * One row per (destination_id, path). `scope` is the tenant that owns the
 * output, NULL for global outputs.
 */
export const journalOutputs = pgTable('journal_outputs', {
  output_id: uuid('output_id').primaryKey(),
  scope: varchar('scope', { length: 255 }),
  destination_id: varchar('destination_id', { length: 255 }).notNull(),
  path: varchar('path', { length: 1024 }).notNull(),
  recursive: boolean('recursive').notNull().default(true),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  uniqueIndex('uq_journal_outputs_destination_path').on(table.destination_id, table.path),
  index('idx_journal_outputs_scope').on(table.scope),
]);
