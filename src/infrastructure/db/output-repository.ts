import { randomUUID } from 'node:crypto';
import { and, eq, isNull } from 'drizzle-orm';
import type { Executor } from './client.js';
import { journalOutputs } from './schema.js';

/** Row shape returned by output queries. */
export type OutputRow = typeof journalOutputs.$inferSelect;

export interface OutputInput {
  scope: string | null;
  destination_id: string;
  path: string;
  recursive: boolean;
}

/** All outputs, or those of one scope (`null` = global only). */
export async function findOutputs(db: Executor, scope?: string | null): Promise<OutputRow[]> {
  const query = db.select().from(journalOutputs);
  if (scope === undefined) return query;
  return query.where(scope === null ? isNull(journalOutputs.scope) : eq(journalOutputs.scope, scope));
}

export async function findOutput(
  db: Executor,
  destinationId: string,
  path: string,
): Promise<OutputRow | undefined> {
  const rows = await db.select().from(journalOutputs).where(and(
    eq(journalOutputs.destination_id, destinationId),
    eq(journalOutputs.path, path),
  )).limit(1);
  return rows[0];
}

export async function insertOutput(db: Executor, input: OutputInput): Promise<void> {
  const now = new Date();
  await db.insert(journalOutputs).values({
    output_id: randomUUID(),
    scope: input.scope,
    destination_id: input.destination_id,
    path: input.path,
    recursive: input.recursive,
    created_at: now,
    updated_at: now,
  });
}

export async function updateOutput(db: Executor, input: OutputInput): Promise<void> {
  await db.update(journalOutputs).set({
    scope: input.scope,
    recursive: input.recursive,
    updated_at: new Date(),
  }).where(and(
    eq(journalOutputs.destination_id, input.destination_id),
    eq(journalOutputs.path, input.path),
  ));
}

export async function deleteOutput(db: Executor, destinationId: string, path: string): Promise<boolean> {
  const rows = await db.delete(journalOutputs).where(and(
    eq(journalOutputs.destination_id, destinationId),
    eq(journalOutputs.path, path),
  )).returning({ output_id: journalOutputs.output_id });
  return rows.length > 0;
}
