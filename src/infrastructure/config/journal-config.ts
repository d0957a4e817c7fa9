import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError, isValidPath } from '../../domain/index.js';

const destinationIdSchema = z.string().min(1).max(255);

export const destinationConfigSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('slack'),
    id: destinationIdSchema,
    webhook_url: z.string().url(),
  }),
  z.object({
    kind: z.literal('redis'),
    id: destinationIdSchema,
    channel: z.string().min(1),
  }),
  z.object({
    kind: z.literal('file'),
    id: destinationIdSchema,
    file_path: z.string().min(1),
  }),
]);

export type DestinationConfig = z.infer<typeof destinationConfigSchema>;

/**
 * Schema for config/journal.json. Every section is optional and falls
 * back to the defaults below.
 */
export const journalConfigSchema = z.object({
  journal_root: z.string().refine(isValidPath, { message: 'Must be a valid journal path' }).default('/journal'),
  history: z.object({
    /** `null` keeps every event for the life of the process. */
    capacity: z.number().int().min(1).nullable().default(1000),
  }).default({}),
  dispatch: z.object({
    delivery: z.enum(['sequential', 'concurrent']).default('sequential'),
    shutdown_grace_ms: z.number().int().min(0).default(5000),
  }).default({}),
  render: z.object({
    attributes: z.boolean().default(true),
  }).default({}),
  storage: z.object({
    driver: z.enum(['memory', 'postgres']).default('memory'),
  }).default({}),
  destinations: z.array(destinationConfigSchema).default([]).superRefine((destinations, ctx) => {
    const seen = new Set<string>();
    for (const [index, destination] of destinations.entries()) {
      if (seen.has(destination.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'id'],
          message: `Duplicate destination id '${destination.id}'`,
        });
      }
      seen.add(destination.id);
    }
  }),
});

export type JournalConfig = z.infer<typeof journalConfigSchema>;

export const DEFAULT_CONFIG: JournalConfig = journalConfigSchema.parse({});

/**
 * Loads the journal configuration.
 *
 * A missing file yields DEFAULT_CONFIG. A file that exists but is not
 * valid JSON or does not match the schema is a startup error.
 */
export function loadJournalConfig(configPath?: string): JournalConfig {
  const filePath = configPath
    ?? process.env['JOURNAL_CONFIG']
    ?? resolve(process.cwd(), 'config', 'journal.json');

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return journalConfigSchema.parse({});
    }
    throw new ConfigError(`Cannot read journal config at ${filePath}`, { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err: unknown) {
    throw new ConfigError(`Journal config at ${filePath} is not valid JSON`, { cause: err });
  }

  const parsed = journalConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid journal config at ${filePath}: ${issues}`);
  }

  return parsed.data;
}
