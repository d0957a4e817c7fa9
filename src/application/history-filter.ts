import { z } from 'zod';
import type { JournalEvent } from '../domain/index.js';
import { isValidPath, isWithinPath } from '../domain/index.js';

export const attributeValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const pathSchema = z.string().refine(isValidPath, { message: 'Must be a valid journal path' });

/**
 * Structured predicate over journal events.
 *
 * Every provided field must hold; an empty filter matches everything.
 * This is the only search language exposed to administrators.
 */
export const historyFilterSchema = z.object({
  path: pathSchema.optional(),
  path_prefix: pathSchema.optional(),
  scope: z.string().min(1).nullable().optional(),
  icon: z.string().min(1).optional(),
  content_contains: z.string().min(1).optional(),
  attributes: z.record(z.string(), attributeValueSchema).optional(),
  has_attributes: z.array(z.string().min(1)).optional(),
}).strict();

export type HistoryFilter = z.infer<typeof historyFilterSchema>;

export type EventPredicate = (event: JournalEvent) => boolean;

/** Turns a validated filter into a predicate. */
export function compileHistoryFilter(filter: HistoryFilter): EventPredicate {
  const needle = filter.content_contains?.toLowerCase();
  const expected = filter.attributes === undefined ? [] : Object.entries(filter.attributes);
  const required = filter.has_attributes ?? [];

  return (event) => {
    if (filter.path !== undefined && event.path !== filter.path) return false;
    if (filter.path_prefix !== undefined && !isWithinPath(event.path, filter.path_prefix)) return false;
    if (filter.scope !== undefined && event.scope !== filter.scope) return false;
    if (filter.icon !== undefined && event.icon !== filter.icon) return false;
    if (needle !== undefined && !event.content.toLowerCase().includes(needle)) return false;

    for (const [key, value] of expected) {
      if (!Object.hasOwn(event.attributes, key) || event.attributes[key] !== value) return false;
    }
    for (const key of required) {
      if (!Object.hasOwn(event.attributes, key)) return false;
    }
    return true;
  };
}
