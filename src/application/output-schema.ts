import { z } from 'zod';
import { attributeValueSchema, historyFilterSchema } from './history-filter.js';

/**
 * Request schemas for the administrative surface.
 *
 * Paths are only checked for presence here; their format is enforced by
 * the domain (PathFormatError) so every entry point rejects them alike.
 */

const scopeSchema = z.string().min(1).max(255).nullable().optional().default(null);
const destinationIdSchema = z.string().min(1).max(255);
const pathSchema = z.string().min(1).max(1024);

export const addOutputSchema = z.object({
  scope: scopeSchema,
  destination_id: destinationIdSchema,
  path: pathSchema,
  recursive: z.boolean().optional().default(true),
});

export type AddOutputInput = z.infer<typeof addOutputSchema>;

export const removeOutputSchema = z.object({
  scope: scopeSchema,
  destination_id: destinationIdSchema,
  path: pathSchema,
});

export type RemoveOutputInput = z.infer<typeof removeOutputSchema>;

export const moveOutputSchema = z.object({
  scope: scopeSchema,
  from_destination_id: destinationIdSchema,
  to_destination_id: destinationIdSchema,
  path: pathSchema,
  recursive: z.boolean().optional().default(true),
});

export type MoveOutputInput = z.infer<typeof moveOutputSchema>;

export const sendEventSchema = z.object({
  path: pathSchema,
  scope: scopeSchema,
  content: z.string().min(1).max(4000),
  attributes: z.record(z.string(), attributeValueSchema).optional().default({}),
});

export type SendEventInput = z.infer<typeof sendEventSchema>;

export const findEventsSchema = z.object({
  scope: z.string().min(1).max(255).nullable().optional(),
  limit: z.number().int().min(1).max(500).optional().default(20),
  filter: historyFilterSchema.optional().default({}),
});

export type FindEventsInput = z.infer<typeof findEventsSchema>;
