import { randomUUID } from 'node:crypto';
import { assertValidPath } from './path.js';

/**
 * Core domain types for a journal event.
 *
 * Events are produced by broadcasters and routed by path to output
 * listeners. They carry no framework dependencies.
 */

export type AttributeValue = string | number | boolean | null;

/** Free-form key/value attributes attached to an event. */
export type JournalAttributes = Readonly<Record<string, AttributeValue>>;

export interface JournalEvent {
  readonly event_id: string;
  readonly path: string;
  /** Tenant the event belongs to; `null` for global events. */
  readonly scope: string | null;
  readonly content: string;
  readonly attributes: JournalAttributes;
  readonly icon: string | null;
  readonly timestamp: string; // ISO-8601
}

export interface JournalEventInput {
  path: string;
  scope: string | null;
  content: string;
  attributes?: Record<string, AttributeValue>;
  icon?: string | null;
  timestamp?: string;
}

/**
 * Builds a frozen event. The path is validated, never rewritten.
 *
 * @throws PathFormatError
 */
export function createJournalEvent(input: JournalEventInput): JournalEvent {
  assertValidPath(input.path);

  return Object.freeze({
    event_id: randomUUID(),
    path: input.path,
    scope: input.scope,
    content: input.content,
    attributes: Object.freeze({ ...input.attributes }),
    icon: input.icon ?? null,
    timestamp: input.timestamp ?? new Date().toISOString(),
  });
}
