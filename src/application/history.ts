import type { JournalEvent } from '../domain/index.js';
import type { EventPredicate, HistoryFilter } from './history-filter.js';
import { compileHistoryFilter } from './history-filter.js';

export const DEFAULT_QUERY_LIMIT = 20;

export interface HistoryQuery {
  /** `null` selects global events; omitted means any scope. */
  scope?: string | null;
  limit?: number;
  filter?: HistoryFilter;
  /** Extra in-process predicate, applied after `filter`. */
  where?: EventPredicate;
}

/**
 * Append-only replay buffer of journal events.
 *
 * Unbounded when `capacity` is undefined. Bounded histories are a ring
 * buffer: once full, each append overwrites the oldest entry, so append
 * stays O(1). Iteration is newest-first.
 */
export class JournalHistory implements Iterable<JournalEvent> {
  private readonly entries: JournalEvent[] = [];
  /** Index of the oldest entry once a bounded buffer has wrapped. */
  private head = 0;
  readonly capacity: number | undefined;

  constructor(capacity?: number) {
    if (capacity !== undefined && (!Number.isInteger(capacity) || capacity < 1)) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  append(event: JournalEvent): void {
    if (this.capacity === undefined || this.entries.length < this.capacity) {
      this.entries.push(event);
      return;
    }
    this.entries[this.head] = event;
    this.head = (this.head + 1) % this.capacity;
  }

  get size(): number {
    return this.entries.length;
  }

  clear(): void {
    this.entries.length = 0;
    this.head = 0;
  }

  *[Symbol.iterator](): Iterator<JournalEvent> {
    const count = this.entries.length;
    for (let i = 1; i <= count; i++) {
      const event = this.entries[(this.head - i + count) % count];
      if (event !== undefined) yield event;
    }
  }

  /** Newest-first matches, capped at `limit` (default 20). */
  query(params: HistoryQuery = {}): JournalEvent[] {
    const limit = params.limit ?? DEFAULT_QUERY_LIMIT;
    const predicate = params.filter === undefined ? undefined : compileHistoryFilter(params.filter);
    const matched: JournalEvent[] = [];

    if (limit <= 0) return matched;

    for (const event of this) {
      if (params.scope !== undefined && event.scope !== params.scope) continue;
      if (predicate !== undefined && !predicate(event)) continue;
      if (params.where !== undefined && !params.where(event)) continue;

      matched.push(event);
      if (matched.length >= limit) break;
    }

    return matched;
  }
}
