import type { AttributeValue, JournalEvent } from '../domain/index.js';
import { assertValidPath, createJournalEvent, isWithinPath } from '../domain/index.js';
import type { HistoryQuery } from './history.js';
import type { Router } from './router.js';

/**
 * Producer-facing handle onto a shared router, bound to a root path.
 *
 * `send` takes the full event path verbatim; the root only scopes this
 * broadcaster's view of history.
 */
export class Broadcaster {
  readonly root: string;
  private readonly router: Router;

  constructor(router: Router, root: string) {
    assertValidPath(root);
    this.router = router;
    this.root = root;
  }

  /**
   * Builds an event and queues it. Returns before any delivery happens.
   *
   * @throws PathFormatError for a malformed path
   */
  send(
    path: string,
    scope: string | null,
    content: string,
    attributes: Record<string, AttributeValue> = {},
    icon: string | null = null,
  ): void {
    const event = createJournalEvent({ path, scope, content, attributes, icon });
    this.router.enqueue(event);
  }

  /** History entries at or under this broadcaster's root, newest first. */
  history(query: HistoryQuery = {}): JournalEvent[] {
    const where = query.where;
    return this.router.history.query({
      ...query,
      where: (event) => isWithinPath(event.path, this.root) && (where === undefined || where(event)),
    });
  }
}
