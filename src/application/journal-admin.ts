import type { Logger } from 'pino';
import type { Destination, JournalEvent } from '../domain/index.js';
import {
  RootBroadcastError,
  ROOT_PATH,
  UnknownDestinationError,
  assertValidPath,
  joinPath,
} from '../domain/index.js';
import type { Router } from './router.js';
import type { Broadcaster } from './broadcaster.js';
import type { OutputRecord, OutputStore } from './output-store.js';
import type { RenderOptions } from './channel-output-listener.js';
import { ChannelOutputListener } from './channel-output-listener.js';
import type {
  AddOutputInput,
  FindEventsInput,
  MoveOutputInput,
  RemoveOutputInput,
  SendEventInput,
} from './output-schema.js';

export const DEFAULT_JOURNAL_ROOT = '/journal';

/** Looks up configured destinations by id. */
export interface DestinationResolver {
  resolve(id: string): Destination | undefined;
}

export interface JournalAdminDeps {
  router: Router;
  store: OutputStore;
  destinations: DestinationResolver;
  log: Logger;
  /** Where output changes are announced. Defaults to `/journal`. */
  journalRoot?: string;
  render?: RenderOptions;
}

/**
 * Administrative use cases over outputs.
 *
 * Each change is written through to the store in one transaction, applied
 * to the router, and then announced under `<root>/channel/*`.
 */
export class JournalAdmin {
  private readonly router: Router;
  private readonly store: OutputStore;
  private readonly destinations: DestinationResolver;
  private readonly log: Logger;
  private readonly render: RenderOptions | undefined;
  private readonly journal: Broadcaster;

  constructor(deps: JournalAdminDeps) {
    this.router = deps.router;
    this.store = deps.store;
    this.destinations = deps.destinations;
    this.log = deps.log;
    this.render = deps.render;
    this.journal = deps.router.broadcaster(deps.journalRoot ?? DEFAULT_JOURNAL_ROOT);
  }

  /**
   * Rebuilds the registry from the store. Outputs whose destination is no
   * longer configured are skipped.
   */
  async loadOutputs(scope?: string | null): Promise<number> {
    this.log.info({ scope }, 'Loading journal outputs from store');
    const records = await this.store.listOutputs(scope);
    let loaded = 0;

    for (const record of records) {
      const destination = this.destinations.resolve(record.destination_id);
      if (destination === undefined) {
        this.log.warn(
          { destination: record.destination_id, path: record.path },
          'Stored journal output references an unknown destination, skipping',
        );
        continue;
      }

      this.log.info(
        { destination: destination.id, path: record.path, recursive: record.recursive },
        'Registering journal output',
      );
      this.router.register(this.createListener(record, destination));
      loaded++;
    }

    return loaded;
  }

  /**
   * Adds an output, or updates the recursive flag of an existing one.
   *
   * @throws PathFormatError
   * @throws UnknownDestinationError
   */
  async addOutput(input: AddOutputInput): Promise<OutputRecord> {
    assertValidPath(input.path);
    const destination = this.requireDestination(input.destination_id);
    const record: OutputRecord = {
      scope: input.scope,
      destination_id: destination.id,
      path: input.path,
      recursive: input.recursive,
    };

    this.log.info({ destination: destination.id, path: input.path }, 'Adding journal output');

    await this.store.transaction(async (tx) => {
      const existing = await tx.findOutput(destination.id, input.path);
      if (existing === undefined) {
        await tx.addOutput(record);
      } else {
        await tx.updateOutput(record);
      }
    });

    this.router.register(this.createListener(record, destination));

    this.journal.send(
      joinPath(this.journal.root, 'channel/add'),
      input.scope,
      `Added journal output to ${destination.id} for \`${input.path}\``,
      { destination: destination.id, path: input.path, recursive: input.recursive },
      'journal',
    );

    return record;
  }

  /**
   * Deletes the stored output and its live listener, if any. A stored output
   * whose destination is no longer configured has no listener but can still
   * be removed. Returns false when neither exists.
   */
  async removeOutput(input: RemoveOutputInput): Promise<boolean> {
    const listener = this.router.get(input.path, input.destination_id);

    this.log.info({ destination: input.destination_id, path: input.path }, 'Removing journal output');

    const stored = await this.store.transaction(async (tx) => {
      const existing = await tx.findOutput(input.destination_id, input.path);
      if (existing !== undefined) {
        await tx.deleteOutput(input.destination_id, input.path);
      }
      return existing;
    });

    if (stored === undefined && listener === undefined) return false;
    if (listener !== undefined) this.router.unregister(listener);

    this.journal.send(
      joinPath(this.journal.root, 'channel/remove'),
      stored?.scope ?? listener?.scope ?? input.scope,
      `Removed journal output from ${input.destination_id} for \`${input.path}\``,
      { destination: input.destination_id, path: input.path },
      'journal',
    );

    return true;
  }

  /**
   * Moves an output to another destination, keeping the scope it was stored
   * with. Returns false when the source output does not exist.
   *
   * @throws UnknownDestinationError for an unconfigured target
   */
  async moveOutput(input: MoveOutputInput): Promise<boolean> {
    const listener = this.router.get(input.path, input.from_destination_id);
    const stored = await this.store.findOutput(input.from_destination_id, input.path);
    if (stored === undefined && listener === undefined) return false;

    const target = this.requireDestination(input.to_destination_id);
    const record: OutputRecord = {
      scope: stored?.scope ?? listener?.scope ?? input.scope,
      destination_id: target.id,
      path: input.path,
      recursive: input.recursive,
    };

    this.log.info(
      { from: input.from_destination_id, to: target.id, path: input.path, scope: record.scope },
      'Moving journal output',
    );

    await this.store.transaction(async (tx) => {
      await tx.deleteOutput(input.from_destination_id, input.path);
      if (await tx.findOutput(target.id, input.path) === undefined) {
        await tx.addOutput(record);
      } else {
        await tx.updateOutput(record);
      }
    });

    if (listener === undefined) {
      this.router.register(this.createListener(record, target));
    } else {
      this.router.relocate(listener, target);
      if (listener.recursive !== record.recursive || listener.scope !== record.scope) {
        this.router.register(this.createListener(record, target));
      }
    }

    this.journal.send(
      joinPath(this.journal.root, 'channel/move'),
      record.scope,
      `Moved journal output from ${input.from_destination_id} to ${target.id} for \`${input.path}\``,
      {
        old_destination: input.from_destination_id,
        new_destination: target.id,
        path: input.path,
        recursive: input.recursive,
      },
      'journal',
    );

    return true;
  }

  /** Stored outputs sorted by path. */
  async listOutputs(scope?: string | null): Promise<OutputRecord[]> {
    const records = await this.store.listOutputs(scope);
    return [...records].sort((a, b) => a.path.localeCompare(b.path));
  }

  /**
   * Manually publishes an event, e.g. to test an output. The path is used
   * verbatim, so every manual send goes through the journal's own
   * broadcaster.
   *
   * @throws RootBroadcastError for `/`
   * @throws PathFormatError
   */
  sendEvent(input: SendEventInput): void {
    if (input.path === ROOT_PATH) {
      throw new RootBroadcastError();
    }

    this.log.info({ path: input.path, attributes: input.attributes }, 'Sending manual journal event');
    this.journal.send(input.path, input.scope, input.content, input.attributes);
  }

  findEvents(input: FindEventsInput): JournalEvent[] {
    return this.router.history.query({
      scope: input.scope,
      limit: input.limit,
      filter: input.filter,
    });
  }

  private requireDestination(id: string): Destination {
    const destination = this.destinations.resolve(id);
    if (destination === undefined) {
      throw new UnknownDestinationError(id);
    }
    return destination;
  }

  private createListener(record: OutputRecord, destination: Destination): ChannelOutputListener {
    return new ChannelOutputListener(
      record.path,
      record.recursive,
      destination,
      this.log,
      this.render,
      record.scope,
    );
  }
}
