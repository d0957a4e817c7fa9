import type { Logger } from 'pino';
import type { Destination, JournalEvent } from '../domain/index.js';
import { RouterStateError, assertValidPath, pathLineage } from '../domain/index.js';
import type { OutputListener } from './output-listener.js';
import { JournalHistory } from './history.js';
import { Broadcaster } from './broadcaster.js';

export type DeliveryMode = 'sequential' | 'concurrent';

export type RouterState = 'idle' | 'running' | 'stopping' | 'stopped';

export const DEFAULT_SHUTDOWN_GRACE_MS = 5000;

export interface RouterOptions {
  log: Logger;
  history?: JournalHistory;
  /** How deliveries for one event are awaited. Defaults to sequential. */
  delivery?: DeliveryMode;
}

export interface RouterStats {
  readonly received: number;
  readonly dispatched: number;
  readonly delivered: number;
  readonly failed: number;
  readonly dropped: number;
}

interface QueuedEvent {
  readonly event: JournalEvent;
  readonly seq: number;
}

interface Registration {
  listener: OutputListener;
  /** Sequence number at registration; only later events are delivered. */
  readonly seq: number;
}

/**
 * Routes journal events to output listeners by path.
 *
 * Producers enqueue through broadcasters; a single dispatch task drains
 * the queue in FIFO order and awaits every delivery for event N before
 * matching event N+1. Listener-observed order therefore always equals
 * send order.
 *
 * Registrations and events share one sequence counter. A listener gets an
 * event only if it was registered before the event was sent and is still
 * registered when the event's dispatch begins.
 */
export class Router {
  readonly history: JournalHistory;
  private readonly log: Logger;
  private readonly delivery: DeliveryMode;

  /** exact path → registrations at that path, in registration order */
  private readonly registry: Map<string, Registration[]> = new Map();
  private readonly queue: QueuedEvent[] = [];
  private readonly broadcasters: Map<string, Broadcaster> = new Map();

  private sequence = 0;
  private state: RouterState = 'idle';
  private dispatching = false;
  private wake: (() => void) | null = null;
  private idleWaiters: Array<() => void> = [];
  private loop: Promise<void> | null = null;

  private counters = { received: 0, dispatched: 0, delivered: 0, failed: 0, dropped: 0 };

  constructor(options: RouterOptions) {
    this.log = options.log;
    this.history = options.history ?? new JournalHistory();
    this.delivery = options.delivery ?? 'sequential';
  }

  // --------------------------------------------------
  // Registry
  // --------------------------------------------------

  /**
   * Adds a listener. An existing listener with the same path and
   * destination id is replaced in place.
   */
  register(listener: OutputListener): void {
    const entries = this.registry.get(listener.path) ?? [];
    const current = entries.find(
      (entry) => entry.listener.destination.id === listener.destination.id,
    );

    if (current !== undefined) {
      current.listener = listener;
      this.log.debug({ path: listener.path, destination: listener.destination.id }, 'Journal listener updated');
      return;
    }

    this.sequence += 1;
    entries.push({ listener, seq: this.sequence });
    this.registry.set(listener.path, entries);
    this.log.debug(
      { path: listener.path, destination: listener.destination.id, recursive: listener.recursive },
      'Journal listener registered',
    );
  }

  /** Idempotent. Returns whether a registration was removed. */
  unregister(listener: OutputListener): boolean {
    const entries = this.registry.get(listener.path);
    if (entries === undefined) return false;

    const remaining = entries.filter(
      (entry) => entry.listener !== listener
        && entry.listener.destination.id !== listener.destination.id,
    );
    if (remaining.length === entries.length) return false;

    if (remaining.length === 0) {
      this.registry.delete(listener.path);
    } else {
      this.registry.set(listener.path, remaining);
    }

    this.log.debug({ path: listener.path, destination: listener.destination.id }, 'Journal listener unregistered');
    return true;
  }

  /** Listener at exactly `path`, optionally bound to `destinationId`. */
  get(path: string, destinationId?: string): OutputListener | undefined {
    const entries = this.registry.get(path) ?? [];
    const found = entries.find(
      (entry) => destinationId === undefined || entry.listener.destination.id === destinationId,
    );
    return found?.listener;
  }

  listeners(path?: string): OutputListener[] {
    if (path !== undefined) {
      return (this.registry.get(path) ?? []).map((entry) => entry.listener);
    }
    return [...this.registry.values()].flat().map((entry) => entry.listener);
  }

  get listenerCount(): number {
    let total = 0;
    for (const entries of this.registry.values()) {
      total += entries.length;
    }
    return total;
  }

  /**
   * Points a registered listener at another destination. A different
   * listener already holding (path, destination) is displaced.
   * Returns false when the listener is not registered.
   */
  relocate(listener: OutputListener, destination: Destination): boolean {
    const entries = this.registry.get(listener.path);
    if (entries === undefined || !entries.some((entry) => entry.listener === listener)) {
      return false;
    }

    const previous = listener.destination.id;
    const remaining = entries.filter(
      (entry) => entry.listener === listener || entry.listener.destination.id !== destination.id,
    );
    this.registry.set(listener.path, remaining);
    listener.destination = destination;

    this.log.debug(
      { path: listener.path, from: previous, to: destination.id },
      'Journal listener relocated',
    );
    return true;
  }

  /** Cached producer handle for a root path. */
  broadcaster(root: string): Broadcaster {
    assertValidPath(root);
    let broadcaster = this.broadcasters.get(root);
    if (broadcaster === undefined) {
      broadcaster = new Broadcaster(this, root);
      this.broadcasters.set(root, broadcaster);
    }
    return broadcaster;
  }

  // --------------------------------------------------
  // Producer side
  // --------------------------------------------------

  /**
   * Records the event in history and queues it for dispatch.
   * Never waits on delivery.
   */
  enqueue(event: JournalEvent): void {
    this.history.append(event);
    this.counters.received += 1;

    if (this.state === 'stopped') {
      this.counters.dropped += 1;
      this.log.warn({ event_id: event.event_id, path: event.path }, 'Router stopped, journal event kept in history only');
      return;
    }

    this.sequence += 1;
    this.queue.push({ event, seq: this.sequence });
    this.signal();
  }

  // --------------------------------------------------
  // Lifecycle
  // --------------------------------------------------

  get status(): RouterState {
    return this.state;
  }

  get pending(): number {
    return this.queue.length;
  }

  get stats(): RouterStats {
    return { ...this.counters };
  }

  /**
   * Launches the dispatch task.
   *
   * @throws RouterStateError when already started or stopped
   */
  start(): void {
    if (this.state !== 'idle') {
      throw new RouterStateError(
        this.state === 'running' ? 'Router already started' : `Router cannot start while ${this.state}`,
      );
    }

    this.state = 'running';
    this.loop = this.run().catch((err: unknown) => {
      this.log.fatal({ err }, 'Journal dispatch task crashed');
      this.state = 'stopped';
      this.dispatching = false;
      this.releaseIdle();
    });

    this.log.info(
      { listeners: this.listenerCount, pending: this.queue.length, delivery: this.delivery },
      'Journal router started',
    );
  }

  /**
   * Drains queued events for up to `graceMs`, then drops the rest.
   * In-flight deliveries are not cancelled.
   */
  async stop(graceMs: number = DEFAULT_SHUTDOWN_GRACE_MS): Promise<void> {
    if (this.state === 'stopped') return;

    if (this.loop === null) {
      this.state = 'stopped';
      this.dropQueued();
      this.releaseIdle();
      return;
    }

    this.state = 'stopping';
    this.signal();

    let timer: ReturnType<typeof setTimeout> | undefined;
    const drained = await Promise.race([
      this.loop.then(() => true),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(false), graceMs);
      }),
    ]);
    clearTimeout(timer);

    this.state = 'stopped';
    const dropped = this.dropQueued();
    this.signal();

    if (drained) {
      this.log.info(this.stats, 'Journal router stopped');
    } else {
      this.log.warn({ dropped, graceMs }, 'Shutdown grace period elapsed, queued journal events dropped');
    }
  }

  /** Resolves once the queue is empty and nothing is being dispatched. */
  idle(): Promise<void> {
    if (this.queue.length === 0 && !this.dispatching) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  // --------------------------------------------------
  // Dispatch task
  // --------------------------------------------------

  private async run(): Promise<void> {
    while (this.state === 'running' || this.state === 'stopping') {
      const next = this.queue.shift();

      if (next === undefined) {
        this.dispatching = false;
        this.releaseIdle();
        if (this.state === 'stopping') break;

        await new Promise<void>((resolve) => {
          this.wake = resolve;
        });
        continue;
      }

      this.dispatching = true;
      await this.dispatch(next);
    }

    this.dispatching = false;
    this.releaseIdle();
  }

  private async dispatch({ event, seq }: QueuedEvent): Promise<void> {
    const targets = this.match(event, seq);
    this.counters.dispatched += 1;

    if (targets.length === 0) {
      this.log.debug({ event_id: event.event_id, path: event.path }, 'No journal listeners matched');
      return;
    }

    if (this.delivery === 'concurrent') {
      await Promise.all(targets.map((listener) => this.deliverTo(listener, event)));
      return;
    }

    for (const listener of targets) {
      await this.deliverTo(listener, event);
    }
  }

  /** Snapshot of matching listeners, exact path first, then ancestors. */
  private match(event: JournalEvent, seq: number): OutputListener[] {
    const matched: OutputListener[] = [];

    for (const candidate of pathLineage(event.path)) {
      for (const entry of this.registry.get(candidate) ?? []) {
        if (entry.seq < seq && entry.listener.matches(event)) {
          matched.push(entry.listener);
        }
      }
    }

    return matched;
  }

  private async deliverTo(listener: OutputListener, event: JournalEvent): Promise<void> {
    try {
      const result = await listener.deliver(event);
      if (result.ok) {
        this.counters.delivered += 1;
      } else {
        this.counters.failed += 1;
      }
    } catch (err: unknown) {
      this.counters.failed += 1;
      this.log.error(
        { err, event_id: event.event_id, path: listener.path, destination: listener.destination.id },
        'Output listener threw during delivery',
      );
    }
  }

  private signal(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private releaseIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private dropQueued(): number {
    const dropped = this.queue.length;
    this.queue.length = 0;
    this.counters.dropped += dropped;
    return dropped;
  }
}
