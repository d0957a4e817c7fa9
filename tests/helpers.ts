import { vi } from 'vitest';
import type { Destination, JournalEvent, JournalEventInput } from '../src/domain/index.js';
import { createJournalEvent } from '../src/domain/index.js';
import { OutputListener } from '../src/application/index.js';
import type { DeliveryResult } from '../src/application/index.js';

let counter = 0;

/**
 * Factory for creating test events with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeEvent(overrides: Partial<JournalEventInput> = {}): JournalEvent {
  counter++;
  return createJournalEvent({
    path: overrides.path ?? '/test',
    scope: overrides.scope === undefined ? null : overrides.scope,
    content: overrides.content ?? `event-${counter}`,
    attributes: overrides.attributes ?? {},
    icon: overrides.icon ?? null,
    ...(overrides.timestamp === undefined ? {} : { timestamp: overrides.timestamp }),
  });
}

export function fakeLogger() {
  const log = {
    trace: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as import('pino').Logger;
}

/** A promise plus the function that resolves it. */
export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Destination that keeps everything it is sent. Set `failure` to make it reject. */
export class RecordingDestination implements Destination {
  readonly kind = 'recording';
  readonly id: string;
  readonly sent: string[] = [];
  failure: Error | null = null;

  constructor(id: string) {
    this.id = id;
  }

  async send(content: string): Promise<void> {
    if (this.failure !== null) throw this.failure;
    this.sent.push(content);
  }
}

export interface RecordingListenerOptions {
  /** Shared log of `<destination>:<content>` entries, pushed on completion. */
  trace?: string[];
  delayMs?: number;
  /** Makes `deliver` throw instead of returning a result. */
  throws?: Error;
  /** Delivery waits for this promise before completing. */
  gate?: Promise<void>;
  scope?: string | null;
}

/** Listener that records the events it receives, in completion order. */
export class RecordingListener extends OutputListener {
  readonly received: JournalEvent[] = [];
  started = 0;
  private readonly options: RecordingListenerOptions;

  constructor(path: string, recursive: boolean, destination: Destination, options: RecordingListenerOptions = {}) {
    super(path, recursive, destination, options.scope ?? null);
    this.options = options;
  }

  async deliver(event: JournalEvent): Promise<DeliveryResult> {
    this.started++;
    if (this.options.gate !== undefined) await this.options.gate;
    if (this.options.delayMs !== undefined) await sleep(this.options.delayMs);
    if (this.options.throws !== undefined) throw this.options.throws;

    this.received.push(event);
    this.options.trace?.push(`${this.destination.id}:${event.content}`);
    return { ok: true };
  }
}

export function contents(events: readonly JournalEvent[]): string[] {
  return events.map((event) => event.content);
}
