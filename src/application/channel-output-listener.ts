import type { Logger } from 'pino';
import type { Destination, JournalEvent } from '../domain/index.js';
import type { DeliveryResult } from './output-listener.js';
import { OutputListener, toDeliveryFailure } from './output-listener.js';

export interface RenderOptions {
  /** Append a `key=value` summary line when the event has attributes. */
  attributes: boolean;
}

function formatAttributeValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Plain-text rendering shared by every channel-style destination.
 *
 *   [icon] content
 *   key=value, other=1
 */
export function renderEvent(event: JournalEvent, options: RenderOptions): string {
  const head = event.icon === null ? event.content : `[${event.icon}] ${event.content}`;
  const keys = Object.keys(event.attributes).sort();

  if (!options.attributes || keys.length === 0) return head;

  const summary = keys
    .map((key) => `${key}=${formatAttributeValue(event.attributes[key])}`)
    .join(', ');

  return `${head}\n${summary}`;
}

/**
 * Listener that renders an event to text and sends it to its destination.
 * Failures are logged and returned, never thrown.
 */
export class ChannelOutputListener extends OutputListener {
  private readonly log: Logger;
  private readonly render: RenderOptions;

  constructor(
    path: string,
    recursive: boolean,
    destination: Destination,
    log: Logger,
    render: RenderOptions = { attributes: true },
    scope: string | null = null,
  ) {
    super(path, recursive, destination, scope);
    this.log = log;
    this.render = render;
  }

  async deliver(event: JournalEvent): Promise<DeliveryResult> {
    const destination = this.destination;

    try {
      await destination.send(renderEvent(event, this.render));
      this.log.debug(
        { event_id: event.event_id, path: event.path, destination: destination.id },
        'Journal event delivered',
      );
      return { ok: true };
    } catch (err: unknown) {
      const error = toDeliveryFailure(destination.id, err);
      this.log.warn(
        { err: error, event_id: event.event_id, path: event.path, destination: destination.id },
        'Journal delivery failed',
      );
      return { ok: false, error };
    }
  }
}
