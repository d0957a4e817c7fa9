import type { Logger } from 'pino';
import type { Destination } from '../../domain/index.js';
import { DeliveryFailure } from '../../domain/index.js';

/**
 * Chat-channel destination backed by a Slack-compatible incoming webhook.
 *
 * POSTs `{ text }` as JSON. A non-OK response rejects with DeliveryFailure;
 * network errors and timeouts propagate as-is and are wrapped by the
 * listener.
 */
export const SLACK_TIMEOUT_MS = 10_000;

export class SlackDestination implements Destination {
  readonly kind = 'slack';
  readonly id: string;
  private readonly webhookUrl: string;
  private readonly log: Logger;
  private readonly timeoutMs: number;

  constructor(id: string, webhookUrl: string, log: Logger, timeoutMs: number = SLACK_TIMEOUT_MS) {
    this.id = id;
    this.webhookUrl = webhookUrl;
    this.log = log;
    this.timeoutMs = timeoutMs;
  }

  async send(content: string): Promise<void> {
    const response = await fetch(this.webhookUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ text: content }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new DeliveryFailure(this.id, `Slack webhook returned status ${response.status}`);
    }

    this.log.debug({ destination: this.id }, 'Slack message sent');
  }
}
