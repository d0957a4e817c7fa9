import type Redis from 'ioredis';
import type { Destination } from '../../domain/index.js';

/**
 * Publishes rendered events on a Redis Pub/Sub channel.
 *
 * Delivery means the PUBLISH succeeded, regardless of how many
 * subscribers received it.
 */
export class RedisDestination implements Destination {
  readonly kind = 'redis';
  readonly id: string;
  readonly channel: string;
  private readonly redis: Redis;

  constructor(id: string, redis: Redis, channel: string) {
    this.id = id;
    this.redis = redis;
    this.channel = channel;
  }

  async send(content: string): Promise<void> {
    await this.redis.publish(this.channel, content);
  }
}
