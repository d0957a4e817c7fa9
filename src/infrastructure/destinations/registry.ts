import type Redis from 'ioredis';
import type { Logger } from 'pino';
import type { Destination } from '../../domain/index.js';
import { ConfigError } from '../../domain/index.js';
import type { DestinationResolver } from '../../application/index.js';
import type { DestinationConfig } from '../config/journal-config.js';
import { SlackDestination } from './slack-destination.js';
import { RedisDestination } from './redis-destination.js';
import { FileDestination } from './file-destination.js';

export interface DestinationDeps {
  log: Logger;
  /** Required when any `redis` destination is configured. */
  redis?: Redis | undefined;
}

/**
 * Builds a destination from its configuration entry.
 *
 * @throws ConfigError when a redis destination has no connection
 */
export function createDestination(config: DestinationConfig, deps: DestinationDeps): Destination {
  switch (config.kind) {
    case 'slack':
      return new SlackDestination(config.id, config.webhook_url, deps.log);
    case 'redis':
      if (deps.redis === undefined) {
        throw new ConfigError(`Destination '${config.id}' needs Redis but REDIS_URL is not configured`);
      }
      return new RedisDestination(config.id, deps.redis, config.channel);
    case 'file':
      return new FileDestination(config.id, config.file_path);
  }
}

/** Configured destinations, keyed by id. */
export class DestinationRegistry implements DestinationResolver {
  private readonly destinations: Map<string, Destination> = new Map();

  constructor(destinations: Iterable<Destination> = []) {
    for (const destination of destinations) {
      this.add(destination);
    }
  }

  static fromConfig(configs: readonly DestinationConfig[], deps: DestinationDeps): DestinationRegistry {
    return new DestinationRegistry(configs.map((config) => createDestination(config, deps)));
  }

  /** Adds or replaces a destination. */
  add(destination: Destination): void {
    this.destinations.set(destination.id, destination);
  }

  resolve(id: string): Destination | undefined {
    return this.destinations.get(id);
  }

  list(): Destination[] {
    return [...this.destinations.values()];
  }

  get size(): number {
    return this.destinations.size;
  }
}
