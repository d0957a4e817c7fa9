import fp from 'fastify-plugin';
import Redis from 'ioredis';
import type { FastifyInstance } from 'fastify';

export interface RedisPluginOptions {
  redisUrl: string;
  /** Commands fail after this many reconnect attempts. Defaults to 3. */
  maxRetriesPerRequest?: number;
}

/** Connection URL with any password masked, for logs and errors. */
export function redactRedisUrl(redisUrl: string): string {
  try {
    const url = new URL(redisUrl);
    if (url.password !== '') url.password = '***';
    return url.toString();
  } catch {
    return '<invalid redis url>';
  }
}

/**
 * Fastify plugin that owns the Redis connection used by `redis`
 * journal destinations.
 *
 * A failed initial connection aborts startup. Later connection errors are
 * logged; publishes made while disconnected fail after
 * `maxRetriesPerRequest` and surface as delivery failures.
 */
async function redisPlugin(fastify: FastifyInstance, opts: RedisPluginOptions): Promise<void> {
  const target = redactRedisUrl(opts.redisUrl);

  const redis = new Redis(opts.redisUrl, {
    maxRetriesPerRequest: opts.maxRetriesPerRequest ?? 3,
    enableReadyCheck: true,
    lazyConnect: true,
  });

  redis.on('error', (err: unknown) => {
    fastify.log.error({ err, redis: target }, 'Redis connection error');
  });

  try {
    await redis.connect();
  } catch (err: unknown) {
    redis.disconnect();
    throw new Error(`Cannot connect to Redis at ${target}`, { cause: err });
  }
  fastify.log.info({ redis: target }, 'Redis connected');

  fastify.decorate('redis', redis);

  fastify.addHook('onClose', async () => {
    await redis.quit();
    fastify.log.info('Redis disconnected');
  });
}

export default fp(redisPlugin, {
  name: 'redis',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    redis: Redis;
  }
}
