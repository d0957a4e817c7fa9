export { default as redisPlugin, redactRedisUrl } from './redis-plugin.js';
export type { RedisPluginOptions } from './redis-plugin.js';
