export { default as redisPlugin } from './redis-plugin.js';
export type { RedisPluginOptions } from './redis-plugin.js';
export { RedisDedupCache } from './redis-dedup-cache.js';
