export { default as storagePlugin } from './storage-plugin.js';
export type { StoragePluginOptions } from './storage-plugin.js';
export { createMemoryStores, createRedisStores } from './stores.js';
export type { Stores } from './stores.js';
export { loadConfig } from './config.js';
export type { AppConfig, LogLevel } from './config.js';
export { InMemoryEventStore, InMemoryIdempotencyGate } from './memory/index.js';
export { RedisEventStore, RedisIdempotencyGate } from './redis/index.js';
