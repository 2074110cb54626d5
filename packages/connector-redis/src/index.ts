export { SharedRedisConnector, createSharedRedisConnector } from "./shared-redis-connector.js";
export type { SharedRedisConnectorOptions } from "./shared-redis-connector.js";

export { createNodeRedisHandleFactory } from "./redis-handle.js";
export type { RedisHandle, RedisHandleFactory, NodeRedisHandleOptions } from "./redis-handle.js";

export { readRedisSettings, toRedisUrl } from "./redis-settings.js";
export type { RedisConnectionSettings, RedisEnvironment } from "./redis-settings.js";

export { RedisSessionCache, createRedisSessionCache } from "./redis-session-cache.js";
export type { RedisSessionCacheOptions } from "./redis-session-cache.js";

export { Mutex } from "./mutex.js";
