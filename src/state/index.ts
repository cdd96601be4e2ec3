/**
 * Deployment State Module
 *
 * Pluggable persistence for deployment records. Nothing on the request
 * path reads from a store.
 *
 * - **MemoryStore**: in-process, lost on exit
 * - **FileStore**: JSON file, shared by CLI runs on one machine
 * - **RedisStore**: shared by several operators
 */

export { createMemoryStore, type MemoryStoreConfig } from "./memory.js";
export { createFileStore, type FileStoreConfig } from "./file.js";
export { createRedisStore, type RedisStoreConfig, type RedisClient } from "./redis.js";
export { deploymentRecordSchema, parseRecord } from "./utils.js";
