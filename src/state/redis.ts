import type {
  ComponentRole,
  DeploymentFilter,
  DeploymentRecord,
  DeploymentStore,
} from "../types/state.js";
import type { DeploymentResult, DeploymentStatus } from "../types/deployment.js";
import {
  byNewest,
  matchesFilter,
  parseRecord,
  withComponent,
  withStatus,
} from "./utils.js";

/**
 * Redis client interface (compatible with ioredis and node-redis v4
 * legacy mode). Callers provide their own connected client.
 */
export interface RedisClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ...args: (string | number)[]): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  keys(pattern: string): Promise<string[]>;
  quit(): Promise<string>;
}

/**
 * Configuration for Redis-based deployment store
 */
export interface RedisStoreConfig {
  /** Redis client instance (e.g., from ioredis) */
  client: RedisClient;
  /** Key prefix for all stored data (default: "hybrid:") */
  prefix?: string;
  /** Clock for `updatedAt`. Default: current time */
  now?: () => Date;
}

/**
 * Create a Redis-backed deployment store
 *
 * Lets several operators share one view of their deployments. Updates
 * are read-modify-write and assume one writer per service.
 *
 * @example
 * ```typescript
 * import Redis from 'ioredis';
 *
 * const store = createRedisStore({ client: new Redis() });
 * ```
 */
export const createRedisStore = (config: RedisStoreConfig): DeploymentStore => {
  const { client } = config;
  const prefix = config.prefix ?? "hybrid:";
  const now = config.now ?? (() => new Date());
  const keyFor = (serviceName: string): string => `${prefix}deployment:${serviceName}`;

  const save = async (record: DeploymentRecord): Promise<void> => {
    await client.set(keyFor(record.serviceName), JSON.stringify(record));
  };

  const get = async (serviceName: string): Promise<DeploymentRecord | null> =>
    parseRecord(await client.get(keyFor(serviceName)));

  const list = async (filter?: DeploymentFilter): Promise<DeploymentRecord[]> => {
    const keys = await client.keys(`${prefix}deployment:*`);
    const values = await Promise.all(keys.map((key) => client.get(key)));
    return values
      .map(parseRecord)
      .filter((record): record is DeploymentRecord => record !== null)
      .filter((record) => matchesFilter(record, filter))
      .sort(byNewest);
  };

  const modify = async (
    serviceName: string,
    change: (record: DeploymentRecord) => DeploymentRecord
  ): Promise<DeploymentRecord | null> => {
    const existing = await get(serviceName);
    if (!existing) return null;
    const updated = change(existing);
    await save(updated);
    return updated;
  };

  const updateStatus = (
    serviceName: string,
    status: DeploymentStatus
  ): Promise<DeploymentRecord | null> =>
    modify(serviceName, (record) => withStatus(record, status, now()));

  const updateComponent = (
    serviceName: string,
    role: ComponentRole,
    result: DeploymentResult
  ): Promise<DeploymentRecord | null> =>
    modify(serviceName, (record) => withComponent(record, role, result, now()));

  const clear = async (): Promise<void> => {
    const allKeys = await client.keys(`${prefix}*`);
    if (allKeys.length > 0) {
      await client.del(...allKeys);
    }
  };

  const close = async (): Promise<void> => {
    await client.quit();
  };

  return { save, get, list, updateStatus, updateComponent, clear, close };
};
