import type {
  ComponentRole,
  DeploymentFilter,
  DeploymentRecord,
  DeploymentStore,
} from "../types/state.js";
import type { DeploymentResult, DeploymentStatus } from "../types/deployment.js";
import { byNewest, matchesFilter, withComponent, withStatus } from "./utils.js";

export interface MemoryStoreConfig {
  /** Clock for `updatedAt`. Default: current time */
  now?: () => Date;
}

/**
 * Create an in-memory deployment store
 *
 * Suitable for tests and for a single process that does not need to
 * remember deployments across restarts.
 */
export const createMemoryStore = (config: MemoryStoreConfig = {}): DeploymentStore => {
  const now = config.now ?? (() => new Date());
  const records = new Map<string, DeploymentRecord>();

  const save = async (record: DeploymentRecord): Promise<void> => {
    records.set(record.serviceName, record);
  };

  const get = async (serviceName: string): Promise<DeploymentRecord | null> =>
    records.get(serviceName) ?? null;

  const list = async (filter?: DeploymentFilter): Promise<DeploymentRecord[]> =>
    [...records.values()].filter((r) => matchesFilter(r, filter)).sort(byNewest);

  const updateStatus = async (
    serviceName: string,
    status: DeploymentStatus
  ): Promise<DeploymentRecord | null> => {
    const existing = records.get(serviceName);
    if (!existing) return null;
    const updated = withStatus(existing, status, now());
    records.set(serviceName, updated);
    return updated;
  };

  const updateComponent = async (
    serviceName: string,
    role: ComponentRole,
    result: DeploymentResult
  ): Promise<DeploymentRecord | null> => {
    const existing = records.get(serviceName);
    if (!existing) return null;
    const updated = withComponent(existing, role, result, now());
    records.set(serviceName, updated);
    return updated;
  };

  const clear = async (): Promise<void> => {
    records.clear();
  };

  const close = async (): Promise<void> => {
    // Nothing to release
  };

  return { save, get, list, updateStatus, updateComponent, clear, close };
};
