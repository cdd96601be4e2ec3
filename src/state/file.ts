import { readFile, writeFile, mkdir, rename, unlink } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname, join } from "node:path";
import { z } from "zod";
import type {
  ComponentRole,
  DeploymentFilter,
  DeploymentRecord,
  DeploymentStore,
} from "../types/state.js";
import type { DeploymentResult, DeploymentStatus } from "../types/deployment.js";
import { HybridRouterError } from "../types/errors.js";
import { debug, errorMessage } from "../utils/debug.js";
import {
  byNewest,
  deploymentRecordSchema,
  matchesFilter,
  withComponent,
  withStatus,
} from "./utils.js";

/**
 * Configuration for file-based deployment store
 */
export interface FileStoreConfig {
  /** Directory to store the state file */
  directory: string;
  /** File name (default: "deployments.json") */
  filename?: string;
  /** Clock for `updatedAt`. Default: current time */
  now?: () => Date;
}

/**
 * Persisted file structure
 */
interface PersistedState {
  deployments: Record<string, DeploymentRecord>;
  lastUpdated: string;
}

const fileSchema = z.object({
  deployments: z.record(z.unknown()).default({}),
  lastUpdated: z.string().optional(),
});

/**
 * Create a JSON-file deployment store
 *
 * The file is re-read on every call, so a CLI run can see deployments
 * made by another. Writes go through a temporary file and a rename.
 * Concurrent writers in different processes are not coordinated.
 *
 * @param config - Configuration for the file store
 */
export const createFileStore = (config: FileStoreConfig): DeploymentStore => {
  const filepath = join(config.directory, config.filename ?? "deployments.json");
  const now = config.now ?? (() => new Date());

  // Serializes read-modify-write cycles within this process
  let queue: Promise<unknown> = Promise.resolve();

  const exclusive = <T>(fn: () => Promise<T>): Promise<T> => {
    const run = queue.then(fn);
    queue = run.catch(() => undefined);
    return run;
  };

  const ensureDirectory = async (): Promise<void> => {
    const dir = dirname(filepath);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }
  };

  const load = async (): Promise<PersistedState> => {
    if (!existsSync(filepath)) {
      return { deployments: {}, lastUpdated: now().toISOString() };
    }
    const content = await readFile(filepath, "utf-8");
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new HybridRouterError(`Deployment state ${filepath} is not valid JSON: ${errorMessage(error)}`);
    }
    const parsed = fileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new HybridRouterError(`Deployment state ${filepath} has an unexpected shape`);
    }

    const deployments: Record<string, DeploymentRecord> = {};
    for (const [name, value] of Object.entries(parsed.data.deployments)) {
      const record = deploymentRecordSchema.safeParse(value);
      if (record.success) {
        deployments[name] = record.data;
      } else {
        debug.warn(`Skipping malformed deployment record "${name}" in ${filepath}`);
      }
    }
    return { deployments, lastUpdated: parsed.data.lastUpdated ?? now().toISOString() };
  };

  const persist = async (state: PersistedState): Promise<void> => {
    await ensureDirectory();
    const tmp = `${filepath}.${process.pid}.tmp`;
    await writeFile(
      tmp,
      JSON.stringify({ ...state, lastUpdated: now().toISOString() }, null, 2),
      "utf-8"
    );
    await rename(tmp, filepath);
  };

  /**
   * Apply a change to one record and write the file back
   */
  const modify = (
    serviceName: string,
    change: (record: DeploymentRecord) => DeploymentRecord
  ): Promise<DeploymentRecord | null> =>
    exclusive(async () => {
      const state = await load();
      const existing = state.deployments[serviceName];
      if (!existing) return null;
      const updated = change(existing);
      state.deployments[serviceName] = updated;
      await persist(state);
      return updated;
    });

  const save = (record: DeploymentRecord): Promise<void> =>
    exclusive(async () => {
      const state = await load();
      state.deployments[record.serviceName] = record;
      await persist(state);
    });

  const get = async (serviceName: string): Promise<DeploymentRecord | null> => {
    const state = await load();
    return state.deployments[serviceName] ?? null;
  };

  const list = async (filter?: DeploymentFilter): Promise<DeploymentRecord[]> => {
    const state = await load();
    return Object.values(state.deployments)
      .filter((r) => matchesFilter(r, filter))
      .sort(byNewest);
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

  const clear = (): Promise<void> =>
    exclusive(async () => {
      if (existsSync(filepath)) {
        await unlink(filepath);
      }
    });

  const close = async (): Promise<void> => {
    await queue;
  };

  return { save, get, list, updateStatus, updateComponent, clear, close };
};
