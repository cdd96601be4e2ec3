import type {
  DeployRequest,
  DeploymentResult,
  DeploymentStatus,
} from "./deployment.js";

/**
 * Role a component plays inside one deployment
 */
export type ComponentRole = "serverless" | "spot";

/**
 * Persisted deployment record, keyed by service name
 */
export interface DeploymentRecord {
  serviceName: string;
  status: DeploymentStatus;
  /** ISO-8601 timestamps */
  createdAt: string;
  updatedAt: string;
  request: DeployRequest;
  /** Public address clients use */
  routerUrl: string | null;
  /** Latest result per component; absent until that leg settles */
  components: Partial<Record<ComponentRole, DeploymentResult>>;
}

/**
 * Filter for listing records
 */
export interface DeploymentFilter {
  status?: DeploymentStatus;
}

/**
 * Interface for deployment persistence
 *
 * Implementations must tolerate being slow; nothing on the request path
 * waits on them.
 */
export interface DeploymentStore {
  /**
   * Insert or replace a record
   */
  save(record: DeploymentRecord): Promise<void>;

  /**
   * Get a record by service name
   */
  get(serviceName: string): Promise<DeploymentRecord | null>;

  /**
   * List records, newest first
   */
  list(filter?: DeploymentFilter): Promise<DeploymentRecord[]>;

  /**
   * Set the status of an existing record
   * @returns The updated record, or null if none exists
   */
  updateStatus(
    serviceName: string,
    status: DeploymentStatus
  ): Promise<DeploymentRecord | null>;

  /**
   * Replace one component's result on an existing record
   * @returns The updated record, or null if none exists
   */
  updateComponent(
    serviceName: string,
    role: ComponentRole,
    result: DeploymentResult
  ): Promise<DeploymentRecord | null>;

  /**
   * Clear all stored data (useful for testing)
   */
  clear(): Promise<void>;

  /**
   * Close any connections (for cleanup)
   */
  close(): Promise<void>;
}
