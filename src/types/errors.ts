import type { BackendName } from "./routing.js";

/**
 * Base error class for hybrid router errors
 */
export class HybridRouterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "HybridRouterError";
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Error thrown when a request is incompatible with a provider's
 * capabilities (unsupported GPU, region, missing credentials).
 * Raised before any deploy attempt.
 */
export class ConfigError extends HybridRouterError {
  /** Provider that rejected the request, when known */
  readonly provider?: string;

  constructor(message: string, provider?: string) {
    super(provider ? `[${provider}] ${message}` : message);
    this.name = "ConfigError";
    this.provider = provider;
  }
}

/**
 * Error returned when a deploy request fails validation against the
 * catalog or the existing deployments
 */
export class ValidationError extends HybridRouterError {
  /** Every problem found, in the order checked */
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid deploy request: ${issues.join("; ")}`);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

/**
 * Error thrown when a template references placeholders with no value
 */
export class TemplateError extends HybridRouterError {
  /** Placeholder names left unresolved */
  readonly missing: string[];

  constructor(missing: string[], source?: string) {
    const where = source ? ` in ${source}` : "";
    super(`Unresolved template placeholders${where}: ${missing.join(", ")}`);
    this.name = "TemplateError";
    this.missing = missing;
  }
}

/**
 * Error describing one backend's failed deployment
 */
export class ProviderDeployError extends HybridRouterError {
  /** Provider whose deploy failed */
  readonly provider: string;

  constructor(provider: string, message: string) {
    super(`Deploy on ${provider} failed: ${message}`);
    this.name = "ProviderDeployError";
    this.provider = provider;
  }
}

/**
 * Error from a readiness probe (timeout, refused connection, non-2xx)
 */
export class ProbeError extends HybridRouterError {
  /** URL that was probed */
  readonly url: string;
  /** HTTP status when the backend answered */
  readonly statusCode?: number;

  constructor(url: string, message: string, statusCode?: number) {
    super(message);
    this.name = "ProbeError";
    this.url = url;
    this.statusCode = statusCode;
  }
}

/**
 * Error thrown when a backend cannot be reached mid-request
 */
export class ProxyUpstreamError extends HybridRouterError {
  /** Backend that failed */
  readonly backend: BackendName;
  /** Underlying transport error */
  readonly transportError?: unknown;

  constructor(backend: BackendName, message: string, transportError?: unknown) {
    super(`Upstream ${backend} unreachable: ${message}`);
    this.name = "ProxyUpstreamError";
    this.backend = backend;
    this.transportError = transportError;
  }
}

/**
 * Error returned when no backend URL is known yet
 */
export class NoBackendAvailableError extends HybridRouterError {
  constructor(message = "No backend available") {
    super(message);
    this.name = "NoBackendAvailableError";
  }
}

/**
 * One failed teardown step
 */
export interface TeardownFailure {
  /** Component role ("serverless" or "spot") */
  component: string;
  /** Provider name */
  provider: string;
  /** Error message */
  message: string;
}

/**
 * Aggregate of every teardown step that failed
 */
export class TeardownError extends HybridRouterError {
  readonly failures: TeardownFailure[];

  constructor(failures: TeardownFailure[]) {
    super(
      `Teardown finished with ${failures.length} error(s): ` +
        failures.map((f) => `${f.component}/${f.provider}: ${f.message}`).join("; ")
    );
    this.name = "TeardownError";
    this.failures = failures;
  }
}

/**
 * Error thrown when a provider name has no registered adapter
 */
export class UnknownProviderError extends HybridRouterError {
  readonly providerName: string;
  readonly available: string[];

  constructor(providerName: string, available: string[]) {
    super(
      `Unknown provider: "${providerName}". Available: ${available.join(", ") || "(none)"}`
    );
    this.name = "UnknownProviderError";
    this.providerName = providerName;
    this.available = available;
  }
}
