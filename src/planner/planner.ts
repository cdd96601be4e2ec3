/**
 * Deployment Planner
 *
 * Validates a deploy request against the catalog and the registered
 * adapters, then renders one plan per leg. Pure: nothing is deployed and
 * nothing is written, so a bad request never leaves half a deployment
 * behind.
 */

import { ok, err, type Result } from "neverthrow";
import type { DeployRequest, ProviderPlan } from "../types/deployment.js";
import type { InferenceProvider } from "../types/provider.js";
import type { Catalog } from "../config/schema.js";
import type { ProviderRegistry } from "../providers/registry.js";
import { ConfigError, ValidationError } from "../types/errors.js";
import { getCatalog } from "../config/loader.js";
import {
  cheapestProvider,
  normalizeGpuName,
  providerGpuId,
  providerRegions,
} from "../catalog/catalog.js";
import { renderTemplateFile } from "../templates/engine.js";
import { errorMessage } from "../utils/debug.js";

/** Port the shared serve command binds to before adapters adjust it */
export const DEFAULT_SERVE_PORT = "8001";

/** Sentinel asking the planner to pick the cheapest serverless provider */
export const AUTO_PROVIDER = "auto";

const SERVICE_NAME = /^[a-z][a-z0-9-]{0,38}$/;

/**
 * Everything needed to launch one hybrid deployment
 */
export interface DeploymentPlan {
  /** Request with the GPU name and providers resolved */
  readonly request: DeployRequest;
  readonly serveCommand: string;
  readonly serverless: ProviderPlan;
  /** Null in serverless-only mode */
  readonly spot: ProviderPlan | null;
}

export interface PlanOptions {
  /** Service names already in use */
  existingServices?: readonly string[];
  catalog?: Catalog;
}

/**
 * Render the model-server start command shared by every backend
 */
export const buildServeCommand = (request: DeployRequest, port = DEFAULT_SERVE_PORT): string =>
  renderTemplateFile("vllm_serve_cmd.txt", {
    model: request.modelName,
    host: "0.0.0.0",
    port,
    max_model_len: request.maxModelLen,
    tp_size: request.tpSize,
    eager_flag: request.coldStartMode === "fast_boot" ? "--enforce-eager" : "",
  }).trim();

/**
 * Resolve `"auto"` to the cheapest registered serverless provider
 * offering the GPU
 */
export const resolveServerlessProvider = (
  request: DeployRequest,
  registry: ProviderRegistry,
  catalog: Catalog = getCatalog()
): string | undefined => {
  if (request.serverlessProvider !== AUTO_PROVIDER) {
    return request.serverlessProvider;
  }
  return cheapestProvider(request.gpu, registry.byKind("serverless"), catalog)?.provider;
};

const checkNumbers = (request: DeployRequest, issues: string[]): void => {
  const positive: Array<[string, number]> = [
    ["gpuCount", request.gpuCount],
    ["tpSize", request.tpSize],
    ["maxModelLen", request.maxModelLen],
    ["concurrency", request.concurrency],
  ];
  for (const [field, value] of positive) {
    if (!Number.isInteger(value) || value < 1) {
      issues.push(`${field} must be a positive integer, got ${value}`);
    }
  }
  if (request.tpSize > request.gpuCount) {
    issues.push(`tpSize ${request.tpSize} exceeds gpuCount ${request.gpuCount}`);
  }
};

const checkProvider = (
  role: "serverless" | "spot",
  name: string,
  registry: ProviderRegistry,
  issues: string[]
): InferenceProvider | undefined => {
  if (!registry.has(name)) {
    issues.push(`Unknown ${role} provider "${name}". Available: ${registry.byKind(role).join(", ")}`);
    return undefined;
  }
  const provider = registry.get(name);
  if (provider.kind !== role) {
    issues.push(`Provider "${name}" is a ${provider.kind} provider, not ${role}`);
    return undefined;
  }
  return provider;
};

const checkOffering = (
  request: DeployRequest,
  provider: string,
  catalog: Catalog,
  issues: string[]
): void => {
  if (!providerGpuId(request.gpu, provider, catalog)) {
    issues.push(`${provider} does not offer GPU ${request.gpu}`);
    return;
  }
  const regions = providerRegions(request.gpu, provider, catalog);
  if (request.region && regions.length > 0 && !regions.includes(request.region)) {
    issues.push(`${provider} does not offer ${request.gpu} in region ${request.region}`);
  }
};

const renderPlan = (
  provider: InferenceProvider,
  request: DeployRequest,
  serveCommand: string,
  issues: string[]
): ProviderPlan | null => {
  try {
    return provider.plan(request, serveCommand);
  } catch (error) {
    if (error instanceof ConfigError) {
      issues.push(error.message);
      return null;
    }
    throw error;
  }
};

/**
 * Validate a request and render the plans for both legs
 *
 * Every problem found is reported at once. Adapter `plan()` errors other
 * than `ConfigError` are programmer errors and propagate.
 */
export const planDeployment = (
  input: DeployRequest,
  registry: ProviderRegistry,
  options: PlanOptions = {}
): Result<DeploymentPlan, ValidationError> => {
  const catalog = options.catalog ?? getCatalog();
  const issues: string[] = [];

  if (!input.modelName.trim()) {
    issues.push("modelName is required");
  }
  if (!SERVICE_NAME.test(input.serviceName)) {
    issues.push(
      `serviceName "${input.serviceName}" must start with a letter and use only lowercase letters, digits and dashes (max 39)`
    );
  }
  if (options.existingServices?.includes(input.serviceName)) {
    issues.push(`Service "${input.serviceName}" already exists`);
  }
  checkNumbers(input, issues);

  const gpu = normalizeGpuName(input.gpu, catalog);
  if (!gpu) {
    issues.push(`Unknown GPU "${input.gpu}"`);
    return err(new ValidationError(issues));
  }

  const withGpu: DeployRequest = { ...input, gpu };
  const serverlessName = resolveServerlessProvider(withGpu, registry, catalog);
  if (!serverlessName) {
    issues.push(`No registered serverless provider offers GPU ${gpu}`);
    return err(new ValidationError(issues));
  }
  const request: DeployRequest = { ...withGpu, serverlessProvider: serverlessName };

  const serverlessProvider = checkProvider("serverless", serverlessName, registry, issues);
  if (serverlessProvider) {
    checkOffering(request, serverlessName, catalog, issues);
  }
  const spotProvider = request.serverlessOnly
    ? undefined
    : checkProvider("spot", request.spotProvider, registry, issues);

  if (issues.length > 0) {
    return err(new ValidationError(issues));
  }

  let serveCommand: string;
  try {
    serveCommand = buildServeCommand(request);
  } catch (error) {
    return err(new ValidationError([`Serve command: ${errorMessage(error)}`]));
  }

  const serverless = serverlessProvider
    ? renderPlan(serverlessProvider, request, serveCommand, issues)
    : null;
  const spot = spotProvider ? renderPlan(spotProvider, request, serveCommand, issues) : null;

  if (!serverless || issues.length > 0) {
    return err(new ValidationError(issues));
  }
  return ok({ request, serveCommand, serverless, spot });
};
