/**
 * Providers Module
 *
 * Backend adapters behind the `InferenceProvider` contract and the
 * registry the planner and coordinator look them up in.
 */

export {
  createProviderRegistry,
  createDefaultRegistry,
  type ProviderRegistry,
} from "./registry.js";

export { createModalProvider, modalAppName, parseModalUrl } from "./modal.js";
export {
  createRunpodProvider,
  runpodEndpointName,
  RUNPOD_API_BASE,
  RUNPOD_SERVE_BASE,
  type RunpodProviderOptions,
} from "./runpod.js";
export {
  createSkyserveProvider,
  skyserveServiceName,
  parseSkyEndpoint,
  SPOT_PORT,
  type SkyserveProviderOptions,
} from "./skyserve.js";

export {
  runCommand,
  withTempFile,
  type CommandRunner,
  type CommandResult,
  type CommandOptions,
} from "./command.js";
export { type ProviderDeps, type ProviderEnv } from "./base.js";
