/**
 * Routing Proxy Module
 *
 * The HTTP front door: forwards OpenAI-compatible traffic to the backend
 * the routing state picks and exposes `/router/health` and
 * `/router/config` for the coordinator.
 */

export {
  createRouterServer,
  configPatchSchema,
  type RouterServer,
  type RouterServerDeps,
  type ConfigPatchBody,
} from "./server.js";
export {
  pushRouterConfig,
  fetchRouterHealth,
  type RouterClientOptions,
  type PushOptions,
} from "./client.js";
export { sanitizePath, buildProxyUrl, filterRequestHeaders, filterResponseHeaders } from "./headers.js";
