/**
 * Upstream Forwarding
 *
 * One undici connection pool per router. Responses are handed back with
 * their body still streaming.
 */

import { Agent, request, type Dispatcher } from "undici";
import type { BackendName } from "../types/routing.js";
import { ProxyUpstreamError } from "../types/errors.js";
import { errorMessage } from "../utils/debug.js";
import type { OutgoingHeaders } from "./headers.js";

export interface UpstreamClientConfig {
  connectTimeoutMs: number;
  /** Bound on waiting for headers and on gaps between body chunks */
  upstreamTimeoutMs: number;
}

export interface ForwardRequest {
  backend: BackendName;
  method: Dispatcher.HttpMethod;
  url: string;
  headers: OutgoingHeaders;
  body?: Buffer;
  /** Aborted when the client goes away */
  signal?: AbortSignal;
}

export type UpstreamResponse = Dispatcher.ResponseData;

export interface UpstreamClient {
  /**
   * Send a request; resolves once response headers arrive
   * @throws ProxyUpstreamError on connect, timeout or socket failure
   */
  forward(req: ForwardRequest): Promise<UpstreamResponse>;
  close(): Promise<void>;
}

const HTTP_METHODS: ReadonlySet<string> = new Set([
  "GET",
  "HEAD",
  "POST",
  "PUT",
  "DELETE",
  "CONNECT",
  "OPTIONS",
  "TRACE",
  "PATCH",
]);

/**
 * Narrow an inbound method name to one undici can send
 */
export const isHttpMethod = (method: string): method is Dispatcher.HttpMethod =>
  HTTP_METHODS.has(method);

/**
 * Create the upstream client
 */
export const createUpstreamClient = (config: UpstreamClientConfig): UpstreamClient => {
  const agent = new Agent({
    connect: { timeout: config.connectTimeoutMs },
    headersTimeout: config.upstreamTimeoutMs,
    bodyTimeout: config.upstreamTimeoutMs,
  });

  const forward = async (req: ForwardRequest): Promise<UpstreamResponse> => {
    const hasBody = req.body !== undefined && req.body.length > 0;
    try {
      return await request(req.url, {
        dispatcher: agent,
        method: req.method,
        headers: req.headers,
        body: hasBody ? req.body : undefined,
        signal: req.signal,
      });
    } catch (error) {
      throw new ProxyUpstreamError(req.backend, errorMessage(error), error);
    }
  };

  return {
    forward,
    close: () => agent.close(),
  };
};
