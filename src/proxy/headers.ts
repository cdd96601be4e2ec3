/**
 * Header and URL Rewriting
 *
 * What crosses the proxy in each direction, and where a request lands on
 * the chosen backend.
 */

import { err, ok, type Result } from "neverthrow";
import { ValidationError } from "../types/errors.js";

/**
 * Headers scoped to one connection (RFC 9110 §7.6.1)
 */
export const HOP_BY_HOP_HEADERS: ReadonlySet<string> = new Set([
  "connection",
  "keep-alive",
  "proxy-authenticate",
  "proxy-authorization",
  "te",
  "trailer",
  "trailers",
  "transfer-encoding",
  "upgrade",
]);

type HeaderValue = string | string[] | undefined;

export type OutgoingHeaders = Record<string, string | string[]>;

/**
 * Extra names a Connection header declares hop-by-hop
 */
const connectionTokens = (headers: Record<string, HeaderValue>): Set<string> => {
  const value = headers["connection"];
  const raw = Array.isArray(value) ? value.join(",") : value ?? "";
  return new Set(
    raw
      .split(",")
      .map((token) => token.trim().toLowerCase())
      .filter((token) => token !== "")
  );
};

const copyExcept = (
  headers: Record<string, HeaderValue>,
  drop: (name: string) => boolean
): OutgoingHeaders => {
  const result: OutgoingHeaders = {};
  for (const [name, value] of Object.entries(headers)) {
    const lower = name.toLowerCase();
    if (value === undefined || drop(lower)) continue;
    result[lower] = value;
  }
  return result;
};

export interface RequestHeaderOptions {
  /** Header carrying the router's own API key */
  apiKeyHeader: string;
  /** Drop the client's Authorization (the router injects its own) */
  stripAuthorization: boolean;
}

/**
 * Headers forwarded from the client to the backend
 */
export const filterRequestHeaders = (
  headers: Record<string, HeaderValue>,
  options: RequestHeaderOptions
): OutgoingHeaders => {
  const declared = connectionTokens(headers);
  const apiKeyHeader = options.apiKeyHeader.toLowerCase();

  return copyExcept(
    headers,
    (name) =>
      HOP_BY_HOP_HEADERS.has(name) ||
      declared.has(name) ||
      name === "host" ||
      name === "content-length" ||
      name === apiKeyHeader ||
      (options.stripAuthorization && name === "authorization")
  );
};

/**
 * Headers relayed from the backend to the client
 *
 * Content-Length is dropped because the body is re-streamed.
 */
export const filterResponseHeaders = (
  headers: Record<string, HeaderValue>
): OutgoingHeaders => {
  const declared = connectionTokens(headers);
  return copyExcept(
    headers,
    (name) => HOP_BY_HOP_HEADERS.has(name) || declared.has(name) || name === "content-length"
  );
};

const ABSOLUTE_URL = /^[a-z][a-z0-9+.-]*:\/\//i;

const isTraversal = (segment: string): boolean => {
  const decoded = segment.replace(/%2e/gi, ".");
  return decoded === "." || decoded === "..";
};

/**
 * Reduce a client path to plain segments
 *
 * Any scheme and host are discarded, and empty, "." and ".." segments
 * (encoded or not) are dropped, so the result cannot climb out of the
 * backend's base path.
 */
export const sanitizePath = (path: string): string => {
  let pathname = path.split("?")[0] ?? "";
  if (ABSOLUTE_URL.test(pathname)) {
    pathname = new URL(pathname).pathname;
  }
  return pathname
    .split("/")
    .filter((segment) => segment !== "" && !isTraversal(segment))
    .join("/");
};

/**
 * Build the backend URL for a client request
 *
 * @param base - Backend base URL, possibly with a path
 * @param path - Client request path
 * @param search - Raw query string without the leading "?"
 */
export const buildProxyUrl = (
  base: string,
  path: string,
  search?: string
): Result<string, ValidationError> => {
  let baseUrl: URL;
  let target: URL;
  try {
    baseUrl = new URL(base);
    target = new URL(`${base.replace(/\/+$/, "")}/${sanitizePath(path)}`);
  } catch {
    return err(new ValidationError([`Cannot build a backend URL from path "${path}"`]));
  }
  if (search) {
    target.search = search;
  }
  if (target.host !== baseUrl.host || target.protocol !== baseUrl.protocol) {
    return err(new ValidationError([`URL host mismatch: expected ${baseUrl.host}`]));
  }
  return ok(target.toString());
};
