/**
 * @footfall/core - Request Context
 *
 * Normalizes whatever the host has at hand into the immutable
 * `RequestContext` the pipeline reads. Malformed pieces are dropped rather
 * than rejected: an unparseable address becomes `undefined`, a missing
 * method becomes "GET", a missing path becomes "/".
 */

import type { RequestContext } from "./types.js";
import type { HeaderInput } from "./headers.js";
import { HeaderMap } from "./headers.js";
import { canonicalAddress } from "./address.js";

/** Loosely-typed input accepted by `createRequestContext()`. */
export interface RequestContextInit {
  method?: string;
  /** Path or full request target; query string and fragment are removed */
  path?: string;
  headers?: HeaderInput;
  remoteAddress?: string;
  requestFrequency?: number;
}

/**
 * Strip query string and fragment, and make sure the path starts with "/".
 * Absolute URLs ("https://host/a?b") are reduced to their path.
 */
export function normalizePath(raw: string | undefined): string {
  if (typeof raw !== "string" || raw === "") {
    return "/";
  }

  let path = raw;
  const scheme = /^[a-z][a-z0-9+.-]*:\/\/[^/?#]*/i.exec(path);
  if (scheme) {
    path = path.slice(scheme[0].length);
  }

  const cut = path.search(/[?#]/);
  if (cut !== -1) {
    path = path.slice(0, cut);
  }

  if (!path.startsWith("/")) {
    path = `/${path}`;
  }
  return path;
}

/**
 * Build a frozen RequestContext.
 *
 * @example
 * ```ts
 * const context = createRequestContext({
 *   method: "get",
 *   path: "/pricing?ref=nav",
 *   headers: req.headers,
 *   remoteAddress: "203.0.113.9",
 * });
 * context.method; // "GET"
 * context.path;   // "/pricing"
 * ```
 */
export function createRequestContext(init: RequestContextInit = {}): RequestContext {
  const method =
    typeof init.method === "string" && init.method.trim() !== ""
      ? init.method.trim().toUpperCase()
      : "GET";

  const frequency = init.requestFrequency;
  const requestFrequency =
    typeof frequency === "number" && Number.isFinite(frequency) && frequency >= 0
      ? frequency
      : undefined;

  return Object.freeze({
    method,
    path: normalizePath(init.path),
    headers: HeaderMap.from(init.headers),
    remoteAddress: canonicalAddress(init.remoteAddress),
    requestFrequency,
  });
}
