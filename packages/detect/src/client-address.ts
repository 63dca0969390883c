/**
 * Client address extraction from proxy headers.
 *
 * Forwarding headers are trivially forged, so they are read only when the
 * direct peer is one of the trusted proxies. With no trusted proxies
 * configured, `trustProxyHeaders` decides whether headers are read at all.
 */

import type { HeaderInput } from "@footfall/core";
import { HeaderMap, canonicalAddress, isInCidr, parseAddress } from "@footfall/core";

export interface ClientAddressOptions {
  /** Addresses or CIDR blocks of the proxies in front of the app */
  trustedProxies?: readonly string[];
  /** Read proxy headers when no trusted proxies are configured (default: true) */
  trustProxyHeaders?: boolean;
}

/** Single-address headers, most specific first. */
const CLIENT_ADDRESS_HEADERS = [
  "cf-connecting-ip",
  "true-client-ip",
  "fastly-client-ip",
  "fly-client-ip",
  "x-real-ip",
] as const;

export type ProxyType =
  | "cloudflare"
  | "cloudfront"
  | "load_balancer"
  | "nginx"
  | "generic_proxy"
  | "direct";

/** Whether `address` is covered by any entry of `trusted`. */
export function isTrustedProxy(address: string | undefined, trusted: readonly string[]): boolean {
  const parsed = parseAddress(address);
  if (!parsed) {
    return false;
  }
  return trusted.some((entry) => isInCidr(parsed, entry.trim()));
}

/**
 * Best guess at the real client address.
 *
 * `x-forwarded-for` is walked right to left when trusted proxies are
 * configured: each proxy appends the address it received the request from,
 * so the first hop that is not a trusted proxy is the client. Without a
 * trusted list the leftmost hop is used. Unparseable values are skipped.
 *
 * @example
 * ```ts
 * extractClientAddress(
 *   { "x-forwarded-for": "203.0.113.7, 10.0.0.2" },
 *   "10.0.0.1",
 *   { trustedProxies: ["10.0.0.0/8"] },
 * );
 * // "203.0.113.7"
 * ```
 */
export function extractClientAddress(
  input: HeaderInput | undefined,
  remoteAddress: string | undefined,
  options: ClientAddressOptions = {},
): string | undefined {
  const peer = canonicalAddress(remoteAddress);
  const trusted = options.trustedProxies ?? [];

  const readHeaders =
    trusted.length > 0 ? isTrustedProxy(peer, trusted) : (options.trustProxyHeaders ?? true);
  if (!readHeaders) {
    return peer;
  }

  const headers = HeaderMap.from(input);

  for (const name of CLIENT_ADDRESS_HEADERS) {
    const address = canonicalAddress(headers.getNonEmpty(name));
    if (address) {
      return address;
    }
  }

  const forwardedFor = headers.getNonEmpty("x-forwarded-for");
  if (forwardedFor) {
    const hops = forwardedFor
      .split(",")
      .map((hop) => canonicalAddress(hop))
      .filter((hop): hop is string => hop !== undefined);
    // Without a trusted list there is nothing to skip; the originating hop is first.
    const client =
      trusted.length === 0
        ? hops[0]
        : [...hops].reverse().find((hop) => !isTrustedProxy(hop, trusted));
    if (client) {
      return client;
    }
  }

  return peer;
}

/** What kind of proxy, if any, the request headers point to. */
export function detectProxyType(input: HeaderInput | undefined): ProxyType {
  const headers = HeaderMap.from(input);
  if (headers.has("cf-ray") || headers.has("cf-connecting-ip")) return "cloudflare";
  if (headers.has("cloudfront-viewer-country")) return "cloudfront";
  if (headers.has("x-forwarded-for") && headers.has("x-forwarded-proto")) return "load_balancer";
  if (headers.has("x-real-ip")) return "nginx";
  if (headers.has("x-forwarded-for")) return "generic_proxy";
  return "direct";
}
