/**
 * Geo resolution from trusted proxy / CDN headers.
 *
 * Providers are tried strictly in priority order and the first one that
 * yields a valid country code wins. Without one, the client address is
 * looked up in the static range table. The result is then enriched,
 * validated, and cut down to the permitted precision. resolve() never
 * throws.
 */

import type {
  AnonymizationLevel,
  GeoProviderName,
  GeoResult,
  GeoSource,
  HeaderInput,
  Logger,
  PrecisionLevel,
} from "@footfall/core";
import {
  ADDRESS_TABLE_CONFIDENCE,
  DEFAULT_PROVIDER_PRIORITY,
  HeaderMap,
  anonymizeAddress,
  canonicalAddress,
  defaultLogger,
  describeError,
  parsePrecision,
} from "@footfall/core";
import type { GeoFields } from "./providers.js";
import { GEO_PROVIDERS } from "./providers.js";
import { lookupAddress } from "./address-table.js";
import { countryName, defaultTimezone } from "./tables.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ResolveOptions {
  /** Direct client address, used for the table fallback and anonymization */
  remoteAddress?: string;
  /** Set `isVpnOrProxy` from header heuristics (default: true) */
  detectVpn?: boolean;
  /** Default: "partial" */
  anonymizeAddressLevel?: AnonymizationLevel;
  /** Provider order (default: every provider, most authoritative first) */
  providerPriority?: readonly GeoProviderName[];
  logger?: Logger;
}

const PRECISION_RANK: Record<PrecisionLevel, number> = {
  country: 0,
  region: 1,
  city: 2,
  full: 3,
};

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/**
 * Resolve a visitor's location from request headers.
 *
 * @param precision - Maximum detail kept; an unknown level falls back to "city"
 * @param privacyMode - Forces country precision and full address anonymization
 *
 * @example
 * ```ts
 * resolve({ "cf-ipcountry": "de", "cf-ipcity": "Berlin" }, "city", false);
 * // { countryCode: "DE", countryName: "Germany", city: "Berlin",
 * //   timezone: "Europe/Berlin", provider: "cloudflare", confidence: 0.95 }
 * ```
 */
export function resolve(
  headers: HeaderInput | undefined,
  precision: PrecisionLevel | string,
  privacyMode: boolean,
  options: ResolveOptions = {},
): GeoResult {
  const logger = options.logger ?? defaultLogger;
  try {
    return resolveUnsafe(HeaderMap.from(headers), parsePrecision(precision, logger), privacyMode, options);
  } catch (err) {
    logger.error("Geo resolution failed", { error: describeError(err) });
    return { provider: "none", confidence: 0 };
  }
}

function resolveUnsafe(
  headers: HeaderMap,
  precision: PrecisionLevel,
  privacyMode: boolean,
  options: ResolveOptions,
): GeoResult {
  const remoteAddress = canonicalAddress(options.remoteAddress);
  const { fields, provider, confidence } = extract(
    headers,
    remoteAddress,
    options.providerPriority ?? DEFAULT_PROVIDER_PRIORITY,
  );

  const result: GeoResult = { provider, confidence };

  if (fields) {
    result.countryCode = fields.countryCode;
    const name = countryName(fields.countryCode);
    if (name !== undefined) result.countryName = name;
    if (fields.region !== undefined) result.region = fields.region;
    if (fields.city !== undefined) result.city = fields.city;
    if (fields.timezone !== undefined) result.timezone = fields.timezone;
    if (validCoordinates(fields.latitude, fields.longitude)) {
      result.latitude = fields.latitude;
      result.longitude = fields.longitude;
    }
  }

  truncate(result, privacyMode ? "country" : precision);

  if (result.countryCode && result.timezone === undefined) {
    const timezone = defaultTimezone(result.countryCode, result.city);
    if (timezone !== undefined) result.timezone = timezone;
  }

  const address = fields?.address ?? remoteAddress;
  if (address) {
    result.anonymizedAddress = anonymizeAddress(
      address,
      addressLevel(options.anonymizeAddressLevel ?? "partial", privacyMode),
    );
  }

  if (options.detectVpn ?? true) {
    result.isVpnOrProxy = looksLikeProxy(headers);
  }

  return result;
}

function extract(
  headers: HeaderMap,
  remoteAddress: string | undefined,
  priority: readonly GeoProviderName[],
): { fields?: GeoFields; provider: GeoSource; confidence: number } {
  for (const name of priority) {
    const provider = GEO_PROVIDERS[name];
    const fields = provider.tryExtract(headers);
    if (fields) {
      return { fields, provider: provider.name, confidence: provider.confidence };
    }
  }

  const fields = lookupAddress(remoteAddress);
  if (fields) {
    return { fields, provider: "address_table", confidence: ADDRESS_TABLE_CONFIDENCE };
  }

  return { provider: "none", confidence: 0 };
}

// ---------------------------------------------------------------------------
// Post-processing
// ---------------------------------------------------------------------------

function validCoordinates(latitude: number | undefined, longitude: number | undefined): boolean {
  return (
    latitude !== undefined &&
    longitude !== undefined &&
    Number.isFinite(latitude) &&
    Number.isFinite(longitude) &&
    latitude >= -90 &&
    latitude <= 90 &&
    longitude >= -180 &&
    longitude <= 180
  );
}

/** Clear every field finer than `precision`. */
function truncate(result: GeoResult, precision: PrecisionLevel): void {
  const rank = PRECISION_RANK[precision];
  if (rank < PRECISION_RANK.full) {
    delete result.latitude;
    delete result.longitude;
  }
  if (rank < PRECISION_RANK.city) {
    delete result.city;
  }
  if (rank < PRECISION_RANK.region) {
    delete result.region;
  }
}

/** Privacy mode always anonymizes at the strongest level. */
function addressLevel(configured: AnonymizationLevel, privacyMode: boolean): AnonymizationLevel {
  return privacyMode ? "full" : configured;
}

// ---------------------------------------------------------------------------
// VPN / proxy heuristics
// ---------------------------------------------------------------------------

/**
 * Whether the request passed through a proxy, as far as headers tell:
 * a Via header, an explicit VPN / proxy service header, or a forwarding
 * chain with more than one hop.
 */
export function looksLikeProxy(input: HeaderInput | undefined): boolean {
  const headers = HeaderMap.from(input);
  if (
    headers.getNonEmpty("via") !== undefined ||
    headers.getNonEmpty("x-vpn-service") !== undefined ||
    headers.getNonEmpty("x-proxy-service") !== undefined
  ) {
    return true;
  }

  const forwarded = headers.getNonEmpty("forwarded");
  if (forwarded && (forwarded.match(/\bfor=/gi) ?? []).length > 1) {
    return true;
  }

  const forwardedFor = headers.getNonEmpty("x-forwarded-for");
  if (forwardedFor) {
    const hops = forwardedFor.split(",").filter((hop) => hop.trim() !== "");
    if (hops.length > 1) {
      return true;
    }
  }

  return false;
}

// ---------------------------------------------------------------------------
// Distance
// ---------------------------------------------------------------------------

const EARTH_RADIUS_KM = 6371;

const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;

/**
 * Great-circle distance between two results, or undefined when either
 * lacks coordinates.
 */
export function distanceKm(
  a: Pick<GeoResult, "latitude" | "longitude">,
  b: Pick<GeoResult, "latitude" | "longitude">,
): number | undefined {
  if (
    a.latitude === undefined ||
    a.longitude === undefined ||
    b.latitude === undefined ||
    b.longitude === undefined
  ) {
    return undefined;
  }
  const dLat = toRadians(b.latitude - a.latitude);
  const dLon = toRadians(b.longitude - a.longitude);
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(a.latitude)) * Math.cos(toRadians(b.latitude)) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.sqrt(h));
}
