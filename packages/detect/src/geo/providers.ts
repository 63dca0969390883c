/**
 * Geo providers: one small matcher per CDN / proxy header convention.
 *
 * A provider matches only when it yields a syntactically valid two-letter
 * country code. Adding a provider means adding one matcher here and its
 * name to GeoProviderName.
 */

import type { GeoProviderName, HeaderMap } from "@footfall/core";
import { canonicalAddress } from "@footfall/core";
import { flyRegionCountry } from "./tables.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Raw location fields read from one provider's headers. */
export interface GeoFields {
  /** Upper-cased, validated ISO 3166-1 alpha-2 code */
  countryCode: string;
  region?: string;
  city?: string;
  /** Unvalidated; range checks happen in the resolver */
  latitude?: number;
  longitude?: number;
  timezone?: string;
  /** Client address as reported by the provider */
  address?: string;
}

export interface GeoProvider {
  readonly name: GeoProviderName;
  /** Fixed confidence of a result from this provider */
  readonly confidence: number;
  tryExtract(headers: HeaderMap): GeoFields | undefined;
}

/** Header names per field; the first non-empty header wins. */
interface HeaderMapping {
  country: readonly string[];
  region?: readonly string[];
  city?: readonly string[];
  latitude?: readonly string[];
  longitude?: readonly string[];
  timezone?: readonly string[];
  address?: readonly string[];
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const COUNTRY_CODE = /^[A-Z]{2}$/;

/** Trim and upper-case a country code; undefined unless it is two letters. */
export function normalizeCountryCode(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  const code = value.trim().toUpperCase();
  return COUNTRY_CODE.test(code) ? code : undefined;
}

function firstHeader(headers: HeaderMap, names: readonly string[] | undefined): string | undefined {
  if (!names) {
    return undefined;
  }
  for (const name of names) {
    const value = headers.getNonEmpty(name);
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

function parseCoordinate(value: string | undefined): number | undefined {
  if (value === undefined || !/^[+-]?\d+(\.\d+)?$/.test(value)) {
    return undefined;
  }
  return Number(value);
}

/** Some CDNs percent-encode city names ("S%C3%A3o%20Paulo"). */
function decodeText(value: string | undefined): string | undefined {
  if (value === undefined || !value.includes("%")) {
    return value;
  }
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

function extractWith(headers: HeaderMap, mapping: HeaderMapping): GeoFields | undefined {
  const countryCode = normalizeCountryCode(firstHeader(headers, mapping.country));
  if (!countryCode) {
    return undefined;
  }

  const fields: GeoFields = { countryCode };
  const region = decodeText(firstHeader(headers, mapping.region));
  const city = decodeText(firstHeader(headers, mapping.city));
  const latitude = parseCoordinate(firstHeader(headers, mapping.latitude));
  const longitude = parseCoordinate(firstHeader(headers, mapping.longitude));
  const timezone = firstHeader(headers, mapping.timezone);
  const address = canonicalAddress(firstHeader(headers, mapping.address));

  if (region !== undefined) fields.region = region;
  if (city !== undefined) fields.city = city;
  if (latitude !== undefined) fields.latitude = latitude;
  if (longitude !== undefined) fields.longitude = longitude;
  if (timezone !== undefined) fields.timezone = timezone;
  if (address !== undefined) fields.address = address;
  return fields;
}

function headerProvider(
  name: GeoProviderName,
  confidence: number,
  mapping: HeaderMapping,
): GeoProvider {
  return {
    name,
    confidence,
    tryExtract: (headers) => extractWith(headers, mapping),
  };
}

// ---------------------------------------------------------------------------
// Providers
// ---------------------------------------------------------------------------

export const cloudflareProvider = headerProvider("cloudflare", 0.95, {
  country: ["cf-ipcountry"],
  region: ["cf-region", "cf-region-code"],
  city: ["cf-ipcity", "cf-city"],
  latitude: ["cf-iplatitude"],
  longitude: ["cf-iplongitude"],
  timezone: ["cf-timezone"],
  address: ["cf-connecting-ip"],
});

export const cloudfrontProvider = headerProvider("cloudfront", 0.92, {
  country: ["cloudfront-viewer-country"],
  region: ["cloudfront-viewer-country-region-name", "cloudfront-viewer-country-region"],
  city: ["cloudfront-viewer-city"],
  latitude: ["cloudfront-viewer-latitude"],
  longitude: ["cloudfront-viewer-longitude"],
  timezone: ["cloudfront-viewer-time-zone"],
  address: ["cloudfront-viewer-address"],
});

export const fastlyProvider = headerProvider("fastly", 0.9, {
  country: ["fastly-geoip-country-code"],
  region: ["fastly-geoip-region"],
  city: ["fastly-geoip-city"],
  latitude: ["fastly-geoip-latitude"],
  longitude: ["fastly-geoip-longitude"],
  address: ["fastly-client-ip"],
});

export const vercelProvider = headerProvider("vercel", 0.85, {
  country: ["x-vercel-ip-country"],
  region: ["x-vercel-ip-country-region", "x-vercel-ip-region"],
  city: ["x-vercel-ip-city"],
  latitude: ["x-vercel-ip-latitude"],
  longitude: ["x-vercel-ip-longitude"],
  timezone: ["x-vercel-ip-timezone"],
});

/**
 * fly.io only reports the edge region that accepted the request, so the
 * country is that region's country.
 */
export const flyIoProvider: GeoProvider = {
  name: "fly_io",
  confidence: 0.8,
  tryExtract(headers) {
    const region = headers.getNonEmpty("fly-region");
    const countryCode = region ? flyRegionCountry(region) : undefined;
    if (!region || !countryCode) {
      return undefined;
    }
    const fields: GeoFields = { countryCode, region: region.toLowerCase() };
    const address = canonicalAddress(headers.getNonEmpty("fly-client-ip"));
    if (address !== undefined) {
      fields.address = address;
    }
    return fields;
  },
};

/** Headers set by hand-configured proxies (nginx geoip, HAProxy). */
export const genericProvider = headerProvider("generic", 0.6, {
  country: ["x-country-code", "x-geo-country", "x-country"],
  region: ["x-region", "x-geo-region", "x-state"],
  city: ["x-city", "x-geo-city"],
  latitude: ["x-latitude", "x-geo-latitude"],
  longitude: ["x-longitude", "x-geo-longitude"],
  timezone: ["x-timezone"],
});

export const GEO_PROVIDERS: Readonly<Record<GeoProviderName, GeoProvider>> = {
  cloudflare: cloudflareProvider,
  cloudfront: cloudfrontProvider,
  fastly: fastlyProvider,
  vercel: vercelProvider,
  fly_io: flyIoProvider,
  generic: genericProvider,
};
