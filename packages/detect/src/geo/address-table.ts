/**
 * Fallback geolocation from a small static table of well-known public
 * address ranges. Used only when no provider header matched.
 */

import { isInCidr, isPrivateAddress, parseAddress } from "@footfall/core";
import type { GeoFields } from "./providers.js";
import { GEO_TABLES } from "./tables.js";

/**
 * Look an address up in the static range table. Private, loopback and
 * otherwise unroutable addresses are never geolocated.
 */
export function lookupAddress(address: string | undefined): GeoFields | undefined {
  const parsed = parseAddress(address);
  if (!parsed || isPrivateAddress(address)) {
    return undefined;
  }
  const range = GEO_TABLES.addressRanges.find((entry) => isInCidr(parsed, entry.cidr));
  return range ? { countryCode: range.countryCode } : undefined;
}
