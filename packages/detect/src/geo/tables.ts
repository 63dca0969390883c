/**
 * Static lookup tables for the geo resolver: country names and default
 * timezones, fly.io region codes, and the address ranges used when no
 * provider headers are present. Loaded once from data/geo-tables.json and
 * validated with zod.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";

const CountryCodeSchema = z.string().regex(/^[A-Z]{2}$/);

const GeoTablesSchema = z.object({
  countries: z.record(
    CountryCodeSchema,
    z.object({ name: z.string().min(1), timezone: z.string().min(1) }),
  ),
  cityTimezones: z.array(
    z.object({ country: CountryCodeSchema, city: z.string().min(1), timezone: z.string().min(1) }),
  ),
  flyRegions: z.record(z.string().regex(/^[a-z]{3}$/), CountryCodeSchema),
  addressRanges: z.array(z.object({ cidr: z.string().min(1), countryCode: CountryCodeSchema })),
});

export type GeoTables = z.infer<typeof GeoTablesSchema>;

function loadTables(): GeoTables {
  const raw: unknown = JSON.parse(
    readFileSync(new URL("./data/geo-tables.json", import.meta.url), "utf8"),
  );
  return GeoTablesSchema.parse(raw);
}

export const GEO_TABLES: GeoTables = loadTables();

const countries = new Map(Object.entries(GEO_TABLES.countries));
const flyRegions = new Map(Object.entries(GEO_TABLES.flyRegions));
const cityTimezones = new Map(
  GEO_TABLES.cityTimezones.map((e) => [`${e.country}|${e.city.toLowerCase()}`, e.timezone]),
);

export function countryName(countryCode: string): string | undefined {
  return countries.get(countryCode)?.name;
}

/** Timezone for a city when known, otherwise the country's default. */
export function defaultTimezone(countryCode: string, city?: string): string | undefined {
  if (city) {
    const zone = cityTimezones.get(`${countryCode}|${city.toLowerCase()}`);
    if (zone) {
      return zone;
    }
  }
  return countries.get(countryCode)?.timezone;
}

/** Country of a fly.io region code ("lhr" -> "GB"). */
export function flyRegionCountry(region: string): string | undefined {
  return flyRegions.get(region.trim().toLowerCase());
}
