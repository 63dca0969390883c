/**
 * @footfall/core - Type Definitions
 *
 * Types shared by the intake pipeline: the request context the host builds,
 * and the four results it receives back (admission, classification, geo,
 * identity).
 */

import type { HeaderMap } from "./headers.js";

// ---------------------------------------------------------------------------
// Request Context
// ---------------------------------------------------------------------------

/**
 * Everything the pipeline knows about one inbound request. Built by the host
 * through `createRequestContext()` and never mutated afterwards.
 */
export interface RequestContext {
  /** Upper-cased HTTP method */
  readonly method: string;
  /** Request path without query string or fragment */
  readonly path: string;
  /** Case-insensitive headers, first value wins per name */
  readonly headers: HeaderMap;
  /** Canonical client address, when one could be parsed */
  readonly remoteAddress?: string;
  /** Requests per minute from this address, as counted by the host */
  readonly requestFrequency?: number;
}

// ---------------------------------------------------------------------------
// Admission
// ---------------------------------------------------------------------------

/** Why a request was not admitted. */
export type BlockReason =
  | "method_excluded"
  | "path_too_long"
  | "static_asset"
  | "built_in_path"
  | "do_not_track"
  | "tenant_blocklist"
  | "not_in_tenant_allowlist"
  | "global_blocklist"
  | "not_in_global_allowlist";

/** Outcome of the route admission check. */
export type Admission =
  | { decision: "allow" }
  | { decision: "block"; reason: BlockReason; detail?: string };

/** Rule scope: the global rule set or one tenant's rule set. */
export type RuleScope = "global" | { tenant: string };

// ---------------------------------------------------------------------------
// Bot Classification
// ---------------------------------------------------------------------------

export type BotType =
  | "search_engine"
  | "social_media"
  | "security"
  | "seo"
  | "monitoring"
  | "unknown_bot"
  | "human";

/** Names of the checks that can mark a request as automated. */
export type BotSignal = "user-agent" | "address" | "frequency";

export interface ClassificationResult {
  isBot: boolean;
  botType: BotType;
  /** Name from the matched user-agent entry, if any */
  botName?: string;
  /** Confidence in the verdict, within [0, 0.99] */
  confidence: number;
  /** Checks that fired, in evaluation order */
  signals: BotSignal[];
}

// ---------------------------------------------------------------------------
// Geo
// ---------------------------------------------------------------------------

/** Maximum granularity of location detail permitted in a result. */
export type PrecisionLevel = "country" | "region" | "city" | "full";

/** Strength of address anonymization. */
export type AnonymizationLevel = "none" | "partial" | "full";

/** Header conventions the geo resolver knows how to read. */
export type GeoProviderName =
  | "cloudflare"
  | "cloudfront"
  | "fastly"
  | "vercel"
  | "fly_io"
  | "generic";

/** Where a geo result came from. */
export type GeoSource = GeoProviderName | "address_table" | "none";

export interface GeoResult {
  /** ISO 3166-1 alpha-2 code, always two uppercase letters */
  countryCode?: string;
  countryName?: string;
  region?: string;
  city?: string;
  /** Present only at "full" precision */
  latitude?: number;
  /** Present only at "full" precision */
  longitude?: number;
  timezone?: string;
  provider: GeoSource;
  confidence: number;
  anonymizedAddress?: string;
  /** Set only when VPN/proxy detection is enabled */
  isVpnOrProxy?: boolean;
}

// ---------------------------------------------------------------------------
// Identity
// ---------------------------------------------------------------------------

/** Cookie-free visitor identity: "fp_" followed by 16 hex characters. */
export type Identity = `fp_${string}`;

// ---------------------------------------------------------------------------
// Privacy
// ---------------------------------------------------------------------------

export type PiiCategory =
  | "email"
  | "phone"
  | "national_id"
  | "payment_card"
  | "ip_address";
