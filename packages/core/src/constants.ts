/**
 * @footfall/core - Constants
 *
 * Default values, prefixes, and built-in tables shared by every package.
 */

// ---------------------------------------------------------------------------
// Version
// ---------------------------------------------------------------------------

/** Current package version */
export const PACKAGE_VERSION = "0.1.0";

/** Prefix used by the default console logger */
export const LOG_PREFIX = "[footfall]";

// ---------------------------------------------------------------------------
// Identity & Hashing
// ---------------------------------------------------------------------------

/** Prefix for visitor identities */
export const IDENTITY_PREFIX = "fp_";

/** Number of hex characters kept from the identity digest */
export const IDENTITY_HASH_LENGTH = 16;

/** Maximum user-agent length that contributes to an identity */
export const MAX_FINGERPRINT_USER_AGENT_LENGTH = 200;

/** Delimiter between identity components */
export const FINGERPRINT_DELIMITER = "|";

/** Number of base64 characters kept from an address hash */
export const ADDRESS_HASH_LENGTH = 16;

/** Default length of generated salts */
export const DEFAULT_SALT_LENGTH = 32;

// ---------------------------------------------------------------------------
// Route Admission Defaults
// ---------------------------------------------------------------------------

/** Methods never recorded */
export const DEFAULT_EXCLUDED_METHODS = ["OPTIONS", "HEAD", "TRACE"] as const;

/** Longest path (in UTF-8 bytes) that is still recorded */
export const DEFAULT_MAX_PATH_LENGTH = 2000;

/** Static asset extensions never recorded */
export const DEFAULT_STATIC_EXTENSIONS = [
  ".css", ".js", ".png", ".jpg", ".jpeg", ".gif", ".svg", ".ico", ".woff", ".woff2",
  ".ttf", ".eot", ".map", ".webp", ".avif", ".pdf", ".txt", ".xml", ".json",
] as const;

/** Static asset path prefixes never recorded */
export const DEFAULT_STATIC_PREFIXES = [
  "/assets/",
  "/static/",
  "/images/",
  "/_next/static/",
  "/favicon",
] as const;

/** Health-check and metrics paths. These are not configurable. */
export const BUILT_IN_EXCLUDED_PATHS: readonly string[] = [
  "/health", "/healthz", "/ping", "/status", "/ready", "/live",
  "/metrics", "/stats", "/telemetry",
];

/** HTTP methods accepted in method-restricted rules */
export const KNOWN_HTTP_METHODS: readonly string[] = [
  "GET", "POST", "PUT", "PATCH", "DELETE", "HEAD", "OPTIONS", "TRACE", "CONNECT",
];

/** Default TTL of compiled rule sets, in seconds */
export const DEFAULT_CACHE_TTL_SECONDS = 3600;

// ---------------------------------------------------------------------------
// Bot Classification
// ---------------------------------------------------------------------------

/** Requests per minute above which traffic looks automated */
export const BOT_FREQUENCY_THRESHOLD = 60;

/** Ceiling applied to every confidence score */
export const MAX_CONFIDENCE = 0.99;

// ---------------------------------------------------------------------------
// Geo
// ---------------------------------------------------------------------------

/** Confidence of a result from the static address table */
export const ADDRESS_TABLE_CONFIDENCE = 0.3;

/** Default precision when none or an invalid one is configured */
export const DEFAULT_PRECISION_LEVEL = "city" as const;
