/**
 * @footfall/core
 *
 * Shared core library for footfall, the request-intake pipeline of a
 * server-side visit tracker. Provides request context construction,
 * configuration validation, address parsing, hashing, and the privacy
 * primitives (anonymization, salted hashing, PII redaction).
 *
 * @packageDocumentation
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type {
  // Request
  RequestContext,
  // Admission
  Admission,
  BlockReason,
  RuleScope,
  // Classification
  BotType,
  BotSignal,
  ClassificationResult,
  // Geo
  PrecisionLevel,
  AnonymizationLevel,
  GeoProviderName,
  GeoSource,
  GeoResult,
  // Identity
  Identity,
  // Privacy
  PiiCategory,
} from "./types.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export {
  PACKAGE_VERSION,
  LOG_PREFIX,
  IDENTITY_PREFIX,
  IDENTITY_HASH_LENGTH,
  MAX_FINGERPRINT_USER_AGENT_LENGTH,
  FINGERPRINT_DELIMITER,
  ADDRESS_HASH_LENGTH,
  DEFAULT_SALT_LENGTH,
  DEFAULT_EXCLUDED_METHODS,
  DEFAULT_MAX_PATH_LENGTH,
  DEFAULT_STATIC_EXTENSIONS,
  DEFAULT_STATIC_PREFIXES,
  BUILT_IN_EXCLUDED_PATHS,
  KNOWN_HTTP_METHODS,
  DEFAULT_CACHE_TTL_SECONDS,
  BOT_FREQUENCY_THRESHOLD,
  MAX_CONFIDENCE,
  ADDRESS_TABLE_CONFIDENCE,
  DEFAULT_PRECISION_LEVEL,
} from "./constants.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export {
  FootfallError,
  InvalidConfigError,
  InvalidRuleError,
  describeError,
} from "./errors.js";
export type { RuleIssue } from "./errors.js";

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

export { createConsoleLogger, silentLogger, defaultLogger } from "./logger.js";
export type { Logger } from "./logger.js";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export {
  FootfallConfigSchema,
  RuleSourceSchema,
  RuleListSchema,
  HttpMethodSchema,
  PRECISION_LEVELS,
  GEO_PROVIDER_NAMES,
  DEFAULT_PROVIDER_PRIORITY,
  validateConfig,
  resolveConfig,
  parsePrecision,
} from "./config.js";
export type {
  FootfallConfig,
  ResolvedConfig,
  RuleSource,
  RuleList,
  TenantRulesProvider,
} from "./config.js";

// ---------------------------------------------------------------------------
// Request Context
// ---------------------------------------------------------------------------

export { HeaderMap } from "./headers.js";
export type { HeaderInput } from "./headers.js";
export { createRequestContext, normalizePath } from "./context.js";
export type { RequestContextInit } from "./context.js";

// ---------------------------------------------------------------------------
// Addresses
// ---------------------------------------------------------------------------

export {
  parseAddress,
  parseIPv4,
  parseIPv6,
  unmapIPv4,
  formatAddress,
  canonicalAddress,
  isValidAddress,
  isInCidr,
  isPrivateAddress,
} from "./address.js";
export type { ParsedAddress, IPv4Address, IPv6Address } from "./address.js";

// ---------------------------------------------------------------------------
// Hashing
// ---------------------------------------------------------------------------

export { digest, digestHex, digestBase64, generateSalt, bytesToHex } from "./crypto.js";

// ---------------------------------------------------------------------------
// Privacy
// ---------------------------------------------------------------------------

export {
  anonymizeAddress,
  hashAddress,
  detectPii,
  sanitize,
  sanitizeUserAgent,
} from "./privacy.js";
export type { SanitizeOptions } from "./privacy.js";
