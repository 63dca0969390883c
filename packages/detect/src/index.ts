/**
 * @footfall/detect - Request intake decisions.
 *
 * Decides, per request, whether it should be recorded (route admission),
 * whether it comes from an automated agent (bot classification), where it
 * comes from (proxy / CDN header geo), and who it is (cookie-free
 * fingerprint identity). Nothing here performs I/O or throws per request.
 *
 * @example Full pipeline
 * ```ts
 * import { createRequestContext } from "@footfall/core";
 * import { createPipeline } from "@footfall/detect";
 *
 * const pipeline = createPipeline({ privacyMode: true, rules: { exclude: ["/admin/*"] } });
 *
 * const result = pipeline.evaluate(createRequestContext({
 *   method: "GET",
 *   path: "/pricing",
 *   headers: { "user-agent": ua, "cf-ipcountry": "NL" },
 *   remoteAddress: "203.0.113.9",
 * }));
 * ```
 *
 * @example Individual components
 * ```ts
 * import { classify, fingerprint, resolve } from "@footfall/detect";
 *
 * classify(context).botType;                    // "search_engine"
 * resolve(headers, "country", false).countryCode; // "NL"
 * fingerprint(context, false);                  // "fp_..."
 * ```
 */

// Rules
export { RuleEngine, createRuleEngine, assertValidRules, describeRule } from "./rules/engine.js";
export type { RuleEngineOptions, RuleEngineStats } from "./rules/engine.js";

export {
  compileRule,
  compileRules,
  matchesRule,
  validateRules,
  globToRegexSource,
} from "./rules/compiler.js";
export type {
  CompiledRule,
  RuleKind,
  RuleValidationError,
  RuleValidationResult,
} from "./rules/compiler.js";

export { RuleSetCache, GLOBAL_SCOPE_KEY, tenantScopeKey } from "./rules/cache.js";
export type { RuleSet, CacheEntry, CacheStats, RuleSetCacheOptions } from "./rules/cache.js";

// Bots
export {
  classify,
  createBotClassifier,
  clampConfidence,
  BOT_PATTERNS,
  BOT_ADDRESS_PREFIXES,
} from "./bots.js";
export type { BotPattern, BotClassifier, BotClassifierOptions } from "./bots.js";

// Geo
export { resolve, looksLikeProxy, distanceKm } from "./geo/resolver.js";
export type { ResolveOptions } from "./geo/resolver.js";

export {
  GEO_PROVIDERS,
  cloudflareProvider,
  cloudfrontProvider,
  fastlyProvider,
  vercelProvider,
  flyIoProvider,
  genericProvider,
  normalizeCountryCode,
} from "./geo/providers.js";
export type { GeoFields, GeoProvider } from "./geo/providers.js";

export { lookupAddress } from "./geo/address-table.js";
export { countryName, defaultTimezone, flyRegionCountry } from "./geo/tables.js";

// Identity
export {
  fingerprint,
  fingerprintComponents,
  normalizeUserAgent,
  detectPlatform,
  detectDeviceType,
} from "./identity.js";
export type { Platform, DeviceType } from "./identity.js";

// Client address
export { extractClientAddress, isTrustedProxy, detectProxyType } from "./client-address.js";
export type { ClientAddressOptions, ProxyType } from "./client-address.js";

// Pipeline
export { createPipeline } from "./pipeline.js";
export type { IntakePipeline, IntakeResult, EvaluateOptions, PipelineOptions } from "./pipeline.js";
