/**
 * @footfall/core - Configuration Validation
 *
 * Zod schemas for validating FootfallConfig. Validation happens once, when
 * the pipeline is created; per-request code only ever sees a ResolvedConfig.
 */

import { z } from "zod";
import { InvalidConfigError } from "./errors.js";
import type { Logger } from "./logger.js";
import { defaultLogger } from "./logger.js";
import type { AnonymizationLevel, GeoProviderName, PrecisionLevel } from "./types.js";
import {
  DEFAULT_CACHE_TTL_SECONDS,
  DEFAULT_EXCLUDED_METHODS,
  DEFAULT_MAX_PATH_LENGTH,
  DEFAULT_PRECISION_LEVEL,
  DEFAULT_STATIC_EXTENSIONS,
  DEFAULT_STATIC_PREFIXES,
  KNOWN_HTTP_METHODS,
} from "./constants.js";

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

export const PRECISION_LEVELS = ["country", "region", "city", "full"] as const;

export const GEO_PROVIDER_NAMES = [
  "cloudflare",
  "cloudfront",
  "fastly",
  "vercel",
  "fly_io",
  "generic",
] as const;

/** Default order in which geo providers are tried. */
export const DEFAULT_PROVIDER_PRIORITY: readonly GeoProviderName[] = GEO_PROVIDER_NAMES;

/** Schema for an HTTP method name used in a rule restriction. */
export const HttpMethodSchema = z
  .string()
  .refine((m) => KNOWN_HTTP_METHODS.includes(m.trim().toUpperCase()), {
    message: `Method must be one of ${KNOWN_HTTP_METHODS.join(", ")}`,
  });

const PatternSchema = z.union([
  z.string().min(1, "Rule pattern must not be empty"),
  z.instanceof(RegExp),
]);

/**
 * Schema for one raw rule: a glob string, a RegExp, a pattern with a method
 * restriction, or a regular-expression source string (for rules that come
 * from JSON, where RegExp literals cannot be written).
 */
export const RuleSourceSchema = z.union([
  PatternSchema,
  z
    .object({
      pattern: PatternSchema,
      methods: z.array(HttpMethodSchema).optional(),
    })
    .strict(),
  z
    .object({
      regex: z.string().min(1, "Regex source must not be empty"),
      flags: z.string().optional(),
      methods: z.array(HttpMethodSchema).optional(),
    })
    .strict(),
]);

/** Schema for the allow/block lists of one scope. */
export const RuleListSchema = z
  .object({
    includeOnly: z.array(RuleSourceSchema).optional(),
    exclude: z.array(RuleSourceSchema).optional(),
  })
  .strict();

export type RuleSource = z.infer<typeof RuleSourceSchema>;
export type RuleList = z.infer<typeof RuleListSchema>;

/** Looks up a tenant's rules; `undefined` means the tenant has none. */
export type TenantRulesProvider = (tenant: string) => RuleList | undefined;

const LoggerSchema = z.custom<Logger>(
  (value) =>
    typeof value === "object" &&
    value !== null &&
    "debug" in value &&
    typeof value.debug === "function" &&
    "warn" in value &&
    typeof value.warn === "function" &&
    "error" in value &&
    typeof value.error === "function",
  { message: "logger must provide debug, warn and error functions" },
);

const TenantRulesSchema = z.union([
  z.record(RuleListSchema),
  z.custom<TenantRulesProvider>((value) => typeof value === "function", {
    message: "tenantRules must be a record of rule lists or a function",
  }),
]);

/** Full schema for FootfallConfig. */
export const FootfallConfigSchema = z
  .object({
    providerPriority: z
      .array(z.enum(GEO_PROVIDER_NAMES))
      .min(1, "providerPriority must name at least one provider")
      .optional(),
    // Checked leniently by resolveConfig(): an unknown level falls back.
    precisionLevel: z.string().optional(),
    privacyMode: z.boolean().optional(),
    detectVpn: z.boolean().optional(),
    anonymizeAddressLevel: z.enum(["none", "partial", "full"]).optional(),
    cacheTtlSeconds: z.number().positive("cacheTtlSeconds must be positive").optional(),
    excludeMethods: z.array(HttpMethodSchema).optional(),
    excludeExtensions: z
      .array(z.string().regex(/^\.[^/]+$/, "Extensions must start with a dot"))
      .optional(),
    excludePrefixes: z
      .array(z.string().startsWith("/", "Static prefixes must start with /"))
      .optional(),
    maxPathLength: z.number().int().positive("maxPathLength must be a positive integer").optional(),
    trustedProxies: z.array(z.string().min(1)).optional(),
    trustProxyHeaders: z.boolean().optional(),
    respectDoNotTrack: z.boolean().optional(),
    rules: RuleListSchema.optional(),
    strictRules: z.boolean().optional(),
    tenantRules: TenantRulesSchema.optional(),
    addressSalt: z.string().min(8, "addressSalt must be at least 8 characters").optional(),
    logger: LoggerSchema.optional(),
  })
  .strict();

export type FootfallConfig = z.infer<typeof FootfallConfigSchema>;

// ---------------------------------------------------------------------------
// Resolved Config (with all defaults applied)
// ---------------------------------------------------------------------------

/** FootfallConfig with all defaults resolved. */
export interface ResolvedConfig {
  providerPriority: readonly GeoProviderName[];
  precisionLevel: PrecisionLevel;
  privacyMode: boolean;
  detectVpn: boolean;
  anonymizeAddressLevel: AnonymizationLevel;
  cacheTtlSeconds: number;
  /** Upper-cased */
  excludeMethods: ReadonlySet<string>;
  /** Lower-cased */
  excludeExtensions: readonly string[];
  excludePrefixes: readonly string[];
  maxPathLength: number;
  trustedProxies: readonly string[];
  /**
   * Read client-address headers (`x-forwarded-for`, `cf-connecting-ip`, ...)
   * when `trustedProxies` is empty. Any client can set these headers, so
   * with this on and no trusted list the address that feeds geo, bot checks
   * and the address hash is whatever the client claims. Apps reachable
   * other than through their proxy should configure `trustedProxies` or
   * turn this off.
   */
  trustProxyHeaders: boolean;
  /** Block requests carrying `DNT: 1` or `Sec-GPC: 1` */
  respectDoNotTrack: boolean;
  rules: { includeOnly: readonly RuleSource[]; exclude: readonly RuleSource[] };
  /** Reject global regex rules that do not compile instead of matching them exactly */
  strictRules: boolean;
  tenantRules: TenantRulesProvider;
  addressSalt?: string;
  logger: Logger;
}

// ---------------------------------------------------------------------------
// Validation & Resolution
// ---------------------------------------------------------------------------

/**
 * Validate a FootfallConfig object against the Zod schema.
 * Throws InvalidConfigError if validation fails.
 */
export function validateConfig(config: unknown): FootfallConfig {
  const result = FootfallConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new InvalidConfigError(
      `Configuration validation failed:\n  - ${issues.join("\n  - ")}`,
      { issues: result.error.issues },
    );
  }
  return result.data;
}

/**
 * Read a precision level, falling back to "city" (with a warning) when the
 * value is not one of the four known levels.
 */
export function parsePrecision(value: unknown, logger: Logger = defaultLogger): PrecisionLevel {
  if (value === undefined) {
    return DEFAULT_PRECISION_LEVEL;
  }
  const normalized = typeof value === "string" ? value.trim().toLowerCase() : value;
  const match = PRECISION_LEVELS.find((level) => level === normalized);
  if (match) {
    return match;
  }
  logger.warn(`Unknown precision level ${JSON.stringify(value)}, using "${DEFAULT_PRECISION_LEVEL}"`);
  return DEFAULT_PRECISION_LEVEL;
}

function tenantProvider(
  source: FootfallConfig["tenantRules"],
): TenantRulesProvider {
  if (source === undefined) {
    return () => undefined;
  }
  if (typeof source === "function") {
    return source;
  }
  const table = new Map(Object.entries(source));
  return (tenant) => table.get(tenant);
}

/**
 * Validate a FootfallConfig and apply every default.
 */
export function resolveConfig(config: FootfallConfig = {}): ResolvedConfig {
  const valid = validateConfig(config);
  const logger = valid.logger ?? defaultLogger;

  return {
    providerPriority: dedupe(valid.providerPriority ?? DEFAULT_PROVIDER_PRIORITY),
    precisionLevel: parsePrecision(valid.precisionLevel, logger),
    privacyMode: valid.privacyMode ?? false,
    detectVpn: valid.detectVpn ?? true,
    anonymizeAddressLevel: valid.anonymizeAddressLevel ?? "partial",
    cacheTtlSeconds: valid.cacheTtlSeconds ?? DEFAULT_CACHE_TTL_SECONDS,
    excludeMethods: new Set(
      (valid.excludeMethods ?? DEFAULT_EXCLUDED_METHODS).map((m) => m.trim().toUpperCase()),
    ),
    excludeExtensions: (valid.excludeExtensions ?? DEFAULT_STATIC_EXTENSIONS).map((e) =>
      e.toLowerCase(),
    ),
    excludePrefixes: [...(valid.excludePrefixes ?? DEFAULT_STATIC_PREFIXES)],
    maxPathLength: valid.maxPathLength ?? DEFAULT_MAX_PATH_LENGTH,
    trustedProxies: [...(valid.trustedProxies ?? [])],
    trustProxyHeaders: valid.trustProxyHeaders ?? true,
    respectDoNotTrack: valid.respectDoNotTrack ?? false,
    rules: {
      includeOnly: [...(valid.rules?.includeOnly ?? [])],
      exclude: [...(valid.rules?.exclude ?? [])],
    },
    strictRules: valid.strictRules ?? false,
    tenantRules: tenantProvider(valid.tenantRules),
    addressSalt: valid.addressSalt,
    logger,
  };
}

function dedupe<T>(values: readonly T[]): T[] {
  return [...new Set(values)];
}
