/**
 * Route admission: decides whether a request should be recorded at all.
 *
 * Built-in exclusions run first and cannot be overridden by rules:
 *
 * 1. excluded HTTP method (OPTIONS, HEAD, TRACE by default)
 * 2. path longer than `maxPathLength` bytes
 * 3. static asset extension or prefix
 * 4. health-check and metrics paths
 * 5. opt-out requests (`DNT: 1` or `Sec-GPC: 1`), only with `respectDoNotTrack`
 *
 * Then the configured rules, highest precedence first: tenant blocklist,
 * tenant allowlist, global blocklist, global allowlist. A non-empty allowlist
 * blocks every path it does not match. With no match anywhere, the request
 * is admitted.
 */

import type {
  Admission,
  BlockReason,
  FootfallConfig,
  Logger,
  RequestContext,
  ResolvedConfig,
  RuleList,
  RuleScope,
  RuleSource,
} from "@footfall/core";
import {
  BUILT_IN_EXCLUDED_PATHS,
  InvalidRuleError,
  createRequestContext,
  describeError,
  resolveConfig,
} from "@footfall/core";
import type { CompiledRule, RuleKind } from "./compiler.js";
import { compileRules, matchesRule, validateRules } from "./compiler.js";
import type { CacheStats, RuleSet } from "./cache.js";
import { GLOBAL_SCOPE_KEY, RuleSetCache, tenantScopeKey } from "./cache.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RuleEngineOptions {
  /** Clock used for cache expiry (default: Date.now) */
  now?: () => number;
}

export interface RuleEngineStats extends CacheStats {
  scope: RuleScope;
  /** When the scope's rules were last compiled, if they are cached */
  compiledAt?: Date;
  ruleCount: {
    includeOnly: number;
    exclude: number;
    byKind: Record<RuleKind, number>;
  };
}

const EMPTY_RULE_SET: RuleSet = Object.freeze({
  includeOnly: Object.freeze([]),
  exclude: Object.freeze([]),
});

const utf8 = new TextEncoder();

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function scopeKey(scope: RuleScope): string {
  return scope === "global" ? GLOBAL_SCOPE_KEY : tenantScopeKey(scope.tenant);
}

function findMatch(
  rules: readonly CompiledRule[],
  path: string,
  method: string,
): CompiledRule | undefined {
  return rules.find((rule) => matchesRule(rule, path, method));
}

/** Readable form of a rule, for block details and logs. */
export function describeRule(source: RuleSource): string {
  if (typeof source === "string") {
    return source;
  }
  if (source instanceof RegExp) {
    return String(source);
  }
  if ("regex" in source) {
    return `/${source.regex}/${source.flags ?? ""}`;
  }
  const pattern = describeRule(source.pattern);
  return source.methods && source.methods.length > 0
    ? `${source.methods.join(",")} ${pattern}`
    : pattern;
}

function block(reason: BlockReason, detail?: string): Admission {
  return detail === undefined ? { decision: "block", reason } : { decision: "block", reason, detail };
}

const ALLOW: Admission = Object.freeze({ decision: "allow" });

/** Opt-out signals honoured when `respectDoNotTrack` is set. */
const OPT_OUT_HEADERS = ["dnt", "sec-gpc"] as const;

// ---------------------------------------------------------------------------
// RuleEngine
// ---------------------------------------------------------------------------

export class RuleEngine {
  private readonly config: ResolvedConfig;
  private readonly cache: RuleSetCache;
  private readonly logger: Logger;
  private readonly builtInPaths: ReadonlySet<string> = new Set(BUILT_IN_EXCLUDED_PATHS);

  /**
   * @throws InvalidRuleError when `strictRules` is set and a global rule
   * contains a regular expression that does not compile
   */
  constructor(config: ResolvedConfig, options: RuleEngineOptions = {}) {
    this.config = config;
    this.logger = config.logger;
    this.cache = new RuleSetCache({ ttlMs: config.cacheTtlSeconds * 1000, now: options.now });

    if (config.strictRules) {
      assertValidRules("rules.includeOnly", config.rules.includeOnly);
      assertValidRules("rules.exclude", config.rules.exclude);
    }
  }

  /**
   * Decide whether a request should be recorded.
   *
   * @example
   * ```ts
   * engine.admit(createRequestContext({ method: "OPTIONS", path: "/" }));
   * // { decision: "block", reason: "method_excluded", detail: "OPTIONS" }
   * ```
   */
  admit(context: RequestContext, scope: RuleScope = "global"): Admission {
    const builtIn = this.checkBuiltIn(context);
    if (builtIn) {
      return builtIn;
    }

    const { path, method } = context;

    if (scope !== "global") {
      const tenant = this.ruleSet(scope);

      const blocked = findMatch(tenant.exclude, path, method);
      if (blocked) {
        return block("tenant_blocklist", describeRule(blocked.source));
      }
      if (tenant.includeOnly.length > 0) {
        return findMatch(tenant.includeOnly, path, method)
          ? ALLOW
          : block("not_in_tenant_allowlist");
      }
    }

    const global = this.ruleSet("global");

    const blocked = findMatch(global.exclude, path, method);
    if (blocked) {
      return block("global_blocklist", describeRule(blocked.source));
    }
    if (global.includeOnly.length > 0) {
      return findMatch(global.includeOnly, path, method)
        ? ALLOW
        : block("not_in_global_allowlist");
    }

    return ALLOW;
  }

  /**
   * Keep only the paths that would be admitted for `method`.
   *
   * @example
   * ```ts
   * engine.filterPaths(["/", "/dashboard", "/assets/app.css", "/health"]);
   * // ["/", "/dashboard"]
   * ```
   */
  filterPaths(paths: readonly string[], method: string = "GET", scope: RuleScope = "global"): string[] {
    return paths.filter(
      (path) => this.admit(createRequestContext({ method, path }), scope).decision === "allow",
    );
  }

  /** Compiled rules of a scope, compiling them if needed. */
  ruleSet(scope: RuleScope): RuleSet {
    return this.cache.getOrCompile(scopeKey(scope), () => this.compileScope(scope));
  }

  /** Force recompilation of one scope on its next use. */
  invalidate(scope: RuleScope): void {
    if (this.cache.invalidate(scopeKey(scope))) {
      this.logger.debug("Rule cache invalidated", { scope: scopeKey(scope) });
    }
  }

  /** Force recompilation of every scope on its next use. */
  invalidateAll(): void {
    this.cache.invalidateAll();
    this.logger.debug("Rule cache cleared");
  }

  stats(scope: RuleScope = "global"): RuleEngineStats {
    const entry = this.cache.peek(scopeKey(scope));
    const rules = entry?.value ?? EMPTY_RULE_SET;
    const byKind: Record<RuleKind, number> = { exact: 0, prefix: 0, suffix: 0, regex: 0 };
    for (const rule of [...rules.includeOnly, ...rules.exclude]) {
      byKind[rule.kind]++;
    }

    return {
      ...this.cache.stats(),
      scope,
      compiledAt: entry ? new Date(entry.compiledAt) : undefined,
      ruleCount: {
        includeOnly: rules.includeOnly.length,
        exclude: rules.exclude.length,
        byKind,
      },
    };
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private checkBuiltIn(context: RequestContext): Admission | undefined {
    const { method, path } = context;

    if (this.config.excludeMethods.has(method)) {
      return block("method_excluded", method);
    }

    const bytes = utf8.encode(path).length;
    if (bytes > this.config.maxPathLength) {
      return block("path_too_long", `${bytes} bytes`);
    }

    const lower = path.toLowerCase();
    const extension = this.config.excludeExtensions.find((ext) => lower.endsWith(ext));
    if (extension) {
      return block("static_asset", extension);
    }
    const prefix = this.config.excludePrefixes.find((p) => lower.startsWith(p));
    if (prefix) {
      return block("static_asset", prefix);
    }

    if (this.builtInPaths.has(path)) {
      return block("built_in_path", path);
    }

    if (this.config.respectDoNotTrack) {
      const optOut = OPT_OUT_HEADERS.find((name) => context.headers.get(name)?.trim() === "1");
      if (optOut) {
        return block("do_not_track", optOut);
      }
    }

    return undefined;
  }

  private compileScope(scope: RuleScope): RuleSet {
    const list = scope === "global" ? this.config.rules : this.loadTenantRules(scope.tenant);
    return {
      includeOnly: compileRules(list.includeOnly ?? [], this.logger),
      exclude: compileRules(list.exclude ?? [], this.logger),
    };
  }

  /**
   * Tenant rules come from caller code, so a provider that throws or hands
   * back malformed entries must not break admission: failures are logged
   * and the offending rules ignored.
   */
  private loadTenantRules(tenant: string): RuleList {
    let list: RuleList | undefined;
    try {
      list = this.config.tenantRules(tenant);
    } catch (err) {
      this.logger.error(`Failed to load rules for tenant "${tenant}"`, {
        error: describeError(err),
      });
      return {};
    }
    if (!list) {
      return {};
    }
    return {
      includeOnly: this.keepValid(tenant, "includeOnly", list.includeOnly ?? []),
      exclude: this.keepValid(tenant, "exclude", list.exclude ?? []),
    };
  }

  private keepValid(tenant: string, listName: string, rules: readonly RuleSource[]): RuleSource[] {
    if (!Array.isArray(rules)) {
      this.logger.warn(`Tenant "${tenant}" ${listName} is not a list, ignoring it`);
      return [];
    }
    const result = validateRules(rules);
    if (result.valid) {
      return [...rules];
    }
    // A bad regex source still compiles (to an exact match); a bad shape does not.
    const unusable = new Set(
      result.errors.filter((e) => e.kind === "invalid_shape").map((e) => e.index),
    );
    for (const error of result.errors) {
      this.logger.warn(`Tenant "${tenant}" ${listName} rule #${error.index}: ${error.message}`);
    }
    return rules.filter((_, index) => !unusable.has(index));
  }
}

/**
 * Throw InvalidRuleError if any rule in the list is unusable.
 */
export function assertValidRules(listName: string, rules: readonly unknown[]): void {
  const result = validateRules(rules);
  if (!result.valid) {
    throw new InvalidRuleError(
      listName,
      result.errors.map(({ index, message }) => ({ index, message })),
    );
  }
}

/**
 * Create a RuleEngine from a FootfallConfig.
 *
 * @throws InvalidConfigError if the configuration is invalid
 */
export function createRuleEngine(config: FootfallConfig = {}, options: RuleEngineOptions = {}): RuleEngine {
  return new RuleEngine(resolveConfig(config), options);
}
