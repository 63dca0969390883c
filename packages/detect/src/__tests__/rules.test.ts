import { describe, it, expect, vi } from "vitest";
import { InvalidRuleError, createRequestContext, silentLogger } from "@footfall/core";
import type { FootfallConfig, RuleList } from "@footfall/core";
import {
  compileRule,
  compileRules,
  globToRegexSource,
  matchesRule,
  validateRules,
} from "../rules/compiler.js";
import { RuleSetCache } from "../rules/cache.js";
import { createRuleEngine, describeRule } from "../rules/engine.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function spyLogger() {
  return { debug: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function engine(config: FootfallConfig = {}, now?: () => number) {
  return createRuleEngine({ logger: silentLogger, ...config }, { now });
}

function get(path: string, method = "GET") {
  return createRequestContext({ method, path });
}

// =========================================================================
// Compilation
// =========================================================================

describe("compileRule", () => {
  it("compiles a leading wildcard to a suffix match", () => {
    const rule = compileRule("*.pdf");
    expect(rule.kind).toBe("suffix");
    expect(rule.pattern).toBe(".pdf");
  });

  it("compiles a trailing wildcard to a prefix match", () => {
    const rule = compileRule("/api/*");
    expect(rule.kind).toBe("prefix");
    expect(rule.pattern).toBe("/api/");
  });

  it("compiles a plain string to an exact match", () => {
    const rule = compileRule("/about");
    expect(rule.kind).toBe("exact");
    expect(matchesRule(rule, "/about", "GET")).toBe(true);
    expect(matchesRule(rule, "/about/team", "GET")).toBe(false);
  });

  it("compiles an inner wildcard to an anchored regex", () => {
    const rule = compileRule("/users/*/settings");
    expect(rule.kind).toBe("regex");
    expect(matchesRule(rule, "/users/42/settings", "GET")).toBe(true);
    expect(matchesRule(rule, "/users/42/settings/extra", "GET")).toBe(false);
    expect(matchesRule(rule, "/prefix/users/42/settings", "GET")).toBe(false);
  });

  it("treats ? as a single-character wildcard", () => {
    const rule = compileRule("/a?c");
    expect(matchesRule(rule, "/abc", "GET")).toBe(true);
    expect(matchesRule(rule, "/ac", "GET")).toBe(false);
  });

  it("keeps dots and parentheses literal when translating a glob", () => {
    const rule = compileRule("/files/report(1)*.pdf");
    expect(rule.kind).toBe("regex");
    expect(matchesRule(rule, "/files/report(1)-final.pdf", "GET")).toBe(true);
    expect(matchesRule(rule, "/files/report1-final.pdf", "GET")).toBe(false);
    expect(matchesRule(rule, "/files/report(1)-finalXpdf", "GET")).toBe(false);
  });

  it("escapes metacharacters before substituting wildcards", () => {
    expect(globToRegexSource("/files/report(1)*.pdf")).toBe("^/files/report\\(1\\).*\\.pdf$");
    expect(globToRegexSource("/a?c")).toBe("^/a.c$");
  });

  it("strips the global flag from RegExp rules", () => {
    const rule = compileRule(/^\/internal\//gi);
    expect(rule.kind).toBe("regex");
    if (rule.kind === "regex") {
      expect(rule.pattern.flags).toBe("i");
    }
    expect(matchesRule(rule, "/internal/a", "GET")).toBe(true);
    expect(matchesRule(rule, "/internal/a", "GET")).toBe(true);
  });

  it("attaches upper-cased method restrictions", () => {
    const rule = compileRule({ regex: "^/api/v[0-9]+/", methods: ["post"] });
    expect([...rule.methods]).toEqual(["POST"]);
    expect(matchesRule(rule, "/api/v2/orders", "POST")).toBe(true);
    expect(matchesRule(rule, "/api/v2/orders", "GET")).toBe(false);
  });

  it("applies a method restriction to a glob pattern", () => {
    const rule = compileRule({ pattern: "/api/*", methods: ["DELETE"] });
    expect(rule.kind).toBe("prefix");
    expect(matchesRule(rule, "/api/items/1", "DELETE")).toBe(true);
    expect(matchesRule(rule, "/api/items/1", "GET")).toBe(false);
  });

  it("falls back to an exact match when a regex source does not compile", () => {
    const logger = spyLogger();
    const rule = compileRule({ regex: "(unclosed" }, logger);
    expect(rule.kind).toBe("exact");
    expect(rule.pattern).toBe("(unclosed");
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("produces frozen rules and lists", () => {
    const rules = compileRules(["/a", "*.b"]);
    expect(Object.isFrozen(rules)).toBe(true);
    expect(Object.isFrozen(rules[0])).toBe(true);
  });
});

describe("validateRules", () => {
  it("accepts every supported rule shape", () => {
    expect(
      validateRules(["/ok", /x/, { pattern: "/p*", methods: ["GET"] }, { regex: "^/r$", flags: "i" }]),
    ).toEqual({ valid: true });
  });

  it("reports wrong shapes and broken regex sources by index", () => {
    const result = validateRules(["/ok", 42, { regex: "(" }, "", { pattern: "/x", methods: ["FETCH"] }]);
    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.errors.map((e) => [e.index, e.kind])).toEqual([
        [1, "invalid_shape"],
        [2, "invalid_regex"],
        [3, "invalid_shape"],
        [4, "invalid_shape"],
      ]);
    }
  });
});

describe("describeRule", () => {
  it("renders each rule shape", () => {
    expect(describeRule("/admin*")).toBe("/admin*");
    expect(describeRule(/^\/x/i)).toBe("/^\\/x/i");
    expect(describeRule({ regex: "^/r$" })).toBe("/^/r$/");
    expect(describeRule({ pattern: "/api/*", methods: ["POST", "PUT"] })).toBe("POST,PUT /api/*");
  });
});

// =========================================================================
// Cache
// =========================================================================

describe("RuleSetCache", () => {
  const empty = () => ({ includeOnly: [], exclude: [] });

  it("recompiles exactly when the entry reaches its TTL", () => {
    let now = 1_000;
    const cache = new RuleSetCache({ ttlMs: 500, now: () => now });
    const compile = vi.fn(empty);

    cache.getOrCompile("global", compile);
    now = 1_499;
    cache.getOrCompile("global", compile);
    expect(compile).toHaveBeenCalledTimes(1);

    now = 1_500;
    cache.getOrCompile("global", compile);
    expect(compile).toHaveBeenCalledTimes(2);
    expect(cache.stats()).toEqual({ hits: 1, misses: 2, expired: 1, size: 1 });
  });

  it("publishes frozen values that later compiles replace rather than mutate", () => {
    let now = 0;
    const cache = new RuleSetCache({ ttlMs: 10, now: () => now });
    const first = cache.getOrCompile("global", empty);
    expect(Object.isFrozen(first)).toBe(true);

    now = 10;
    const second = cache.getOrCompile("global", empty);
    expect(second).not.toBe(first);
    expect(first).toEqual({ includeOnly: [], exclude: [] });
  });

  it("invalidates one key or all keys", () => {
    const cache = new RuleSetCache({ ttlMs: 1_000 });
    cache.getOrCompile("global", empty);
    cache.getOrCompile("tenant:a", empty);

    expect(cache.invalidate("tenant:a")).toBe(true);
    expect(cache.invalidate("tenant:a")).toBe(false);
    expect(cache.peek("global")).toBeDefined();

    cache.invalidateAll();
    expect(cache.stats().size).toBe(0);
  });
});

// =========================================================================
// Admission
// =========================================================================

describe("RuleEngine built-in exclusions", () => {
  it("blocks excluded methods before any rule runs", () => {
    const rules = engine({ rules: { includeOnly: ["/"] } });
    expect(rules.admit(get("/", "OPTIONS"))).toEqual({
      decision: "block",
      reason: "method_excluded",
      detail: "OPTIONS",
    });
  });

  it("measures path length in UTF-8 bytes", () => {
    const rules = engine({ maxPathLength: 2 });
    expect(rules.admit(get("/é"))).toEqual({
      decision: "block",
      reason: "path_too_long",
      detail: "3 bytes",
    });
  });

  it("blocks static assets by extension, case-insensitively", () => {
    const rules = engine();
    expect(rules.admit(get("/assets/app.css"))).toEqual({
      decision: "block",
      reason: "static_asset",
      detail: ".css",
    });
    expect(rules.admit(get("/LOGO.PNG"))).toEqual({
      decision: "block",
      reason: "static_asset",
      detail: ".png",
    });
  });

  it("blocks static assets by prefix", () => {
    expect(engine().admit(get("/static/page"))).toEqual({
      decision: "block",
      reason: "static_asset",
      detail: "/static/",
    });
  });

  it("blocks health and metrics paths even when rules allow them", () => {
    const rules = engine({ rules: { includeOnly: ["/health", "/metrics"] } });
    expect(rules.admit(get("/health"))).toEqual({
      decision: "block",
      reason: "built_in_path",
      detail: "/health",
    });
    expect(rules.admit(get("/metrics", "POST")).decision).toBe("block");
  });

  it("blocks opt-out requests when asked to respect them", () => {
    const rules = engine({ respectDoNotTrack: true });
    const optOut = (headers: Record<string, string>) =>
      rules.admit(createRequestContext({ method: "GET", path: "/pricing", headers }));

    expect(optOut({ DNT: "1" })).toEqual({ decision: "block", reason: "do_not_track", detail: "dnt" });
    expect(optOut({ "Sec-GPC": " 1 " })).toEqual({
      decision: "block",
      reason: "do_not_track",
      detail: "sec-gpc",
    });
    expect(optOut({ DNT: "0" })).toEqual({ decision: "allow" });
    expect(optOut({})).toEqual({ decision: "allow" });
  });

  it("ignores opt-out headers by default", () => {
    const context = createRequestContext({ method: "GET", path: "/pricing", headers: { dnt: "1" } });
    expect(engine().admit(context)).toEqual({ decision: "allow" });
  });
});

describe("RuleEngine precedence", () => {
  const config: FootfallConfig = {
    rules: { includeOnly: ["/app*", "/admin*"], exclude: ["/admin*"] },
    tenantRules: { acme: { includeOnly: ["*"], exclude: ["/app/secret"] } },
  };

  it("lets a tenant blocklist override a tenant allow-all", () => {
    expect(engine(config).admit(get("/app/secret"), { tenant: "acme" })).toEqual({
      decision: "block",
      reason: "tenant_blocklist",
      detail: "/app/secret",
    });
  });

  it("lets a tenant allowlist override global rules", () => {
    expect(engine(config).admit(get("/admin/users"), { tenant: "acme" })).toEqual({
      decision: "allow",
    });
  });

  it("lets the global blocklist override the global allowlist", () => {
    expect(engine(config).admit(get("/admin/users"))).toEqual({
      decision: "block",
      reason: "global_blocklist",
      detail: "/admin*",
    });
  });

  it("blocks paths outside a non-empty global allowlist", () => {
    const rules = engine(config);
    expect(rules.admit(get("/pricing"))).toEqual({
      decision: "block",
      reason: "not_in_global_allowlist",
    });
    expect(rules.admit(get("/app/home"))).toEqual({ decision: "allow" });
  });

  it("applies only global rules for a tenant without rules", () => {
    expect(engine(config).admit(get("/pricing"), { tenant: "other" })).toEqual({
      decision: "block",
      reason: "not_in_global_allowlist",
    });
  });

  it("blocks paths outside a non-empty tenant allowlist", () => {
    const rules = engine({ tenantRules: { beta: { includeOnly: ["/beta/*"] } } });
    expect(rules.admit(get("/home"), { tenant: "beta" })).toEqual({
      decision: "block",
      reason: "not_in_tenant_allowlist",
    });
    expect(rules.admit(get("/beta/x"), { tenant: "beta" })).toEqual({ decision: "allow" });
  });

  it("allows by default", () => {
    expect(engine().admit(get("/anything"))).toEqual({ decision: "allow" });
  });

  it("honours method restrictions", () => {
    const rules = engine({ rules: { exclude: [{ pattern: "/api/*", methods: ["POST"] }] } });
    expect(rules.admit(get("/api/orders", "POST"))).toEqual({
      decision: "block",
      reason: "global_blocklist",
      detail: "POST /api/*",
    });
    expect(rules.admit(get("/api/orders", "GET"))).toEqual({ decision: "allow" });
  });

  it("matches global-flag regex rules on every request", () => {
    const rules = engine({ rules: { exclude: [/^\/internal\//g] } });
    expect(rules.admit(get("/internal/a")).decision).toBe("block");
    expect(rules.admit(get("/internal/a")).decision).toBe("block");
  });
});

describe("RuleEngine tenant rules", () => {
  it("treats a throwing provider as no tenant rules", () => {
    const logger = spyLogger();
    const rules = createRuleEngine({
      logger,
      tenantRules: () => {
        throw new Error("kaboom");
      },
    });

    expect(rules.admit(get("/home"), { tenant: "boom" })).toEqual({ decision: "allow" });
    expect(logger.error).toHaveBeenCalledWith('Failed to load rules for tenant "boom"', {
      error: "kaboom",
    });
  });

  it("keeps a tenant regex that does not compile as an exact match and warns", () => {
    const logger = spyLogger();
    const rules = createRuleEngine({
      logger,
      tenantRules: { acme: { exclude: [{ regex: "(" }, "/y"] } },
    });

    expect(rules.admit(get("/y"), { tenant: "acme" })).toEqual({
      decision: "block",
      reason: "tenant_blocklist",
      detail: "/y",
    });
    expect(logger.warn).toHaveBeenCalled();
  });
});

describe("RuleEngine caching", () => {
  it("reloads tenant rules after the TTL and after invalidation", () => {
    let now = 0;
    const provider = vi.fn((): RuleList => ({ exclude: ["/blocked"] }));
    const rules = engine({ cacheTtlSeconds: 10, tenantRules: provider }, () => now);
    const acme = { tenant: "acme" };

    rules.admit(get("/ok"), acme);
    now = 9_999;
    rules.admit(get("/ok"), acme);
    expect(provider).toHaveBeenCalledTimes(1);

    now = 10_000;
    rules.admit(get("/ok"), acme);
    expect(provider).toHaveBeenCalledTimes(2);

    expect(rules.stats(acme)).toEqual({
      hits: 2,
      misses: 4,
      expired: 2,
      size: 2,
      scope: acme,
      compiledAt: new Date(10_000),
      ruleCount: {
        includeOnly: 0,
        exclude: 1,
        byKind: { exact: 1, prefix: 0, suffix: 0, regex: 0 },
      },
    });

    rules.invalidate(acme);
    rules.admit(get("/ok"), acme);
    expect(provider).toHaveBeenCalledTimes(3);

    rules.invalidateAll();
    rules.admit(get("/ok"), acme);
    expect(provider).toHaveBeenCalledTimes(4);
  });

  it("returns the same decision from a cold and a warm cache", () => {
    const rules = engine({ rules: { exclude: ["/admin*"] } });
    const cold = rules.admit(get("/admin"));
    const warm = rules.admit(get("/admin"));
    expect(warm).toEqual(cold);
  });
});

describe("RuleEngine strictRules", () => {
  it("rejects a global regex that does not compile", () => {
    expect(() => engine({ strictRules: true, rules: { exclude: [{ regex: "(" }] } })).toThrow(
      InvalidRuleError,
    );
  });

  it("degrades to an exact match without strictRules", () => {
    const logger = spyLogger();
    const rules = createRuleEngine({ logger, rules: { exclude: [{ regex: "(" }] } });
    expect(rules.admit(get("/page"))).toEqual({ decision: "allow" });
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});

describe("RuleEngine.filterPaths", () => {
  it("keeps only admitted paths", () => {
    expect(engine().filterPaths(["/", "/dashboard", "/assets/app.css", "/health"])).toEqual([
      "/",
      "/dashboard",
    ]);
  });
});
