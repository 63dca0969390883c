/**
 * Rule compilation: turns raw rule sources (glob strings, RegExps, method
 * restricted patterns, regex source strings) into immutable CompiledRules.
 *
 * Compilation never throws. A regular expression that fails to compile is
 * reported through the logger and matched as an exact string instead.
 */

import type { Logger, RuleSource } from "@footfall/core";
import { RuleSourceSchema, defaultLogger, describeError } from "@footfall/core";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type RuleKind = "exact" | "prefix" | "suffix" | "regex";

interface RuleBase {
  /** Upper-cased methods; empty matches any method */
  readonly methods: ReadonlySet<string>;
  /** The raw rule this was compiled from */
  readonly source: RuleSource;
}

export type CompiledRule =
  | (RuleBase & { readonly kind: "exact" | "prefix" | "suffix"; readonly pattern: string })
  | (RuleBase & { readonly kind: "regex"; readonly pattern: RegExp });

/** Problem found by validateRules(). */
export interface RuleValidationError {
  index: number;
  rule: unknown;
  kind: "invalid_shape" | "invalid_regex";
  message: string;
}

export type RuleValidationResult =
  | { valid: true }
  | { valid: false; errors: RuleValidationError[] };

// ---------------------------------------------------------------------------
// Glob translation
// ---------------------------------------------------------------------------

/** Characters that turn a plain string into a pattern. */
const PATTERN_CHARS = /[*?[({|^]/;
const GLOB_TOKENS = /[*?]/;
const REGEX_SPECIALS = /[.*+?^${}()|[\]\\]/g;

/**
 * Translate a glob into an anchored regular expression source. Every regex
 * metacharacter is escaped first; only then are the glob tokens substituted,
 * so "(" or "." in the glob stay literal.
 */
export function globToRegexSource(glob: string): string {
  const escaped = glob.replace(REGEX_SPECIALS, "\\$&");
  return `^${escaped.replace(/\\\*/g, ".*").replace(/\\\?/g, ".")}$`;
}

/** Drop the flags that make RegExp.test() stateful. */
function stateless(regex: RegExp): RegExp {
  return regex.global || regex.sticky
    ? new RegExp(regex.source, regex.flags.replace(/[gy]/g, ""))
    : regex;
}

function tryRegExp(source: string, flags: string | undefined): RegExp | Error {
  try {
    return stateless(new RegExp(source, flags));
  } catch (err) {
    return err instanceof Error ? err : new Error(describeError(err));
  }
}

// ---------------------------------------------------------------------------
// Compilation
// ---------------------------------------------------------------------------

type Matcher =
  | { kind: "exact" | "prefix" | "suffix"; pattern: string }
  | { kind: "regex"; pattern: RegExp };

function compileGlob(glob: string, logger: Logger): Matcher {
  const leading = glob.replace(/^\*+/, "");
  if (leading !== glob && !GLOB_TOKENS.test(leading)) {
    return { kind: "suffix", pattern: leading };
  }

  const trailing = glob.replace(/\*+$/, "");
  if (trailing !== glob && !GLOB_TOKENS.test(trailing)) {
    return { kind: "prefix", pattern: trailing };
  }

  if (PATTERN_CHARS.test(glob)) {
    return compileRegexSource(globToRegexSource(glob), undefined, glob, logger);
  }

  return { kind: "exact", pattern: glob };
}

function compileRegexSource(
  source: string,
  flags: string | undefined,
  fallback: string,
  logger: Logger,
): Matcher {
  const regex = tryRegExp(source, flags);
  if (regex instanceof Error) {
    logger.warn(`Rule pattern ${JSON.stringify(fallback)} is not a valid regular expression, matching it exactly`, {
      error: regex.message,
    });
    return { kind: "exact", pattern: fallback };
  }
  return { kind: "regex", pattern: regex };
}

function compileMatcher(source: RuleSource, logger: Logger): Matcher {
  if (typeof source === "string") {
    return compileGlob(source, logger);
  }
  if (source instanceof RegExp) {
    return { kind: "regex", pattern: stateless(source) };
  }
  if ("regex" in source) {
    return compileRegexSource(source.regex, source.flags, source.regex, logger);
  }
  return compileMatcher(source.pattern, logger);
}

function methodsOf(source: RuleSource): ReadonlySet<string> {
  if (typeof source === "string" || source instanceof RegExp || !source.methods) {
    return new Set();
  }
  return new Set(source.methods.map((m) => m.trim().toUpperCase()));
}

/**
 * Compile one raw rule.
 *
 * - `"*.pdf"` is a suffix match on ".pdf"
 * - `"/api/*"` is a prefix match on "/api/"
 * - `"/users/*\/settings"` becomes `^/users/.*\/settings$`
 * - `"/about"` is an exact match
 * - a RegExp is used as-is
 */
export function compileRule(source: RuleSource, logger: Logger = defaultLogger): CompiledRule {
  const matcher = compileMatcher(source, logger);
  const methods = methodsOf(source);
  return Object.freeze(
    matcher.kind === "regex"
      ? { kind: matcher.kind, pattern: matcher.pattern, methods, source }
      : { kind: matcher.kind, pattern: matcher.pattern, methods, source },
  );
}

export function compileRules(
  sources: readonly RuleSource[],
  logger: Logger = defaultLogger,
): readonly CompiledRule[] {
  return Object.freeze(sources.map((source) => compileRule(source, logger)));
}

// ---------------------------------------------------------------------------
// Matching
// ---------------------------------------------------------------------------

export function matchesRule(rule: CompiledRule, path: string, method: string): boolean {
  if (rule.methods.size > 0 && !rule.methods.has(method)) {
    return false;
  }
  switch (rule.kind) {
    case "exact":
      return path === rule.pattern;
    case "prefix":
      return path.startsWith(rule.pattern);
    case "suffix":
      return path.endsWith(rule.pattern);
    case "regex":
      return rule.pattern.test(path);
  }
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/**
 * Check a list of raw rules without compiling it: wrong shapes, empty
 * patterns, unknown HTTP methods, and regex sources that do not compile.
 * Meant for configuration tooling and startup checks.
 */
export function validateRules(rules: readonly unknown[]): RuleValidationResult {
  const errors: RuleValidationError[] = [];

  rules.forEach((rule, index) => {
    const parsed = RuleSourceSchema.safeParse(rule);
    if (!parsed.success) {
      const message = parsed.error.issues.map((issue) => issue.message).join("; ");
      errors.push({ index, rule, kind: "invalid_shape", message });
      return;
    }
    const source = parsed.data;
    if (typeof source === "object" && !(source instanceof RegExp) && "regex" in source) {
      const regex = tryRegExp(source.regex, source.flags);
      if (regex instanceof Error) {
        errors.push({
          index,
          rule,
          kind: "invalid_regex",
          message: `Invalid regular expression: ${regex.message}`,
        });
      }
    }
  });

  return errors.length === 0 ? { valid: true } : { valid: false, errors };
}
