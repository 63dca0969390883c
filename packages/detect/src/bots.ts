/**
 * Bot classification.
 *
 * Three checks, each of which can mark a request as automated:
 *
 * 1. the User-Agent against an ordered pattern table (first match wins)
 * 2. the client address against known crawler network prefixes
 * 3. the caller-supplied request frequency against a threshold
 *
 * Confidence starts at 0.6 for a bot verdict (0.8 for human) and grows with
 * every check that fires: +0.3 user agent, +0.2 address, +0.1 frequency,
 * capped at 0.99.
 */

import type { BotSignal, BotType, ClassificationResult, RequestContext } from "@footfall/core";
import { BOT_FREQUENCY_THRESHOLD, MAX_CONFIDENCE } from "@footfall/core";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface BotPattern {
  /** Tested case-insensitively against the User-Agent */
  pattern: RegExp;
  botType: Exclude<BotType, "human">;
  botName: string;
}

export interface BotClassifierOptions {
  /** Checked before the built-in table */
  extraPatterns?: readonly BotPattern[];
  /** Address prefixes added to the built-in crawler networks */
  extraPrefixes?: readonly string[];
  /** Requests per minute above which traffic is bot-like (default: 60) */
  frequencyThreshold?: number;
}

export interface BotClassifier {
  classify(context: RequestContext): ClassificationResult;
}

// ---------------------------------------------------------------------------
// Tables
// ---------------------------------------------------------------------------

/**
 * Known crawlers. Named entries come first; the generic patterns at the end
 * would otherwise swallow them.
 */
export const BOT_PATTERNS: readonly BotPattern[] = [
  // Search engines
  { pattern: /googlebot/i, botType: "search_engine", botName: "Googlebot" },
  { pattern: /bingbot/i, botType: "search_engine", botName: "Bingbot" },
  { pattern: /slurp/i, botType: "search_engine", botName: "Yahoo Slurp" },
  { pattern: /duckduckbot/i, botType: "search_engine", botName: "DuckDuckBot" },
  { pattern: /baiduspider/i, botType: "search_engine", botName: "Baiduspider" },
  { pattern: /yandexbot/i, botType: "search_engine", botName: "YandexBot" },
  { pattern: /applebot/i, botType: "search_engine", botName: "Applebot" },

  // Social media
  { pattern: /facebookexternalhit/i, botType: "social_media", botName: "Facebook" },
  { pattern: /twitterbot/i, botType: "social_media", botName: "Twitter" },
  { pattern: /linkedinbot/i, botType: "social_media", botName: "LinkedIn" },
  { pattern: /slackbot/i, botType: "social_media", botName: "Slack" },
  { pattern: /discordbot/i, botType: "social_media", botName: "Discord" },
  { pattern: /telegrambot/i, botType: "social_media", botName: "Telegram" },

  // SEO
  { pattern: /ahrefsbot/i, botType: "seo", botName: "AhrefsBot" },
  { pattern: /semrushbot/i, botType: "seo", botName: "SemrushBot" },
  { pattern: /mj12bot/i, botType: "seo", botName: "MJ12bot" },
  { pattern: /dotbot/i, botType: "seo", botName: "DotBot" },

  // Monitoring
  { pattern: /uptimerobot/i, botType: "monitoring", botName: "UptimeRobot" },
  { pattern: /pingdom/i, botType: "monitoring", botName: "Pingdom" },
  { pattern: /statuscake/i, botType: "monitoring", botName: "StatusCake" },

  // Security scanners
  { pattern: /nessus/i, botType: "security", botName: "Nessus" },
  { pattern: /nmap/i, botType: "security", botName: "Nmap" },
  { pattern: /masscan/i, botType: "security", botName: "Masscan" },

  // Generic
  { pattern: /bot\b/i, botType: "unknown_bot", botName: "Generic Bot" },
  { pattern: /crawler/i, botType: "unknown_bot", botName: "Crawler" },
  { pattern: /spider/i, botType: "unknown_bot", botName: "Spider" },
  { pattern: /scraper/i, botType: "unknown_bot", botName: "Scraper" },
];

/**
 * Address prefixes of known crawler networks. A simplified subset: a real
 * deployment would check published crawler ranges instead.
 */
export const BOT_ADDRESS_PREFIXES: readonly string[] = [
  "66.249.", // Google
  "207.46.", // Microsoft
  "40.77.", // Bing
  "157.55.", // Bing
  "69.63.176.", // Facebook
  "69.171.", // Facebook
  "17.58.", // Apple
];

// ---------------------------------------------------------------------------
// Classifier
// ---------------------------------------------------------------------------

function caseInsensitive(pattern: RegExp): RegExp {
  const flags = pattern.flags.replace(/[gy]/g, "");
  return flags.includes("i") && flags === pattern.flags
    ? pattern
    : new RegExp(pattern.source, flags.includes("i") ? flags : `${flags}i`);
}

/**
 * Create a classifier with additional patterns, prefixes, or a different
 * frequency threshold.
 *
 * @example
 * ```ts
 * const classifier = createBotClassifier({
 *   extraPatterns: [{ pattern: /acme-probe/i, botType: "monitoring", botName: "Acme Probe" }],
 * });
 * classifier.classify(context).botName; // "Acme Probe"
 * ```
 */
export function createBotClassifier(options: BotClassifierOptions = {}): BotClassifier {
  const patterns: BotPattern[] = [...(options.extraPatterns ?? []), ...BOT_PATTERNS].map(
    (entry) => ({ ...entry, pattern: caseInsensitive(entry.pattern) }),
  );
  const prefixes = [...BOT_ADDRESS_PREFIXES, ...(options.extraPrefixes ?? [])];
  const threshold = options.frequencyThreshold ?? BOT_FREQUENCY_THRESHOLD;

  const findPattern = (userAgent: string | undefined): BotPattern | undefined => {
    if (!userAgent) {
      return undefined;
    }
    return patterns.find((entry) => entry.pattern.test(userAgent));
  };

  const matchesPrefix = (address: string | undefined): boolean => {
    if (!address) {
      return false;
    }
    return prefixes.some((prefix) => address.startsWith(prefix));
  };

  return {
    classify(context: RequestContext): ClassificationResult {
      const match = findPattern(context.headers.getNonEmpty("user-agent"));
      const signals: BotSignal[] = [];
      if (match) {
        signals.push("user-agent");
      }
      if (matchesPrefix(context.remoteAddress)) {
        signals.push("address");
      }
      if ((context.requestFrequency ?? 0) > threshold) {
        signals.push("frequency");
      }

      const isBot = signals.length > 0;
      let confidence = isBot ? 0.6 : 0.8;
      if (signals.includes("user-agent")) confidence += 0.3;
      if (signals.includes("address")) confidence += 0.2;
      if (signals.includes("frequency")) confidence += 0.1;

      const result: ClassificationResult = {
        isBot,
        botType: match ? match.botType : isBot ? "unknown_bot" : "human",
        confidence: clampConfidence(confidence),
        signals,
      };
      if (match) {
        result.botName = match.botName;
      }
      return result;
    },
  };
}

/** Round away float noise (0.6 + 0.3 is 0.8999...) and clamp to [0, 0.99]. */
export function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  const rounded = Math.round(value * 100) / 100;
  return Math.min(Math.max(rounded, 0), MAX_CONFIDENCE);
}

const defaultClassifier = createBotClassifier();

/**
 * Classify a request with the built-in tables.
 *
 * @example
 * ```ts
 * classify(createRequestContext({
 *   headers: { "user-agent": "Mozilla/5.0 (compatible; Googlebot/2.1; +http://www.google.com/bot.html)" },
 * }));
 * // { isBot: true, botType: "search_engine", botName: "Googlebot", confidence: 0.9, signals: ["user-agent"] }
 * ```
 */
export function classify(context: RequestContext): ClassificationResult {
  return defaultClassifier.classify(context);
}
