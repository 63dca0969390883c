import { describe, it, expect } from "vitest";
import { createRequestContext } from "@footfall/core";
import type { RequestContextInit } from "@footfall/core";
import { BOT_PATTERNS, clampConfidence, classify, createBotClassifier } from "../bots.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function ctx(userAgent: string | undefined, init: RequestContextInit = {}) {
  return createRequestContext({
    ...init,
    headers: userAgent === undefined ? {} : { "user-agent": userAgent },
  });
}

/** One real-world style User-Agent per table entry, keyed by bot name. */
const SAMPLE_AGENTS: Record<string, string> = {
  Googlebot: "Mozilla/5.0 (compatible; Googlebot/2.1; +http://www.google.com/bot.html)",
  Bingbot: "Mozilla/5.0 (compatible; bingbot/2.0; +http://www.bing.com/bingbot.htm)",
  "Yahoo Slurp": "Mozilla/5.0 (compatible; Yahoo! Slurp; http://help.yahoo.com/help/us/ysearch/slurp)",
  DuckDuckBot: "DuckDuckBot/1.1; (+http://duckduckgo.com/duckduckbot.html)",
  Baiduspider: "Mozilla/5.0 (compatible; Baiduspider/2.0; +http://www.baidu.com/search/spider.html)",
  YandexBot: "Mozilla/5.0 (compatible; YandexBot/3.0; +http://yandex.com/bots)",
  Applebot:
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_5) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/13.1.1 Safari/605.1.15 (Applebot/0.1)",
  Facebook: "facebookexternalhit/1.1 (+http://www.facebook.com/externalhit_uatext.php)",
  Twitter: "Twitterbot/1.0",
  LinkedIn: "LinkedInBot/1.0 (compatible; Mozilla/5.0; Apache-HttpClient +http://www.linkedin.com)",
  Slack: "Slackbot-LinkExpanding 1.0 (+https://api.slack.com/robots)",
  Discord: "Mozilla/5.0 (compatible; Discordbot/2.0; +https://discordapp.com)",
  Telegram: "TelegramBot/1.0",
  AhrefsBot: "Mozilla/5.0 (compatible; AhrefsBot/7.0; +http://ahrefs.com/robot/)",
  SemrushBot: "Mozilla/5.0 (compatible; SemrushBot/7~bl; +http://www.semrush.com/bot.html)",
  MJ12bot: "Mozilla/5.0 (compatible; MJ12bot/v1.4.8; http://mj12bot.com/)",
  DotBot: "Mozilla/5.0 (compatible; DotBot/1.2; +https://opensiteexplorer.org/dotbot)",
  UptimeRobot: "Mozilla/5.0+(compatible; UptimeRobot/2.0; http://www.uptimerobot.com/)",
  Pingdom: "Pingdom.com_bot_version_1.4_(http://www.pingdom.com/)",
  StatusCake: "Mozilla/5.0 (compatible; StatusCake)",
  Nessus: "Mozilla/5.0 (compatible; Nessus)",
  Nmap: "Mozilla/5.0 (compatible; Nmap Scripting Engine; https://nmap.org/book/nse.html)",
  Masscan: "masscan/1.3 (https://github.com/robertdavidgraham/masscan)",
  "Generic Bot": "ExampleBot/1.0",
  Crawler: "my-crawler/2.0",
  Spider: "FancySpider 3",
  Scraper: "price-scraper/0.1",
};

const BROWSERS = [
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36 Edg/120.0.0.0",
  "Mozilla/5.0 (X11; Linux x86_64; rv:121.0) Gecko/20100101 Firefox/121.0",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.2 Safari/605.1.15",
  "Mozilla/5.0 (iPhone; CPU iPhone OS 17_2 like Mac OS X) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.2 Mobile/15E148 Safari/604.1",
  "Mozilla/5.0 (Linux; Android 14; Pixel 8) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.6099.144 Mobile Safari/537.36",
];

const CHROME = BROWSERS[0];

// =========================================================================
// User-Agent table
// =========================================================================

describe("classify: user-agent table", () => {
  it("has a sample for every table entry", () => {
    expect(Object.keys(SAMPLE_AGENTS).sort()).toEqual(BOT_PATTERNS.map((p) => p.botName).sort());
  });

  for (const entry of BOT_PATTERNS) {
    it(`classifies ${entry.botName} as ${entry.botType}`, () => {
      const result = classify(ctx(SAMPLE_AGENTS[entry.botName]));
      expect(result.isBot).toBe(true);
      expect(result.botType).toBe(entry.botType);
      expect(result.botName).toBe(entry.botName);
      expect(result.confidence).toBeGreaterThanOrEqual(0.8);
      expect(result.confidence).toBeLessThanOrEqual(0.99);
    });
  }

  it("scores a user-agent hit alone at 0.9", () => {
    expect(classify(ctx(SAMPLE_AGENTS.Googlebot))).toEqual({
      isBot: true,
      botType: "search_engine",
      botName: "Googlebot",
      confidence: 0.9,
      signals: ["user-agent"],
    });
  });

  it("prefers named crawlers over the generic spider pattern", () => {
    expect(classify(ctx(SAMPLE_AGENTS.Baiduspider)).botName).toBe("Baiduspider");
  });

  it("matches case-insensitively", () => {
    expect(classify(ctx("GOOGLEBOT")).botName).toBe("Googlebot");
  });
});

describe("classify: browsers", () => {
  for (const userAgent of BROWSERS) {
    it(`treats ${userAgent.slice(0, 60)}... as human`, () => {
      expect(classify(ctx(userAgent))).toEqual({
        isBot: false,
        botType: "human",
        confidence: 0.8,
        signals: [],
      });
    });
  }

  it("treats a missing or empty user agent as human", () => {
    expect(classify(ctx(undefined)).botType).toBe("human");
    expect(classify(ctx("")).isBot).toBe(false);
  });
});

// =========================================================================
// Address and frequency
// =========================================================================

describe("classify: address and frequency", () => {
  it("flags a crawler network address as an unnamed bot", () => {
    expect(classify(ctx(CHROME, { remoteAddress: "66.249.66.1" }))).toEqual({
      isBot: true,
      botType: "unknown_bot",
      confidence: 0.8,
      signals: ["address"],
    });
  });

  it("matches IPv4-mapped IPv6 addresses", () => {
    expect(classify(ctx(CHROME, { remoteAddress: "::ffff:66.249.66.1" })).signals).toEqual([
      "address",
    ]);
  });

  it("caps combined evidence at 0.99", () => {
    const result = classify(
      ctx(SAMPLE_AGENTS.Googlebot, { remoteAddress: "66.249.66.1", requestFrequency: 120 }),
    );
    expect(result.confidence).toBe(0.99);
    expect(result.signals).toEqual(["user-agent", "address", "frequency"]);
    expect(result.botType).toBe("search_engine");
  });

  it("flags more than 60 requests per minute", () => {
    expect(classify(ctx(CHROME, { requestFrequency: 61 }))).toEqual({
      isBot: true,
      botType: "unknown_bot",
      confidence: 0.7,
      signals: ["frequency"],
    });
    expect(classify(ctx(CHROME, { requestFrequency: 60 })).isBot).toBe(false);
  });
});

// =========================================================================
// Custom classifiers
// =========================================================================

describe("createBotClassifier", () => {
  it("checks extra patterns first, case-insensitively", () => {
    const classifier = createBotClassifier({
      extraPatterns: [{ pattern: /acme-probe/, botType: "monitoring", botName: "Acme Probe" }],
    });
    const result = classifier.classify(ctx("ACME-PROBE/1.0"));
    expect(result.botType).toBe("monitoring");
    expect(result.botName).toBe("Acme Probe");
  });

  it("adds address prefixes and a custom frequency threshold", () => {
    const classifier = createBotClassifier({
      extraPrefixes: ["203.0.113."],
      frequencyThreshold: 10,
    });
    expect(classifier.classify(ctx(CHROME, { remoteAddress: "203.0.113.50" })).signals).toEqual([
      "address",
    ]);
    expect(classifier.classify(ctx(CHROME, { requestFrequency: 11 })).signals).toEqual([
      "frequency",
    ]);
  });
});

describe("clampConfidence", () => {
  it("rounds and bounds scores", () => {
    expect(clampConfidence(0.6 + 0.3)).toBe(0.9);
    expect(clampConfidence(1.5)).toBe(0.99);
    expect(clampConfidence(-1)).toBe(0);
    expect(clampConfidence(Number.NaN)).toBe(0);
  });
});
