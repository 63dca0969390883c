/**
 * @footfall/core - Privacy
 *
 * Address anonymization, salted address hashing, and PII detection /
 * redaction. Every function here is pure and never throws: input it cannot
 * interpret is returned unchanged (or reported as containing no PII).
 */

import type { AnonymizationLevel, PiiCategory } from "./types.js";
import type { ParsedAddress } from "./address.js";
import { formatAddress, parseAddress, canonicalAddress } from "./address.js";
import { digestBase64, generateSalt } from "./crypto.js";
import { ADDRESS_HASH_LENGTH } from "./constants.js";

// ---------------------------------------------------------------------------
// Address anonymization
// ---------------------------------------------------------------------------

/**
 * Number of leading units kept per family and level: octets for IPv4,
 * 16-bit groups for IPv6. Partial IPv6 drops the last 80 bits, full drops
 * the last 112.
 */
const KEPT_UNITS: Record<"partial" | "full", { v4: number; v6: number }> = {
  partial: { v4: 3, v6: 3 },
  full: { v4: 2, v6: 1 },
};

function truncate(address: ParsedAddress, level: "partial" | "full"): ParsedAddress {
  if (address.version === 4) {
    const keep = KEPT_UNITS[level].v4;
    return { version: 4, octets: address.octets.map((o, i) => (i < keep ? o : 0)) };
  }
  const keep = KEPT_UNITS[level].v6;
  return { version: 6, groups: address.groups.map((g, i) => (i < keep ? g : 0)) };
}

/**
 * Anonymize an IP address by zeroing its trailing bits.
 *
 * - IPv4 `partial` zeroes the last octet, `full` the last two.
 * - IPv6 `partial` zeroes the last 80 bits, `full` the last 112.
 * - `none` and unrecognized input are returned unchanged.
 *
 * The result is in canonical form, so anonymizing twice at the same level
 * yields the same string.
 *
 * @example
 * ```ts
 * anonymizeAddress("192.168.1.100", "partial"); // "192.168.1.0"
 * anonymizeAddress("192.168.1.100", "full");    // "192.168.0.0"
 * ```
 */
export function anonymizeAddress(address: string, level: AnonymizationLevel): string {
  if (level === "none") {
    return address;
  }
  const parsed = parseAddress(address);
  if (!parsed) {
    return address;
  }
  return formatAddress(truncate(parsed, level));
}

/**
 * Salted, irreversible hash of an address. The same `(address, salt)` pair
 * always yields the same hash; without the salt two hashes of one address
 * cannot be correlated. A random salt is generated when none is given.
 */
export function hashAddress(address: string, salt?: string): string {
  const effectiveSalt = salt ?? generateSalt();
  const canonical = canonicalAddress(address) ?? address.trim();
  return digestBase64(effectiveSalt + canonical).slice(0, ADDRESS_HASH_LENGTH);
}

// ---------------------------------------------------------------------------
// PII detection
// ---------------------------------------------------------------------------

const PII_PATTERNS: ReadonlyArray<{ category: PiiCategory; pattern: RegExp }> = [
  { category: "email", pattern: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/ },
  { category: "phone", pattern: /(?<!\d)(?:\+\d{1,3}\s?)?\(?\d{3}\)?[\s.-]?\d{3}[\s.-]?\d{4}(?!\d)/ },
  { category: "national_id", pattern: /\b\d{3}-\d{2}-\d{4}\b/ },
  { category: "payment_card", pattern: /\b\d{4}[\s-]?\d{4}[\s-]?\d{4}[\s-]?\d{4}\b/ },
  { category: "ip_address", pattern: /\b\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}\b/ },
];

/**
 * Test text against each PII pattern independently.
 *
 * @returns Categories found (empty when none)
 */
export function detectPii(text: string): Set<PiiCategory> {
  const found = new Set<PiiCategory>();
  if (typeof text !== "string" || text === "") {
    return found;
  }
  for (const { category, pattern } of PII_PATTERNS) {
    if (pattern.test(text)) {
      found.add(category);
    }
  }
  return found;
}

export interface SanitizeOptions {
  /** Character repeated over each PII span (default: "*") */
  maskChar?: string;
  /** Mask only the local part of emails, keeping "@domain" (default: false) */
  preserveDomain?: boolean;
}

/**
 * Mask every detected PII span with `maskChar`, repeated to the span's
 * length. Spans are collected against the original text and merged before
 * masking, so overlapping matches (a national id inside a longer digit
 * group, say) are masked completely and the text keeps its length.
 */
export function sanitize(text: string, options: SanitizeOptions = {}): string {
  if (typeof text !== "string" || text === "") {
    return text;
  }
  const maskChar = options.maskChar && options.maskChar.length > 0 ? options.maskChar[0] : "*";

  const spans: Array<[number, number]> = [];
  for (const { category, pattern } of PII_PATTERNS) {
    for (const match of text.matchAll(new RegExp(pattern.source, "g"))) {
      const start = match.index ?? 0;
      let end = start + match[0].length;
      if (category === "email" && options.preserveDomain) {
        end = start + match[0].indexOf("@");
      }
      if (end > start) {
        spans.push([start, end]);
      }
    }
  }
  if (spans.length === 0) {
    return text;
  }

  spans.sort((a, b) => a[0] - b[0]);
  const merged: Array<[number, number]> = [];
  for (const [start, end] of spans) {
    const last = merged[merged.length - 1];
    if (last && start <= last[1]) {
      last[1] = Math.max(last[1], end);
    } else {
      merged.push([start, end]);
    }
  }

  // Every pattern is ASCII-only, so UTF-16 offsets equal character counts.
  let result = "";
  let cursor = 0;
  for (const [start, end] of merged) {
    result += text.slice(cursor, start) + maskChar.repeat(end - start);
    cursor = end;
  }
  return result + text.slice(cursor);
}

/**
 * Strip identifying detail from a user agent while keeping the browser and
 * platform family: dotted version numbers become "x.x.x", long upper-case
 * tokens become "XXXXXXXX", and parenthesized details are emptied.
 */
export function sanitizeUserAgent(userAgent: string): string {
  return userAgent
    .replace(/\b\d+\.\d+\.\d+(?:\.\d+)?\b/g, "x.x.x")
    .replace(/\b[A-Z0-9]{8,}\b/g, "XXXXXXXX")
    .replace(/\(.+?\)/g, "()")
    .replace(/\s+/g, " ")
    .trim();
}

