/**
 * Cookie-free visitor identity.
 *
 * An identity is a truncated digest over a fixed, ordered list of request
 * characteristics. Version numbers in the User-Agent are normalized away so
 * that a browser update does not create a new visitor.
 */

import type { Identity, RequestContext } from "@footfall/core";
import {
  FINGERPRINT_DELIMITER,
  IDENTITY_HASH_LENGTH,
  IDENTITY_PREFIX,
  MAX_FINGERPRINT_USER_AGENT_LENGTH,
  digestHex,
} from "@footfall/core";

export type Platform = "Windows" | "macOS" | "Linux" | "iOS" | "Android" | "Unknown";

export type DeviceType = "mobile" | "tablet" | "desktop" | "unknown";

const VERSION_NUMBER = /\d+(?:\.\d+)+/g;

// ---------------------------------------------------------------------------
// User-Agent helpers
// ---------------------------------------------------------------------------

/** Replace every dotted version number with a placeholder and cap the length. */
export function normalizeUserAgent(userAgent: string): string {
  return userAgent.replace(VERSION_NUMBER, "VERSION").slice(0, MAX_FINGERPRINT_USER_AGENT_LENGTH);
}

/**
 * Coarse operating-system guess. Mobile platforms are checked first: iOS
 * agents also say "Mac OS X" and Android agents also say "Linux".
 */
export function detectPlatform(userAgent: string | undefined): Platform {
  if (!userAgent) {
    return "Unknown";
  }
  if (/iphone|ipad|ipod/i.test(userAgent)) return "iOS";
  if (/android/i.test(userAgent)) return "Android";
  if (/windows/i.test(userAgent)) return "Windows";
  if (/macintosh|mac os x/i.test(userAgent)) return "macOS";
  if (/linux|x11/i.test(userAgent)) return "Linux";
  return "Unknown";
}

export function detectDeviceType(userAgent: string | undefined): DeviceType {
  if (!userAgent) {
    return "unknown";
  }
  if (/ipad|tablet/i.test(userAgent)) return "tablet";
  if (/mobile|iphone|ipod|android/i.test(userAgent)) return "mobile";
  return "desktop";
}

// ---------------------------------------------------------------------------
// Connection hints
// ---------------------------------------------------------------------------

function connectionScheme(context: RequestContext): string {
  const forwarded = context.headers.getNonEmpty("x-forwarded-proto");
  if (forwarded) {
    return forwarded.split(",")[0].trim().toLowerCase();
  }
  // Cloudflare: cf-visitor: {"scheme":"https"}
  const visitor = /"scheme"\s*:\s*"([a-z]+)"/i.exec(context.headers.getNonEmpty("cf-visitor") ?? "");
  return visitor ? visitor[1].toLowerCase() : "http";
}

function viewportHint(context: RequestContext): string | undefined {
  return (
    context.headers.getNonEmpty("viewport-width") ??
    context.headers.getNonEmpty("sec-ch-viewport-width")
  );
}

// ---------------------------------------------------------------------------
// Fingerprint
// ---------------------------------------------------------------------------

/**
 * Ordered identity components. New components may only ever be appended,
 * otherwise every existing identity changes.
 */
export function fingerprintComponents(context: RequestContext, privacyMode: boolean): string[] {
  const userAgent = context.headers.getNonEmpty("user-agent");
  const components: Array<string | undefined> = [
    userAgent === undefined ? undefined : normalizeUserAgent(userAgent),
    context.headers.getNonEmpty("accept-language"),
    context.headers.getNonEmpty("accept-encoding"),
    detectPlatform(userAgent),
  ];
  if (!privacyMode) {
    components.push(connectionScheme(context), viewportHint(context));
  }
  return components.filter((component): component is string => component !== undefined);
}

/**
 * Derive a visitor identity from a request.
 *
 * @example
 * ```ts
 * fingerprint(createRequestContext({ headers: { "user-agent": ua } }), false);
 * // "fp_3f29c1d0a8b47e65"
 * ```
 */
export function fingerprint(context: RequestContext, privacyMode: boolean): Identity {
  const joined = fingerprintComponents(context, privacyMode).join(FINGERPRINT_DELIMITER);
  return `${IDENTITY_PREFIX}${digestHex(joined).slice(0, IDENTITY_HASH_LENGTH)}`;
}
