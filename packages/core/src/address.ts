/**
 * @footfall/core - IP Address Parsing
 *
 * Minimal IPv4 / IPv6 parsing and formatting. Parsing is strict (no octal
 * or shorthand IPv4 forms) and never throws: unparseable input yields
 * `undefined`. IPv6 output follows RFC 5952 (lowercase, longest zero run
 * compressed). `parseAddress` reads IPv4-mapped addresses (`::ffff:a.b.c.d`,
 * what a dual-stack socket reports for an IPv4 peer) as plain IPv4.
 */

export interface IPv4Address {
  version: 4;
  /** Four octets, 0-255 */
  octets: number[];
}

export interface IPv6Address {
  version: 6;
  /** Eight 16-bit groups */
  groups: number[];
}

export type ParsedAddress = IPv4Address | IPv6Address;

const IPV4_PART = /^(0|[1-9]\d{0,2})$/;
const IPV6_GROUP = /^[0-9a-f]{1,4}$/;
const IPV4_WITH_PORT = /^(\d{1,3}(?:\.\d{1,3}){3}):\d{1,5}$/;
const BRACKETED_IPV6 = /^\[([^\]]+)\](?::\d{1,5})?$/;

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

export function parseIPv4(text: string): IPv4Address | undefined {
  const parts = text.split(".");
  if (parts.length !== 4) {
    return undefined;
  }

  const octets: number[] = [];
  for (const part of parts) {
    if (!IPV4_PART.test(part)) {
      return undefined;
    }
    const value = Number(part);
    if (value > 255) {
      return undefined;
    }
    octets.push(value);
  }

  return { version: 4, octets };
}

export function parseIPv6(text: string): IPv6Address | undefined {
  let input = text.toLowerCase();

  // Drop a zone index ("fe80::1%eth0").
  const zone = input.indexOf("%");
  if (zone !== -1) {
    input = input.slice(0, zone);
  }

  // Trailing dotted quad ("::ffff:192.0.2.1").
  let embedded: number[] = [];
  if (input.includes(".")) {
    const lastColon = input.lastIndexOf(":");
    const v4 = parseIPv4(input.slice(lastColon + 1));
    if (!v4 || lastColon === -1) {
      return undefined;
    }
    const [a, b, c, d] = v4.octets;
    embedded = [(a << 8) | b, (c << 8) | d];
    input = input.slice(0, lastColon + 1);
    // Keep "::" intact; otherwise drop the dangling separator.
    if (input.endsWith(":") && !input.endsWith("::")) {
      input = input.slice(0, -1);
    }
  }

  const halves = input.split("::");
  if (halves.length > 2) {
    return undefined;
  }

  const parseGroups = (chunk: string): number[] | undefined => {
    if (chunk === "") {
      return [];
    }
    const groups: number[] = [];
    for (const group of chunk.split(":")) {
      if (!IPV6_GROUP.test(group)) {
        return undefined;
      }
      groups.push(parseInt(group, 16));
    }
    return groups;
  };

  const head = parseGroups(halves[0]);
  const tail = halves.length === 2 ? parseGroups(halves[1]) : [];
  if (!head || !tail) {
    return undefined;
  }

  const explicit = head.length + tail.length + embedded.length;
  let groups: number[];
  if (halves.length === 2) {
    if (explicit > 7) {
      return undefined;
    }
    groups = [...head, ...new Array<number>(8 - explicit).fill(0), ...tail, ...embedded];
  } else {
    if (explicit !== 8) {
      return undefined;
    }
    groups = [...head, ...embedded];
  }

  return { version: 6, groups };
}

/** The embedded IPv4 address of an IPv4-mapped IPv6 address, if it is one. */
export function unmapIPv4(address: IPv6Address): IPv4Address | undefined {
  const g = address.groups;
  if (!g.slice(0, 5).every((x) => x === 0) || g[5] !== 0xffff) {
    return undefined;
  }
  return { version: 4, octets: [g[6] >> 8, g[6] & 0xff, g[7] >> 8, g[7] & 0xff] };
}

function parseIPv6Unmapped(text: string): ParsedAddress | undefined {
  const parsed = parseIPv6(text);
  return parsed ? (unmapIPv4(parsed) ?? parsed) : undefined;
}

/**
 * Parse an address in any common textual form: plain v4 or v6, v4 with a
 * port, or a bracketed v6 with an optional port. IPv4-mapped v6 addresses
 * come back as v4.
 */
export function parseAddress(text: string | undefined | null): ParsedAddress | undefined {
  if (typeof text !== "string") {
    return undefined;
  }
  let input = text.trim();
  if (input === "") {
    return undefined;
  }

  const bracketed = BRACKETED_IPV6.exec(input);
  if (bracketed) {
    return parseIPv6Unmapped(bracketed[1]);
  }

  const withPort = IPV4_WITH_PORT.exec(input);
  if (withPort) {
    input = withPort[1];
  }

  return input.includes(":") ? parseIPv6Unmapped(input) : parseIPv4(input);
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

export function formatAddress(address: ParsedAddress): string {
  if (address.version === 4) {
    return address.octets.join(".");
  }

  const mapped = unmapIPv4(address);
  if (mapped) {
    return `::ffff:${mapped.octets.join(".")}`;
  }

  const g = address.groups;

  // Longest run of zero groups (length >= 2), first one on ties.
  let bestStart = -1;
  let bestLength = 0;
  for (let i = 0; i < 8; ) {
    if (g[i] !== 0) {
      i++;
      continue;
    }
    let j = i;
    while (j < 8 && g[j] === 0) j++;
    if (j - i > bestLength) {
      bestStart = i;
      bestLength = j - i;
    }
    i = j;
  }

  const hex = g.map((x) => x.toString(16));
  if (bestLength < 2) {
    return hex.join(":");
  }
  const left = hex.slice(0, bestStart).join(":");
  const right = hex.slice(bestStart + bestLength).join(":");
  return `${left}::${right}`;
}

/**
 * Canonical text form of an address, or undefined when it cannot be parsed.
 */
export function canonicalAddress(text: string | undefined | null): string | undefined {
  const parsed = parseAddress(text);
  return parsed ? formatAddress(parsed) : undefined;
}

export function isValidAddress(text: string | undefined | null): boolean {
  return parseAddress(text) !== undefined;
}

// ---------------------------------------------------------------------------
// Ranges
// ---------------------------------------------------------------------------

/** Bits of an address, most significant first, as 16-bit words. */
function toWords(address: ParsedAddress): number[] {
  if (address.version === 6) {
    return address.groups;
  }
  const [a, b, c, d] = address.octets;
  return [(a << 8) | b, (c << 8) | d];
}

/**
 * Whether an address falls inside a CIDR block such as "10.0.0.0/8" or
 * "fc00::/7". Mismatched families never match. An unparseable block never
 * matches.
 */
export function isInCidr(address: ParsedAddress, cidr: string): boolean {
  const slash = cidr.indexOf("/");
  const base = parseAddress(slash === -1 ? cidr : cidr.slice(0, slash));
  if (!base || base.version !== address.version) {
    return false;
  }

  const width = address.version === 4 ? 32 : 128;
  const prefix = slash === -1 ? width : Number(cidr.slice(slash + 1));
  if (!Number.isInteger(prefix) || prefix < 0 || prefix > width) {
    return false;
  }

  const a = toWords(address);
  const b = toWords(base);
  let remaining = prefix;
  for (let i = 0; i < a.length && remaining > 0; i++) {
    const bits = Math.min(16, remaining);
    const mask = (0xffff << (16 - bits)) & 0xffff;
    if ((a[i] & mask) !== (b[i] & mask)) {
      return false;
    }
    remaining -= bits;
  }
  return true;
}

const PRIVATE_RANGES = [
  "0.0.0.0/8",
  "10.0.0.0/8",
  "100.64.0.0/10",
  "127.0.0.0/8",
  "169.254.0.0/16",
  "172.16.0.0/12",
  "192.168.0.0/16",
  "::/128",
  "::1/128",
  "fc00::/7",
  "fe80::/10",
];

/**
 * Whether an address is loopback, link-local, private or otherwise not
 * publicly routable.
 */
export function isPrivateAddress(text: string | undefined | null): boolean {
  const parsed = parseAddress(text);
  if (!parsed) {
    return false;
  }
  return PRIVATE_RANGES.some((range) => isInCidr(parsed, range));
}
