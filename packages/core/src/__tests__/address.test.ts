import { describe, it, expect } from "vitest";
import {
  parseAddress,
  canonicalAddress,
  isValidAddress,
  isInCidr,
  isPrivateAddress,
  formatAddress,
  parseIPv6,
} from "../index.js";

describe("parseAddress", () => {
  it("parses a dotted quad", () => {
    expect(parseAddress("192.168.1.100")).toEqual({ version: 4, octets: [192, 168, 1, 100] });
  });

  it("reads IPv4-mapped addresses as IPv4", () => {
    expect(parseAddress("::ffff:10.0.0.1")).toEqual({ version: 4, octets: [10, 0, 0, 1] });
    expect(parseAddress("[::ffff:203.0.113.7]:443")).toEqual({
      version: 4,
      octets: [203, 0, 113, 7],
    });
    expect(parseAddress("::ffff:c000:201")).toEqual({ version: 4, octets: [192, 0, 2, 1] });
  });

  it("rejects octets out of range or with leading zeros", () => {
    expect(parseAddress("256.1.1.1")).toBeUndefined();
    expect(parseAddress("01.2.3.4")).toBeUndefined();
    expect(parseAddress("1.2.3")).toBeUndefined();
  });

  it("strips a port from an IPv4 address", () => {
    expect(canonicalAddress("203.0.113.9:8080")).toBe("203.0.113.9");
  });

  it("parses a bracketed IPv6 address with a port", () => {
    expect(canonicalAddress("[2001:db8::1]:443")).toBe("2001:db8::1");
  });

  it("drops an IPv6 zone index", () => {
    expect(canonicalAddress("fe80::1%eth0")).toBe("fe80::1");
  });

  it("rejects malformed IPv6", () => {
    expect(parseAddress("1:2:3:4:5:6:7:8:9")).toBeUndefined();
    expect(parseAddress("1::2::3")).toBeUndefined();
    expect(parseAddress("12345::1")).toBeUndefined();
  });

  it("returns undefined for empty, blank and non-string input", () => {
    expect(parseAddress("")).toBeUndefined();
    expect(parseAddress("   ")).toBeUndefined();
    expect(parseAddress(undefined)).toBeUndefined();
    expect(parseAddress(null)).toBeUndefined();
  });
});

describe("canonicalAddress", () => {
  it("compresses and lower-cases IPv6", () => {
    expect(canonicalAddress("2001:0DB8:0000:0000:0000:0000:0000:0001")).toBe("2001:db8::1");
  });

  it("compresses the first of two equal zero runs", () => {
    expect(canonicalAddress("2001:db8:0:0:1:0:0:1")).toBe("2001:db8::1:0:0:1");
  });

  it("does not compress a single zero group", () => {
    expect(canonicalAddress("2001:db8:0:1:1:1:1:1")).toBe("2001:db8:0:1:1:1:1:1");
  });

  it("writes loopback and unspecified addresses", () => {
    expect(canonicalAddress("::1")).toBe("::1");
    expect(canonicalAddress("::")).toBe("::");
  });

  it("writes IPv4-mapped addresses as plain IPv4", () => {
    expect(canonicalAddress("::FFFF:192.0.2.1")).toBe("192.0.2.1");
  });

  it("formats a raw IPv4-mapped group list in dotted form", () => {
    const parsed = parseIPv6("::ffff:192.0.2.1");
    expect(parsed && formatAddress(parsed)).toBe("::ffff:192.0.2.1");
  });

  it("trims surrounding whitespace", () => {
    expect(canonicalAddress("  10.0.0.1 ")).toBe("10.0.0.1");
  });
});

describe("isValidAddress", () => {
  it("accepts both families", () => {
    expect(isValidAddress("8.8.8.8")).toBe(true);
    expect(isValidAddress("2606:4700::1111")).toBe(true);
  });

  it("rejects hostnames", () => {
    expect(isValidAddress("localhost")).toBe(false);
  });
});

describe("isInCidr", () => {
  const addr = (text: string) => {
    const parsed = parseAddress(text);
    if (!parsed) throw new Error(`bad fixture ${text}`);
    return parsed;
  };

  it("matches on a partial-word prefix", () => {
    expect(isInCidr(addr("172.31.255.255"), "172.16.0.0/12")).toBe(true);
    expect(isInCidr(addr("172.32.0.1"), "172.16.0.0/12")).toBe(false);
  });

  it("treats a block without a prefix length as a single address", () => {
    expect(isInCidr(addr("10.0.0.1"), "10.0.0.1")).toBe(true);
    expect(isInCidr(addr("10.0.0.2"), "10.0.0.1")).toBe(false);
  });

  it("never matches across families", () => {
    expect(isInCidr(addr("fd00::10:0:0:1"), "10.0.0.0/8")).toBe(false);
    expect(isInCidr(addr("10.0.0.1"), "fd00::/8")).toBe(false);
  });

  it("matches IPv4-mapped addresses against IPv4 blocks", () => {
    expect(isInCidr(addr("::ffff:10.0.0.1"), "10.0.0.0/8")).toBe(true);
  });

  it("never matches an invalid block", () => {
    expect(isInCidr(addr("10.0.0.1"), "10.0.0.0/40")).toBe(false);
    expect(isInCidr(addr("10.0.0.1"), "nonsense/8")).toBe(false);
  });

  it("matches everything under /0", () => {
    expect(isInCidr(addr("203.0.113.9"), "0.0.0.0/0")).toBe(true);
  });
});

describe("isPrivateAddress", () => {
  it("recognizes private and loopback ranges", () => {
    expect(isPrivateAddress("10.1.2.3")).toBe(true);
    expect(isPrivateAddress("192.168.0.5")).toBe(true);
    expect(isPrivateAddress("127.0.0.1")).toBe(true);
    expect(isPrivateAddress("100.64.1.1")).toBe(true);
    expect(isPrivateAddress("::1")).toBe(true);
    expect(isPrivateAddress("fd12::1")).toBe(true);
    expect(isPrivateAddress("fe80::abcd")).toBe(true);
  });

  it("recognizes IPv4-mapped loopback and private addresses", () => {
    expect(isPrivateAddress("::ffff:127.0.0.1")).toBe(true);
    expect(isPrivateAddress("::ffff:192.168.0.5")).toBe(true);
    expect(isPrivateAddress("::ffff:8.8.8.8")).toBe(false);
  });

  it("returns false for public and unparseable addresses", () => {
    expect(isPrivateAddress("8.8.8.8")).toBe(false);
    expect(isPrivateAddress("2606:4700::1111")).toBe(false);
    expect(isPrivateAddress("garbage")).toBe(false);
  });
});
