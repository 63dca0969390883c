/**
 * @footfall/core - Hashing Helpers
 *
 * Synchronous digests for identities and address hashes. tweetnacl's hash
 * is SHA-512 and runs on every JavaScript runtime without Web Crypto's async
 * API, which matters because the intake pipeline never suspends.
 */

import nacl from "tweetnacl";
import { decodeUTF8, encodeBase64 } from "tweetnacl-util";
import { customAlphabet } from "nanoid";
import { DEFAULT_SALT_LENGTH } from "./constants.js";

const SALT_ALPHABET =
  "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz+/";

/** SHA-512 digest of a UTF-8 string. */
export function digest(input: string): Uint8Array {
  return nacl.hash(decodeUTF8(input));
}

/** Hex-encoded SHA-512 digest of a UTF-8 string. */
export function digestHex(input: string): string {
  return bytesToHex(digest(input));
}

/** Base64-encoded SHA-512 digest of a UTF-8 string. */
export function digestBase64(input: string): string {
  return encodeBase64(digest(input));
}

/**
 * Generate a cryptographically random salt drawn from the base64 alphabet.
 *
 * @param length - Number of characters (default: 32)
 */
export function generateSalt(length: number = DEFAULT_SALT_LENGTH): string {
  return customAlphabet(SALT_ALPHABET, length)();
}

/** Convert a Uint8Array to a hex string. */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join("");
}
