/**
 * Cryptographic utilities for the legacy request signature
 * Uses @noble/hashes for SHA-1
 */

import { sha1 } from '@noble/hashes/sha1';

/**
 * Block size of SHA-1 in bytes; the signing key is padded to this length
 */
export const SHA1_BLOCK_SIZE = 64;

const INNER_PAD = 0x36;
const OUTER_PAD = 0x5c;

/**
 * HMAC-SHA1 built by hand from two SHA-1 passes.
 *
 * The key is zero-padded to the 64-byte block, or cut to it when longer.
 * Longer keys are never pre-hashed, so for keys over 64 bytes this differs
 * from RFC 2104; for every shorter key it is the same function.
 *
 * inner = SHA1((key ^ 0x36...) || message)
 * outer = SHA1((key ^ 0x5c...) || inner)
 */
export function legacyHmacSha1(key: Uint8Array, message: string | Uint8Array): Uint8Array {
  const messageBytes = typeof message === 'string' ? new TextEncoder().encode(message) : message;

  const blockKey = new Uint8Array(SHA1_BLOCK_SIZE);
  blockKey.set(key.subarray(0, SHA1_BLOCK_SIZE));

  const innerInput = new Uint8Array(SHA1_BLOCK_SIZE + messageBytes.length);
  const outerKey = new Uint8Array(SHA1_BLOCK_SIZE);
  for (const [i, byte] of blockKey.entries()) {
    innerInput[i] = byte ^ INNER_PAD;
    outerKey[i] = byte ^ OUTER_PAD;
  }
  innerInput.set(messageBytes, SHA1_BLOCK_SIZE);

  const innerDigest = sha1(innerInput);

  const outerInput = new Uint8Array(SHA1_BLOCK_SIZE + innerDigest.length);
  outerInput.set(outerKey);
  outerInput.set(innerDigest, SHA1_BLOCK_SIZE);

  return sha1(outerInput);
}

/**
 * Convert byte array to base64 string
 */
export function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64');
}
