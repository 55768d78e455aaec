/**
 * Hashing utilities for the fork economics simulator
 * Uses @noble/hashes for SHA-256
 */

import { sha256 } from '@noble/hashes/sha2';
import { bytesToHex } from '@noble/hashes/utils';

/**
 * Hashes data with SHA-256
 * Non-string data is serialized with JSON.stringify first, so key order matters
 * @returns The hash as a 64-character hex string
 */
export const sha256Hash = (data: unknown): string => {
  const stringData = typeof data === 'string' ? data : JSON.stringify(data);
  const hashBytes = sha256(new TextEncoder().encode(stringData));
  return bytesToHex(hashBytes);
};

/**
 * Shortens a hash for log output
 */
export const shortHash = (hash: string, length: number = 8): string => {
  return hash.substring(0, length);
};
