/**
 * merkle-attest - Digest Functions
 *
 * Leaf and pair hashing over a pluggable digest function.
 * Defaults to SHA3-256.
 */

import { sha3_256 } from '@noble/hashes/sha3';
import { sha256 } from '@noble/hashes/sha256';
import { concatBytes, utf8ToBytes } from '@noble/hashes/utils';
import {
  DEFAULT_CONFIG,
  type Digest,
  type DigestFunction,
  type HashAlgorithm,
  type RecordInput,
  type TreeOptions,
} from '../types.js';

// ============================================================================
// Algorithms
// ============================================================================

const DIGEST_FUNCTIONS: Record<HashAlgorithm, DigestFunction> = {
  'sha3-256': (data) => sha3_256(data),
  'sha256': (data) => sha256(data),
};

export const HASH_ALGORITHMS: readonly HashAlgorithm[] = ['sha3-256', 'sha256'];

export function isHashAlgorithm(name: string): name is HashAlgorithm {
  return HASH_ALGORITHMS.some(algorithm => algorithm === name);
}

export function getDigestFunction(algorithm: HashAlgorithm = DEFAULT_CONFIG.algorithm): DigestFunction {
  return DIGEST_FUNCTIONS[algorithm];
}

/**
 * Resolve tree options to a digest function and the name reported for it.
 * A custom hash is reported as 'custom'.
 */
export function resolveDigest(options: TreeOptions = {}): { algorithm: string; hash: DigestFunction } {
  if (options.hash) {
    return { algorithm: 'custom', hash: options.hash };
  }
  const algorithm = options.algorithm ?? DEFAULT_CONFIG.algorithm;
  return { algorithm, hash: getDigestFunction(algorithm) };
}

// ============================================================================
// Hash Functions
// ============================================================================

/**
 * Normalize a record to bytes. Always returns a fresh copy.
 */
export function toBytes(record: RecordInput): Uint8Array {
  return typeof record === 'string' ? utf8ToBytes(record) : Uint8Array.from(record);
}

/**
 * Hash a leaf: H(record). No domain-separation prefix.
 */
export function hashRecord(record: RecordInput, hash: DigestFunction = getDigestFunction()): Digest {
  return hash(typeof record === 'string' ? utf8ToBytes(record) : record);
}

/**
 * Hash two child digests: H(left || right).
 * Order matters: left child always comes first.
 */
export function hashPair(left: Digest, right: Digest, hash: DigestFunction = getDigestFunction()): Digest {
  return hash(concatBytes(left, right));
}

/**
 * Byte-wise equality.
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}
