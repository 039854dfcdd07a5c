/**
 * merkle-attest - Level Builder
 *
 * Flat, bottom-up level construction. Level 0 holds the leaf digests,
 * each higher level holds the hashes of adjacent pairs from the level below.
 */

import type { Digest, DigestFunction } from '../types.js';
import { getDigestFunction, hashPair, hashRecord } from './digest.js';

/**
 * One digest per record, in record order.
 */
export function buildLeafLevel(
  records: readonly Uint8Array[],
  hash: DigestFunction = getDigestFunction()
): Digest[] {
  return records.map(record => hashRecord(record, hash));
}

/**
 * Hash consecutive pairs (d0,d1), (d2,d3), ... into the parent level.
 * An unpaired last digest is hashed with itself.
 * Output length is ceil(n / 2).
 */
export function buildParentLevel(
  level: readonly Digest[],
  hash: DigestFunction = getDigestFunction()
): Digest[] {
  const parents: Digest[] = [];

  for (let i = 0; i < level.length; i += 2) {
    const left = level[i];
    // Odd count: duplicate last
    const right = i + 1 < level.length ? level[i + 1] : left;
    parents.push(hashPair(left, right, hash));
  }

  return parents;
}

/**
 * All levels from the leaves up to the single-entry root level.
 * Returns no levels for no records.
 */
export function buildLevels(
  records: readonly Uint8Array[],
  hash: DigestFunction = getDigestFunction()
): Digest[][] {
  if (records.length === 0) return [];

  const levels: Digest[][] = [buildLeafLevel(records, hash)];
  let current = levels[0];

  while (current.length > 1) {
    current = buildParentLevel(current, hash);
    levels.push(current);
  }

  return levels;
}
