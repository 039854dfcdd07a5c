/**
 * merkle-attest - Proof Verification
 */

import type { Digest, DigestFunction, MerkleProof } from '../types.js';
import { bytesEqual, getDigestFunction, hashPair } from './digest.js';

/**
 * Replay the hashing described by a proof and compare the result to a root.
 * Needs no tree: a root, a proof and a candidate leaf digest are enough.
 *
 * Never throws. Anything that does not reproduce the root, including
 * malformed proofs, yields false.
 */
export function verifyProof(
  proof: MerkleProof,
  candidate: Digest,
  root: Digest,
  hash: DigestFunction = getDigestFunction()
): boolean {
  try {
    let current = candidate;

    for (const sibling of proof.siblings) {
      if (sibling.position === 'left') {
        current = hashPair(sibling.hash, current, hash);
      } else if (sibling.position === 'right') {
        current = hashPair(current, sibling.hash, hash);
      } else {
        return false;
      }
    }

    return bytesEqual(current, root);
  } catch {
    return false;
  }
}
