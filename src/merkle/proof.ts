/**
 * merkle-attest - Proof Envelope
 *
 * JSON encoding of membership proofs, digests as lowercase hex.
 */

import { bytesToHex, hexToBytes } from '@noble/hashes/utils';
import { ProofFormatError } from '../errors.js';
import {
  PROOF_VERSION,
  type Digest,
  type EncodedProof,
  type MerkleProof,
  type ProofPosition,
  type ProofSibling,
} from '../types.js';

export interface DecodedProof {
  proof: MerkleProof;
  algorithm: string;
  root?: Digest;
}

// ============================================================================
// Encoding/Decoding
// ============================================================================

/**
 * Encode a proof as JSON text.
 */
export function encodeProof(
  proof: MerkleProof,
  options: { algorithm: string; root?: Digest }
): string {
  const envelope: EncodedProof = {
    version: PROOF_VERSION,
    algorithm: options.algorithm,
    leafIndex: proof.leafIndex,
    root: options.root ? bytesToHex(options.root) : undefined,
    siblings: proof.siblings.map(sibling => ({
      hash: bytesToHex(sibling.hash),
      position: sibling.position,
    })),
  };
  return JSON.stringify(envelope, null, 2);
}

/**
 * Decode JSON text into a proof.
 * @throws ProofFormatError on anything that is not a well-formed envelope
 */
export function decodeProof(text: string): DecodedProof {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new ProofFormatError('Proof is not valid JSON');
  }

  if (!isObject(parsed)) {
    throw new ProofFormatError('Proof must be a JSON object');
  }

  if (parsed.version !== PROOF_VERSION) {
    throw new ProofFormatError(`Unsupported proof version: ${String(parsed.version)}`);
  }

  const algorithm = parsed.algorithm;
  if (typeof algorithm !== 'string' || algorithm.length === 0) {
    throw new ProofFormatError('Proof algorithm must be a non-empty string');
  }

  const leafIndex = parsed.leafIndex;
  if (typeof leafIndex !== 'number' || !Number.isInteger(leafIndex) || leafIndex < 0) {
    throw new ProofFormatError('Proof leafIndex must be a non-negative integer');
  }

  const entries = parsed.siblings;
  if (!Array.isArray(entries)) {
    throw new ProofFormatError('Proof siblings must be an array');
  }

  const siblings = entries.map((entry: unknown, i: number) => decodeSibling(entry, i));

  let root: Digest | undefined;
  const rootHex = parsed.root;
  if (rootHex !== undefined) {
    if (typeof rootHex !== 'string') {
      throw new ProofFormatError('Proof root must be a hex string');
    }
    root = decodeHex(rootHex, 'root');
  }

  return {
    proof: { leafIndex, siblings },
    algorithm,
    root,
  };
}

// ============================================================================
// Helpers
// ============================================================================

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPosition(value: unknown): value is ProofPosition {
  return value === 'left' || value === 'right';
}

function decodeSibling(entry: unknown, i: number): ProofSibling {
  if (!isObject(entry)) {
    throw new ProofFormatError(`Sibling ${i} must be an object`);
  }
  const { hash, position } = entry;
  if (typeof hash !== 'string') {
    throw new ProofFormatError(`Sibling ${i} hash must be a hex string`);
  }
  if (!isPosition(position)) {
    throw new ProofFormatError(`Sibling ${i} position must be 'left' or 'right'`);
  }
  return { hash: decodeHex(hash, `sibling ${i} hash`), position };
}

/**
 * Parse a hex digest. Empty strings are rejected.
 */
export function decodeHex(hex: string, label = 'digest'): Digest {
  if (hex.length === 0 || !/^[0-9a-fA-F]*$/.test(hex) || hex.length % 2 !== 0) {
    throw new ProofFormatError(`Invalid hex in ${label}`);
  }
  return hexToBytes(hex);
}
