/**
 * merkle-attest - Core Types
 *
 * Records, digests and proofs shared by the tree, the verifier and the CLI.
 */

// ============================================================================
// Bytes
// ============================================================================

/**
 * Fixed-size output of the digest function.
 */
export type Digest = Uint8Array;

/**
 * A record as accepted by the public API. Strings are UTF-8 encoded.
 */
export type RecordInput = Uint8Array | string;

/**
 * Maps a byte sequence to a fixed-length digest. Must be deterministic.
 */
export type DigestFunction = (data: Uint8Array) => Digest;

export type HashAlgorithm = 'sha3-256' | 'sha256';

// ============================================================================
// Merkle Tree Types
// ============================================================================

/**
 * Which side of the path node a sibling is concatenated on.
 */
export type ProofPosition = 'left' | 'right';

export interface ProofSibling {
  /** Digest of the sibling node */
  readonly hash: Digest;

  /** Position relative to path node */
  readonly position: ProofPosition;
}

/**
 * Membership proof for a single record.
 * Siblings run from the leaf level up to just below the root.
 */
export interface MerkleProof {
  /** Index of the leaf (informational, not used by verification) */
  readonly leafIndex: number;

  readonly siblings: readonly ProofSibling[];
}

/**
 * Summary of a tree.
 */
export interface TreeState {
  /** Root digest as hex (or null if empty) */
  rootHash: string | null;

  leafCount: number;

  /** Levels above the leaves */
  height: number;

  algorithm: string;
}

// ============================================================================
// Proof Envelope
// ============================================================================

export const PROOF_VERSION = 1;

/**
 * JSON form of a proof, digests as hex.
 */
export interface EncodedProof {
  version: typeof PROOF_VERSION;
  algorithm: string;
  leafIndex: number;
  root?: string;
  siblings: Array<{ hash: string; position: ProofPosition }>;
}

// ============================================================================
// Configuration
// ============================================================================

export interface TreeConfig {
  /** Built-in digest algorithm */
  algorithm: HashAlgorithm;
}

export interface TreeOptions {
  algorithm?: HashAlgorithm;

  /** Custom digest function; takes precedence over algorithm */
  hash?: DigestFunction;
}

export const DEFAULT_CONFIG: TreeConfig = {
  algorithm: 'sha3-256',
};
