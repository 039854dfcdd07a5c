/**
 * merkle-attest - Merkle roots and membership proofs
 *
 * Build a hash tree over records, prove a record is in it,
 * verify the proof with nothing but the root.
 */

// Core types
export type {
  Digest,
  DigestFunction,
  EncodedProof,
  HashAlgorithm,
  MerkleProof,
  ProofPosition,
  ProofSibling,
  RecordInput,
  TreeConfig,
  TreeOptions,
  TreeState,
} from './types.js';
export { DEFAULT_CONFIG, PROOF_VERSION } from './types.js';

// Errors
export {
  MerkleTreeError,
  NotFoundError,
  EmptyTreeError,
  ProofFormatError,
  type MerkleErrorCode,
} from './errors.js';

// Merkle tree
export { MerkleTree } from './merkle/tree.js';
export { verifyProof } from './merkle/verify.js';
export { buildLeafLevel, buildParentLevel, buildLevels } from './merkle/levels.js';
export {
  HASH_ALGORITHMS,
  bytesEqual,
  getDigestFunction,
  hashPair,
  hashRecord,
  isHashAlgorithm,
  resolveDigest,
  toBytes,
} from './merkle/digest.js';

// Proof envelope
export { encodeProof, decodeProof, decodeHex, type DecodedProof } from './merkle/proof.js';
