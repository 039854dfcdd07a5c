/**
 * merkle-attest - Merkle Tree Implementation
 *
 * Binary hash tree over an ordered list of byte records.
 * Every structural change rebuilds all levels from the leaves up.
 */

import { bytesToHex } from '@noble/hashes/utils';
import { EmptyTreeError, NotFoundError } from '../errors.js';
import type {
  Digest,
  DigestFunction,
  MerkleProof,
  ProofSibling,
  RecordInput,
  TreeOptions,
  TreeState,
} from '../types.js';
import { bytesEqual, hashRecord, resolveDigest, toBytes } from './digest.js';
import { buildLevels } from './levels.js';
import { verifyProof } from './verify.js';

// ============================================================================
// Merkle Tree Class
// ============================================================================

/**
 * In-memory Merkle tree.
 *
 * Design:
 * - Raw records are kept in insertion order for lookup by value
 * - Level 0 holds one digest per record
 * - Each higher level contains hashes of pairs from the level below
 * - The last level has exactly one entry, the root
 *
 * Not safe for concurrent mutation; callers serialize access.
 */
export class MerkleTree {
  /** Raw records, insertion order */
  private records: Uint8Array[] = [];

  /** Digests by level, leaves first */
  private levels: Digest[][] = [];

  private readonly hash: DigestFunction;

  /** Name of the digest algorithm ('custom' for a supplied function) */
  readonly algorithm: string;

  constructor(records: Iterable<RecordInput> = [], options: TreeOptions = {}) {
    const { algorithm, hash } = resolveDigest(options);
    this.algorithm = algorithm;
    this.hash = hash;

    this.records = Array.from(records, toBytes);
    this.rebuild();
  }

  /**
   * Build a tree from an ordered list of records.
   */
  static build(records: Iterable<RecordInput>, options?: TreeOptions): MerkleTree {
    return new MerkleTree(records, options);
  }

  // --------------------------------------------------------------------------
  // Public API
  // --------------------------------------------------------------------------

  /**
   * Append a record and re-derive every level.
   * Proofs generated before this call are stale afterwards.
   * @returns Leaf hash and index
   */
  add(record: RecordInput): { hash: Digest; index: number } {
    const bytes = toBytes(record);
    const index = this.records.length;

    this.records.push(bytes);
    this.rebuild();

    return { hash: this.levels[0][index].slice(), index };
  }

  /**
   * Get the current root digest.
   * @throws EmptyTreeError if the tree has no records
   */
  getRoot(): Digest {
    if (this.levels.length === 0) {
      throw new EmptyTreeError('Cannot read the root of an empty tree');
    }
    return this.levels[this.levels.length - 1][0].slice();
  }

  get leafCount(): number {
    return this.records.length;
  }

  /**
   * Levels above the leaves. 0 for a single leaf or an empty tree.
   */
  get height(): number {
    return Math.max(this.levels.length - 1, 0);
  }

  get isEmpty(): boolean {
    return this.records.length === 0;
  }

  /**
   * Position of the first stored record equal to the given one, or -1.
   */
  indexOf(record: RecordInput): number {
    const bytes = typeof record === 'string' ? toBytes(record) : record;
    return this.records.findIndex(stored => bytesEqual(stored, bytes));
  }

  has(record: RecordInput): boolean {
    return this.indexOf(record) !== -1;
  }

  /**
   * Generate a membership proof for a record.
   * Matches by exact byte equality; the first occurrence wins.
   * @throws EmptyTreeError if the tree has no records
   * @throws NotFoundError if the record was never added
   */
  generateProof(record: RecordInput): MerkleProof {
    if (this.isEmpty) {
      throw new EmptyTreeError('Cannot generate a proof from an empty tree');
    }

    const index = this.indexOf(record);
    if (index === -1) {
      throw new NotFoundError();
    }

    return this.buildProof(index);
  }

  /**
   * Generate a membership proof for the leaf at a position.
   */
  generateProofForIndex(leafIndex: number): MerkleProof {
    if (this.isEmpty) {
      throw new EmptyTreeError('Cannot generate a proof from an empty tree');
    }

    if (!Number.isInteger(leafIndex) || leafIndex < 0 || leafIndex >= this.leafCount) {
      throw new NotFoundError(`Leaf index ${leafIndex} out of range for ${this.leafCount} leaves`);
    }

    return this.buildProof(leafIndex);
  }

  /**
   * Verify a proof against this tree's current root.
   * Returns false for an empty tree.
   */
  verify(proof: MerkleProof, candidate: Digest): boolean {
    if (this.isEmpty) return false;
    return verifyProof(proof, candidate, this.getRoot(), this.hash);
  }

  /**
   * Verify a proof for a raw record against this tree's current root.
   */
  verifyRecord(proof: MerkleProof, record: RecordInput): boolean {
    return this.verify(proof, hashRecord(record, this.hash));
  }

  /**
   * Copy of every level, leaves first.
   */
  getLevels(): Digest[][] {
    return this.levels.map(level => level.map(digest => digest.slice()));
  }

  getState(): TreeState {
    return {
      rootHash: this.isEmpty ? null : bytesToHex(this.getRoot()),
      leafCount: this.leafCount,
      height: this.height,
      algorithm: this.algorithm,
    };
  }

  // --------------------------------------------------------------------------
  // Internal Methods
  // --------------------------------------------------------------------------

  private rebuild(): void {
    this.levels = buildLevels(this.records, this.hash);
  }

  /**
   * Walk from a leaf up to (not including) the root, collecting siblings.
   */
  private buildProof(leafIndex: number): MerkleProof {
    const siblings: ProofSibling[] = [];
    let currentIndex = leafIndex;

    for (let level = 0; level < this.height; level++) {
      const nodes = this.levels[level];
      const isLeft = currentIndex % 2 === 0;
      const siblingIndex = isLeft ? currentIndex + 1 : currentIndex - 1;

      if (siblingIndex < nodes.length) {
        siblings.push({
          hash: nodes[siblingIndex].slice(),
          position: isLeft ? 'right' : 'left',
        });
      } else {
        // Unpaired last node of an odd level: hashed with itself
        siblings.push({ hash: nodes[currentIndex].slice(), position: 'right' });
      }

      // Move to parent
      currentIndex = Math.floor(currentIndex / 2);
    }

    return { leafIndex, siblings };
  }
}
