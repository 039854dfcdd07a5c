/**
 * merkle-attest - Errors
 */

export type MerkleErrorCode =
  | 'NOT_FOUND'
  | 'EMPTY_TREE'
  | 'INVALID_PROOF';

export class MerkleTreeError extends Error {
  readonly code: MerkleErrorCode;

  constructor(code: MerkleErrorCode, message: string) {
    super(message);
    this.name = 'MerkleTreeError';
    this.code = code;
  }
}

/**
 * Requested record (or leaf index) is not in the tree.
 */
export class NotFoundError extends MerkleTreeError {
  constructor(message = 'Record not found in tree') {
    super('NOT_FOUND', message);
    this.name = 'NotFoundError';
  }
}

/**
 * The tree has no records, so it has no root.
 */
export class EmptyTreeError extends MerkleTreeError {
  constructor(message = 'Tree is empty') {
    super('EMPTY_TREE', message);
    this.name = 'EmptyTreeError';
  }
}

export class ProofFormatError extends MerkleTreeError {
  constructor(message: string) {
    super('INVALID_PROOF', message);
    this.name = 'ProofFormatError';
  }
}
