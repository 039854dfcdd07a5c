/**
 * Proof Envelope Tests
 */

import { describe, it, expect } from 'vitest';
import { bytesToHex } from '@noble/hashes/utils';
import { MerkleTree } from '../../src/merkle/tree.js';
import { decodeHex, decodeProof, encodeProof } from '../../src/merkle/proof.js';
import { hashRecord } from '../../src/merkle/digest.js';
import { verifyProof } from '../../src/merkle/verify.js';
import { ProofFormatError } from '../../src/errors.js';

describe('Proof envelope', () => {
  const tree = new MerkleTree(['data1', 'data2', 'data3']);
  const proof = tree.generateProof('data2');

  describe('encodeProof', () => {
    it('should write digests as hex', () => {
      const envelope = JSON.parse(encodeProof(proof, { algorithm: 'sha3-256', root: tree.getRoot() }));

      expect(envelope).toEqual({
        version: 1,
        algorithm: 'sha3-256',
        leafIndex: 1,
        root: bytesToHex(tree.getRoot()),
        siblings: [
          { hash: bytesToHex(proof.siblings[0].hash), position: 'left' },
          { hash: bytesToHex(proof.siblings[1].hash), position: 'right' },
        ],
      });
    });

    it('should omit an absent root', () => {
      const envelope = JSON.parse(encodeProof(proof, { algorithm: 'sha3-256' }));
      expect('root' in envelope).toBe(false);
    });
  });

  describe('decodeProof', () => {
    it('should restore a proof that still verifies', () => {
      const decoded = decodeProof(encodeProof(proof, { algorithm: 'sha3-256', root: tree.getRoot() }));

      expect(decoded.algorithm).toBe('sha3-256');
      expect(decoded.proof).toEqual(proof);
      expect(decoded.root).toEqual(tree.getRoot());
      expect(verifyProof(decoded.proof, hashRecord('data2'), tree.getRoot())).toBe(true);
    });

    it('should reject invalid JSON', () => {
      expect(() => decodeProof('{not json')).toThrow('Proof is not valid JSON');
    });

    it('should reject non-objects', () => {
      expect(() => decodeProof('[]')).toThrow('Proof must be a JSON object');
    });

    it('should reject unsupported versions', () => {
      const text = JSON.stringify({ version: 2, algorithm: 'sha3-256', leafIndex: 0, siblings: [] });
      expect(() => decodeProof(text)).toThrow('Unsupported proof version: 2');
    });

    it('should reject a missing algorithm', () => {
      const text = JSON.stringify({ version: 1, leafIndex: 0, siblings: [] });
      expect(() => decodeProof(text)).toThrow(ProofFormatError);
    });

    it('should reject a negative leaf index', () => {
      const text = JSON.stringify({ version: 1, algorithm: 'sha3-256', leafIndex: -1, siblings: [] });
      expect(() => decodeProof(text)).toThrow('Proof leafIndex must be a non-negative integer');
    });

    it('should reject an unknown position', () => {
      const text = JSON.stringify({
        version: 1,
        algorithm: 'sha3-256',
        leafIndex: 0,
        siblings: [{ hash: 'ab', position: 'up' }],
      });
      expect(() => decodeProof(text)).toThrow("Sibling 0 position must be 'left' or 'right'");
    });

    it('should reject malformed hex', () => {
      const text = JSON.stringify({
        version: 1,
        algorithm: 'sha3-256',
        leafIndex: 0,
        siblings: [{ hash: 'abc', position: 'left' }],
      });
      expect(() => decodeProof(text)).toThrow('Invalid hex in sibling 0 hash');
    });

    it('should reject a non-string root', () => {
      const text = JSON.stringify({ version: 1, algorithm: 'sha3-256', leafIndex: 0, root: 7, siblings: [] });
      expect(() => decodeProof(text)).toThrow('Proof root must be a hex string');
    });

    it('should tag failures with the INVALID_PROOF code', () => {
      try {
        decodeProof('null');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ProofFormatError);
        expect(error).toMatchObject({ code: 'INVALID_PROOF', name: 'ProofFormatError' });
      }
    });
  });

  describe('decodeHex', () => {
    it('should accept upper and lower case', () => {
      expect(decodeHex('0aFF')).toEqual(Uint8Array.of(0x0a, 0xff));
    });

    it('should reject empty input', () => {
      expect(() => decodeHex('', 'root')).toThrow('Invalid hex in root');
    });
  });
});
