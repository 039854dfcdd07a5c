/**
 * merkle-attest CLI
 *
 * Build a tree from records, print its root, and issue or check proofs.
 */

import { readFileSync, writeFileSync } from 'fs';
import { Command } from 'commander';
import { bytesToHex } from '@noble/hashes/utils';
import { MerkleTree } from '../merkle/tree.js';
import { getDigestFunction, hashRecord, HASH_ALGORITHMS, isHashAlgorithm } from '../merkle/digest.js';
import { decodeHex, decodeProof, encodeProof } from '../merkle/proof.js';
import { verifyProof } from '../merkle/verify.js';
import { DEFAULT_CONFIG, type HashAlgorithm } from '../types.js';
import { loadRecords, parseRecord, type RecordSourceOptions } from './records.js';

interface TreeCommandOptions extends RecordSourceOptions {
  algorithm: string;
}

interface ProveOptions extends TreeCommandOptions {
  output?: string;
}

interface VerifyOptions {
  root?: string;
  hex?: boolean;
}

// ============================================================================
// Helpers
// ============================================================================

function collect(value: string, previous: string[]): string[] {
  return previous.concat([value]);
}

function addTreeOptions(command: Command): Command {
  return command
    .option('-f, --file <path>', 'Newline-delimited record file')
    .option('-r, --record <value>', 'Record value (repeatable)', collect, [])
    .option('--hex', 'Treat record values as hex bytes')
    .option(
      '-a, --algorithm <name>',
      `Digest algorithm (${HASH_ALGORITHMS.join('|')})`,
      DEFAULT_CONFIG.algorithm
    );
}

function parseAlgorithm(name: string): HashAlgorithm {
  if (!isHashAlgorithm(name)) {
    throw new Error(`Unknown algorithm '${name}'. Must be one of: ${HASH_ALGORITHMS.join(', ')}`);
  }
  return name;
}

function openTree(options: TreeCommandOptions): MerkleTree {
  const algorithm = parseAlgorithm(options.algorithm);
  return new MerkleTree(loadRecords(options), { algorithm });
}

function fail(context: string, error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`❌ ${context}: ${message}`);
  process.exitCode = 1;
}

// ============================================================================
// Program
// ============================================================================

export function createProgram(): Command {
  const program = new Command();

  program
    .name('merkle-attest')
    .description('Merkle roots and membership proofs for record lists')
    .version('0.1.0');

  // --------------------------------------------------------------------------
  // Root Command
  // --------------------------------------------------------------------------

  addTreeOptions(
    program
      .command('root')
      .description('Print the root digest of the records')
  ).action((options: TreeCommandOptions) => {
    try {
      const tree = openTree(options);
      console.log(bytesToHex(tree.getRoot()));
    } catch (error) {
      fail('Failed to compute root', error);
    }
  });

  // --------------------------------------------------------------------------
  // Levels Command
  // --------------------------------------------------------------------------

  addTreeOptions(
    program
      .command('levels')
      .description('Print every level of the tree, leaves first')
  ).action((options: TreeCommandOptions) => {
    try {
      const tree = openTree(options);
      const levels = tree.getLevels();

      if (levels.length === 0) {
        console.log('🌳 (empty tree)');
        return;
      }

      levels.forEach((level, i) => {
        console.log(`Level ${i} (${level.length}):`);
        for (const digest of level) {
          console.log(`  ${bytesToHex(digest)}`);
        }
      });
      console.log(`🌳 Root: ${bytesToHex(tree.getRoot())}`);
    } catch (error) {
      fail('Failed to build tree', error);
    }
  });

  // --------------------------------------------------------------------------
  // Prove Command
  // --------------------------------------------------------------------------

  addTreeOptions(
    program
      .command('prove <record>')
      .description('Generate a membership proof for a record')
      .option('-o, --output <file>', 'Output file (default: stdout)')
  ).action((record: string, options: ProveOptions) => {
    try {
      const tree = openTree(options);
      const proof = tree.generateProof(parseRecord(record, options.hex));
      const proofJson = encodeProof(proof, { algorithm: tree.algorithm, root: tree.getRoot() });

      if (options.output) {
        writeFileSync(options.output, proofJson);
        console.log(`✅ Proof written to ${options.output}`);
      } else {
        console.log(proofJson);
      }
    } catch (error) {
      fail('Failed to generate proof', error);
    }
  });

  // --------------------------------------------------------------------------
  // Verify Command
  // --------------------------------------------------------------------------

  program
    .command('verify <proof-file> <record>')
    .description('Verify a membership proof for a record')
    .option('--root <hex>', 'Trusted root digest (default: root stored in the proof file)')
    .option('--hex', 'Treat the record as hex bytes')
    .action((proofFile: string, record: string, options: VerifyOptions) => {
      try {
        const decoded = decodeProof(readFileSync(proofFile, 'utf-8'));
        const hash = getDigestFunction(parseAlgorithm(decoded.algorithm));

        const root = options.root ? decodeHex(options.root, 'root') : decoded.root;
        if (!root) {
          throw new Error('No root given and the proof file carries none');
        }

        const candidate = hashRecord(parseRecord(record, options.hex), hash);

        if (verifyProof(decoded.proof, candidate, root, hash)) {
          console.log('✅ Proof is VALID');
          console.log(`   Root: ${bytesToHex(root)}`);
          if (!options.root) {
            console.log('\n💡 Tip: Use --root <hex> to check against a root you trust');
          }
        } else {
          console.log('❌ Proof is INVALID');
          process.exitCode = 1;
        }
      } catch (error) {
        fail('Failed to verify proof', error);
      }
    });

  return program;
}
