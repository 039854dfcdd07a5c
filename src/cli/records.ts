/**
 * merkle-attest - CLI record sources
 */

import { readFileSync } from 'fs';
import { hexToBytes, utf8ToBytes } from '@noble/hashes/utils';

export interface RecordSourceOptions {
  /** Newline-delimited record file */
  file?: string;

  /** Records given on the command line */
  record?: string[];

  /** Treat values as hex-encoded bytes */
  hex?: boolean;
}

/**
 * Parse a single record value.
 */
export function parseRecord(value: string, hex = false): Uint8Array {
  if (!hex) return utf8ToBytes(value);

  if (!/^[0-9a-fA-F]*$/.test(value) || value.length % 2 !== 0) {
    throw new Error(`Invalid hex record: ${value}`);
  }
  return hexToBytes(value);
}

/**
 * Split file contents into records, one per line.
 * A single trailing newline does not produce an extra empty record.
 */
export function splitLines(contents: string): string[] {
  if (contents.length === 0) return [];

  const lines = contents.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Collect records: file lines first, then --record values, in order.
 */
export function loadRecords(options: RecordSourceOptions): Uint8Array[] {
  const values: string[] = [];

  if (options.file) {
    values.push(...splitLines(readFileSync(options.file, 'utf-8')));
  }

  if (options.record) {
    values.push(...options.record);
  }

  return values.map(value => parseRecord(value, options.hex));
}
