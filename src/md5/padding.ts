import { writeUint64LE } from '../binary.js';
import { BLOCK_SIZE } from './constants.js';

const LENGTH_OFFSET = 56;
const UINT64_MASK = 0xffffffffffffffffn;

/**
 * Trailing bytes for a message whose last partial block is `pending`:
 * `0x80`, zeros up to 56 mod 64, then `bitLength` as a little-endian uint64.
 */
export function md5Padding(bitLength: bigint, pending: Uint8Array): Uint8Array {
  const used = pending.length % BLOCK_SIZE;
  const zeroEnd = used < LENGTH_OFFSET ? LENGTH_OFFSET : LENGTH_OFFSET + BLOCK_SIZE;
  const out = new Uint8Array(zeroEnd - used + 8);
  out[0] = 0x80;
  writeUint64LE(out, out.length - 8, bitLength & UINT64_MASK);
  return out;
}
