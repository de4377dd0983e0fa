import { readUint32LE } from '../binary.js';
import { K, SHIFTS } from './constants.js';

/** Chaining value: four unsigned 32-bit words A, B, C, D. */
export type DigestState = readonly [a: number, b: number, c: number, d: number];

/**
 * Run the 64-step MD5 transform over the 64 bytes of `block` starting at
 * `offset` and return the next chaining value. `state` is not modified.
 */
export function compressBlock(state: DigestState, block: Uint8Array, offset = 0): DigestState {
  const m = new Uint32Array(16);
  for (let i = 0; i < 16; i += 1) {
    m[i] = readUint32LE(block, offset + i * 4);
  }

  let a = state[0];
  let b = state[1];
  let c = state[2];
  let d = state[3];

  for (let i = 0; i < 64; i += 1) {
    const round = i >>> 4;
    let f: number;
    let g: number;
    if (round === 0) {
      f = (b & c) | (~b & d);
      g = i;
    } else if (round === 1) {
      f = (b & d) | (c & ~d);
      g = (5 * i + 1) & 15;
    } else if (round === 2) {
      f = b ^ c ^ d;
      g = (3 * i + 5) & 15;
    } else {
      f = c ^ (b | ~d);
      g = (7 * i) & 15;
    }
    const temp = (a + f + m[g]! + K[i]!) >>> 0;
    a = d;
    d = c;
    c = b;
    b = (b + rotl(temp, SHIFTS[round * 4 + (i & 3)]!)) >>> 0;
  }

  return [
    (state[0] + a) >>> 0,
    (state[1] + b) >>> 0,
    (state[2] + c) >>> 0,
    (state[3] + d) >>> 0
  ];
}

function rotl(value: number, shift: number): number {
  return ((value << shift) | (value >>> (32 - shift))) >>> 0;
}
