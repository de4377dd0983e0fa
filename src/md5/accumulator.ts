import { compressBlock, type DigestState } from './compress.js';
import { BLOCK_SIZE } from './constants.js';

export interface AccumulatorResult {
  state: DigestState;
  pending: Uint8Array;
}

/**
 * Append `data` to `pending`, compress every complete block in order and
 * return the new chaining value with the (< 64 byte) remainder.
 */
export function accumulate(state: DigestState, pending: Uint8Array, data: Uint8Array): AccumulatorResult {
  let offset = 0;
  let next = state;

  if (pending.length > 0) {
    const take = Math.min(BLOCK_SIZE - pending.length, data.length);
    if (pending.length + take < BLOCK_SIZE) {
      const merged = new Uint8Array(pending.length + take);
      merged.set(pending);
      merged.set(data.subarray(0, take), pending.length);
      return { state, pending: merged };
    }
    const block = new Uint8Array(BLOCK_SIZE);
    block.set(pending);
    block.set(data.subarray(0, take), pending.length);
    next = compressBlock(next, block);
    offset = take;
  }

  while (data.length - offset >= BLOCK_SIZE) {
    next = compressBlock(next, data, offset);
    offset += BLOCK_SIZE;
  }

  return { state: next, pending: data.slice(offset) };
}
