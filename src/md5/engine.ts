import { writeUint32LE } from '../binary.js';
import { UsageError } from '../errors.js';
import { accumulate } from './accumulator.js';
import type { DigestState } from './compress.js';
import { DIGEST_SIZE, INITIAL_STATE } from './constants.js';
import { md5Padding } from './padding.js';

const UINT64_MASK = 0xffffffffffffffffn;
const EMPTY = new Uint8Array(0);

/** Engine accepting input. */
export interface OpenEngineState {
  readonly status: 'open';
  readonly state: DigestState;
  /** Bytes not yet forming a full block (always fewer than 64). */
  readonly pending: Uint8Array;
  /** Bits consumed so far, modulo 2^64. */
  readonly bitLength: bigint;
}

/** Terminal engine holding the produced digest. */
export interface FinalizedEngineState {
  readonly status: 'finalized';
  readonly digest: Uint8Array;
}

export type EngineState = OpenEngineState | FinalizedEngineState;

export interface FinalizeResult {
  digest: Uint8Array;
  engine: FinalizedEngineState;
}

export function init(): OpenEngineState {
  return { status: 'open', state: INITIAL_STATE, pending: EMPTY, bitLength: 0n };
}

/**
 * Feed `data` to an open engine. The returned engine replaces the argument;
 * neither `engine` nor `data` is modified, and `data` is not retained.
 */
export function update(engine: EngineState, data: Uint8Array): OpenEngineState {
  if (engine.status === 'finalized') {
    throw new UsageError('MD5_UPDATE_AFTER_FINALIZE', 'MD5: cannot update after finalize', {
      context: { bytes: String(data.length) }
    });
  }
  const { state, pending } = accumulate(engine.state, engine.pending, data);
  return {
    status: 'open',
    state,
    pending,
    bitLength: (engine.bitLength + BigInt(data.length) * 8n) & UINT64_MASK
  };
}

export function finalize(engine: EngineState): FinalizeResult {
  if (engine.status === 'finalized') {
    throw new UsageError('MD5_ALREADY_FINALIZED', 'MD5: digest already finalized');
  }
  const padding = md5Padding(engine.bitLength, engine.pending);
  // pending + padding is exactly one or two blocks, so nothing is left over.
  const { state } = accumulate(engine.state, engine.pending, padding);
  const digest = serializeState(state);
  return { digest, engine: { status: 'finalized', digest: digest.slice() } };
}

/** One-shot digest, defined through init/update/finalize. */
export function hash(data: Uint8Array): Uint8Array {
  return finalize(update(init(), data)).digest;
}

function serializeState(state: DigestState): Uint8Array {
  const out = new Uint8Array(DIGEST_SIZE);
  for (let i = 0; i < 4; i += 1) {
    writeUint32LE(out, i * 4, state[i]!);
  }
  return out;
}
