import { toHex } from '../hex.js';
import { finalize, init, update, type EngineState } from './engine.js';

/**
 * Incremental MD5 hasher. Owns a single engine and replaces it on every call,
 * so one instance must not be shared between independent callers.
 */
export class Md5 {
  private engine: EngineState = init();

  /** True once `finalize` has produced the digest. */
  get finalized(): boolean {
    return this.engine.status === 'finalized';
  }

  /** Copy of the produced digest, or undefined while still open. */
  get digest(): Uint8Array | undefined {
    return this.engine.status === 'finalized' ? this.engine.digest.slice() : undefined;
  }

  update(data: Uint8Array): this {
    this.engine = update(this.engine, data);
    return this;
  }

  finalize(): Uint8Array {
    const result = finalize(this.engine);
    this.engine = result.engine;
    return result.digest;
  }

  /** Lowercase hex digest; finalizes first when still open. */
  hex(): string {
    if (this.engine.status === 'finalized') {
      return toHex(this.engine.digest);
    }
    return toHex(this.finalize());
  }
}
