import { Md5 } from '../md5/Md5.js';

export interface Md5TransformResult {
  bytes: bigint;
  /** Set when the stream flushes. */
  digest?: Uint8Array | undefined;
}

/** Pass-through stream that digests every chunk flowing through it. */
export function createMd5Transform(result: Md5TransformResult): TransformStream<Uint8Array, Uint8Array> {
  const md5 = new Md5();
  return new TransformStream({
    transform(chunk, controller) {
      md5.update(chunk);
      result.bytes += BigInt(chunk.length);
      controller.enqueue(chunk);
    },
    flush() {
      result.digest = md5.finalize();
    }
  });
}
