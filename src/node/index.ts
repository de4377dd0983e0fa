import { open } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { throwIfAborted } from '../abort.js';
import { Md5 } from '../md5/Md5.js';
import { DigestProgress, resolveSetting } from '../streams/progress.js';
import type { Md5ReadOptions } from '../types.js';

export * from '../index.js';

/** Bytes requested per file read when no chunk size is given. */
export const DEFAULT_CHUNK_SIZE = 64 * 1024;

export type Md5StreamSource = AsyncIterable<Uint8Array> | ReadableStream<Uint8Array>;

/** Digest a file by reading it in bounded chunks. */
export async function md5File(path: string | URL, options?: Md5ReadOptions): Promise<Uint8Array> {
  const filePath = typeof path === 'string' ? path : fileURLToPath(path);
  const signal = options?.signal;
  throwIfAborted(signal);
  const chunkSize = resolveSetting(options?.chunkSize, DEFAULT_CHUNK_SIZE, 1);
  const progress = DigestProgress.from(options, filePath);
  const md5 = new Md5();
  const handle = await open(filePath, 'r');
  try {
    const buffer = new Uint8Array(chunkSize);
    for (;;) {
      throwIfAborted(signal);
      const { bytesRead } = await handle.read(buffer, 0, chunkSize, null);
      if (bytesRead === 0) break;
      md5.update(buffer.subarray(0, bytesRead));
      progress?.add(bytesRead);
    }
  } finally {
    await handle.close();
  }
  progress?.done();
  return md5.finalize();
}

/** Digest every chunk of a Node or web stream, in order. */
export async function md5Stream(source: Md5StreamSource, options?: Md5ReadOptions): Promise<Uint8Array> {
  const signal = options?.signal;
  throwIfAborted(signal);
  const progress = DigestProgress.from(options, 'stream');
  const md5 = new Md5();
  for await (const chunk of iterateSource(source, signal)) {
    md5.update(chunk);
    progress?.add(chunk.length);
  }
  progress?.done();
  return md5.finalize();
}

async function* iterateSource(source: Md5StreamSource, signal: AbortSignal | undefined): AsyncGenerator<Uint8Array> {
  if (source instanceof ReadableStream) {
    const reader = source.getReader();
    try {
      for (;;) {
        throwIfAborted(signal);
        const { done, value } = await reader.read();
        if (done) return;
        yield value;
      }
    } catch (err) {
      await reader.cancel(err);
      throw err;
    } finally {
      reader.releaseLock();
    }
  }
  for await (const chunk of source) {
    throwIfAborted(signal);
    yield chunk;
  }
}
