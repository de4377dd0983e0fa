/** Progress event emitted while a source is being digested. */
export type DigestProgressEvent = {
  /** File path or `'stream'`. */
  source: string;
  /** Bytes fed to the engine so far. */
  bytesIn: bigint;
};

/** Progress callback options. */
export interface DigestProgressOptions {
  onProgress?: ((event: DigestProgressEvent) => void) | undefined;
  /** Minimum time between events, in milliseconds. */
  progressIntervalMs?: number | undefined;
  /** Emit at least every N chunks. */
  progressChunkInterval?: number | undefined;
}

/** Options shared by the file and stream helpers. */
export interface Md5ReadOptions extends DigestProgressOptions {
  signal?: AbortSignal | undefined;
  /** Bytes requested per file read. Ignored for streams. */
  chunkSize?: number | undefined;
}
