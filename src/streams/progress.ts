import type { DigestProgressEvent, DigestProgressOptions } from '../types.js';

const DEFAULT_PROGRESS_INTERVAL_MS = 50;
const DEFAULT_PROGRESS_CHUNK_INTERVAL = 16;

/**
 * Floor a numeric option and clamp it to `min`; non-finite or missing values
 * fall back to `fallback`.
 */
export function resolveSetting(value: number | undefined, fallback: number, min: number): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  return Math.max(min, Math.floor(value));
}

/**
 * Counts bytes fed to a digest and reports them, at most once per
 * `progressChunkInterval` chunks unless `progressIntervalMs` has elapsed.
 */
export class DigestProgress {
  private bytesIn = 0n;
  private pendingChunks = 0;
  private lastReport: number;

  private constructor(
    private readonly source: string,
    private readonly report: (event: DigestProgressEvent) => void,
    private readonly intervalMs: number,
    private readonly chunkInterval: number
  ) {
    this.lastReport = Date.now();
  }

  /** Null when no `onProgress` callback was given. */
  static from(options: DigestProgressOptions | undefined, source: string): DigestProgress | null {
    const report = options?.onProgress;
    if (!report) return null;
    return new DigestProgress(
      source,
      report,
      resolveSetting(options.progressIntervalMs, DEFAULT_PROGRESS_INTERVAL_MS, 0),
      resolveSetting(options.progressChunkInterval, DEFAULT_PROGRESS_CHUNK_INTERVAL, 1)
    );
  }

  add(byteCount: number): void {
    this.bytesIn += BigInt(byteCount);
    this.pendingChunks += 1;
    if (this.pendingChunks >= this.chunkInterval || Date.now() - this.lastReport >= this.intervalMs) {
      this.emit();
    }
  }

  /** Report the final total. */
  done(): void {
    this.emit();
  }

  private emit(): void {
    this.lastReport = Date.now();
    this.pendingChunks = 0;
    this.report({ source: this.source, bytesIn: this.bytesIn });
  }
}
