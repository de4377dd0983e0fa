/** Throw the signal's reason (or an AbortError) when it has fired. */
export function throwIfAborted(signal?: AbortSignal | null): void {
  if (!signal?.aborted) return;
  const reason: unknown = signal.reason;
  if (reason instanceof Error) {
    throw reason;
  }
  throw reason ?? new DOMException('The operation was aborted', 'AbortError');
}
