/** Version tag carried by every JSON error report. */
export const REPORT_SCHEMA_VERSION = '1';

/** Stable usage error codes. */
export type UsageErrorCode = 'MD5_UPDATE_AFTER_FINALIZE' | 'MD5_ALREADY_FINALIZED';

const REPORT_KEYS = new Set<string>(['schemaVersion', 'name', 'code', 'message', 'hint', 'context']);

/** Thrown when a finalized digest engine is asked to do more work. */
export class UsageError extends Error {
  /** Machine-readable error code. */
  readonly code: UsageErrorCode;
  /** Additional context for serialization. */
  readonly context?: Record<string, string> | undefined;

  constructor(code: UsageErrorCode, message: string, options?: { context?: Record<string, string> | undefined }) {
    super(message);
    this.name = 'UsageError';
    this.code = code;
    this.context = options?.context;
  }

  /** JSON-safe serialization with schemaVersion "1". */
  toJSON(): {
    schemaVersion: string;
    name: string;
    code: UsageErrorCode;
    message: string;
    hint: string;
    context: Record<string, string>;
  } {
    const context: Record<string, string> = {};
    for (const [key, value] of Object.entries(this.context ?? {})) {
      if (REPORT_KEYS.has(key)) continue;
      context[key] = value;
    }
    return {
      schemaVersion: REPORT_SCHEMA_VERSION,
      name: this.name,
      code: this.code,
      message: this.message,
      hint: HINTS[this.code],
      context
    };
  }
}

const HINTS: Record<UsageErrorCode, string> = {
  MD5_UPDATE_AFTER_FINALIZE: 'Create a new engine with init() to hash more data.',
  MD5_ALREADY_FINALIZED: 'Read the stored digest instead of finalizing again.'
};
