export type LoadErrorReason = 'not-found' | 'unsupported' | 'unreadable';

/** Raised only when a source file cannot be read or parsed at all. */
export class LoadError extends Error {
  readonly filePath: string;
  readonly reason: LoadErrorReason;

  constructor(filePath: string, reason: LoadErrorReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LoadError';
    this.filePath = filePath;
    this.reason = reason;
  }
}

/** Bad command-line input; reported without a stack trace. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
