// Raised when the source report cannot be read or lacks the columns we rely on.
// Callers treat it as fatal and report it separately from other failures.
export class IngestionError extends Error {
  readonly filePath?: string;

  constructor(message: string, options: { filePath?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'IngestionError';
    this.filePath = options.filePath;
  }
}

export function isIngestionError(err: unknown): err is IngestionError {
  return err instanceof IngestionError;
}
