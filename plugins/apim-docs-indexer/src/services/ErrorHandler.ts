export type StageName = 'download' | 'convert' | 'wiki' | 'index';

export type Failure = {
  item: string;
  reason: string;
  fatal?: boolean;
};

export type Result<T> = { ok: true; value: T } | { ok: false; error: Failure };

export type BatchResult<T> = {
  succeeded: T[];
  failed: Failure[];
};

/** A stage could not run at all (service unreachable, directory missing, index not created). */
export class StageError extends Error {
  constructor(
    readonly stage: StageName,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'StageError';
  }
}

/** The model returned nothing usable for a specification; aborts that document. */
export class ExtractionError extends Error {
  constructor(readonly fileName: string) {
    super(`Failed to extract API information using LLM from ${fileName}`);
    this.name = 'ExtractionError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

export class ErrorHandler {
  static describe(error: unknown): string {
    if (error instanceof Error) return error.message;
    if (typeof error === 'string') return error;
    try {
      return JSON.stringify(error);
    } catch {
      return String(error);
    }
  }

  static failure(item: string, error: unknown): Failure {
    return {
      item,
      reason: ErrorHandler.describe(error),
      ...(error instanceof ExtractionError ? { fatal: true } : {}),
    };
  }

  static async attempt<T>(item: string, operation: () => Promise<T>): Promise<Result<T>> {
    try {
      return { ok: true, value: await operation() };
    } catch (error) {
      return { ok: false, error: ErrorHandler.failure(item, error) };
    }
  }

  static collect<T>(results: Result<T>[]): BatchResult<T> {
    const batch = ErrorHandler.emptyBatch<T>();
    for (const r of results) {
      if (r.ok) batch.succeeded.push(r.value);
      else batch.failed.push(r.error);
    }
    return batch;
  }

  static merge<T>(...batches: BatchResult<T>[]): BatchResult<T> {
    return {
      succeeded: batches.flatMap(b => b.succeeded),
      failed: batches.flatMap(b => b.failed),
    };
  }

  static emptyBatch<T>(): BatchResult<T> {
    return { succeeded: [], failed: [] };
  }
}
