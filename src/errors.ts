export class SearchProviderError extends Error {
  constructor(
    message: string,
    public readonly query: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'SearchProviderError';
  }
}

/**
 * Raised when a sub-task's evaluation step cannot run at all.
 * Unparseable replies are not errors; they fall back to a default evaluation.
 */
export class EvaluationError extends Error {
  constructor(
    message: string,
    public readonly taskId: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'EvaluationError';
  }
}

/**
 * Fatal: the run cannot start without a model backend
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
