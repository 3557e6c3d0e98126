/** The snapshot could not be built */
export class LoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LoadError';
  }
}

/** A single symbol's usage or export data could not be read */
export class AnalysisError extends Error {
  constructor(
    message: string,
    public readonly filepath: string,
    public readonly symbol: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'AnalysisError';
  }
}

export class RemovalError extends Error {
  constructor(
    message: string,
    public readonly filepath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'RemovalError';
  }
}

/** Branch, commit, push or pull request creation failed */
export class PublishError extends Error {
  constructor(
    message: string,
    public readonly status: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'PublishError';
  }
}

export class InvalidRepositoryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRepositoryError';
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class CancellationError extends Error {
  constructor(message = 'Operation was cancelled') {
    super(message);
    this.name = 'CancellationError';
  }
}

/** Render an unknown thrown value as text */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
