export type ErrorCode = 'INVALID_ARGUMENT' | 'CATALOG_INVALID' | 'CONFIG_INVALID';

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly cause?: unknown,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/** A caller-supplied argument is missing or unusable. Reported back to the caller verbatim. */
export class InvalidArgumentError extends AppError {
  constructor(public readonly field: string, message = `Missing required argument: ${field}`) {
    super('INVALID_ARGUMENT', message, undefined, { field });
    this.name = 'InvalidArgumentError';
  }
}

/** The style catalog failed validation. Raised at startup, never per request. */
export class CatalogError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CATALOG_INVALID', message, undefined, details);
    this.name = 'CatalogError';
  }
}

export class ConfigError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('CONFIG_INVALID', message, cause);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
