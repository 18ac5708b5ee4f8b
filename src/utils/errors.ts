export class SchemaError extends Error {
  constructor(message: string, public source: string, public missingColumns: string[]) {
    super(message);
    this.name = 'SchemaError';
  }
}

export class ComputationError extends Error {
  constructor(message: string, public itemNumber?: string, public details?: Record<string, unknown>) {
    super(message);
    this.name = 'ComputationError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string, public field: string, public value?: unknown) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class SourceReadError extends Error {
  constructor(message: string, public source: string, public originalError?: Error) {
    super(message);
    this.name = 'SourceReadError';
  }
}

export type EngineError = SchemaError | ComputationError | ConfigurationError | SourceReadError;

export function isEngineError(error: unknown): error is EngineError {
  return (
    error instanceof SchemaError ||
    error instanceof ComputationError ||
    error instanceof ConfigurationError ||
    error instanceof SourceReadError
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
