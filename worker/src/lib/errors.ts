export class NormalizerError extends Error {
  code: string;
  details?: Record<string, unknown>;

  constructor(message: string, code: string = 'NORMALIZER_ERROR', details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class ConfigError extends NormalizerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
  }
}

export class PersistenceError extends NormalizerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PERSISTENCE_ERROR', details);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
