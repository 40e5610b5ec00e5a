/**
 * Fatal failures. Anything that can be excluded row-by-row is reported as a
 * value instead and never reaches these classes.
 */
export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends PipelineError {}

export class InputReadError extends PipelineError {}

export class CatalogFetchError extends PipelineError {
  readonly attempts: number;

  constructor(message: string, attempts: number, lastError: unknown) {
    super(message, { cause: lastError });
    this.attempts = attempts;
  }
}

export class ExportError extends PipelineError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
