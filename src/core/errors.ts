/**
 * Base error for the harness. Carries a SCREAMING_SNAKE `code` for
 * programmatic handling and an optional cause for chaining.
 */
export class HarnessError extends Error {
  readonly code: string;

  constructor(message: string, code: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "HarnessError";
    this.code = code;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      cause: this.cause instanceof Error ? { name: this.cause.name, message: this.cause.message } : undefined,
    };
  }
}

/**
 * Fatal before any item runs: bad flags, missing credentials, unknown provider.
 */
export class ConfigurationError extends HarnessError {
  constructor(message: string, code = "CONFIG_INVALID", cause?: unknown) {
    super(message, code, cause);
    this.name = "ConfigurationError";
  }
}

export class ProviderError extends HarnessError {
  readonly provider: string;
  readonly status?: number;

  constructor(provider: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(`${provider} completion failed: ${message}`, "PROVIDER_REQUEST_FAILED", options.cause);
    this.name = "ProviderError";
    this.provider = provider;
    this.status = options.status;
  }
}

export class MemoryServiceError extends HarnessError {
  readonly operation: string;
  readonly status?: number;

  constructor(operation: string, status?: number) {
    super(
      status === undefined ? `Memory ${operation} failed` : `Memory ${operation} failed: ${status}`,
      "MEMORY_REQUEST_FAILED",
    );
    this.name = "MemoryServiceError";
    this.operation = operation;
    this.status = status;
  }
}

export class DatasetError extends HarnessError {
  readonly line: number;

  constructor(line: number, message: string, cause?: unknown) {
    super(`Dataset line ${line}: ${message}`, "DATASET_INVALID", cause);
    this.name = "DatasetError";
    this.line = line;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
