export type TypeformClientErrorKind = 'request_build' | 'transport' | 'decode' | 'api';

export abstract class TypeformClientError extends Error {
  public abstract readonly kind: TypeformClientErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
  }
}

export class RequestBuildError extends TypeformClientError {
  public readonly kind = 'request_build';

  constructor(message: string, options?: { cause?: unknown }) {
    super(`Failed to build a request: ${message}`, options);
    this.name = 'RequestBuildError';
  }
}

export class TransportError extends TypeformClientError {
  public readonly kind = 'transport';

  constructor(message: string, options?: { cause?: unknown }) {
    super(`Failed to send get request: ${message}`, options);
    this.name = 'TransportError';
  }
}

export class DecodeError extends TypeformClientError {
  public readonly kind = 'decode';
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: { cause?: unknown }) {
    super(`Failed to deserialize a response: ${message}`, options);
    this.name = 'DecodeError';
    this.issues = issues;
  }
}

/**
 * The provider answered with a non-2xx status. `code` and `description` come
 * from the provider's error envelope when the body carries one.
 */
export class ApiError extends TypeformClientError {
  public readonly kind = 'api';
  public readonly statusCode: number;
  public readonly code?: string;
  public readonly description?: string;

  constructor(statusCode: number, details: { code?: string; description?: string; statusText?: string } = {}) {
    const reason = details.code
      ? `${details.code}${details.description ? ` (${details.description})` : ''}`
      : details.statusText || 'no error details';
    super(`HTTP ${statusCode}: ${reason}`);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.code = details.code;
    this.description = details.description;
  }
}

export class ConfigurationError extends Error {
  public readonly variables: string[];

  constructor(message: string, variables: string[]) {
    super(message);
    this.name = 'ConfigurationError';
    this.variables = variables;
  }
}
