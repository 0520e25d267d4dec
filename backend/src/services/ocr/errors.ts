export type OcrErrorKind =
  | 'authentication'
  | 'rate_limit'
  | 'processing'
  | 'timeout'
  | 'transport'
  | 'validation'
  | 'unified';

export class OcrError extends Error {
  constructor(
    public kind: OcrErrorKind,
    public message: string,
    public provider: string | null = null,
    public retryable = false,
    public statusCode: number | null = null
  ) {
    super(message);
    this.name = 'OcrError';
    Object.setPrototypeOf(this, OcrError.prototype);
  }
}

export class AuthenticationError extends OcrError {
  constructor(message: string, provider: string | null = null, statusCode: number | null = null) {
    super('authentication', message, provider, false, statusCode);
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

export class RateLimitError extends OcrError {
  constructor(message: string, provider: string | null = null, statusCode: number | null = null) {
    super('rate_limit', message, provider, true, statusCode);
    this.name = 'RateLimitError';
    Object.setPrototypeOf(this, RateLimitError.prototype);
  }
}

export class ProcessingError extends OcrError {
  constructor(message: string, provider: string | null = null, statusCode: number | null = null) {
    super('processing', message, provider, true, statusCode);
    this.name = 'ProcessingError';
    Object.setPrototypeOf(this, ProcessingError.prototype);
  }
}

export class TimeoutError extends OcrError {
  constructor(message: string, provider: string | null = null) {
    super('timeout', message, provider, true);
    this.name = 'TimeoutError';
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

/** Network-level failure: DNS, connection reset, unreadable body. */
export class TransportError extends OcrError {
  constructor(message: string, provider: string | null = null) {
    super('transport', message, provider, true);
    this.name = 'TransportError';
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

/** Local precondition failure. Raised before any network call. */
export class ValidationError extends OcrError {
  constructor(message: string, provider: string | null = null) {
    super('validation', message, provider, false);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export interface ProviderFailure {
  provider: string;
  kind: OcrErrorKind;
  message: string;
}

export class UnifiedRecognitionError extends OcrError {
  constructor(
    message: string,
    public failures: ProviderFailure[]
  ) {
    super('unified', message, null, false);
    this.name = 'UnifiedRecognitionError';
    Object.setPrototypeOf(this, UnifiedRecognitionError.prototype);
  }
}

export function toProviderFailure(error: unknown, provider: string): ProviderFailure {
  if (error instanceof OcrError) {
    return { provider, kind: error.kind, message: error.message };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { provider, kind: 'processing', message };
}
