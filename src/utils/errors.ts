export class MetricsSubmissionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MetricsSubmissionError';
  }
}

export class ConfigurationError extends MetricsSubmissionError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Payload could not be serialized; nothing was sent
 */
export class SubmissionEncodingError extends MetricsSubmissionError {
  constructor(reason: string) {
    super(`Failed to encode submission payload: ${reason}`);
    this.name = 'SubmissionEncodingError';
  }
}

export class SubmissionDecodingError extends MetricsSubmissionError {
  constructor(reason: string) {
    super(`Failed to decode submission payload: ${reason}`);
    this.name = 'SubmissionDecodingError';
  }
}

// ============================================================================
// Transport Errors
// ============================================================================

/**
 * Base class for failures surfaced by the HTTP transport
 */
export class TransportError extends MetricsSubmissionError {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TransportError';
  }

  toJSON(): Record<string, unknown> {
    return {
      type: this.name,
      code: this.code,
      message: this.message,
      ...this.details
    };
  }
}

/**
 * Server answered with a non-2xx status
 */
export class HTTPStatusError extends TransportError {
  constructor(
    public readonly statusCode: number,
    statusText: string,
    details?: Record<string, unknown>
  ) {
    super(`HTTP ${statusCode}: ${statusText}`, 'HTTP_STATUS', { statusCode, ...details });
    this.name = 'HTTPStatusError';
  }
}

export class NetworkError extends TransportError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', details);
    this.name = 'NetworkError';
  }
}

export class TimeoutError extends TransportError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TIMEOUT', details);
    this.name = 'TimeoutError';
  }
}

/**
 * Extracts error message from unknown error type
 * @param error - The caught error (unknown type)
 * @returns Error message as string
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
