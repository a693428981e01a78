/**
 * Submission transport types
 */

export type HTTPMethod = 'POST';

/**
 * Request relative to the analytics service base URL
 */
export interface HTTPRequest {
  method: HTTPMethod;
  path: string;
  headers: Record<string, string>;
  body?: string;
}

export interface HTTPResponse {
  status: number;
  statusText: string;
  headers: Record<string, string>;
  body: string;
}

/**
 * Sends a request; resolves only for 2xx responses
 */
export interface HTTPTransport {
  send(request: HTTPRequest): Promise<HTTPResponse>;
}

/**
 * Structured logging sink used around submission
 */
export interface SubmissionLogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
}
