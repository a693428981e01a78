/**
 * Simple HTTP Client for metrics submission
 *
 * Sends one request against the analytics service base URL with a timeout.
 * Non-2xx responses, connection failures and timeouts reject with
 * transport errors; nothing is retried.
 */

import https from 'node:https';
import http from 'node:http';
import { URL } from 'node:url';
import { logger } from '../utils/logger.js';
import { sanitizeHeaders } from '../utils/sanitize.js';
import { HTTPStatusError, NetworkError, TimeoutError } from '../utils/errors.js';
import type { HTTPRequest, HTTPResponse, HTTPTransport } from './types.js';

export interface HTTPClientConfig {
  baseUrl: string;
  timeout?: number;                  // Timeout in milliseconds (default: 30000)
  headers?: Record<string, string>;  // Headers added to every request
}

const NETWORK_ERROR_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'ECONNRESET', 'EAI_AGAIN', 'EHOSTUNREACH']);

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function flattenHeaders(headers: http.IncomingHttpHeaders): Record<string, string> {
  const flattened: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    flattened[key] = Array.isArray(value) ? value.join(', ') : value;
  }
  return flattened;
}

export class HTTPClient implements HTTPTransport {
  private baseUrl: string;
  private timeout: number;
  private headers: Record<string, string>;

  constructor(config: HTTPClientConfig) {
    this.baseUrl = config.baseUrl;
    this.timeout = config.timeout ?? 30000;
    this.headers = config.headers ?? {};
  }

  /**
   * Resolve a request path against the base URL, keeping any base path prefix
   */
  resolveUrl(path: string): URL {
    const base = this.baseUrl.endsWith('/') ? this.baseUrl : `${this.baseUrl}/`;
    return new URL(path.replace(/^\/+/, ''), base);
  }

  async send(request: HTTPRequest): Promise<HTTPResponse> {
    const url = this.resolveUrl(request.path);
    const isHttps = url.protocol === 'https:';
    const client = isHttps ? https : http;

    const requestHeaders: Record<string, string> = {
      ...this.headers,
      ...request.headers
    };

    if (request.body !== undefined) {
      requestHeaders['Content-Length'] = Buffer.byteLength(request.body).toString();
    }

    if (logger.isDebugMode()) {
      logger.debug(`[HTTP Request] ${request.method} ${url.toString()}`);
      logger.debug(`[Headers]`, sanitizeHeaders(requestHeaders));
    }

    const options: http.RequestOptions = {
      hostname: url.hostname,
      port: url.port || (isHttps ? 443 : 80),
      path: url.pathname + url.search,
      method: request.method,
      headers: requestHeaders,
      timeout: this.timeout
    };

    return new Promise((resolve, reject) => {
      const req = client.request(options, (res) => {
        let responseData = '';

        res.setEncoding('utf8');
        res.on('data', (chunk: string) => {
          responseData += chunk;
        });

        res.on('end', () => {
          const status = res.statusCode ?? 0;
          const statusText = res.statusMessage ?? '';

          logger.debug(`[HTTP Response] ${status} ${statusText}`);

          if (status >= 200 && status < 300) {
            resolve({
              status,
              statusText,
              headers: flattenHeaders(res.headers),
              body: responseData
            });
          } else {
            reject(new HTTPStatusError(status, statusText, { url: url.toString() }));
          }
        });

        res.on('error', reject);
      });

      req.on('error', (error) => {
        const code = errorCode(error);
        if (code && NETWORK_ERROR_CODES.has(code)) {
          reject(new NetworkError(`Cannot connect to analytics service: ${error.message}`, {
            errorCode: code,
            hostname: url.hostname
          }));
        } else {
          reject(error);
        }
      });

      req.on('timeout', () => {
        req.destroy();
        reject(new TimeoutError(`Request timeout after ${this.timeout}ms`, {
          timeout: this.timeout,
          url: url.toString()
        }));
      });

      if (request.body !== undefined) {
        req.write(request.body);
      }

      req.end();
    });
  }
}
