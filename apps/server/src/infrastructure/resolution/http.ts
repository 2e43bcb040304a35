/**
 * HTTP helper shared by the extractors and the descrambler
 */

export type HttpErrorCode = 'TIMEOUT_ERROR' | 'ABORTED' | 'NETWORK_ERROR';

export class HttpRequestError extends Error {
  constructor(
    message: string,
    public readonly code: HttpErrorCode,
    public readonly statusCode?: number,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'HttpRequestError';
  }
}

export class HttpTimeoutError extends HttpRequestError {
  constructor(timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`, 'TIMEOUT_ERROR');
    this.name = 'HttpTimeoutError';
  }
}

/**
 * The caller's signal fired. Not a failure of the remote side.
 */
export class HttpAbortedError extends HttpRequestError {
  constructor() {
    super('Request aborted', 'ABORTED');
    this.name = 'HttpAbortedError';
  }
}

export interface HttpRequestOptions {
  readonly method?: 'GET' | 'POST';
  readonly headers?: Record<string, string>;
  readonly body?: string;
  readonly timeoutMs: number;
  readonly signal?: AbortSignal;
}

/**
 * fetch with a per-request timeout, chained to an optional parent signal
 */
export async function fetchWithTimeout(url: string, options: HttpRequestOptions): Promise<Response> {
  const { signal: parent, timeoutMs } = options;
  if (parent?.aborted) {
    throw new HttpAbortedError();
  }

  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onParentAbort = (): void => controller.abort();
  parent?.addEventListener('abort', onParentAbort, { once: true });

  try {
    return await fetch(url, {
      method: options.method ?? 'GET',
      headers: options.headers,
      body: options.body,
      signal: controller.signal
    });
  } catch (error) {
    if (timedOut) {
      throw new HttpTimeoutError(timeoutMs);
    }
    if (parent?.aborted) {
      throw new HttpAbortedError();
    }
    const message = error instanceof Error ? error.message : 'Unknown error';
    throw new HttpRequestError(sanitizeErrorMessage(`Request failed: ${message}`), 'NETWORK_ERROR', undefined, error);
  } finally {
    clearTimeout(timeoutId);
    parent?.removeEventListener('abort', onParentAbort);
  }
}

/**
 * Strip API keys from anything that may end up in a log line or a response
 */
export function sanitizeErrorMessage(message: string): string {
  if (!message) return 'Unknown error';
  return message.replace(/([?&]key=)[^&\s]+/g, '$1[REDACTED]');
}

export function isAbortError(error: unknown): boolean {
  return error instanceof HttpAbortedError;
}

/**
 * True when a failed request or body read was cancelled by the caller.
 * Anything else is a transport failure local to that request.
 */
export function isCancellation(error: unknown, signal?: AbortSignal): boolean {
  return isAbortError(error) || signal?.aborted === true;
}

export function describeTransportError(error: unknown): string {
  return sanitizeErrorMessage(error instanceof Error ? error.message : String(error));
}
