import {
  AuthenticationError,
  ProcessingError,
  RateLimitError,
  TimeoutError,
  TransportError,
} from './errors';

const HTTP_STATUS_UNAUTHORIZED = 401;
const HTTP_STATUS_FORBIDDEN = 403;
const HTTP_STATUS_TOO_MANY_REQUESTS = 429;
const HTTP_STATUS_BAD_REQUEST = 400;
const API_KEY_HEADER = 'X-Api-Key';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpRequestOptions {
  method: 'GET' | 'POST';
  apiKey: string;
  provider: string;
  timeoutMs: number;
  fetchImpl: FetchLike;
  body?: FormData;
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  body: unknown;
}

function createTimeoutController(
  timeoutMs: number,
  parent?: AbortSignal
): { controller: AbortController; timedOut: () => boolean; dispose: () => void } {
  const controller = new AbortController();
  let expired = false;

  const timeoutId = setTimeout(() => {
    expired = true;
    controller.abort();
  }, timeoutMs);

  const onParentAbort = () => controller.abort();
  parent?.addEventListener('abort', onParentAbort, { once: true });

  return {
    controller,
    timedOut: () => expired,
    dispose: () => {
      clearTimeout(timeoutId);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

function parseBody(text: string): unknown {
  if (text.trim() === '') {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return { error: text.slice(0, 200) };
  }
}

export function readErrorMessage(body: unknown): string | null {
  if (typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string') {
    return body.error;
  }
  return null;
}

function classifyStatus(status: number, body: unknown, provider: string): void {
  if (status === HTTP_STATUS_UNAUTHORIZED || status === HTTP_STATUS_FORBIDDEN) {
    throw new AuthenticationError('Invalid API key', provider, status);
  }

  if (status === HTTP_STATUS_TOO_MANY_REQUESTS) {
    throw new RateLimitError('Rate limit exceeded', provider, status);
  }

  if (status >= HTTP_STATUS_BAD_REQUEST) {
    const message = readErrorMessage(body) ?? `HTTP ${status}`;
    throw new ProcessingError(`Request failed: ${message}`, provider, status);
  }
}

/**
 * Single authenticated request against a provider endpoint. Status codes are
 * mapped onto the OCR error taxonomy; the parsed JSON body is returned as-is
 * for the caller to validate.
 */
export async function requestJson(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
  const { provider } = options;

  if (options.signal?.aborted) {
    throw new TimeoutError('Request cancelled: deadline exceeded', provider);
  }

  const timeout = createTimeoutController(options.timeoutMs, options.signal);
  let status: number;
  let text: string;

  try {
    const response = await options.fetchImpl(url, {
      method: options.method,
      headers: { [API_KEY_HEADER]: options.apiKey },
      body: options.body,
      signal: timeout.controller.signal,
    });
    status = response.status;
    text = await response.text();
  } catch (error) {
    if (timeout.timedOut()) {
      throw new TimeoutError(`Request timed out after ${options.timeoutMs}ms`, provider);
    }
    if (options.signal?.aborted) {
      throw new TimeoutError('Request cancelled: deadline exceeded', provider);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new TransportError(`Network error: ${message}`, provider);
  } finally {
    timeout.dispose();
  }

  const body = parseBody(text);
  classifyStatus(status, body, provider);

  return { status, body };
}
