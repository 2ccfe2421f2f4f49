/**
 * HTTP client utilities for making API requests
 */

export interface HttpClientOptions {
  baseUrl?: string;
  headers?: Record<string, string>;
  /** Per-request timeout in milliseconds */
  timeout?: number;
}

export interface RequestOptions extends RequestInit {
  params?: Record<string, string | number | boolean | undefined>;
}

/**
 * Binary response body with its content type
 */
export interface BinaryResponse {
  data: Uint8Array;
  contentType: string;
}

/**
 * Build URL with query parameters
 */
function buildUrl(baseUrl: string, path: string, params?: RequestOptions['params']): string {
  const url = baseUrl ? new URL(path, baseUrl) : new URL(path);

  if (params) {
    Object.entries(params).forEach(([key, value]) => {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    });
  }

  return url.toString();
}

/**
 * Wrap the global fetch so every request is aborted after `timeoutMs`
 *
 * A signal passed by the caller still applies alongside the deadline.
 */
export function createTimeoutFetch(timeoutMs: number): typeof fetch {
  return (input, init) => {
    const deadline = AbortSignal.timeout(timeoutMs);
    const signal = init?.signal ? AbortSignal.any([init.signal, deadline]) : deadline;
    return fetch(input, { ...init, signal });
  };
}

/**
 * Create an HTTP client with default options
 */
export function createHttpClient(options: HttpClientOptions = {}) {
  const { baseUrl = '', headers: defaultHeaders = {}, timeout } = options;

  const timeoutSignal = (): AbortSignal | undefined =>
    timeout !== undefined ? AbortSignal.timeout(timeout) : undefined;

  return {
    /**
     * Make a GET request
     */
    async get<T>(path: string, requestOptions: RequestOptions = {}): Promise<T> {
      const { params, headers, ...fetchOptions } = requestOptions;
      const url = buildUrl(baseUrl, path, params);

      const response = await fetch(url, {
        method: 'GET',
        headers: {
          ...defaultHeaders,
          ...headers,
        },
        signal: timeoutSignal(),
        ...fetchOptions,
      });

      if (!response.ok) {
        throw new HttpError(response.status, response.statusText, await response.text());
      }

      return response.json() as Promise<T>;
    },

    /**
     * Fetch binary data (e.g., images) from an absolute URL
     */
    async getBinary(url: string): Promise<BinaryResponse> {
      const response = await fetch(url, {
        headers: defaultHeaders,
        signal: timeoutSignal(),
      });

      if (!response.ok) {
        throw new HttpError(response.status, response.statusText, await response.text());
      }

      return {
        data: new Uint8Array(await response.arrayBuffer()),
        contentType: response.headers.get('content-type') || 'image/jpeg',
      };
    },
  };
}

/**
 * Type for the HTTP client
 */
export type HttpClient = ReturnType<typeof createHttpClient>;

/**
 * HTTP error with status code and response body
 */
export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly statusText: string,
    public readonly body: string
  ) {
    super(`HTTP ${status} ${statusText}: ${body}`);
    this.name = 'HttpError';
  }
}
