/**
 * Shared API utilities
 */
export {
  createHttpClient,
  createTimeoutFetch,
  HttpError,
  type HttpClient,
  type HttpClientOptions,
  type RequestOptions,
  type BinaryResponse,
} from './http-client';
