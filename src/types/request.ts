import type { Dispatcher, Headers, Response } from 'undici';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** HTTP verbs exposed by a fetch provider. */
export type HttpMethod = 'get' | 'post' | 'put' | 'patch' | 'delete';

/** Header options accepted by the fetch wrapper; `null`/`undefined` values remove a header. */
export type HeaderOptions = Headers | Record<string, string | null | undefined> | Array<[string, string]>;

/** Single query-string value. */
export type QueryValue = string | number | boolean;

/** Query parameters; `null`/`undefined` entries are skipped and arrays are repeated. */
export type QueryParams = Record<string, QueryValue | readonly QueryValue[] | null | undefined>;

/** Options to pass in for each fetch request */
export interface FetchOptions {
  /** Headers merged with provider defaults. */
  headers?: HeaderOptions;
  /** Serialized request body. */
  body?: string;
  /** Abort signal to cancel the request. */
  signal?: AbortSignal;
}

/** Options to configure a fetch provider. */
export interface FetchClientOptions {
  /** Default headers sent with every request. */
  headers?: HeaderOptions;
  /**
   * Verify the server certificate chain.
   * @default true
   */
  verifyTls?: boolean;
  /** Dispatcher to route requests through. When given, the provider does not own or close it. */
  dispatcher?: Dispatcher;
}

/** Contract for HTTP client implementations used by ApiClient. */
export interface FetchClientProviderDefinition {
  /** Executes a GET request. */
  get: (url: string, options: Omit<FetchOptions, 'body'>) => SafeWrapAsync<Error, Response>;
  /** Executes a PUT request. */
  put: (url: string, options: FetchOptions) => SafeWrapAsync<Error, Response>;
  /** Executes a PATCH request. */
  patch: (url: string, options: FetchOptions) => SafeWrapAsync<Error, Response>;
  /** Executes a POST request. */
  post: (url: string, options: FetchOptions) => SafeWrapAsync<Error, Response>;
  /** Executes a DELETE request. */
  delete: (url: string, options: Omit<FetchOptions, 'body'>) => SafeWrapAsync<Error, Response>;
  /** Releases connection resources (keep-alive sockets). Safe to call more than once. */
  dispose: () => SafeWrapAsync<Error, true>;
}

/** Factory signature for constructing HTTP providers. */
export interface FetchClientProvider {
  /** Creates a new instance of the fetch-client, with a base-url + options */
  new (baseUrl: string, opts: FetchClientOptions): FetchClientProviderDefinition;
}
