import type { Dispatcher } from 'undici';
import type { FetchClientProvider, HeaderOptions, QueryParams } from '../types/request.js';
import type { Logger } from '../utils/logger.js';
import type { ClientPropsInput } from './schema.js';

/** Props for {@link ApiClient.create}. */
export interface ApiClientProps extends ClientPropsInput {
  /** Absolute http(s) URL every request path is resolved against. */
  baseUrl: string;
  /** Bearer token sent as `Authorization: Bearer <token>`. */
  token: string;
  /**
   * Request timeout in seconds.
   * @default 30
   */
  timeout?: number;
  /**
   * Verify the server certificate chain.
   * @default true
   */
  verifyTls?: boolean;
  /** Overrides the default `User-Agent` header. */
  userAgent?: string;
  /** Receives request logs. Defaults to a silent logger. */
  logger?: Logger;
  /** HTTP client implementation used for requests. Defaults to {@link FetchClient}. */
  fetchProvider?: FetchClientProvider;
  /** undici dispatcher handed to the provider, e.g. a proxy agent or a `MockAgent`. */
  dispatcher?: Dispatcher;
}

/** Per-call options for {@link ApiClient.request}. */
export interface RequestArgs {
  /** Request body, serialized as JSON. */
  body?: unknown;
  /** Query parameters appended to the URL. */
  query?: QueryParams;
  /** Headers merged over the defaults; a `null` value removes a default. */
  headers?: HeaderOptions;
  /** Timeout in seconds for this call only. */
  timeout?: number;
}

/** Per-call options for the resource helpers. */
export type ResourceOptions = Pick<RequestArgs, 'headers' | 'timeout'>;
