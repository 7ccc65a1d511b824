import type { Response } from 'undici';
import { AbortError } from '../error/abortError.js';
import { ApiError } from '../error/apiError.js';
import { getHttpError } from '../error/httpError.js';
import { rootCauseMessage } from '../error/unwrapErrorType.js';
import type { ValidationError } from '../error/validationError.js';
import { FetchClient } from '../fetch/client.js';
import { mergeHeaderOptions } from '../fetch/utils.js';
import type { JsonValue } from '../types/json.js';
import type {
  FetchClientProviderDefinition,
  FetchOptions,
  HeaderOptions,
  HttpMethod,
  QueryParams,
} from '../types/request.js';
import { constructUrl } from '../utils/constructUrl.js';
import { getErrorMessage } from '../utils/getErrorMessage.js';
import { bufferResponse } from '../utils/bufferResponse.js';
import { getResponseData } from '../utils/getResponseData.js';
import { type Logger, silentLogger } from '../utils/logger.js';
import { createTimeoutSignal, mergeSignals } from '../utils/signals.js';
import { validator } from '../utils/validator.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';
import { USER_AGENT } from '../version.js';
import { type ClientPropsParsed, clientPropsSchema } from './schema.js';
import type { ApiClientProps, RequestArgs, ResourceOptions } from './types.js';

/** Timeout, in seconds, for {@link ApiClient.healthCheck}. */
const HEALTH_CHECK_TIMEOUT = 10;

type ResolvedProps = ClientPropsParsed & Pick<ApiClientProps, 'logger' | 'fetchProvider' | 'dispatcher'>;

/**
 * Bearer-token REST client for a single base URL.
 *
 * - Builds one connection context (default headers + dispatcher) on creation and reuses it.
 * - Every failure surfaces as an {@link ApiError}; only {@link ApiClient.healthCheck} swallows one.
 * - All methods return error-first tuples via {@link SafeWrapAsync}.
 *
 * @example
 * const [err, client] = ApiClient.create({ baseUrl: 'https://api.example.com', token });
 * if (err) throw err;
 * const [errUser, user] = await client.getResource('users/1');
 * await client.close();
 */
export class ApiClient {
  /** Base URL request paths are resolved against. */
  #baseUrl: string;
  /** Default timeout in seconds. */
  #timeout: number;
  /** Whether the dispatcher verifies certificates. */
  #verifyTls: boolean;
  /** Headers applied to every request. */
  #defaultHeaders: HeaderOptions;
  /** Underlying fetch-capable HTTP provider instance. */
  #fetchClient: FetchClientProviderDefinition;
  #logger: Logger;
  /** Aborts in-flight requests on close. */
  #abortController = new AbortController();
  #closed = false;

  private constructor({
    baseUrl,
    token,
    timeout,
    verifyTls,
    userAgent = USER_AGENT,
    logger = silentLogger,
    fetchProvider = FetchClient,
    dispatcher,
  }: ResolvedProps) {
    this.#baseUrl = baseUrl;
    this.#timeout = timeout;
    this.#verifyTls = verifyTls;
    this.#logger = logger;
    this.#defaultHeaders = mergeHeaderOptions({
      Authorization: `Bearer ${token}`,
      'Content-Type': 'application/json',
      'User-Agent': userAgent,
      Accept: 'application/json',
    });

    this.#fetchClient = new fetchProvider(baseUrl, {
      headers: this.#defaultHeaders,
      verifyTls,
      dispatcher,
    });
  }

  /**
   * Validates `baseUrl` and `token` and builds the connection context.
   *
   * @returns `[ValidationError, null]` when the props are malformed, otherwise `[null, client]`.
   */
  static create(props: ApiClientProps): SafeWrap<ValidationError, ApiClient> {
    const { logger, fetchProvider, dispatcher, ...input } = props;
    const [err, parsed] = validator(input, clientPropsSchema, 'invalid client options');
    if (err) {
      return [err, null];
    }

    return [null, new ApiClient({ ...parsed, logger, fetchProvider, dispatcher })];
  }

  /**
   * Creates a client, runs `fn` with it and closes it on every exit path,
   * including when `fn` returns an error tuple or throws.
   */
  static async scoped<T, ErrorType extends Error = Error>(
    props: ApiClientProps,
    fn: (client: ApiClient) => SafeWrapAsync<ErrorType, T>,
  ): SafeWrapAsync<ErrorType | ValidationError, T> {
    const [errCreate, client] = ApiClient.create(props);
    if (errCreate) {
      return [errCreate, null];
    }

    try {
      return await fn(client);
    } finally {
      const [errClose] = await client.close();
      if (errClose) {
        client.#logger.error('error closing client', { error: rootCauseMessage(errClose) });
      }
    }
  }

  /** Base URL request paths are resolved against. */
  get baseUrl(): string {
    return this.#baseUrl;
  }

  /** Default timeout in seconds. */
  get timeout(): number {
    return this.#timeout;
  }

  /** Whether the server certificate chain is verified. */
  get verifyTls(): boolean {
    return this.#verifyTls;
  }

  /** Whether {@link ApiClient.close} has been called. */
  get closed(): boolean {
    return this.#closed;
  }

  /**
   * Performs one HTTP exchange and returns the response with its body already read into memory.
   *
   * - `path` is resolved against the base URL with WHATWG URL rules.
   * - `headers` are merged over the defaults, `timeout` overrides the default for this call.
   * - Transport failures, including a timeout or `close()` while the body streams, fail with
   *   `Request failed: <innermost cause>` and no status.
   * - Statuses outside 200-299 fail with the body's `message` (or `error`) field and the status.
   */
  async request(method: HttpMethod, path: string, opts: RequestArgs = {}): SafeWrapAsync<ApiError, Response> {
    const verb = method.toUpperCase();
    if (this.#closed) {
      return [new ApiError('Request failed: client was closed'), null];
    }

    const [errUrl, url] = constructUrl(this.#baseUrl, path, opts.query);
    if (errUrl) {
      return [new ApiError(`Request failed: ${rootCauseMessage(errUrl)}`, { cause: errUrl }), null];
    }

    const timeoutSignal = createTimeoutSignal(Math.round((opts.timeout ?? this.#timeout) * 1000));
    const signal = mergeSignals([timeoutSignal?.signal, this.#abortController.signal]);
    const requestOptions: FetchOptions = { headers: mergeHeaderOptions(this.#defaultHeaders, opts.headers) };
    if (opts.body !== undefined) {
      requestOptions.body = JSON.stringify(opts.body);
    }

    if (signal) {
      requestOptions.signal = signal.signal;
    }

    const [errExchange, exchange] = await this.#exchange(method, url, requestOptions);
    timeoutSignal?.release();
    signal?.release();

    if (errExchange) {
      this.#logger.error(`${verb} ${url} - Request failed`, { error: rootCauseMessage(errExchange) });
      return [new ApiError(`Request failed: ${rootCauseMessage(errExchange)}`, { cause: errExchange }), null];
    }

    const { response, cause } = exchange;
    this.#logger.debug(`${verb} ${url} - Status: ${response.status}`);

    if (!response.ok) {
      const message = await getErrorMessage(response);
      return [new ApiError(message, { statusCode: response.status, response, cause }), null];
    }

    return [null, response];
  }

  /**
   * GET a single resource and return its parsed body.
   *
   * @param path - Resource path, e.g. `users/1`.
   * @param params - Query parameters.
   */
  getResource(path: string, params?: QueryParams, opts: ResourceOptions = {}): SafeWrapAsync<ApiError, JsonValue> {
    return this.#json('get', path, { ...opts, query: params });
  }

  /**
   * GET a collection and return its parsed body.
   * Behaves exactly like {@link ApiClient.getResource}.
   */
  listResources(path: string, params?: QueryParams, opts: ResourceOptions = {}): SafeWrapAsync<ApiError, JsonValue> {
    return this.#json('get', path, { ...opts, query: params });
  }

  /**
   * POST `data` and return the parsed body.
   *
   * @param data - A JSON value, or JSON text which is parsed before sending.
   */
  createResource(path: string, data: JsonValue, opts: ResourceOptions = {}): SafeWrapAsync<ApiError, JsonValue> {
    return this.#send('post', path, data, opts);
  }

  /**
   * PUT `data` and return the parsed body.
   *
   * @param data - A JSON value, or JSON text which is parsed before sending.
   */
  updateResource(path: string, data: JsonValue, opts: ResourceOptions = {}): SafeWrapAsync<ApiError, JsonValue> {
    return this.#send('put', path, data, opts);
  }

  /**
   * DELETE a resource.
   *
   * @returns `true` for 200 and 204, `false` for any other success status.
   */
  async deleteResource(path: string, opts: ResourceOptions = {}): SafeWrapAsync<ApiError, boolean> {
    const [err, response] = await this.request('delete', path, opts);
    if (err) {
      return [err, null];
    }

    return [null, response.status === 200 || response.status === 204];
  }

  /**
   * GET `health` with a fixed 10 second timeout.
   *
   * @returns `true` only for a 200 response; any failure resolves to `false`.
   */
  async healthCheck(): Promise<boolean> {
    const [err, response] = await this.request('get', 'health', { timeout: HEALTH_CHECK_TIMEOUT });
    if (err) {
      this.#logger.debug('health check failed', { error: err.message, status: err.statusCode });
      return false;
    }

    return response.status === 200;
  }

  /**
   * Aborts in-flight requests and releases the connection pool.
   * Safe to call more than once; later operations fail without touching the transport.
   */
  async close(): SafeWrapAsync<Error, true> {
    if (this.#closed) {
      return [null, true];
    }

    this.#closed = true;
    this.#abortController.abort(new AbortError('client was closed'));

    const [err] = await this.#fetchClient.dispose();
    if (err) {
      return [new Error('error disposing fetch provider in close', { cause: err }), null];
    }

    return [null, true];
  }

  /**
   * Sends one request and reads its body before the caller releases the request's
   * signals, so the timeout and `close()` also cover a body that is still streaming.
   * The returned response is an in-memory copy.
   */
  async #exchange(
    method: HttpMethod,
    url: URL,
    opts: FetchOptions,
  ): SafeWrapAsync<Error, { response: Response; cause?: Error }> {
    const [errWrapped, wrapped] = await safeWrapAsync(() => this.#fetchClient[method](url.toString(), opts));
    if (errWrapped) {
      return [errWrapped, null];
    }

    // A non-2xx status arrives as an HTTPError from the provider; anything else is a transport failure
    const [errFetch, fetched] = wrapped;
    if (errFetch) {
      const httpError = getHttpError(errFetch);
      if (!httpError) {
        return [errFetch, null];
      }

      const [errBody, response] = await bufferResponse(httpError.response);
      if (errBody) {
        return [errBody, null];
      }

      return [null, { response, cause: errFetch }];
    }

    const [errBody, response] = await bufferResponse(fetched);
    if (errBody) {
      return [errBody, null];
    }

    return [null, { response }];
  }

  async #send(
    method: 'post' | 'put',
    path: string,
    data: JsonValue,
    opts: ResourceOptions,
  ): SafeWrapAsync<ApiError, JsonValue> {
    let body = data;
    if (typeof data === 'string') {
      const [errBody, parsed] = safeWrap<JsonValue>(() => JSON.parse(data));
      if (errBody) {
        return [new ApiError('Invalid JSON data provided', { cause: errBody }), null];
      }

      body = parsed;
    }

    return this.#json(method, path, { ...opts, body });
  }

  async #json(method: HttpMethod, path: string, args: RequestArgs): SafeWrapAsync<ApiError, JsonValue> {
    const [err, response] = await this.request(method, path, args);
    if (err) {
      return [err, null];
    }

    const [errData, data] = await getResponseData(response);
    if (errData) {
      return [
        new ApiError(`Invalid response body: ${rootCauseMessage(errData)}`, {
          statusCode: response.status,
          response,
          cause: errData,
        }),
        null,
      ];
    }

    return [null, data];
  }
}
