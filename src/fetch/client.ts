import { Agent, type Dispatcher, fetch, type Response } from 'undici';
import { HTTPError } from '../error/httpError.js';
import type {
  FetchClientOptions,
  FetchClientProviderDefinition,
  FetchOptions,
  HeaderOptions,
} from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { mergeHeaderOptions } from './utils.js';

type RequestMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Thin wrapper around undici's `fetch` that:
 * - resolves request URLs against a configured base URL,
 * - merges default and per-request headers,
 * - routes every request through one dispatcher that carries the TLS policy,
 * - returns error-first tuples via {@link SafeWrapAsync}.
 */
export class FetchClient implements FetchClientProviderDefinition {
  /** Base URL relative request URLs are resolved against. */
  #baseUrl: string;
  /** Default headers sent with every request. */
  #headers?: HeaderOptions;
  /** Connection pool shared by every request. */
  #dispatcher: Dispatcher;
  /** Whether {@link FetchClient.dispose} should close the dispatcher. */
  #ownsDispatcher: boolean;
  #disposed = false;

  /** Creates a new instance of the fetch-client, with a base-url + options */
  constructor(baseUrl: string, { headers, verifyTls = true, dispatcher }: FetchClientOptions = {}) {
    this.#baseUrl = baseUrl;
    this.#headers = headers;
    this.#ownsDispatcher = dispatcher === undefined;
    this.#dispatcher = dispatcher ?? new Agent({ connect: { rejectUnauthorized: verifyTls } });
  }

  /**
   * Executes a GET request against the given url.
   *
   * @param url - Absolute URL, or a path resolved against the base URL.
   * @param opts - Request options merged with the client's defaults.
   */
  public get(url: string, opts: Omit<FetchOptions, 'body'>): SafeWrapAsync<Error, Response> {
    return this.#request('GET', url, opts);
  }

  /** Executes a PUT request against the given url. */
  public put(url: string, opts: FetchOptions): SafeWrapAsync<Error, Response> {
    return this.#request('PUT', url, opts);
  }

  /** Executes a PATCH request against the given url. */
  public patch(url: string, opts: FetchOptions): SafeWrapAsync<Error, Response> {
    return this.#request('PATCH', url, opts);
  }

  /** Executes a POST request against the given url. */
  public post(url: string, opts: FetchOptions): SafeWrapAsync<Error, Response> {
    return this.#request('POST', url, opts);
  }

  /** Executes a DELETE request against the given url. */
  public delete(url: string, opts: Omit<FetchOptions, 'body'>): SafeWrapAsync<Error, Response> {
    return this.#request('DELETE', url, opts);
  }

  /**
   * Closes the dispatcher when this client created it. A dispatcher passed in
   * through the options belongs to the caller and is left open.
   */
  public async dispose(): SafeWrapAsync<Error, true> {
    if (this.#disposed) {
      return [null, true];
    }

    this.#disposed = true;
    if (!this.#ownsDispatcher) {
      return [null, true];
    }

    const [err] = await safeWrapAsync(() => this.#dispatcher.close());
    if (err) {
      return [new Error('error closing dispatcher in fetchClient', { cause: err }), null];
    }

    return [null, true];
  }

  /**
   * Core request implementation used by all HTTP verb helpers.
   *
   * Errors:
   * - Network / fetch errors are wrapped in `Error`.
   * - Non-2xx responses are wrapped in `HTTPError`.
   */
  async #request(method: RequestMethod, url: string, opts: FetchOptions): SafeWrapAsync<Error, Response> {
    const headers = mergeHeaderOptions(this.#headers, opts.headers);

    const [err, res] = await safeWrapAsync(() =>
      fetch(new URL(url, this.#baseUrl), {
        method,
        body: opts.body,
        headers,
        dispatcher: this.#dispatcher,
        ...(opts.signal && { signal: opts.signal }),
      }),
    );

    if (err) {
      return [new Error(`error wrapping ${method} request in fetchClient`, { cause: err }), null];
    }

    if (!res.ok) {
      return [new HTTPError(res, `error in ${method} request in fetchClient`), null];
    }

    return [null, res];
  }
}
