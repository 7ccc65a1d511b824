/**
 * Root entrypoint for restline: re-exports the API client, configuration, fetch provider,
 * logging and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

/**
 * Bearer-token REST client and its options.
 */
export { ApiClient } from './client/client.js';
export type { ApiClientProps, RequestArgs, ResourceOptions } from './client/types.js';

/**
 * Validated configuration backed by a TOML file and `RESTLINE_*` environment variables.
 */
export { type ClientParams, Config } from './config/config.js';
export { defaultConfigPath, ENV_VARS } from './config/env.js';
export type { ConfigFields, ConfigFileData, ConfigInput } from './config/schema.js';

/**
 * Error thrown into in-flight requests when the client is closed.
 */
export { AbortError } from './error/abortError.js';

/**
 * The single error type surfaced by {@link ApiClient}.
 */
export { ApiError, isApiError } from './error/apiError.js';

/**
 * Configuration file and configuration check failures.
 */
export { ConfigurationError, InvalidFormatError, NotFoundError, SaveError } from './error/configError.js';

/**
 * Error representing a non-2xx HTTP response.
 */
export { HTTPError } from './error/httpError.js';

/**
 * Error thrown when a request exceeds the configured timeout.
 */
export { TimeoutError } from './error/timeoutError.js';

/**
 * Error thrown when validation of configuration or client options fails.
 */
export { ValidationError } from './error/validationError.js';

/** Recursively unwraps nested causes to find a specific error class. */
export { rootCauseMessage, unwrapErrorType } from './error/unwrapErrorType.js';

/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './error/isErrorType.js';

/**
 * Default undici-backed HTTP provider, and the header merge it applies.
 */
export { FetchClient } from './fetch/client.js';
export { mergeHeaderOptions } from './fetch/utils.js';

export type { JsonObject, JsonPrimitive, JsonValue } from './types/json.js';
export type {
  FetchClientOptions,
  FetchClientProvider,
  FetchClientProviderDefinition,
  FetchOptions,
  HeaderOptions,
  HttpMethod,
  QueryParams,
  QueryValue,
} from './types/request.js';

/** JSON-lines logger used by the client and the CLI. */
export { JsonLogger, type JsonLoggerOptions, LOG_LEVELS, type Logger, type LogLevel, silentLogger } from './utils/logger.js';

export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';

export { APP_NAME, USER_AGENT, VERSION } from './version.js';
