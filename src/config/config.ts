import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { parse, stringify } from 'smol-toml';
import { ConfigurationError, InvalidFormatError, NotFoundError, SaveError } from '../error/configError.js';
import type { ValidationError } from '../error/validationError.js';
import type { LogLevel } from '../utils/logger.js';
import { validator } from '../utils/validator.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';
import { defaultConfigPath, ENV_VARS, type Env, isTruthy } from './env.js';
import {
  type ConfigFields,
  type ConfigFileData,
  type ConfigInput,
  configFieldsSchema,
  configFileSchema,
} from './schema.js';

/** Constructor input for `ApiClient`, as projected from a {@link Config}. */
export interface ClientParams {
  baseUrl: string;
  token: string;
  timeout: number;
  verifyTls: boolean;
}

function validateFields(input: unknown): SafeWrap<ValidationError, ConfigFields> {
  return validator(input, configFieldsSchema, 'Invalid configuration');
}

/** Drops keys whose value is `undefined`, so they do not clobber existing fields. */
function definedEntries(input: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
}

function fromFileData(data: ConfigFileData): Record<string, unknown> {
  return definedEntries({
    endpoint: data.api_endpoint,
    token: data.api_token,
    timeout: data.timeout,
    verifyTls: data.verify_ssl,
    logLevel: data.log_level,
  });
}

function parseTimeout(value: string): number | string {
  return /^\s*-?\d+\s*$/.test(value) ? Number.parseInt(value, 10) : value;
}

/**
 * Validated application configuration.
 *
 * Instances are only created through the static constructors, each of which runs
 * field validation, and {@link Config.assign} re-validates before mutating.
 */
export class Config {
  #fields: ConfigFields;
  #sourcePath: string | null;

  private constructor(fields: ConfigFields, sourcePath: string | null = null) {
    this.#fields = fields;
    this.#sourcePath = sourcePath;
  }

  /**
   * Builds a configuration from explicit fields; missing fields take defaults.
   */
  static create(input: ConfigInput = {}): SafeWrap<ValidationError, Config> {
    const [err, fields] = validateFields(input);
    if (err) {
      return [err, null];
    }

    return [null, new Config(fields)];
  }

  /**
   * Loads a TOML configuration file.
   *
   * @returns `NotFoundError` when `path` does not exist, `InvalidFormatError` when the
   * content does not parse or fails validation.
   */
  static async fromFile(path: string): SafeWrapAsync<NotFoundError | InvalidFormatError, Config> {
    const [errRead, text] = await safeWrapAsync(() => readFile(path, 'utf8'));
    if (errRead) {
      if ('code' in errRead && errRead.code === 'ENOENT') {
        return [new NotFoundError(path, { cause: errRead }), null];
      }

      return [new InvalidFormatError(path, { cause: errRead }), null];
    }

    const [errParse, raw] = safeWrap(() => parse(text));
    if (errParse) {
      return [new InvalidFormatError(path, { cause: errParse }), null];
    }

    const [errShape, data] = validator(raw, configFileSchema, 'Invalid configuration');
    if (errShape) {
      return [new InvalidFormatError(path, { cause: errShape }), null];
    }

    const [errFields, fields] = validateFields(fromFileData(data));
    if (errFields) {
      return [new InvalidFormatError(path, { cause: errFields }), null];
    }

    return [null, new Config(fields, path)];
  }

  /**
   * Builds a configuration from `RESTLINE_*` environment variables; unset variables
   * take defaults.
   */
  static fromEnv(env: Env = process.env): SafeWrap<ValidationError, Config> {
    const input: Record<string, unknown> = {};

    const endpoint = env[ENV_VARS.endpoint];
    if (endpoint !== undefined) {
      input.endpoint = endpoint;
    }

    const token = env[ENV_VARS.token];
    if (token !== undefined) {
      input.token = token;
    }

    const timeout = env[ENV_VARS.timeout];
    if (timeout !== undefined) {
      input.timeout = parseTimeout(timeout);
    }

    const noVerifySsl = env[ENV_VARS.noVerifySsl];
    if (noVerifySsl !== undefined) {
      input.verifyTls = !isTruthy(noVerifySsl);
    }

    const logLevel = env[ENV_VARS.logLevel];
    if (logLevel !== undefined) {
      input.logLevel = logLevel;
    }

    const [err, fields] = validateFields(input);
    if (err) {
      return [err, null];
    }

    return [null, new Config(fields)];
  }

  /** API endpoint, if configured. */
  get endpoint(): string | undefined {
    return this.#fields.endpoint;
  }

  /** API token, if configured. */
  get token(): string | undefined {
    return this.#fields.token;
  }

  /** Request timeout in seconds, within [1, 300]. */
  get timeout(): number {
    return this.#fields.timeout;
  }

  get verifyTls(): boolean {
    return this.#fields.verifyTls;
  }

  get logLevel(): LogLevel {
    return this.#fields.logLevel;
  }

  /** File this configuration was loaded from, if any. Never persisted. */
  get sourcePath(): string | null {
    return this.#sourcePath;
  }

  /**
   * Applies overrides after validating the merged result. Either every override is
   * applied or none is. `undefined` values are ignored.
   */
  assign(overrides: ConfigInput): SafeWrap<ValidationError, Config> {
    const [err, fields] = validateFields({ ...this.#fields, ...definedEntries(overrides) });
    if (err) {
      return [err, null];
    }

    this.#fields = fields;
    return [null, this];
  }

  /**
   * Writes the configuration as TOML, creating parent directories. Unset fields are omitted
   * and the file is created readable by the owner only.
   *
   * @returns The written path.
   */
  async save(path: string = defaultConfigPath()): SafeWrapAsync<SaveError, string> {
    const [errDir] = await safeWrapAsync(() => mkdir(dirname(path), { recursive: true }));
    if (errDir) {
      return [new SaveError(path, { cause: errDir }), null];
    }

    const [errWrite] = await safeWrapAsync(() =>
      writeFile(path, stringify(this.toFileData()), { encoding: 'utf8', mode: 0o600 }),
    );
    if (errWrite) {
      return [new SaveError(path, { cause: errWrite }), null];
    }

    return [null, path];
  }

  /** Whether both endpoint and token are non-empty. */
  isConfigured(): boolean {
    return Boolean(this.#fields.endpoint && this.#fields.token);
  }

  /**
   * Checks the configuration is usable for requests.
   */
  validate(): SafeWrap<ConfigurationError, true> {
    if (!this.isConfigured()) {
      return [new ConfigurationError('API endpoint and token must be configured'), null];
    }

    const endpoint = this.#fields.endpoint ?? '';
    if (!endpoint.startsWith('http://') && !endpoint.startsWith('https://')) {
      return [new ConfigurationError('API endpoint must be a valid HTTP/HTTPS URL'), null];
    }

    return [null, true];
  }

  /** Projects the fields onto `ApiClient` props; unset endpoint and token become `''`. */
  toClientParams(): ClientParams {
    return {
      baseUrl: this.#fields.endpoint ?? '',
      token: this.#fields.token ?? '',
      timeout: this.#fields.timeout,
      verifyTls: this.#fields.verifyTls,
    };
  }

  /** File representation, keyed as on disk. */
  toFileData(): ConfigFileData {
    const data: ConfigFileData = {};
    if (this.#fields.endpoint !== undefined) {
      data.api_endpoint = this.#fields.endpoint;
    }

    if (this.#fields.token !== undefined) {
      data.api_token = this.#fields.token;
    }

    data.timeout = this.#fields.timeout;
    data.verify_ssl = this.#fields.verifyTls;
    data.log_level = this.#fields.logLevel;
    return data;
  }

  toJSON(): ConfigFields {
    return { ...this.#fields };
  }
}
