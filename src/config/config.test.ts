import { mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { TomlError } from 'smol-toml';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigurationError, InvalidFormatError, NotFoundError, SaveError } from '../error/configError.js';
import { ValidationError } from '../error/validationError.js';
import { Config } from './config.js';

const mustCreate = (...args: Parameters<typeof Config.create>) => {
  const [err, config] = Config.create(...args);
  if (err) {
    throw err;
  }

  return config;
};

describe('Config.create', () => {
  it('applies defaults', () => {
    const config = mustCreate();

    expect(config.toJSON()).toStrictEqual({ timeout: 30, verifyTls: true, logLevel: 'INFO' });
    expect(config.endpoint).toBeUndefined();
    expect(config.token).toBeUndefined();
    expect(config.sourcePath).toBeNull();
  });

  it('normalizes the log level to upper case', () => {
    expect(mustCreate({ logLevel: 'debug' }).logLevel).toBe('DEBUG');
  });

  it('rejects an unknown log level', () => {
    const [err, config] = Config.create({ logLevel: 'TRACE' });

    expect(config).toBeNull();
    expect(err).toBeInstanceOf(ValidationError);
    expect(err?.message).toBe('Invalid configuration: Log level must be one of: DEBUG, INFO, WARNING, ERROR, CRITICAL');
  });

  it.each([0, 301, -5])('rejects timeout %i', (timeout) => {
    const [err] = Config.create({ timeout });

    expect(err?.message).toBe('Invalid configuration: Timeout must be between 1 and 300 seconds');
  });

  it.each([1, 300])('accepts boundary timeout %i', (timeout) => {
    expect(mustCreate({ timeout }).timeout).toBe(timeout);
  });

  it('rejects a fractional timeout', () => {
    const [err] = Config.create({ timeout: 2.5 });

    expect(err?.message).toBe('Invalid configuration: Timeout must be an integer number of seconds');
  });
});

describe('Config.assign', () => {
  it('applies valid overrides and ignores undefined values', () => {
    const config = mustCreate({ endpoint: 'https://api.example.com', token: 'test-token' });

    const [err, assigned] = config.assign({ timeout: 60, token: undefined });

    expect(err).toBeNull();
    expect(assigned).toBe(config);
    expect(config.timeout).toBe(60);
    expect(config.token).toBe('test-token');
  });

  it('is all or nothing', () => {
    const config = mustCreate({ endpoint: 'https://api.example.com' });

    const [err] = config.assign({ endpoint: 'https://other.example.com', timeout: 0 });

    expect(err).toBeInstanceOf(ValidationError);
    expect(config.endpoint).toBe('https://api.example.com');
    expect(config.timeout).toBe(30);
  });
});

describe('Config.validate', () => {
  it('requires endpoint and token', () => {
    const [err] = mustCreate({ endpoint: 'https://api.example.com' }).validate();

    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err?.message).toBe('API endpoint and token must be configured');
  });

  it('requires an http(s) endpoint', () => {
    const [err] = mustCreate({ endpoint: 'ftp://api.example.com', token: 'test-token' }).validate();

    expect(err?.message).toBe('API endpoint must be a valid HTTP/HTTPS URL');
  });

  it('passes a complete configuration', () => {
    const config = mustCreate({ endpoint: 'http://localhost:8080', token: 'test-token' });

    expect(config.validate()).toStrictEqual([null, true]);
    expect(config.isConfigured()).toBe(true);
  });

  it('treats empty strings as not configured', () => {
    expect(mustCreate({ endpoint: '', token: 'test-token' }).isConfigured()).toBe(false);
  });
});

describe('Config.toClientParams', () => {
  it('projects fields onto client props', () => {
    const config = mustCreate({ endpoint: 'https://api.example.com', token: 'test-token', verifyTls: false });

    expect(config.toClientParams()).toStrictEqual({
      baseUrl: 'https://api.example.com',
      token: 'test-token',
      timeout: 30,
      verifyTls: false,
    });
  });

  it('maps unset fields to empty strings', () => {
    expect(mustCreate().toClientParams()).toStrictEqual({ baseUrl: '', token: '', timeout: 30, verifyTls: true });
  });
});

describe('Config.fromEnv', () => {
  it('reads every variable', () => {
    const [err, config] = Config.fromEnv({
      RESTLINE_API_ENDPOINT: 'https://api.example.com',
      RESTLINE_API_TOKEN: 'test-token',
      RESTLINE_TIMEOUT: '45',
      RESTLINE_NO_VERIFY_SSL: 'Yes',
      RESTLINE_LOG_LEVEL: 'warning',
    });

    expect(err).toBeNull();
    expect(config?.toJSON()).toStrictEqual({
      endpoint: 'https://api.example.com',
      token: 'test-token',
      timeout: 45,
      verifyTls: false,
      logLevel: 'WARNING',
    });
  });

  it('falls back to defaults for unset variables', () => {
    const [, config] = Config.fromEnv({ UNRELATED: 'x' });

    expect(config?.toJSON()).toStrictEqual({ timeout: 30, verifyTls: true, logLevel: 'INFO' });
  });

  it('keeps verification on for non-truthy values', () => {
    const [, config] = Config.fromEnv({ RESTLINE_NO_VERIFY_SSL: '0' });

    expect(config?.verifyTls).toBe(true);
  });

  it('rejects a non-integer timeout', () => {
    const [err] = Config.fromEnv({ RESTLINE_TIMEOUT: 'soon' });

    expect(err?.message).toBe('Invalid configuration: Timeout must be an integer number of seconds');
  });

  it('rejects an out-of-range timeout', () => {
    const [err] = Config.fromEnv({ RESTLINE_TIMEOUT: '900' });

    expect(err?.message).toBe('Invalid configuration: Timeout must be between 1 and 300 seconds');
  });
});

describe('config files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'restline-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads a TOML file', async () => {
    const path = join(dir, 'config.toml');
    await writeFile(
      path,
      ['api_endpoint = "https://api.example.com"', 'api_token = "test-token"', 'timeout = 60', 'log_level = "debug"'].join(
        '\n',
      ),
    );

    const [err, config] = await Config.fromFile(path);

    expect(err).toBeNull();
    expect(config?.toJSON()).toStrictEqual({
      endpoint: 'https://api.example.com',
      token: 'test-token',
      timeout: 60,
      verifyTls: true,
      logLevel: 'DEBUG',
    });
    expect(config?.sourcePath).toBe(path);
  });

  it('fails with NotFoundError for a missing file', async () => {
    const path = join(dir, 'missing.toml');

    const [err, config] = await Config.fromFile(path);

    expect(config).toBeNull();
    expect(err).toBeInstanceOf(NotFoundError);
    expect(err?.message).toBe(`Configuration file not found: ${path}`);
    expect(err?.path).toBe(path);
  });

  it('fails with InvalidFormatError for malformed TOML', async () => {
    const path = join(dir, 'config.toml');
    await writeFile(path, 'api_endpoint = "unterminated');

    const [err] = await Config.fromFile(path);

    expect(err).toBeInstanceOf(InvalidFormatError);
    expect(err?.cause).toBeInstanceOf(TomlError);
  });

  it('fails with InvalidFormatError for out-of-range values', async () => {
    const path = join(dir, 'config.toml');
    await writeFile(path, 'timeout = 0\n');

    const [err] = await Config.fromFile(path);

    expect(err).toBeInstanceOf(InvalidFormatError);
    expect(err?.message).toBe(
      `Invalid configuration file ${path}: Invalid configuration: Timeout must be between 1 and 300 seconds`,
    );
    expect(err?.cause).toBeInstanceOf(ValidationError);
  });

  it('rejects unknown keys', async () => {
    const path = join(dir, 'config.toml');
    await writeFile(path, 'api_endpont = "https://api.example.com"\n');

    const [err] = await Config.fromFile(path);

    expect(err).toBeInstanceOf(InvalidFormatError);
    expect(err?.cause).toBeInstanceOf(ValidationError);
  });

  it('saves and loads back the same fields', async () => {
    const path = join(dir, 'nested', 'dir', 'config.toml');
    const config = mustCreate({
      endpoint: 'https://api.example.com',
      token: 'test-token',
      timeout: 120,
      verifyTls: false,
      logLevel: 'ERROR',
    });

    const [errSave, saved] = await config.save(path);
    const [errLoad, loaded] = await Config.fromFile(path);

    expect(errSave).toBeNull();
    expect(saved).toBe(path);
    expect(errLoad).toBeNull();
    expect(loaded?.toJSON()).toStrictEqual(config.toJSON());
  });

  it('omits unset fields and writes owner-only permissions', async () => {
    const path = join(dir, 'config.toml');

    await mustCreate({ timeout: 10 }).save(path);

    const text = await readFile(path, 'utf8');
    expect(text).not.toContain('api_endpoint');
    expect(text).not.toContain('api_token');
    expect(text).toContain('timeout = 10');
    if (process.platform !== 'win32') {
      expect((await stat(path)).mode & 0o777).toBe(0o600);
    }
  });

  it('fails with SaveError when the target is not writable', async () => {
    const blocker = join(dir, 'blocker');
    await writeFile(blocker, '');
    const path = join(blocker, 'config.toml');

    const [err, saved] = await mustCreate().save(path);

    expect(saved).toBeNull();
    expect(err).toBeInstanceOf(SaveError);
    expect(err?.path).toBe(path);
  });
});
