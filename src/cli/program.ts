import { access, readFile, writeFile } from 'node:fs/promises';
import { Command, InvalidArgumentError, Option } from 'commander';
import type { Dispatcher } from 'undici';
import { z } from 'zod';
import { ApiClient } from '../client/client.js';
import { Config } from '../config/config.js';
import { defaultConfigPath, ENV_VARS, isTruthy } from '../config/env.js';
import type { JsonValue } from '../types/json.js';
import type { FetchClientProvider, QueryParams } from '../types/request.js';
import { JsonLogger, LOG_LEVELS, type LogLevel, type Logger, type LogSink } from '../utils/logger.js';
import { validator } from '../utils/validator.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';
import { APP_NAME, VERSION } from '../version.js';
import { formatData, OUTPUT_FORMATS, type OutputFormat, renderTable } from './render.js';

/** Streams and hooks the program talks to; swapped out in tests. */
export interface CliIO {
  /** Data output. */
  stdout: LogSink;
  /** Messages, errors and logs. */
  stderr: LogSink;
  /** Asks a yes/no question. */
  confirm: (question: string) => Promise<boolean>;
  /** HTTP provider for the API client. Defaults to the undici fetch client. */
  fetchProvider?: FetchClientProvider;
  /** undici dispatcher for the API client. */
  dispatcher?: Dispatcher;
}

type GlobalOptions = {
  config?: string;
  verbose?: boolean;
  endpoint?: string;
  token?: string;
  timeout?: number;
  verifySsl: boolean;
};

type ConfigureOptions = {
  endpoint: string;
  token: string;
  timeout: number;
  verifySsl: boolean;
  logLevel: LogLevel;
};

type FetchCommandOptions = {
  resource: string;
  params?: QueryParams;
  output?: string;
  format: OutputFormat;
};

type WriteCommandOptions = {
  resource: string;
  data?: string;
  file?: string;
};

type UpdateCommandOptions = {
  resource: string;
  data: string;
};

type DeleteCommandOptions = {
  resource: string;
  force?: boolean;
};

const NOT_CONFIGURED = "API not configured. Use 'configure' command first.";

const queryValueSchema = z.union([z.string(), z.number(), z.boolean()]);
const queryParamsSchema = z.record(z.union([queryValueSchema, z.array(queryValueSchema), z.null()]));

function parseUrl(value: string): string {
  if (!value.startsWith('http://') && !value.startsWith('https://')) {
    throw new InvalidArgumentError('URL must start with http:// or https://');
  }

  return value;
}

function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Must be an integer.');
  }

  return Number.parseInt(value, 10);
}

function parseJsonText(value: string): string {
  const [err] = safeWrap<unknown>(() => JSON.parse(value));
  if (err) {
    throw new InvalidArgumentError('Data must be valid JSON');
  }

  return value;
}

function parseQueryParams(value: string): QueryParams {
  const [errJson, parsed] = safeWrap<unknown>(() => JSON.parse(value));
  if (errJson) {
    throw new InvalidArgumentError('Params must be valid JSON');
  }

  const [errParams, params] = validator(parsed, queryParamsSchema);
  if (errParams) {
    throw new InvalidArgumentError('Params must be a JSON object of strings, numbers, booleans or arrays of them');
  }

  return params;
}

/** Messages of every error in the `cause` chain below `err`. */
function causeMessages(err: Error): string[] {
  const messages: string[] = [];
  const seen = new Set<unknown>([err]);
  let current = err.cause;
  while (current !== undefined && !seen.has(current)) {
    seen.add(current);
    messages.push(current instanceof Error ? `${current.name}: ${current.message}` : String(current));
    current = current instanceof Error ? current.cause : undefined;
  }

  return messages;
}

async function existingDefaultConfigPath(): Promise<string | null> {
  const path = defaultConfigPath();
  const [err] = await safeWrapAsync(() => access(path));
  return err ? null : path;
}

/**
 * Loads the configuration: `--config` when given, else the default file when it exists,
 * else the environment. Command-line options and their environment variables are applied on top.
 */
async function loadConfig(opts: GlobalOptions, env = process.env): SafeWrapAsync<Error, Config> {
  const noVerifySsl = !opts.verifySsl || isTruthy(env[ENV_VARS.noVerifySsl]);
  const path = opts.config ?? (await existingDefaultConfigPath());
  const [err, config] = path ? await Config.fromFile(path) : Config.fromEnv();
  if (err) {
    return [err, null];
  }

  return config.assign({
    endpoint: opts.endpoint,
    token: opts.token,
    timeout: opts.timeout,
    verifyTls: noVerifySsl ? false : undefined,
  });
}

/**
 * Builds the `restline` command tree. Failures are reported through commander's
 * `error()`, so `parseAsync` rejects with a `CommanderError` carrying the exit code.
 */
export function createProgram(io: CliIO): Command {
  const program = new Command();
  let loaded: { config: Config; logger: Logger } | null = null;

  const print = (text: string) => io.stdout.write(`${text}\n`);
  const notice = (text: string) => io.stderr.write(`${text}\n`);
  const globals = () => program.opts<GlobalOptions>();

  const fail = (command: Command, doing: string, err: Error): never => {
    const lines = [`Error ${doing}: ${err.message}`];
    if (globals().verbose) {
      lines.push(...causeMessages(err).map((message) => `  caused by ${message}`));
    }

    return command.error(lines.join('\n'), { exitCode: 1, code: `${APP_NAME}.failed` });
  };

  const requireConfig = (command: Command) => {
    const current = loaded;
    if (!current) {
      return command.error('Error loading configuration: configuration was not loaded', { exitCode: 1 });
    }

    if (!current.config.isConfigured()) {
      return command.error(NOT_CONFIGURED, { exitCode: 1, code: `${APP_NAME}.unconfigured` });
    }

    const [err] = current.config.validate();
    if (err) {
      return fail(command, 'validating configuration', err);
    }

    return current;
  };

  const withClient = async <T>(
    command: Command,
    doing: string,
    fn: (client: ApiClient) => SafeWrapAsync<Error, T>,
  ): Promise<T> => {
    const { config, logger } = requireConfig(command);
    const [err, result] = await ApiClient.scoped(
      { ...config.toClientParams(), logger, fetchProvider: io.fetchProvider, dispatcher: io.dispatcher },
      fn,
    );
    if (err) {
      return fail(command, doing, err);
    }

    return result;
  };

  program
    .name(APP_NAME)
    .description('Command-line client for bearer-token REST APIs')
    .version(VERSION)
    .exitOverride()
    .enablePositionalOptions()
    .configureOutput({
      writeOut: (text) => io.stdout.write(text),
      writeErr: (text) => io.stderr.write(text),
    })
    .addOption(new Option('-c, --config <path>', 'path to configuration file').env(ENV_VARS.config))
    .addOption(new Option('-v, --verbose', 'enable verbose output').env(ENV_VARS.verbose))
    .addOption(new Option('-e, --endpoint <url>', 'API endpoint URL').env(ENV_VARS.endpoint).argParser(parseUrl))
    .addOption(new Option('-t, --token <token>', 'API authentication token').env(ENV_VARS.token))
    .addOption(
      new Option('--timeout <seconds>', 'request timeout in seconds').env(ENV_VARS.timeout).argParser(parseInteger),
    )
    .option('--no-verify-ssl', `disable TLS certificate verification (env: ${ENV_VARS.noVerifySsl})`)
    .hook('preAction', async (_program, actionCommand) => {
      if (actionCommand.name() === 'configure') {
        return;
      }

      const opts = globals();
      const [err, config] = await loadConfig(opts);
      if (err) {
        return fail(actionCommand, 'loading configuration', err);
      }

      const level = opts.verbose ? 'DEBUG' : config.logLevel;
      loaded = { config, logger: new JsonLogger({ level, sink: io.stderr }) };
    });

  const configure = program
    .command('configure')
    .description('save API credentials to the configuration file')
    .addOption(new Option('-e, --endpoint <url>', 'API endpoint URL').argParser(parseUrl).makeOptionMandatory())
    .requiredOption('-t, --token <token>', 'API authentication token')
    .option('--timeout <seconds>', 'request timeout in seconds', parseInteger, 30)
    .option('--no-verify-ssl', 'disable TLS certificate verification')
    .addOption(new Option('--log-level <level>', 'logging level').choices(LOG_LEVELS).default('INFO'));

  configure.action(async () => {
    const opts = configure.opts<ConfigureOptions>();
    const [errCreate, config] = Config.create({
      endpoint: opts.endpoint,
      token: opts.token,
      timeout: opts.timeout,
      verifyTls: opts.verifySsl,
      logLevel: opts.logLevel,
    });
    if (errCreate) {
      return fail(configure, 'saving configuration', errCreate);
    }

    const [errSave, path] = await config.save(globals().config);
    if (errSave) {
      return fail(configure, 'saving configuration', errSave);
    }

    notice('Configuration saved successfully!');
    if (globals().verbose) {
      notice(`  Path: ${path}`);
      notice(`  Endpoint: ${config.endpoint}`);
      notice(`  Token: ${'*'.repeat(8)}`);
      notice(`  Timeout: ${config.timeout}s`);
      notice(`  SSL Verify: ${config.verifyTls}`);
      notice(`  Log Level: ${config.logLevel}`);
    }
  });

  const status = program
    .command('status', { isDefault: true })
    .description('show the active configuration');

  status.action(() => {
    if (!loaded) {
      return status.error('Error loading configuration: configuration was not loaded', { exitCode: 1 });
    }

    const { config } = loaded;
    const rows = [
      ['API Endpoint', config.endpoint || 'Not configured'],
      ['API Token', config.token ? 'Configured' : 'Not configured'],
      ['Timeout', `${config.timeout}s`],
      ['SSL Verification', config.verifyTls ? 'Enabled' : 'Disabled'],
      ['Log Level', config.logLevel],
      ['Verbose Mode', globals().verbose ? 'Yes' : 'No'],
      ['Config File', config.sourcePath ?? 'None'],
    ];

    print(renderTable(['Setting', 'Value'], rows, 'Application Status'));
    if (!config.isConfigured()) {
      notice(`\nWarning: ${NOT_CONFIGURED}`);
    }
  });

  const fetchCommand = program
    .command('fetch')
    .description('fetch a resource')
    .requiredOption('-r, --resource <path>', 'resource to fetch, e.g. users or users/1')
    .option('-p, --params <json>', 'query parameters as a JSON object', parseQueryParams)
    .option('-o, --output <file>', 'write the JSON result to a file')
    .addOption(new Option('-f, --format <format>', 'output format').choices(OUTPUT_FORMATS).default('json'));

  fetchCommand.action(async () => {
    const opts = fetchCommand.opts<FetchCommandOptions>();
    const data = await withClient<JsonValue>(fetchCommand, 'fetching data', (client) =>
      client.getResource(opts.resource, opts.params),
    );

    notice(`Successfully fetched ${opts.resource}`);
    if (opts.output) {
      const output = opts.output;
      const [errWrite] = await safeWrapAsync(() => writeFile(output, `${JSON.stringify(data, null, 2)}\n`));
      if (errWrite) {
        return fail(fetchCommand, 'writing output', errWrite);
      }

      notice(`Output saved to ${output}`);
      return;
    }

    print(formatData(data, opts.format, `Resource: ${opts.resource}`));
  });

  const create = program
    .command('create')
    .description('create a resource')
    .requiredOption('-r, --resource <path>', 'resource collection, e.g. users')
    .option('-d, --data <json>', 'resource data as JSON', parseJsonText)
    .option('-f, --file <path>', 'read resource data from a file');

  create.action(async () => {
    const opts = create.opts<WriteCommandOptions>();
    let data = opts.data;
    if (opts.file) {
      const file = opts.file;
      const [errRead, text] = await safeWrapAsync(() => readFile(file, 'utf8'));
      if (errRead) {
        return fail(create, 'reading data file', errRead);
      }

      data = text;
    }

    if (data === undefined) {
      return create.error('Error creating resource: either --data or --file is required', { exitCode: 1 });
    }

    const body = data;
    const result = await withClient<JsonValue>(create, 'creating resource', (client) =>
      client.createResource(opts.resource, body),
    );

    notice(`Successfully created ${opts.resource}`);
    print(JSON.stringify(result, null, 2));
  });

  const update = program
    .command('update')
    .description('update a resource')
    .requiredOption('-r, --resource <path>', 'resource to update, e.g. users/1')
    .requiredOption('-d, --data <json>', 'update data as JSON', parseJsonText);

  update.action(async () => {
    const opts = update.opts<UpdateCommandOptions>();
    const result = await withClient<JsonValue>(update, 'updating resource', (client) =>
      client.updateResource(opts.resource, opts.data),
    );

    notice(`Successfully updated ${opts.resource}`);
    print(JSON.stringify(result, null, 2));
  });

  const remove = program
    .command('delete')
    .description('delete a resource')
    .requiredOption('-r, --resource <path>', 'resource to delete, e.g. users/1')
    .option('-f, --force', 'skip the confirmation prompt');

  remove.action(async () => {
    const opts = remove.opts<DeleteCommandOptions>();
    requireConfig(remove);

    if (!opts.force && !(await io.confirm(`Are you sure you want to delete ${opts.resource}?`))) {
      notice('Deletion cancelled');
      return;
    }

    const deleted = await withClient<boolean>(remove, 'deleting resource', (client) =>
      client.deleteResource(opts.resource),
    );

    if (deleted) {
      notice(`Successfully deleted ${opts.resource}`);
      return;
    }

    notice(`Resource ${opts.resource} was not found or could not be deleted`);
  });

  const health = program.command('health').description('check API health');

  health.action(async () => {
    const healthy = await withClient<boolean>(
      health,
      'checking API health',
      async (client): SafeWrapAsync<Error, boolean> => [null, await client.healthCheck()],
    );

    print(healthy ? 'API is healthy' : 'API is unhealthy');
  });

  return program;
}
