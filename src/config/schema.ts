import { z } from 'zod';
import { isLogLevel, LOG_LEVELS } from '../utils/logger.js';

/** Smallest accepted timeout, in seconds. */
export const MIN_TIMEOUT = 1;
/** Largest accepted timeout, in seconds. */
export const MAX_TIMEOUT = 300;

const TIMEOUT_RANGE = `Timeout must be between ${MIN_TIMEOUT} and ${MAX_TIMEOUT} seconds`;
const TIMEOUT_TYPE = 'Timeout must be an integer number of seconds';

/**
 * Configuration fields. Every mutation of a `Config` runs through this schema,
 * so the range and level invariants hold for every instance.
 */
export const configFieldsSchema = z
  .object({
    endpoint: z.string({ invalid_type_error: 'API endpoint must be a string' }).optional(),
    token: z.string({ invalid_type_error: 'API token must be a string' }).optional(),
    timeout: z
      .number({ invalid_type_error: TIMEOUT_TYPE })
      .int(TIMEOUT_TYPE)
      .min(MIN_TIMEOUT, TIMEOUT_RANGE)
      .max(MAX_TIMEOUT, TIMEOUT_RANGE)
      .default(30),
    verifyTls: z.boolean({ invalid_type_error: 'verify_ssl must be a boolean' }).default(true),
    logLevel: z
      .string({ invalid_type_error: 'Log level must be a string' })
      .transform((level) => level.toUpperCase())
      .refine(isLogLevel, `Log level must be one of: ${LOG_LEVELS.join(', ')}`)
      .default('INFO'),
  })
  .strict();

/** Input accepted by {@link configFieldsSchema}. */
export type ConfigInput = z.input<typeof configFieldsSchema>;

/** Validated configuration fields. */
export type ConfigFields = z.output<typeof configFieldsSchema>;

/**
 * Shape of the TOML file on disk. Unknown keys are rejected.
 */
export const configFileSchema = z
  .object({
    api_endpoint: z.string().optional(),
    api_token: z.string().optional(),
    timeout: z.number().optional(),
    verify_ssl: z.boolean().optional(),
    log_level: z.string().optional(),
  })
  .strict();

/** Parsed content of a configuration file. */
export type ConfigFileData = z.output<typeof configFileSchema>;
