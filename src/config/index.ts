/**
 * Configuration entrypoint.
 * @module
 */
export { type ClientParams, Config } from './config.js';
export { defaultConfigPath, type Env, ENV_VARS, isTruthy } from './env.js';
export {
  type ConfigFields,
  type ConfigFileData,
  type ConfigInput,
  configFieldsSchema,
  configFileSchema,
  MAX_TIMEOUT,
  MIN_TIMEOUT,
} from './schema.js';
