import { homedir } from 'node:os';
import { join } from 'node:path';
import { APP_NAME } from '../version.js';

const PREFIX = `${APP_NAME.toUpperCase()}_`;

/** Environment variables read by the configuration and the CLI. */
export const ENV_VARS = {
  endpoint: `${PREFIX}API_ENDPOINT`,
  token: `${PREFIX}API_TOKEN`,
  timeout: `${PREFIX}TIMEOUT`,
  noVerifySsl: `${PREFIX}NO_VERIFY_SSL`,
  logLevel: `${PREFIX}LOG_LEVEL`,
  config: `${PREFIX}CONFIG`,
  verbose: `${PREFIX}VERBOSE`,
} as const;

/** Environment map, e.g. `process.env`. */
export type Env = Record<string, string | undefined>;

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

/** `1`, `true`, `yes` and `on`, case-insensitive. */
export function isTruthy(value: string | undefined): boolean {
  return value !== undefined && TRUTHY.has(value.trim().toLowerCase());
}

/**
 * Default configuration file location:
 * `$XDG_CONFIG_HOME/restline/config.toml`, else `~/.config/restline/config.toml`.
 */
export function defaultConfigPath(env: Env = process.env): string {
  const xdgConfigHome = env.XDG_CONFIG_HOME;
  if (xdgConfigHome) {
    return join(xdgConfigHome, APP_NAME, 'config.toml');
  }

  return join(homedir(), '.config', APP_NAME, 'config.toml');
}
