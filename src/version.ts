/** Application name, used for the CLI binary, config directory and environment prefix. */
export const APP_NAME = 'restline';

/** Package version. */
export const VERSION = '0.1.0';

/** Default `User-Agent` header value. */
export const USER_AGENT = `${APP_NAME}/${VERSION}`;
