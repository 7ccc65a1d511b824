import { z } from 'zod';
import { safeWrap } from '../utils/wrap.js';

function isHttpUrl(value: string): boolean {
  const [err, url] = safeWrap(() => new URL(value));
  if (err) {
    return false;
  }

  return url.protocol === 'http:' || url.protocol === 'https:';
}

/**
 * Serializable part of the client props, validated on {@link ApiClient.create}.
 */
export const clientPropsSchema = z.object({
  baseUrl: z.string().refine(isHttpUrl, 'Base URL must be an absolute http(s) URL'),
  token: z.string().min(1, 'Token must not be empty'),
  timeout: z.number().positive('Timeout must be a positive number of seconds').default(30),
  verifyTls: z.boolean().default(true),
  userAgent: z.string().min(1, 'User agent must not be empty').optional(),
});

/** Input accepted by {@link clientPropsSchema}. */
export type ClientPropsInput = z.input<typeof clientPropsSchema>;

/** Props after defaults have been applied. */
export type ClientPropsParsed = z.output<typeof clientPropsSchema>;
