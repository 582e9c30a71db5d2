/**
 * HTTP Server Section Schema
 */

import { isIP } from 'node:net';
import { z } from 'zod';
import { positiveInt, text } from './common.js';

const HOSTNAME_PATTERN =
  /^(?=.{1,253}$)[a-zA-Z0-9]([a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?(\.[a-zA-Z0-9]([a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)*$/;

export function isValidHost(host: string): boolean {
  return isIP(host) !== 0 || HOSTNAME_PATTERN.test(host);
}

export const ServerConfigSchema = z.object({
  host: text(
    z
      .string()
      .min(1, 'must not be empty')
      .refine(isValidHost, 'must be a hostname or IP address')
  ).describe('Bind address'),
  port: z
    .number()
    .int()
    .min(1, 'must be between 1 and 65535')
    .max(65535, 'must be between 1 and 65535')
    .describe('Listen port'),
  requestTimeoutSecs: positiveInt().describe('Per-request deadline in seconds'),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;
