/**
 * Authentication Section Schema
 *
 * Token lifetimes, signing material, cookie naming and audit switches.
 */

import { z } from 'zod';
import { positiveInt, text } from './common.js';

export const CookieConfigSchema = z.object({
  accessName: text(z.string().min(1)).default('access_token'),
  refreshName: text(z.string().min(1)).default('refresh_token'),
  sameSite: z.enum(['strict', 'lax', 'none']).default('lax'),
  path: text(z.string().startsWith('/', 'must start with "/"')).default('/'),
  domain: text(z.string().min(1)).optional().describe('Cookie domain (production only)'),
});

export const AuditConfigSchema = z.object({
  enabled: z.boolean().default(true).describe('Record audit entries'),
  logAllAttempts: z
    .boolean()
    .default(false)
    .describe('Also record successful operations, not only failures'),
});

export const AuthConfigSchema = z
  .object({
    signingSecret: text(z.string().min(1, 'must not be empty')).describe(
      'HMAC secret for access and refresh tokens'
    ),
    accessTokenExpirySecs: positiveInt().describe('Access token lifetime'),
    refreshTokenExpirySecs: positiveInt().describe('Refresh token lifetime'),
    issuer: text(z.string().min(1)).default('chat-auth-service').describe('Token `iss` claim'),
    cookie: CookieConfigSchema.default({}),
    audit: AuditConfigSchema.default({}),
  })
  .superRefine((auth, ctx) => {
    if (auth.accessTokenExpirySecs >= auth.refreshTokenExpirySecs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['accessTokenExpirySecs'],
        message: 'must be less than auth.refreshTokenExpirySecs',
      });
    }
  });

export type CookieConfig = z.infer<typeof CookieConfigSchema>;
export type AuditConfig = z.infer<typeof AuditConfigSchema>;
export type AuthConfig = z.infer<typeof AuthConfigSchema>;
