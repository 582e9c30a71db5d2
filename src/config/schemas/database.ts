/**
 * Database Section Schema
 */

import { z } from 'zod';
import { positiveInt, text } from './common.js';

function isPostgresUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'postgres:' || url.protocol === 'postgresql:';
  } catch {
    return false;
  }
}

export const DatabaseConfigSchema = z
  .object({
    url: text(
      z
        .string()
        .min(1, 'must not be empty')
        .refine(isPostgresUrl, 'must be a postgres:// connection URL')
    ).describe('Connection URL'),
    minConnections: positiveInt().describe('Pool lower bound'),
    maxConnections: positiveInt().describe('Pool upper bound'),
    connectTimeoutSecs: positiveInt()
      .default(5)
      .describe('Timeout for acquiring a pooled connection'),
  })
  .superRefine((db, ctx) => {
    if (db.minConnections > db.maxConnections) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['minConnections'],
        message: 'must be less than or equal to database.maxConnections',
      });
    }
  });

export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;
