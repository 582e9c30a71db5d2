/**
 * Application Section Schema
 */

import { z } from 'zod';
import { text } from './common.js';

export const ENVIRONMENTS = ['development', 'test', 'staging', 'production'] as const;

export const RuntimeEnvironmentSchema = z
  .enum(ENVIRONMENTS)
  .describe('Deployment environment; selects <environment>.json and cookie policy');

export type RuntimeEnvironment = z.infer<typeof RuntimeEnvironmentSchema>;

export const AppConfigSchema = z.object({
  name: text(z.string().trim().min(1, 'must not be empty')).describe('Service name'),
  environment: RuntimeEnvironmentSchema,
  version: text(z.string().min(1)).optional().describe('Build/version label'),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
