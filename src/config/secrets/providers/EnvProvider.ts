/**
 * Environment Variable Secret Provider
 *
 * Fallback after FileSecretProvider. Reads `process.env[NAME]`, which in
 * development is typically populated from `.env` by dotenv at startup.
 */

import type { ISecretProvider } from '../ISecretProvider.js';

export class EnvProvider implements ISecretProvider {
  constructor(private readonly env: Record<string, string | undefined> = process.env) {}

  public async resolve(logicalName: string): Promise<string | undefined> {
    const value = this.env[logicalName];
    if (value === undefined || value.trim() === '') {
      return undefined;
    }
    return value.trim();
  }
}
