/**
 * File-Based Secret Provider
 *
 * Resolves `NAME` from `<secretDir>/NAME` (Docker/Kubernetes secret mounts).
 * Preferred over environment variables in production.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { ISecretProvider } from '../ISecretProvider.js';

export class FileSecretProvider implements ISecretProvider {
  private readonly secretDir: string;

  constructor(secretDir: string = '/run/secrets') {
    this.secretDir = secretDir;
  }

  /**
   * Names that would resolve outside `secretDir` are treated as not found.
   */
  public async resolve(logicalName: string): Promise<string | undefined> {
    if (logicalName.includes('..') || path.isAbsolute(logicalName)) {
      return undefined;
    }

    const root = path.resolve(this.secretDir);
    const filePath = path.resolve(root, logicalName);
    if (!filePath.startsWith(root + path.sep)) {
      return undefined;
    }

    try {
      const contents = await fs.readFile(filePath, 'utf-8');
      // echo/heredoc leave a trailing newline
      return contents.trim();
    } catch (error) {
      const code = errorCode(error);
      if (code === 'ENOENT' || code === 'EACCES' || code === 'ENOTDIR') {
        return undefined;
      }
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[FileSecretProvider] Unexpected error reading ${filePath}: ${message}`);
      return undefined;
    }
  }

  public getSecretDir(): string {
    return this.secretDir;
  }
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}
