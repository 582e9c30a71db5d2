/**
 * Configuration Manager
 *
 * Reads the layered configuration once at boot:
 *
 *   <configDir>/base.json            required
 *   <configDir>/<APP__ENV>.json      required
 *   <configDir>/local.json           optional, untracked developer overrides
 *   APP__SECTION__FIELD variables    highest precedence
 *
 * then resolves `{"$secret": "NAME"}` descriptors and validates the result into
 * a frozen ConfigSnapshot. There is no reload: components receive the snapshot
 * explicitly and keep it for the life of the process.
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import { AuditService } from '../core/audit-service.js';
import { ConfigError } from '../utils/errors.js';
import { isConfigTree, mergeLayers, type ConfigTree } from './merge.js';
import { ENVIRONMENTS, RuntimeEnvironmentSchema, type ConfigSnapshot } from './schemas/index.js';
import { EnvProvider, FileSecretProvider, SecretResolver } from './secrets/index.js';
import { ENVIRONMENT_VARIABLE, orderLayers, validateConfig } from './validate.js';

export interface ConfigManagerOptions {
  /** Directory holding base.json and the environment files (default: ./config) */
  configDir?: string;

  /** Variable source (default: process.env) */
  env?: Record<string, string | undefined>;

  /** Directory for file-based secrets (default: /run/secrets) */
  secretsDir?: string;

  auditService?: AuditService;
}

const MIN_PRODUCTION_SECRET_LENGTH = 32;

export class ConfigManager {
  private config: ConfigSnapshot | null = null;
  private readonly configDir: string;
  private readonly env: Record<string, string | undefined>;
  private readonly secretResolver: SecretResolver;

  constructor(options: ConfigManagerOptions = {}) {
    this.env = options.env ?? process.env;
    this.configDir = options.configDir ?? this.env.CONFIG_DIR ?? './config';

    this.secretResolver = new SecretResolver({ auditService: options.auditService });
    // Mounted files first, environment as the fallback
    this.secretResolver.addProvider(new FileSecretProvider(options.secretsDir ?? '/run/secrets'));
    this.secretResolver.addProvider(new EnvProvider(this.env));
  }

  /**
   * Load, resolve and validate. Subsequent calls return the cached snapshot.
   *
   * @throws {ConfigError} on a missing APP__ENV, an unreadable or malformed
   *         file, an unresolvable secret, or a schema violation
   */
  async loadConfig(): Promise<ConfigSnapshot> {
    if (this.config) {
      return this.config;
    }

    const selected = RuntimeEnvironmentSchema.safeParse(this.env[ENVIRONMENT_VARIABLE]);
    if (!selected.success) {
      throw new ConfigError(ENVIRONMENT_VARIABLE, `must be one of: ${ENVIRONMENTS.join(', ')}`);
    }

    const environment = selected.data;
    const base = await this.readRequiredLayer('base.json');
    const environmentLayer = await this.readRequiredLayer(`${environment}.json`);
    const local = await this.readLayer('local.json');

    const merged = mergeLayers(
      orderLayers({
        base,
        environment: environmentLayer,
        local: local ?? undefined,
        env: this.env,
      })
    );

    await this.secretResolver.resolveSecrets(merged);

    const snapshot = validateConfig(merged);
    this.warnOnWeakSettings(snapshot);

    console.log('[ConfigManager] Configuration loaded:', {
      app: snapshot.app.name,
      environment: snapshot.app.environment,
      localOverrides: local !== null,
    });

    this.config = snapshot;
    return snapshot;
  }

  getConfig(): ConfigSnapshot {
    if (!this.config) {
      throw new Error('Configuration not loaded. Call loadConfig() first.');
    }
    return this.config;
  }

  private async readRequiredLayer(fileName: string): Promise<ConfigTree> {
    const layer = await this.readLayer(fileName);
    if (!layer) {
      throw new ConfigError(fileName, `not found in ${this.configDir}`);
    }
    return layer;
  }

  /**
   * @returns null when the file does not exist
   */
  private async readLayer(fileName: string): Promise<ConfigTree | null> {
    const filePath = join(this.configDir, fileName);

    let contents: string;
    try {
      contents = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(fileName, `could not be read from ${filePath}: ${message}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(contents);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(fileName, `is not valid JSON: ${message}`);
    }

    if (!isConfigTree(parsed)) {
      throw new ConfigError(fileName, 'must contain a JSON object');
    }
    return parsed;
  }

  private warnOnWeakSettings(config: ConfigSnapshot): void {
    if (config.app.environment !== 'production') {
      return;
    }
    if (config.auth.signingSecret.length < MIN_PRODUCTION_SECRET_LENGTH) {
      console.warn(
        `[ConfigManager] auth.signingSecret is shorter than ${MIN_PRODUCTION_SECRET_LENGTH} characters`
      );
    }
    if (!config.auth.audit.enabled) {
      console.warn('[ConfigManager] Audit logging should be enabled in production environments');
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
