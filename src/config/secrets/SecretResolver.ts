/**
 * Secret Resolver
 *
 * Walks a merged configuration tree and replaces every `{"$secret": "NAME"}`
 * descriptor with the value from the first provider that has it.
 *
 * Usage:
 * ```typescript
 * const resolver = new SecretResolver();
 * resolver.addProvider(new FileSecretProvider('/run/secrets'));
 * resolver.addProvider(new EnvProvider());
 * await resolver.resolveSecrets(tree); // in place
 * ```
 *
 * An unresolvable secret is a ConfigError on the descriptor's path: the
 * service must not start with a hole where a secret belongs.
 */

import { AuditService } from '../../core/audit-service.js';
import { ConfigError } from '../../utils/errors.js';
import { isConfigTree, type ConfigTree, type ConfigValue } from '../merge.js';
import { isSecretProvider, type ISecretProvider } from './ISecretProvider.js';

export interface SecretResolverConfig {
  /** Records which provider supplied each secret (never the value) */
  auditService?: AuditService;
}

export interface SecretDescriptor {
  $secret: string;
}

export function isSecretDescriptor(value: unknown): value is SecretDescriptor {
  return (
    isConfigTree(value) &&
    Object.keys(value).length === 1 &&
    typeof value.$secret === 'string' &&
    value.$secret.length > 0
  );
}

const AUDIT_SOURCE = 'secret:resolution';

export class SecretResolver {
  private providers: ISecretProvider[] = [];
  private readonly auditService?: AuditService;

  constructor(config?: SecretResolverConfig) {
    this.auditService = config?.auditService;
  }

  /**
   * Providers are queried in the order they were added.
   */
  public addProvider(provider: ISecretProvider): void {
    if (!isSecretProvider(provider)) {
      throw new Error('Provider must implement ISecretProvider interface');
    }
    this.providers.push(provider);
  }

  /**
   * Resolve every descriptor in `tree`, modifying it in place.
   *
   * @throws {ConfigError} when no provider can resolve a descriptor
   */
  public async resolveSecrets(tree: ConfigTree): Promise<void> {
    await this.resolveNode(tree, []);
  }

  public getProviders(): ISecretProvider[] {
    return [...this.providers];
  }

  private async resolveNode(node: ConfigValue, path: string[]): Promise<void> {
    if (Array.isArray(node)) {
      for (let i = 0; i < node.length; i++) {
        const item = node[i];
        const itemPath = [...path, String(i)];
        if (isSecretDescriptor(item)) {
          node[i] = await this.resolveDescriptor(item, itemPath);
        } else {
          await this.resolveNode(item, itemPath);
        }
      }
      return;
    }

    if (!isConfigTree(node)) {
      return;
    }

    for (const key of Object.keys(node)) {
      const child = node[key];
      const childPath = [...path, key];
      if (isSecretDescriptor(child)) {
        node[key] = await this.resolveDescriptor(child, childPath);
      } else {
        await this.resolveNode(child, childPath);
      }
    }
  }

  private async resolveDescriptor(descriptor: SecretDescriptor, path: string[]): Promise<string> {
    const field = path.join('.');
    const logicalName = descriptor.$secret;

    for (const provider of this.providers) {
      let value: string | undefined;
      try {
        value = await provider.resolve(logicalName);
      } catch (error) {
        console.warn(
          `[SecretResolver] Provider ${provider.constructor.name} failed to resolve "${logicalName}": ${error instanceof Error ? error.message : 'Unknown error'}`
        );
        continue;
      }

      if (value !== undefined) {
        await this.audit(logicalName, field, true, provider.constructor.name);
        return value;
      }
    }

    await this.audit(logicalName, field, false, 'none');
    throw new ConfigError(field, `secret "${logicalName}" could not be resolved by any provider`);
  }

  private async audit(
    secretName: string,
    configPath: string,
    success: boolean,
    provider: string
  ): Promise<void> {
    if (!this.auditService) {
      return;
    }
    await this.auditService.log({
      source: AUDIT_SOURCE,
      timestamp: new Date(),
      userId: 'system',
      action: `resolve:${secretName}`,
      success,
      ...(success ? {} : { reason: 'No provider could resolve this secret' }),
      metadata: { secretName, provider, configPath },
    });
  }
}
