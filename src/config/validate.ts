/**
 * Final typing pass over a merged configuration tree.
 */

import { ConfigError, type ConfigIssue } from '../utils/errors.js';
import { mergeLayers, parseEnvLayer, type ConfigTree } from './merge.js';
import { ConfigSnapshotSchema, type ConfigSnapshot } from './schemas/index.js';

export const ENVIRONMENT_VARIABLE = 'APP__ENV';

export interface ConfigSources {
  /** base.json */
  base: ConfigTree;

  /** <environment>.json */
  environment: ConfigTree;

  /** local.json, when present */
  local?: ConfigTree;

  /** Variables to read `APP__*` overrides from */
  env: Record<string, string | undefined>;
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Validate a merged tree into a frozen snapshot.
 *
 * @throws {ConfigError} naming the dotted path of the first offending field
 */
export function validateConfig(tree: ConfigTree): ConfigSnapshot {
  const result = ConfigSnapshotSchema.safeParse(tree);

  if (!result.success) {
    const issues: ConfigIssue[] = result.error.issues.map((issue) => ({
      field: issue.path.length > 0 ? issue.path.join('.') : '(root)',
      message: issue.message,
    }));
    const [first] = issues;
    throw new ConfigError(first.field, first.message, issues);
  }

  return deepFreeze(result.data);
}

/**
 * `APP__ENV` selects the environment file and also fills `app.environment`,
 * beneath every file so a file may still state it explicitly.
 */
export function environmentNameLayer(env: Record<string, string | undefined>): ConfigTree {
  const name = env[ENVIRONMENT_VARIABLE];
  return name ? { app: { environment: name } } : {};
}

/**
 * Ordered layers: APP__ENV < base < environment < local < environment variables.
 */
export function orderLayers(sources: ConfigSources): ConfigTree[] {
  return [
    environmentNameLayer(sources.env),
    sources.base,
    sources.environment,
    ...(sources.local ? [sources.local] : []),
    parseEnvLayer(sources.env),
  ];
}

/**
 * Merge and validate already-parsed layers. No I/O and no secret resolution;
 * see ConfigManager for the file-backed path.
 */
export function loadAndValidate(sources: ConfigSources): ConfigSnapshot {
  return validateConfig(mergeLayers(orderLayers(sources)));
}
