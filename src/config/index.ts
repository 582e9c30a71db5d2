/**
 * Configuration Module - Public API
 */

export { ConfigManager, type ConfigManagerOptions } from './manager.js';

export {
  deepMerge,
  mergeLayers,
  parseEnvLayer,
  parseScalar,
  toCamelCase,
  isConfigTree,
  type ConfigTree,
  type ConfigValue,
} from './merge.js';

export {
  validateConfig,
  loadAndValidate,
  orderLayers,
  environmentNameLayer,
  deepFreeze,
  ENVIRONMENT_VARIABLE,
  type ConfigSources,
} from './validate.js';

export * from './schemas/index.js';

export {
  SecretResolver,
  FileSecretProvider,
  EnvProvider,
  isSecretProvider,
  isSecretDescriptor,
  type ISecretProvider,
  type SecretResolverConfig,
  type SecretDescriptor,
} from './secrets/index.js';
