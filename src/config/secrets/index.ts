/**
 * Secret resolution for configuration trees
 */

export type { ISecretProvider } from './ISecretProvider.js';
export { isSecretProvider } from './ISecretProvider.js';
export {
  SecretResolver,
  isSecretDescriptor,
  type SecretResolverConfig,
  type SecretDescriptor,
} from './SecretResolver.js';

export { FileSecretProvider } from './providers/FileSecretProvider.js';
export { EnvProvider } from './providers/EnvProvider.js';
