// Main export file - re-exports the public API

// Core services
export * from './core/index.js';

// Configuration
export * from './config/index.js';

// Credential storage
export { PostgresCredentialStore, type PostgresStoreConfig } from './store/postgres-credential-store.js';
export {
  normalizeEmail,
  type CredentialStore,
  type NewCredential,
  type StoredTokenPair,
} from './store/credential-store.js';

// HTTP
export * from './http/index.js';

// Utilities
export * from './utils/errors.js';
export { withTimeout } from './utils/timeout.js';
