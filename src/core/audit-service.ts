/**
 * Audit Service - Security Event Logging with Null Object Pattern
 *
 * Records why a login, refresh, logout or guard check failed (expired, forged,
 * revoked, superseded, ...). These reasons stay inside the process: the HTTP
 * layer only ever reports the coarse error category.
 *
 * Works without configuration: a disabled service accepts entries and drops them.
 */

import type { AuditEntry } from './types.js';

// ============================================================================
// Interfaces
// ============================================================================

/**
 * Configuration for the Audit Service
 */
export interface AuditServiceConfig {
  /** Whether audit logging is enabled (default: false) */
  enabled?: boolean;

  /** Whether to record successes as well as failures (default: true) */
  logAllAttempts?: boolean;

  /** Custom storage implementation (default: InMemoryAuditStorage) */
  storage?: AuditStorage;

  /** Receives entries the default in-memory storage evicts */
  onOverflow?: (evicted: AuditEntry[]) => void;
}

/**
 * Storage interface for audit entries
 *
 * Write-only: querying belongs to an indexed backend.
 */
export interface AuditStorage {
  log(entry: AuditEntry): Promise<void> | void;
}

// ============================================================================
// Storage Implementations
// ============================================================================

function describeEntry(entry: AuditEntry): Record<string, unknown> {
  return {
    at: entry.timestamp.toISOString(),
    source: entry.source,
    action: entry.action,
    success: entry.success,
    ...(entry.userId !== undefined && { userId: entry.userId }),
    ...(entry.reason !== undefined && { reason: entry.reason }),
    ...(entry.metadata !== undefined && { metadata: entry.metadata }),
  };
}

/**
 * Writes each entry to stdout. The service's sink when nothing else is
 * configured; log shipping picks it up from there.
 */
export class ConsoleAuditStorage implements AuditStorage {
  log(entry: AuditEntry): void {
    if (entry.success) {
      console.info('[Audit]', describeEntry(entry));
    } else {
      console.warn('[Audit]', describeEntry(entry));
    }
  }
}

/**
 * Bounded ring of recent entries, used by tests and local tooling.
 *
 * When full, the oldest entry is evicted: handed to `onOverflow` if one is set,
 * otherwise written to the console so it is not lost silently.
 */
export class InMemoryAuditStorage implements AuditStorage {
  private entries: AuditEntry[] = [];

  constructor(
    private readonly capacity: number = 10000,
    private readonly onOverflow?: (evicted: AuditEntry[]) => void
  ) {}

  log(entry: AuditEntry): void {
    this.entries.push(entry);
    if (this.entries.length <= this.capacity) {
      return;
    }

    const evicted = this.entries.splice(0, this.entries.length - this.capacity);
    if (this.onOverflow) {
      this.onOverflow(evicted);
    } else {
      for (const dropped of evicted) {
        console.warn('[Audit] Evicted from memory:', describeEntry(dropped));
      }
    }
  }

  /** Snapshot of the retained entries, oldest first */
  getEntries(): AuditEntry[] {
    return [...this.entries];
  }

  clear(): void {
    this.entries = [];
  }
}

// ============================================================================
// Audit Service (Null Object Pattern)
// ============================================================================

/**
 * Centralized security audit logging
 *
 * Usage:
 * ```typescript
 * const audit = new AuditService({ enabled: true });
 * await audit.log({
 *   timestamp: new Date(),
 *   source: 'auth:lifecycle',
 *   userId: '42',
 *   action: 'refresh',
 *   success: false,
 *   reason: 'superseded',
 * });
 * ```
 */
export class AuditService {
  private enabled: boolean;
  private logAllAttempts: boolean;
  private storage: AuditStorage;

  constructor(config?: AuditServiceConfig) {
    this.enabled = config?.enabled ?? false;
    this.logAllAttempts = config?.logAllAttempts ?? true;
    this.storage = config?.storage ?? new InMemoryAuditStorage(10000, config?.onOverflow);
  }

  /**
   * Log an audit entry
   *
   * @throws Error if the entry has no source
   */
  async log(entry: AuditEntry): Promise<void> {
    if (!this.enabled) {
      return;
    }

    if (!entry.source) {
      throw new Error(
        'AuditEntry missing required field: source. ' +
          'All audit entries must include a source field.'
      );
    }

    if (entry.success && !this.logAllAttempts) {
      return;
    }

    await this.storage.log(entry);
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Get internal storage (for testing only)
   * @internal
   */
  _getStorage(): AuditStorage {
    return this.storage;
  }
}

