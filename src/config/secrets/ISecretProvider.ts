/**
 * Secret Provider Interface
 *
 * A provider resolves a logical secret name (e.g. "AUTH_SIGNING_SECRET") from
 * one source. Providers are chained by SecretResolver; the first one that
 * returns a value wins.
 */

export interface ISecretProvider {
  /**
   * Resolve `logicalName` from this provider's source.
   *
   * @returns The secret, or undefined when this source does not have it
   * @throws Only for unexpected failures; "not found" is undefined
   */
  resolve(logicalName: string): Promise<string | undefined>;
}

export function isSecretProvider(value: unknown): value is ISecretProvider {
  return (
    typeof value === 'object' &&
    value !== null &&
    'resolve' in value &&
    typeof value.resolve === 'function'
  );
}
