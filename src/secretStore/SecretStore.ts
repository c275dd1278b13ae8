import { SecretNotFoundError } from '../configResolver/errors';

/**
 * Narrow read interface the resolver depends on.
 *
 * Implementations reject with `SecretNotFoundError` when the name is unknown
 * and `SecretStoreUnavailableError` on transport or auth failure.
 */
export interface SecretStore {
  /** Fetch the current serialized payload of the named secret. */
  getSecretString(secretName: string): Promise<string>;
}

/**
 * In-process secret store backed by a fixed map of names to payloads.
 *
 * Serves local runs where keys are supplied directly rather than fetched.
 */
export class StaticSecretStore implements SecretStore {
  readonly #secrets: ReadonlyMap<string, string>;

  constructor(secrets: Record<string, string>) {
    this.#secrets = new Map(Object.entries(secrets));
  }

  async getSecretString(secretName: string): Promise<string> {
    const value = this.#secrets.get(secretName);
    if (typeof value === 'undefined') throw new SecretNotFoundError(secretName);
    return value;
  }
}
