/**
 * Requirements addressed:
 * - Resolve configuration once, at startup: fetch the named secret, parse it
 *   as a string map, extract both credential fields and the region.
 * - Region falls back to the ambient hint, then to the hardcoded default.
 * - All-or-nothing: any failure rejects and no partial value escapes.
 * - The resolved value is immutable and never logged.
 */

import { toSecretStoreError } from '../secretStore/awsError';
import type { Logger } from '../secretStore/logger';
import {
  parseSecretPayload,
  type SecretPayload,
} from '../secretStore/secretPayload';
import type { SecretStore } from '../secretStore/SecretStore';
import {
  type CredentialField,
  isConfigResolutionError,
  MissingCredentialFieldError,
} from './errors';
import {
  DEFAULT_REGION,
  fromAmbientHint,
  fromDefault,
  fromSecretPayload,
  resolveRegion,
} from './regionProviders';

/** Result of one successful resolution. */
export type ResolvedConfiguration = Readonly<{
  accessKeyId: string;
  secretAccessKey: string;
  region: string;
}>;

export type ResolveConfigurationOptions = {
  /** Secret store read client. */
  store: SecretStore;
  /** Name of the secret holding the credentials. */
  secretName: string;
  /** Ambient region hint; absent when the environment configures none. */
  regionHint?: string;
  /** Last-resort region. */
  defaultRegion?: string;
  logger?: Logger;
};

const requireCredential = (
  secretName: string,
  payload: SecretPayload,
  field: CredentialField,
): string => {
  const value = payload[field];
  if (!value) throw new MissingCredentialFieldError(secretName, field);
  return value;
};

const fetchSecretString = async (
  store: SecretStore,
  secretName: string,
): Promise<string> => {
  try {
    return await store.getSecretString(secretName);
  } catch (err) {
    throw isConfigResolutionError(err)
      ? err
      : toSecretStoreError(secretName, err);
  }
};

export const resolveConfiguration = async ({
  store,
  secretName,
  regionHint,
  defaultRegion = DEFAULT_REGION,
  logger = console,
}: ResolveConfigurationOptions): Promise<ResolvedConfiguration> => {
  if (!secretName) throw new Error('secretName is required');
  if (!defaultRegion) throw new Error('defaultRegion is required');

  logger.debug('Resolving configuration...', { secretName });
  const payload = parseSecretPayload(
    secretName,
    await fetchSecretString(store, secretName),
  );

  const accessKeyId = requireCredential(
    secretName,
    payload,
    'AWS_ACCESS_KEY_ID',
  );
  const secretAccessKey = requireCredential(
    secretName,
    payload,
    'AWS_SECRET_ACCESS_KEY',
  );

  const resolved = resolveRegion([
    fromSecretPayload(payload),
    fromAmbientHint(regionHint),
    fromDefault(defaultRegion),
  ]);
  if (!resolved) throw new Error('No region provider yielded a region.');

  logger.debug('Configuration resolved.', {
    secretName,
    regionSource: resolved.source,
  });

  return Object.freeze({
    accessKeyId,
    secretAccessKey,
    region: resolved.region,
  });
};
