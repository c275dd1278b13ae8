/**
 * Requirements addressed:
 * - Resolve configuration exactly once, before the service starts accepting
 *   requests, and hand the immutable result to the starter explicitly.
 * - Any resolution failure is fatal: `start` is never called.
 */

import {
  type AmbientRegionLoader,
  loadAmbientRegion,
} from '../configResolver/ambientRegion';
import {
  resolveConfiguration,
  type ResolvedConfiguration,
} from '../configResolver/resolveConfiguration';
import { AwsSecretStore } from '../secretStore/AwsSecretStore';
import { assertLogger, type Logger } from '../secretStore/logger';
import type { SecretStore } from '../secretStore/SecretStore';
import {
  parseResolverOptions,
  type ResolverOptions,
  type ResolverOptionsInput,
} from './resolverOptions';

export type BootstrapOptions<T> = {
  /** Resolver options (validated here). */
  options: ResolverOptionsInput;
  /** Secret store override; defaults to an `AwsSecretStore`. */
  store?: SecretStore;
  /** Ambient region source override; defaults to the AWS SDK's resolution. */
  regionLoader?: AmbientRegionLoader;
  logger?: Logger;
  /** Starts the service with the resolved configuration. */
  start: (config: ResolvedConfiguration) => T | Promise<T>;
};

/**
 * Build the Secrets Manager store.
 *
 * The store's region is `secretsRegion`, else the ambient region, else the
 * configured default, so the client never starts without one.
 */
export const createSecretStore = async (
  { secretsRegion, defaultRegion, requestTimeoutMs, xray }: ResolverOptions,
  regionHint: string | undefined,
  logger: Logger,
): Promise<SecretStore> =>
  await AwsSecretStore.init({
    clientConfig: {
      region: secretsRegion ?? regionHint ?? defaultRegion,
      logger,
    },
    requestTimeoutMs,
    xray,
  });

export const bootstrap = async <T>({
  options,
  store,
  regionLoader,
  logger = console,
  start,
}: BootstrapOptions<T>): Promise<T> => {
  assertLogger(logger);
  const opts = parseResolverOptions(options);

  const regionHint = await loadAmbientRegion({ logger, load: regionLoader });
  const secretStore =
    store ?? (await createSecretStore(opts, regionHint, logger));

  const config = await resolveConfiguration({
    store: secretStore,
    secretName: opts.secretName,
    regionHint,
    defaultRegion: opts.defaultRegion,
    logger,
  });
  logger.info(`Resolved configuration from secret '${opts.secretName}'.`);

  return await start(config);
};
