/**
 * This is the main entry point for the library.
 *
 * @packageDocumentation
 */

/**
 * Requirements addressed:
 * - Export `resolveConfiguration` and the immutable `ResolvedConfiguration`.
 * - Export the resolution error taxonomy.
 * - Export the secret store read interface and its implementations.
 * - Export the startup `bootstrap` and the consumer client-config mapping.
 */

export { bootstrap, type BootstrapOptions } from './bootstrap/bootstrap';
export {
  loadEnv,
  readResolverOptions,
  type ResolverOptions,
  type ResolverOptionsInput,
  resolverOptionsSchema,
} from './bootstrap/resolverOptions';
export {
  type AmbientRegionLoader,
  loadAmbientRegion,
} from './configResolver/ambientRegion';
export {
  type AwsClientConfig,
  redactConfiguration,
  toAwsClientConfig,
} from './configResolver/clientConfig';
export {
  ConfigResolutionError,
  type CredentialField,
  describeResolutionFailure,
  isConfigResolutionError,
  MalformedSecretError,
  MissingCredentialFieldError,
  type ResolutionStage,
  SecretNotFoundError,
  SecretStoreUnavailableError,
} from './configResolver/errors';
export {
  DEFAULT_REGION,
  fromAmbientHint,
  fromDefault,
  fromSecretPayload,
  type RegionProvider,
  type RegionSource,
  resolveRegion,
} from './configResolver/regionProviders';
export {
  resolveConfiguration,
  type ResolveConfigurationOptions,
  type ResolvedConfiguration,
} from './configResolver/resolveConfiguration';
export {
  AwsSecretStore,
  type AwsSecretStoreInitOptions,
} from './secretStore/AwsSecretStore';
export type { Logger } from './secretStore/logger';
export type { SecretPayload } from './secretStore/secretPayload';
export { type SecretStore, StaticSecretStore } from './secretStore/SecretStore';
