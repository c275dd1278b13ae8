/**
 * Requirements addressed:
 * - `SecretStore` backed by AWS Secrets Manager `GetSecretValue`, built via
 *   `AwsSecretStore.init(...)`; reads only.
 * - One attempt, bounded by connection and request timeouts; a hung store
 *   surfaces as `SecretStoreUnavailableError`.
 * - Optional X-Ray tracing of the client (`auto` by default).
 * - The store's logger must implement debug/info/warn/error.
 */

import {
  GetSecretValueCommand,
  type GetSecretValueCommandInput,
  SecretsManagerClient,
  type SecretsManagerClientConfig,
} from '@aws-sdk/client-secrets-manager';
import { NodeHttpHandler } from '@smithy/node-http-handler';

import { MalformedSecretError } from '../configResolver/errors';
import { toSecretStoreError } from './awsError';
import { assertLogger, type Logger } from './logger';
import type { SecretStore } from './SecretStore';
import {
  resolveXrayState,
  traceClient,
  type XrayMode,
  type XrayState,
} from './xray';

/** Default TCP connection timeout for the Secrets Manager client. */
export const DEFAULT_CONNECTION_TIMEOUT_MS = 3_000;

/** Default per-request timeout for the Secrets Manager client. */
export const DEFAULT_REQUEST_TIMEOUT_MS = 5_000;

/** Options for {@link AwsSecretStore.init}. */
export type AwsSecretStoreInitOptions = {
  /**
   * AWS SDK v3 Secrets Manager client config (region, credentials, endpoint,
   * etc.). These credentials address the store itself, not the resolved
   * storage credentials. If a logger is provided, it must implement
   * debug/info/warn/error.
   */
  clientConfig?: SecretsManagerClientConfig;
  /** TCP connection timeout. Ignored when `clientConfig.requestHandler` is set. */
  connectionTimeoutMs?: number;
  /** Per-request timeout. Ignored when `clientConfig.requestHandler` is set. */
  requestTimeoutMs?: number;
  /** Secret version stage to read. Defaults to the current version. */
  versionStage?: string;
  /** Specific secret version to read; takes precedence over `versionStage`. */
  versionId?: string;
  /**
   * X-Ray tracing mode, `auto` by default. See {@link resolveXrayState}; `on`
   * without `AWS_XRAY_DAEMON_ADDRESS` rejects `init`.
   */
  xray?: XrayMode;
};

/**
 * AWS Secrets Manager read client for configuration secrets.
 *
 * Returns the raw `SecretString`; decoding is left to the resolver.
 */
export class AwsSecretStore implements SecretStore {
  /** Secrets Manager client, wrapped for tracing when enabled. */
  public readonly client: SecretsManagerClient;
  /** Config the client was built from, defaults applied. */
  public readonly clientConfig: SecretsManagerClientConfig;
  /** The logger used by this store and by the AWS client. */
  public readonly logger: Logger;
  /** Tracing decision made at init. */
  public readonly xray: XrayState;
  readonly #version: Pick<
    GetSecretValueCommandInput,
    'VersionId' | 'VersionStage'
  >;

  private constructor({
    client,
    clientConfig,
    logger,
    xray,
    versionId,
    versionStage,
  }: {
    client: SecretsManagerClient;
    clientConfig: SecretsManagerClientConfig;
    logger: Logger;
    xray: XrayState;
    versionId?: string;
    versionStage?: string;
  }) {
    this.client = client;
    this.clientConfig = clientConfig;
    this.logger = logger;
    this.xray = xray;
    this.#version = versionId
      ? { VersionId: versionId }
      : versionStage
        ? { VersionStage: versionStage }
        : {};
  }

  /**
   * Initialize an `AwsSecretStore`.
   *
   * Consumers never construct the Secrets Manager client themselves: the store
   * fixes a single attempt and bounded timeouts, then decides on tracing.
   * Caller `clientConfig` entries (including `requestHandler`) win over those
   * defaults.
   */
  static async init({
    clientConfig = {},
    connectionTimeoutMs = DEFAULT_CONNECTION_TIMEOUT_MS,
    requestTimeoutMs = DEFAULT_REQUEST_TIMEOUT_MS,
    versionId,
    versionStage,
    xray: xrayMode,
  }: AwsSecretStoreInitOptions = {}): Promise<AwsSecretStore> {
    const logger = assertLogger(clientConfig.logger ?? console);
    const xray = resolveXrayState(xrayMode);

    const config: SecretsManagerClientConfig = {
      maxAttempts: 1,
      requestHandler: new NodeHttpHandler({
        connectionTimeout: connectionTimeoutMs,
        requestTimeout: requestTimeoutMs,
      }),
      ...clientConfig,
      logger,
    };

    const client = await traceClient(
      new SecretsManagerClient(config),
      xray,
      logger,
    );

    return new AwsSecretStore({
      client,
      clientConfig: config,
      logger,
      xray,
      versionId,
      versionStage,
    });
  }

  /**
   * Read the named secret's current `SecretString`.
   *
   * @throws `SecretNotFoundError` when the secret does not exist.
   * @throws `SecretStoreUnavailableError` on any other client failure.
   * @throws `MalformedSecretError` when the secret has no string payload.
   */
  async getSecretString(secretName: string): Promise<string> {
    if (!secretName) throw new Error('secretName is required');

    this.logger.debug(`Getting secret value...`, { secretName });
    let secretString: string | undefined;
    try {
      const res = await this.client.send(
        new GetSecretValueCommand({ SecretId: secretName, ...this.#version }),
      );
      secretString = res.SecretString;
    } catch (err) {
      throw toSecretStoreError(secretName, err);
    }

    if (!secretString) {
      throw new MalformedSecretError(
        secretName,
        'SecretString is missing (binary secrets not supported).',
      );
    }

    return secretString;
  }
}
