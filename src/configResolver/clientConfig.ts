import type { AwsCredentialIdentity } from '@smithy/types';

import type { ResolvedConfiguration } from './resolveConfiguration';

/** AWS SDK v3 client config fragment built from resolved configuration. */
export type AwsClientConfig = {
  region: string;
  credentials: AwsCredentialIdentity;
};

/**
 * Map resolved configuration onto an AWS SDK v3 client config, e.g.
 * `new S3Client(toAwsClientConfig(config))`.
 */
export const toAwsClientConfig = ({
  accessKeyId,
  secretAccessKey,
  region,
}: ResolvedConfiguration): AwsClientConfig => ({
  region,
  credentials: { accessKeyId, secretAccessKey },
});

const maskAccessKeyId = (accessKeyId: string): string =>
  accessKeyId.length > 4 ? `****${accessKeyId.slice(-4)}` : '****';

/** Loggable view of resolved configuration; secrets never appear. */
export const redactConfiguration = ({
  accessKeyId,
  region,
}: ResolvedConfiguration): Record<keyof ResolvedConfiguration, string> => ({
  accessKeyId: maskAccessKeyId(accessKeyId),
  secretAccessKey: '****',
  region,
});
