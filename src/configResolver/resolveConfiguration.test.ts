import { describe, expect, it, vi } from 'vitest';

import type { Logger } from '../secretStore/logger';
import { type SecretStore, StaticSecretStore } from '../secretStore/SecretStore';
import {
  MalformedSecretError,
  MissingCredentialFieldError,
  SecretNotFoundError,
  SecretStoreUnavailableError,
} from './errors';
import { resolveConfiguration } from './resolveConfiguration';

const makeLogger = () =>
  ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }) satisfies Logger;

const storeWith = (payload: unknown) =>
  new StaticSecretStore({ 'app-creds': JSON.stringify(payload) });

describe('resolveConfiguration', () => {
  it('returns the payload values when all three fields are present', async () => {
    const store = new StaticSecretStore({
      FastAPI_S3_Credentials: JSON.stringify({
        AWS_ACCESS_KEY_ID: 'AKIA...',
        AWS_SECRET_ACCESS_KEY: 'xyz',
        AWS_REGION: 'us-east-2',
      }),
    });

    const config = await resolveConfiguration({
      store,
      secretName: 'FastAPI_S3_Credentials',
      logger: makeLogger(),
    });

    expect(config).toEqual({
      accessKeyId: 'AKIA...',
      secretAccessKey: 'xyz',
      region: 'us-east-2',
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('prefers the secret region over the ambient hint', async () => {
    const config = await resolveConfiguration({
      store: storeWith({
        AWS_ACCESS_KEY_ID: 'test-key-id',
        AWS_SECRET_ACCESS_KEY: 'test-secret',
        AWS_REGION: 'ca-central-1',
      }),
      secretName: 'app-creds',
      regionHint: 'eu-west-1',
      logger: makeLogger(),
    });

    expect(config.region).toBe('ca-central-1');
  });

  it('falls back to the ambient hint when the secret omits the region', async () => {
    const config = await resolveConfiguration({
      store: storeWith({
        AWS_ACCESS_KEY_ID: 'test-key-id',
        AWS_SECRET_ACCESS_KEY: 'test-secret',
        AWS_REGION: null,
      }),
      secretName: 'app-creds',
      regionHint: 'eu-west-1',
      logger: makeLogger(),
    });

    expect(config.region).toBe('eu-west-1');
  });

  it('falls back to the default region without a hint', async () => {
    const payload = {
      AWS_ACCESS_KEY_ID: 'AKIA...',
      AWS_SECRET_ACCESS_KEY: 'xyz',
    };

    await expect(
      resolveConfiguration({
        store: storeWith(payload),
        secretName: 'app-creds',
        logger: makeLogger(),
      }),
    ).resolves.toEqual({
      accessKeyId: 'AKIA...',
      secretAccessKey: 'xyz',
      region: 'us-east-2',
    });

    const config = await resolveConfiguration({
      store: storeWith(payload),
      secretName: 'app-creds',
      regionHint: '',
      defaultRegion: 'ap-south-1',
      logger: makeLogger(),
    });
    expect(config.region).toBe('ap-south-1');
  });

  it('fails when a credential field is missing', async () => {
    const err = await resolveConfiguration({
      store: storeWith({ AWS_SECRET_ACCESS_KEY: 'test-secret' }),
      secretName: 'app-creds',
      logger: makeLogger(),
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(MissingCredentialFieldError);
    expect(err).toMatchObject({
      stage: 'extraction',
      field: 'AWS_ACCESS_KEY_ID',
    });
  });

  it('treats empty credential values as missing', async () => {
    const err = await resolveConfiguration({
      store: storeWith({
        AWS_ACCESS_KEY_ID: 'test-key-id',
        AWS_SECRET_ACCESS_KEY: '',
      }),
      secretName: 'app-creds',
      logger: makeLogger(),
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(MissingCredentialFieldError);
    expect(err).toMatchObject({ field: 'AWS_SECRET_ACCESS_KEY' });
  });

  it('fails with SecretNotFoundError for an unknown secret', async () => {
    await expect(
      resolveConfiguration({
        store: new StaticSecretStore({}),
        secretName: 'nope',
        logger: makeLogger(),
      }),
    ).rejects.toBeInstanceOf(SecretNotFoundError);
  });

  it('fails with MalformedSecretError for an unparsable payload', async () => {
    await expect(
      resolveConfiguration({
        store: new StaticSecretStore({ 'app-creds': 'AWS_REGION=us-east-2' }),
        secretName: 'app-creds',
        logger: makeLogger(),
      }),
    ).rejects.toBeInstanceOf(MalformedSecretError);
  });

  it('wraps unclassified store failures as unavailable', async () => {
    const cause = new Error('socket hang up');
    const store: SecretStore = {
      getSecretString: vi.fn(async () => {
        throw cause;
      }),
    };

    const err = await resolveConfiguration({
      store,
      secretName: 'app-creds',
      logger: makeLogger(),
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(SecretStoreUnavailableError);
    expect(err).toMatchObject({ stage: 'transport', cause });
  });

  it('logs the region source but never the values', async () => {
    const logger = makeLogger();
    await resolveConfiguration({
      store: storeWith({
        AWS_ACCESS_KEY_ID: 'test-key-id',
        AWS_SECRET_ACCESS_KEY: 'test-secret',
      }),
      secretName: 'app-creds',
      regionHint: 'eu-west-1',
      logger,
    });

    expect(logger.debug).toHaveBeenCalledTimes(2);
    expect(logger.debug).toHaveBeenNthCalledWith(
      1,
      'Resolving configuration...',
      { secretName: 'app-creds' },
    );
    expect(logger.debug).toHaveBeenNthCalledWith(
      2,
      'Configuration resolved.',
      { secretName: 'app-creds', regionSource: 'ambient' },
    );
  });
});
