import { Command } from 'commander';
import { describe, expect, it, vi } from 'vitest';

import { StaticSecretStore } from '../secretStore/SecretStore';
import { registerCheckCommand, runCheck } from './registerCheckCommand';

const makeLogger = () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

const store = new StaticSecretStore({
  'app-creds': JSON.stringify({
    AWS_ACCESS_KEY_ID: 'TESTKEYID00001234',
    AWS_SECRET_ACCESS_KEY: 'test-secret',
  }),
});

describe('check command', () => {
  it('prints a redacted summary and exits 0', async () => {
    const logger = makeLogger();

    await expect(
      runCheck({
        env: { CONFIG_SECRET_NAME: 'app-creds' },
        store,
        regionLoader: async () => undefined,
        logger,
      }),
    ).resolves.toBe(0);

    expect(logger.info.mock.calls).toEqual([
      ["Resolved configuration from secret 'app-creds'."],
      ['secretName: app-creds'],
      ['accessKeyId: ****1234'],
      ['secretAccessKey: ****'],
      ['region: us-east-2'],
    ]);
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('flags override the environment', async () => {
    const logger = makeLogger();

    await runCheck({
      env: { CONFIG_SECRET_NAME: 'other' },
      overrides: { secretName: 'app-creds', defaultRegion: 'eu-west-1' },
      store,
      regionLoader: async () => undefined,
      logger,
    });

    expect(logger.info).toHaveBeenCalledWith('region: eu-west-1');
  });

  it('prints the failed stage and exits 1', async () => {
    const logger = makeLogger();

    await expect(
      runCheck({
        env: { CONFIG_SECRET_NAME: 'missing' },
        store,
        regionLoader: async () => undefined,
        logger,
      }),
    ).resolves.toBe(1);

    expect(logger.error).toHaveBeenCalledWith(
      "Configuration resolution failed at lookup: Secret 'missing' was not found.",
    );
  });

  it('registers check with its flags', () => {
    const program = new Command();
    registerCheckCommand(program);

    const check = program.commands.find((c) => c.name() === 'check');
    expect(check?.options.map((o) => o.long)).toEqual([
      '--secret-name',
      '--secrets-region',
      '--default-region',
      '--xray',
      '--paths',
      '--debug',
    ]);
  });
});
