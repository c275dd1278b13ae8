/**
 * Requirements addressed:
 * - Provide `check`: resolve configuration once, exactly as service startup
 *   does, and print a redacted summary.
 * - Flags override environment-derived options.
 * - On failure print the stage diagnostic and exit non-zero.
 */

import type { Command } from 'commander';

import { bootstrap } from '../bootstrap/bootstrap';
import {
  loadEnv,
  readResolverOptions,
  type ResolverOptionsOverrides,
} from '../bootstrap/resolverOptions';
import type { AmbientRegionLoader } from '../configResolver/ambientRegion';
import { redactConfiguration } from '../configResolver/clientConfig';
import { describeResolutionFailure } from '../configResolver/errors';
import { type Logger, quietLogger } from '../secretStore/logger';
import type { SecretStore } from '../secretStore/SecretStore';

type CheckOpts = {
  secretName?: string;
  secretsRegion?: string;
  defaultRegion?: string;
  xray?: string;
  paths: string[];
  debug: boolean;
};

export type RunCheckOptions = {
  overrides?: ResolverOptionsOverrides;
  /** Dotenv directories; ignored when `env` is supplied. */
  paths?: string[];
  /** Pre-loaded environment map. */
  env?: Record<string, string | undefined>;
  store?: SecretStore;
  regionLoader?: AmbientRegionLoader;
  logger?: Logger;
};

/** Run the check and return the process exit code. */
export const runCheck = async ({
  overrides,
  paths,
  env,
  store,
  regionLoader,
  logger = console,
}: RunCheckOptions = {}): Promise<number> => {
  try {
    const options = readResolverOptions(
      env ?? (await loadEnv(paths)),
      overrides,
    );
    const redacted = await bootstrap({
      options,
      store,
      regionLoader,
      logger,
      start: redactConfiguration,
    });

    logger.info(`secretName: ${options.secretName}`);
    for (const [k, v] of Object.entries(redacted)) logger.info(`${k}: ${v}`);
    return 0;
  } catch (err) {
    logger.error(describeResolutionFailure(err));
    return 1;
  }
};

export const registerCheckCommand = (program: Command): void => {
  program
    .command('check')
    .description(
      'Resolve configuration from the secret store and print a redacted summary.',
    )
    .option(
      '-s, --secret-name <string>',
      'secret name (supports $VAR expansion) (default: $CONFIG_SECRET_NAME or $STACK_NAME)',
    )
    .option(
      '--secrets-region <string>',
      'region of the secret store (default: SDK region resolution)',
    )
    .option(
      '--default-region <string>',
      'region used when neither the secret nor the environment has one (default: us-east-2)',
    )
    .option('--xray <mode>', 'AWS X-Ray capture mode: auto|on|off')
    .option('--paths <strings...>', 'dotenv directories', ['./'])
    .option('--debug', 'log debug output', false)
    .action(async (opts: CheckOpts) => {
      process.exitCode = await runCheck({
        overrides: {
          secretName: opts.secretName,
          secretsRegion: opts.secretsRegion,
          defaultRegion: opts.defaultRegion,
          xray: opts.xray,
        },
        paths: opts.paths,
        logger: opts.debug ? console : quietLogger,
      });
    });
};
