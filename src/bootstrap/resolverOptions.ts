/**
 * Requirements addressed:
 * - Resolver options come from the environment, with `.env`/`.env.local`
 *   loaded via get-dotenv and merged over process.env.
 * - Secret name supports $VAR expansion; default `$STACK_NAME`.
 * - Explicit overrides (CLI flags) win over environment values; unset or
 *   empty values are ignored.
 * - Unknown keys are stripped by the schema.
 */

import { dotenvExpand, getDotenv } from '@karmaniverous/get-dotenv';
import { shake } from 'radash';
import { z } from 'zod';

import { DEFAULT_REGION } from '../configResolver/regionProviders';
import { DEFAULT_REQUEST_TIMEOUT_MS } from '../secretStore/AwsSecretStore';

export const DEFAULT_SECRET_NAME = '$STACK_NAME';

export const resolverOptionsSchema = z.object({
  secretName: z.string().min(1, 'secret-name is required.'),
  secretsRegion: z.string().min(1).optional(),
  defaultRegion: z.string().min(1).default(DEFAULT_REGION),
  requestTimeoutMs: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_REQUEST_TIMEOUT_MS),
  xray: z.enum(['auto', 'on', 'off']).default('auto'),
});

/** Validated resolver options. */
export type ResolverOptions = z.output<typeof resolverOptionsSchema>;

/** Resolver options before defaults are applied. */
export type ResolverOptionsInput = z.input<typeof resolverOptionsSchema>;

/** Overrides accepted on top of environment-derived options. */
export type ResolverOptionsOverrides = {
  secretName?: string;
  secretsRegion?: string;
  defaultRegion?: string;
  requestTimeoutMs?: number;
  xray?: string;
};

type Env = Record<string, string | undefined>;

export const parseResolverOptions = (raw: unknown): ResolverOptions => {
  const res = resolverOptionsSchema.safeParse(raw);
  if (res.success) return res.data;

  const details = res.error.issues
    .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
    .join('; ');
  throw new Error(`Invalid resolver options: ${details}`);
};

export const expandSecretName = (raw: string, envRef: Env): string =>
  dotenvExpand(raw, envRef) ?? raw;

/** Derive resolver options from an environment map plus overrides. */
export const readResolverOptions = (
  env: Env,
  overrides: ResolverOptionsOverrides = {},
): ResolverOptions => {
  const isUnset = (v: unknown) => typeof v === 'undefined' || v === '';

  const fromEnv = {
    secretName: env.CONFIG_SECRET_NAME,
    secretsRegion: env.SECRETS_MANAGER_REGION,
    defaultRegion: env.CONFIG_DEFAULT_REGION,
    requestTimeoutMs: env.SECRETS_MANAGER_TIMEOUT_MS,
    xray: env.AWS_XRAY_MODE,
  };

  const raw = {
    ...shake<never, typeof fromEnv>(fromEnv, isUnset),
    ...shake<never, ResolverOptionsOverrides>(overrides, isUnset),
  };

  return parseResolverOptions({
    ...raw,
    secretName: expandSecretName(raw.secretName ?? DEFAULT_SECRET_NAME, env),
  });
};

/**
 * Load the dotenv cascade from `paths` (public `.env` + private `.env.local`)
 * over process.env. Dotenv values take precedence.
 */
export const loadEnv = async (paths: string[] = ['./']): Promise<Env> => {
  const dotenv = await getDotenv({
    paths,
    dotenvToken: '.env',
    privateToken: 'local',
    loadProcess: false,
  });

  return { ...process.env, ...dotenv };
};
