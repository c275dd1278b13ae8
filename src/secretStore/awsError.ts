/**
 * Requirements addressed:
 * - Only a missing secret is a lookup failure; every other store error is a
 *   transport failure (no retry, no recovery).
 * - Client failures without an AWS code (missing region, socket errors) keep
 *   their message so the operator can act on it.
 */

import {
  SecretNotFoundError,
  SecretStoreUnavailableError,
} from '../configResolver/errors';

const readCode = (err: unknown): string | undefined => {
  if (!err || typeof err !== 'object') return;
  const code =
    ('name' in err && err.name) ||
    ('code' in err && err.code) ||
    ('Code' in err && err.Code);
  return typeof code === 'string' ? code : undefined;
};

/** Map an error thrown by the Secrets Manager client onto the resolver taxonomy. */
export const toSecretStoreError = (
  secretName: string,
  err: unknown,
): SecretNotFoundError | SecretStoreUnavailableError => {
  const code = readCode(err);
  if (code === 'ResourceNotFoundException') {
    return new SecretNotFoundError(secretName, { cause: err });
  }

  // `Error` is the generic name, not an AWS code.
  if (code && code !== 'Error') {
    return new SecretStoreUnavailableError(secretName, { code, cause: err });
  }

  return new SecretStoreUnavailableError(secretName, {
    ...(err instanceof Error && err.message ? { detail: err.message } : {}),
    cause: err,
  });
};
