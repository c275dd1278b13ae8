/**
 * Requirements addressed:
 * - Secret payloads are JSON object maps of strings.
 * - `null` values decode as absent.
 */

import { MalformedSecretError } from '../configResolver/errors';

/**
 * Decoded secret payload.
 *
 * `undefined` values are not representable in JSON; `null` values decode as
 * `undefined`.
 */
export type SecretPayload = Record<string, string | undefined>;

export const parseSecretPayload = (
  secretName: string,
  secretString: string,
): SecretPayload => {
  if (!secretString.trim()) {
    throw new MalformedSecretError(secretName, 'SecretString is empty.');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(secretString);
  } catch {
    throw new MalformedSecretError(secretName, 'SecretString is not valid JSON.');
  }

  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new MalformedSecretError(
      secretName,
      'Secret JSON must be an object map.',
    );
  }

  const out: SecretPayload = {};
  for (const [k, v] of Object.entries(parsed)) {
    if (v === null) {
      out[k] = undefined;
      continue;
    }
    if (typeof v === 'string') {
      out[k] = v;
      continue;
    }
    throw new MalformedSecretError(
      secretName,
      `Secret JSON value for '${k}' must be a string or null.`,
    );
  }
  return out;
};
