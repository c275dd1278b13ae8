/**
 * Requirements addressed:
 * - Region fallback is an ordered list of providers evaluated in sequence:
 *   secret payload, then ambient region hint, then hardcoded default.
 * - Each provider is pure; an empty string counts as absent.
 */

import type { SecretPayload } from '../secretStore/secretPayload';

/** Region used when neither the secret nor the environment supplies one. */
export const DEFAULT_REGION = 'us-east-2';

/** Secret payload key holding the region. */
export const REGION_FIELD = 'AWS_REGION';

export type RegionSource = 'secret' | 'ambient' | 'default';

export type RegionProvider = {
  source: RegionSource;
  region: () => string | undefined;
};

export type RegionResolution = {
  region: string;
  source: RegionSource;
};

export const fromSecretPayload = (payload: SecretPayload): RegionProvider => ({
  source: 'secret',
  region: () => payload[REGION_FIELD],
});

export const fromAmbientHint = (hint: string | undefined): RegionProvider => ({
  source: 'ambient',
  region: () => hint,
});

export const fromDefault = (region = DEFAULT_REGION): RegionProvider => ({
  source: 'default',
  region: () => region,
});

/** Return the first provider yielding a non-empty region. */
export const resolveRegion = (
  providers: readonly RegionProvider[],
): RegionResolution | undefined => {
  for (const { source, region } of providers) {
    const value = region();
    if (value) return { region: value, source };
  }
  return;
};
