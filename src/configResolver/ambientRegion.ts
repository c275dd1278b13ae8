/**
 * Requirements addressed:
 * - Supply the execution environment's default region, resolved the way the
 *   AWS SDK resolves it (AWS_REGION, then the shared config profile).
 * - Absence is a normal condition and yields `undefined`.
 */

import {
  NODE_REGION_CONFIG_FILE_OPTIONS,
  NODE_REGION_CONFIG_OPTIONS,
} from '@smithy/config-resolver';
import { loadConfig } from '@smithy/node-config-provider';

import type { Logger } from '../secretStore/logger';

export type AmbientRegionLoader = () => Promise<string | undefined>;

const loadSdkRegion: AmbientRegionLoader = async () =>
  await loadConfig(
    NODE_REGION_CONFIG_OPTIONS,
    NODE_REGION_CONFIG_FILE_OPTIONS,
  )();

export const loadAmbientRegion = async ({
  logger = console,
  load = loadSdkRegion,
}: {
  logger?: Logger;
  load?: AmbientRegionLoader;
} = {}): Promise<string | undefined> => {
  try {
    const region = await load();
    return region || undefined;
  } catch (err) {
    // The SDK signals an unconfigured region by throwing.
    logger.debug('No ambient region configured.', {
      reason: err instanceof Error ? err.message : String(err),
    });
    return;
  }
};
