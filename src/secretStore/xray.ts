/**
 * Requirements addressed:
 * - Tracing of the Secrets Manager read is opt-in through a mode:
 *   `auto` traces only where an X-Ray daemon is configured, `on` insists on
 *   one, `off` never traces.
 * - The decision is made once, at store construction, and the tracing SDK is
 *   only loaded when that decision is to trace.
 */

import type { Logger } from './logger';

export type XrayMode = 'auto' | 'on' | 'off';

/** Tracing decision recorded on the store. */
export type XrayState = {
  mode: XrayMode;
  enabled: boolean;
  /** Present only while tracing. */
  daemonAddress?: string;
};

/** The part of `aws-xray-sdk` the store relies on. */
type XraySdk = {
  captureAWSv3Client: <TClient extends object>(client: TClient) => TClient;
};

const isXraySdk = (candidate: unknown): candidate is XraySdk =>
  typeof candidate === 'object' &&
  candidate !== null &&
  'captureAWSv3Client' in candidate &&
  typeof candidate.captureAWSv3Client === 'function';

/**
 * Decide whether the store traces its client.
 *
 * @throws when `mode` is `on` and no daemon address is configured.
 */
export const resolveXrayState = (
  mode: XrayMode = 'auto',
  daemonAddress: string | undefined = process.env.AWS_XRAY_DAEMON_ADDRESS,
): XrayState => {
  if (mode === 'off' || (mode === 'auto' && !daemonAddress)) {
    return { mode, enabled: false };
  }
  if (!daemonAddress) {
    throw new Error(
      "xray is 'on' but AWS_XRAY_DAEMON_ADDRESS is empty; set it or use 'auto'.",
    );
  }
  return { mode, enabled: true, daemonAddress };
};

const loadXraySdk = async (): Promise<XraySdk> => {
  let mod: unknown;
  try {
    mod = await import('aws-xray-sdk');
  } catch (err) {
    throw new Error(
      "Tracing the secret store needs the optional 'aws-xray-sdk' package.",
      { cause: err },
    );
  }

  // CommonJS interop may park the exports under `default`.
  if (isXraySdk(mod)) return mod;
  if (typeof mod === 'object' && mod !== null && 'default' in mod) {
    if (isXraySdk(mod.default)) return mod.default;
  }
  throw new Error("'aws-xray-sdk' does not export captureAWSv3Client.");
};

/** Wrap `client` for tracing when `state` says so; otherwise return it as is. */
export const traceClient = async <TClient extends object>(
  client: TClient,
  state: XrayState,
  logger: Logger,
): Promise<TClient> => {
  if (!state.enabled) return client;

  const sdk = await loadXraySdk();
  logger.debug('Tracing secret store client.', {
    daemonAddress: state.daemonAddress,
  });
  return sdk.captureAWSv3Client(client);
};
