/**
 * Requirements addressed:
 * - Error taxonomy: SecretNotFoundError, SecretStoreUnavailableError,
 *   MalformedSecretError, MissingCredentialFieldError.
 * - Every failure is fatal to startup and names the stage that failed
 *   (lookup, transport, parsing, extraction).
 * - Messages never carry secret values.
 */

/** Resolution stage a {@link ConfigResolutionError} was raised in. */
export type ResolutionStage = 'lookup' | 'transport' | 'parsing' | 'extraction';

/** Credential fields the resolver requires from the secret payload. */
export type CredentialField = 'AWS_ACCESS_KEY_ID' | 'AWS_SECRET_ACCESS_KEY';

/** Base class for every configuration resolution failure. */
export abstract class ConfigResolutionError extends Error {
  abstract readonly stage: ResolutionStage;

  constructor(
    message: string,
    readonly secretName: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The store holds no secret under the requested name. */
export class SecretNotFoundError extends ConfigResolutionError {
  readonly stage = 'lookup';

  constructor(secretName: string, options?: { cause?: unknown }) {
    super(`Secret '${secretName}' was not found.`, secretName, options);
  }
}

const unavailableMessage = (
  secretName: string,
  code?: string,
  detail?: string,
): string => {
  const base = `Secret store unavailable while reading '${secretName}'`;
  if (code) return `${base} (${code}).`;
  return detail ? `${base}: ${detail}` : `${base}.`;
};

/**
 * The store could not be reached or refused the caller (network, auth,
 * throttling, timeout).
 */
export class SecretStoreUnavailableError extends ConfigResolutionError {
  readonly stage = 'transport';
  /** AWS error code, when the failure carried one. */
  readonly code?: string;

  /**
   * @param options - `code` is rendered in parentheses; without one, `detail`
   * (the underlying client message) follows the sentence.
   */
  constructor(
    secretName: string,
    {
      code,
      detail,
      cause,
    }: { code?: string; detail?: string; cause?: unknown } = {},
  ) {
    super(unavailableMessage(secretName, code, detail), secretName, {
      cause,
    });
    if (code) this.code = code;
  }
}

/** The payload is not a JSON object map of strings. */
export class MalformedSecretError extends ConfigResolutionError {
  readonly stage = 'parsing';

  constructor(secretName: string, reason: string) {
    super(`Secret '${secretName}' is malformed: ${reason}`, secretName);
  }
}

/** A required credential field is absent or empty. */
export class MissingCredentialFieldError extends ConfigResolutionError {
  readonly stage = 'extraction';

  constructor(
    secretName: string,
    readonly field: CredentialField,
  ) {
    super(`Secret '${secretName}' is missing '${field}'.`, secretName);
  }
}

export const isConfigResolutionError = (
  err: unknown,
): err is ConfigResolutionError => err instanceof ConfigResolutionError;

/**
 * Render a startup diagnostic naming the failed stage.
 *
 * Errors from outside the resolver are reported under `startup`.
 */
export const describeResolutionFailure = (err: unknown): string => {
  if (isConfigResolutionError(err)) {
    return `Configuration resolution failed at ${err.stage}: ${err.message}`;
  }
  const message = err instanceof Error ? err.message : String(err);
  return `Configuration resolution failed at startup: ${message}`;
};
