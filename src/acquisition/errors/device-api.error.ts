/**
 * Error taxonomy for talking to the device.
 *
 * - AuthError: credentials rejected (401). Never retried; triggers re-auth.
 * - RateLimitError: device refuses requests after repeated bad logins (429).
 * - UnreachableError: connection refused, DNS failure, timeout, cancellation.
 * - ProtocolError: non-2xx status or a body that is not the expected JSON.
 * - MalformedDocumentError: a required field has the wrong structure.
 * - PreconditionFailedError: control action rejected locally (local mode off).
 * - CommandError: console command accepted but returned a non-zero exit code.
 * - InvalidRequestError: a control request failed validation before any I/O.
 */
export abstract class DeviceApiError extends Error {
  /** Whether the retrying client may try the request again */
  abstract readonly retryable: boolean;

  constructor(
    message: string,
    public readonly endpoint?: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

export class AuthError extends DeviceApiError {
  readonly retryable = false;
}

export class RateLimitError extends DeviceApiError {
  readonly retryable = false;
}

export class UnreachableError extends DeviceApiError {
  readonly retryable = true;
}

export class ProtocolError extends DeviceApiError {
  readonly retryable = true;

  constructor(
    message: string,
    endpoint?: string,
    public readonly status?: number,
    cause?: unknown,
  ) {
    super(message, endpoint, cause);
  }
}

export class MalformedDocumentError extends DeviceApiError {
  readonly retryable = false;

  constructor(
    endpoint: string,
    public readonly fieldPath: string,
    detail: string,
  ) {
    super(`Malformed ${endpoint} document at "${fieldPath}": ${detail}`, endpoint);
  }
}

export class PreconditionFailedError extends DeviceApiError {
  readonly retryable = false;
}

export class CommandError extends DeviceApiError {
  readonly retryable = false;

  constructor(
    message: string,
    public readonly command: string,
  ) {
    super(message, '/console.json');
  }
}

export class InvalidRequestError extends DeviceApiError {
  readonly retryable = false;
}
