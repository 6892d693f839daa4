import { HttpException, HttpStatus } from '@nestjs/common';
import {
  AuthError,
  CommandError,
  DeviceApiError,
  InvalidRequestError,
  MalformedDocumentError,
  PreconditionFailedError,
  ProtocolError,
  RateLimitError,
  UnreachableError,
} from './device-api.error';

export function httpStatusFor(error: DeviceApiError): HttpStatus {
  if (error instanceof InvalidRequestError) return HttpStatus.BAD_REQUEST;
  if (error instanceof PreconditionFailedError) return HttpStatus.PRECONDITION_FAILED;
  if (error instanceof AuthError) return HttpStatus.UNAUTHORIZED;
  if (error instanceof RateLimitError) return HttpStatus.TOO_MANY_REQUESTS;
  if (error instanceof UnreachableError) return HttpStatus.SERVICE_UNAVAILABLE;
  if (
    error instanceof ProtocolError ||
    error instanceof CommandError ||
    error instanceof MalformedDocumentError
  ) {
    return HttpStatus.BAD_GATEWAY;
  }
  return HttpStatus.INTERNAL_SERVER_ERROR;
}

/**
 * Rethrow a device error as the matching HttpException. HttpExceptions and
 * unknown errors are rethrown unchanged.
 */
export function rethrowAsHttp(error: unknown): never {
  if (error instanceof DeviceApiError) {
    const status = httpStatusFor(error);
    throw new HttpException(
      { statusCode: status, error: error.name, message: error.message },
      status,
      { cause: error },
    );
  }
  throw error;
}
