/**
 * Error classes for the proxy.
 * Each error carries the HTTP status and machine-readable reason it is answered with.
 */

export type ErrorReason =
  | 'authentication_missing'
  | 'authentication_malformed'
  | 'authentication_rejected'
  | 'sprint_not_found'
  | 'not_found'
  | 'validation_error'
  | 'upstream_error'
  | 'configuration_incomplete'
  | 'configuration_invalid'
  | 'internal_error';

export interface ErrorBody {
  error: ErrorReason;
  message: string;
}

/**
 * Base error class for all proxy errors.
 */
export class ProxyError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly reason: ErrorReason,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'ProxyError';
    Object.setPrototypeOf(this, ProxyError.prototype);
  }

  toResponseBody(): ErrorBody {
    return { error: this.reason, message: this.message };
  }
}

/**
 * No usable bearer credential on the inbound request.
 */
export class AuthenticationMissingError extends ProxyError {
  constructor(malformed = false) {
    super(
      malformed
        ? 'Malformed Authorization header. Use: Authorization: Bearer YOUR_PAT'
        : 'Authorization header required. Use: Authorization: Bearer YOUR_PAT',
      401,
      malformed ? 'authentication_malformed' : 'authentication_missing'
    );
    this.name = 'AuthenticationMissingError';
    Object.setPrototypeOf(this, AuthenticationMissingError.prototype);
  }
}

/**
 * Azure DevOps refused the supplied credential.
 */
export class AuthenticationRejectedError extends ProxyError {
  constructor(statusCode: 401 | 403 = 401) {
    super(
      statusCode === 403
        ? 'Azure DevOps denied access for the supplied token'
        : 'Azure DevOps rejected the supplied token',
      statusCode,
      'authentication_rejected'
    );
    this.name = 'AuthenticationRejectedError';
    Object.setPrototypeOf(this, AuthenticationRejectedError.prototype);
  }
}

export class SprintNotFoundError extends ProxyError {
  constructor(public readonly sprint: string) {
    super(`Sprint not found: ${sprint}`, 404, 'sprint_not_found');
    this.name = 'SprintNotFoundError';
    Object.setPrototypeOf(this, SprintNotFoundError.prototype);
  }
}

/**
 * Azure DevOps answered 404 for a resource other than a sprint lookup.
 */
export class NotFoundError extends ProxyError {
  constructor(resource: string) {
    super(`${resource} not found`, 404, 'not_found');
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class ValidationError extends ProxyError {
  constructor(message: string) {
    super(message, 422, 'validation_error');
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Network failure, unexpected status or malformed payload from Azure DevOps.
 * The message stays generic; details only go to the log.
 */
export class UpstreamError extends ProxyError {
  constructor(cause?: unknown) {
    super('Azure DevOps request failed', 500, 'upstream_error', cause);
    this.name = 'UpstreamError';
    Object.setPrototypeOf(this, UpstreamError.prototype);
  }
}

export class ConfigurationError extends ProxyError {
  constructor(message: string, reason: 'configuration_incomplete' | 'configuration_invalid' = 'configuration_invalid') {
    super(message, 500, reason);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Translate any thrown value into a ProxyError, hiding unknown errors behind a generic 500.
 */
export function toProxyError(error: unknown): ProxyError {
  if (error instanceof ProxyError) {
    return error;
  }
  return new ProxyError('Internal server error', 500, 'internal_error', error);
}
