export type CloudErrorCode =
  | 'AUTH_REQUIRED'
  | 'AUTHENTICATION_FAILED'
  | 'NOT_FOUND'
  | 'INVALID_ARGUMENT'
  | 'REMOTE_ERROR'
  | 'TRANSPORT_ERROR';

export class CloudError extends Error {
  constructor(
    readonly code: CloudErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'CloudError';
  }
}

export class AuthRequiredError extends CloudError {
  constructor(action: string) {
    super('AUTH_REQUIRED', `Must be authenticated to ${action}`);
    this.name = 'AuthRequiredError';
  }
}

export class AuthenticationFailedError extends CloudError {
  constructor(message: string) {
    super('AUTHENTICATION_FAILED', message);
    this.name = 'AuthenticationFailedError';
  }
}

/**
 * A path segment (or the final item) was absent when the path was walked.
 * `prefix` is the path reached up to and including the failing segment's directory.
 */
export class NotFoundError extends CloudError {
  constructor(
    readonly segment: string,
    readonly prefix: string,
    readonly target: 'directory' | 'file',
  ) {
    super('NOT_FOUND', `${target === 'directory' ? 'Directory' : 'File'} not found: ${segment} in ${prefix}`);
    this.name = 'NotFoundError';
  }
}

export class InvalidArgumentError extends CloudError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
    this.name = 'InvalidArgumentError';
  }
}

export class RemoteError extends CloudError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('REMOTE_ERROR', message, options);
    this.name = 'RemoteError';
  }
}

export class TransportError extends CloudError {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super('TRANSPORT_ERROR', message, { cause: options?.cause });
    this.name = 'TransportError';
    this.status = options?.status;
  }
}

export function isCloudError(value: unknown): value is CloudError {
  return value instanceof CloudError;
}
