/**
 * Error taxonomy for scale changes.
 *
 * ValidationError is thrown to the caller before anything is touched.
 * ExternalOperationError and ResourceError are logged by whoever catches them;
 * they never reach a caller whose request was coalesced away.
 */

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class ExternalOperationError extends Error {
  readonly factor: number;

  constructor(message: string, factor: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExternalOperationError';
    this.factor = factor;
  }
}

export type ResourceKind = 'settings' | 'theme' | 'notifier' | 'splash' | 'env';

export class ResourceError extends Error {
  readonly resource: ResourceKind;

  constructor(resource: ResourceKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ResourceError';
    this.resource = resource;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    const cause = err.cause !== undefined ? ` (${describeError(err.cause)})` : '';
    return `${err.message}${cause}`;
  }
  return String(err);
}
