import { SocialProviderId } from '@signin-kit/common-types';

export type AuthOperation = 'email sign-up' | 'email sign-in' | `${SocialProviderId} sign-in`;

/**
 * A rejection reported by an identity provider under its native error code
 * (e.g. `ERROR_EMAIL_ALREADY_IN_USE`). Backends throw this for every failure they
 * can name; whether the code maps to a status is decided by the normalizer.
 */
export class IdentityProviderError extends Error {
  public readonly code: string;
  public readonly provider: string;

  constructor(code: string, message: string, options: { provider: string; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = 'IdentityProviderError';
    this.code = code;
    this.provider = options.provider;
  }
}

/**
 * A failure that was not classified: unrecognized provider codes, network errors,
 * malformed provider responses. Messages are meant for developers, not end users.
 */
export class UnexpectedAuthFailureError extends Error {
  public readonly operation: AuthOperation;

  constructor(operation: AuthOperation, detail: string, cause?: unknown) {
    super(`Unexpected ${operation} failure: ${detail}`, { cause });
    this.name = 'UnexpectedAuthFailureError';
    this.operation = operation;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
