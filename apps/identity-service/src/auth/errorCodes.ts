import { EmailSignInStatus, EmailSignUpStatus } from '@signin-kit/common-types';

// The same native codes are reported for every platform the backend supports.
export type NativeSignUpErrorCode =
  | 'ERROR_INVALID_EMAIL'
  | 'ERROR_WEAK_PASSWORD'
  | 'ERROR_EMAIL_ALREADY_IN_USE'
  | 'ERROR_MISSING_EMAIL';

export type NativeSignInErrorCode = 'ERROR_WRONG_PASSWORD' | 'ERROR_USER_NOT_FOUND' | 'ERROR_INVALID_EMAIL';

export const EMAIL_SIGN_UP_ERROR_CODES: Readonly<Record<NativeSignUpErrorCode, EmailSignUpStatus>> = Object.freeze({
  ERROR_INVALID_EMAIL: EmailSignUpStatus.InvalidEmail,
  ERROR_WEAK_PASSWORD: EmailSignUpStatus.WeakPassword,
  ERROR_EMAIL_ALREADY_IN_USE: EmailSignUpStatus.EmailAlreadyInUse,
  ERROR_MISSING_EMAIL: EmailSignUpStatus.MissingEmail,
});

export const EMAIL_SIGN_IN_ERROR_CODES: Readonly<Record<NativeSignInErrorCode, EmailSignInStatus>> = Object.freeze({
  ERROR_WRONG_PASSWORD: EmailSignInStatus.WrongPassword,
  ERROR_USER_NOT_FOUND: EmailSignInStatus.UserNotFound,
  ERROR_INVALID_EMAIL: EmailSignInStatus.InvalidEmail,
});

export type DecodedProviderError<S> = { kind: 'mapped'; status: S } | { kind: 'unmapped'; code: string };

function isTableCode<C extends string>(table: Readonly<Record<C, unknown>>, code: string): code is C {
  return Object.prototype.hasOwnProperty.call(table, code);
}

function decodeWith<C extends string, S>(table: Readonly<Record<C, S>>, code: string): DecodedProviderError<S> {
  if (isTableCode(table, code)) {
    return { kind: 'mapped', status: table[code] };
  }
  return { kind: 'unmapped', code };
}

export function decodeEmailSignUpError(code: string): DecodedProviderError<EmailSignUpStatus> {
  return decodeWith(EMAIL_SIGN_UP_ERROR_CODES, code);
}

export function decodeEmailSignInError(code: string): DecodedProviderError<EmailSignInStatus> {
  return decodeWith(EMAIL_SIGN_IN_ERROR_CODES, code);
}
