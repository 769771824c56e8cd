/**
 * Outcome statuses for each sign-in operation.
 *
 * Only `Success` accompanies an identity; every other member describes why the
 * operation did not produce one. Failures that cannot be classified are never
 * given a status: they surface as thrown errors instead.
 */

// Shorter passwords are rejected before any provider call.
export const MIN_SIGN_UP_PASSWORD_LENGTH = 6;

export enum EmailSignUpStatus {
  Success = 'SUCCESS',
  /** The email was not correctly formatted. Reported by the provider before any other check. */
  InvalidEmail = 'INVALID_EMAIL',
  /** The email was null or blank. Checked locally before the provider is called. */
  MissingEmail = 'MISSING_EMAIL',
  /** The password was missing or below the minimum length. */
  WeakPassword = 'WEAK_PASSWORD',
  /**
   * An account already exists for this email, including accounts created through a
   * social provider. Returned even when the password matches the existing account.
   */
  EmailAlreadyInUse = 'EMAIL_ALREADY_IN_USE',
}

export enum EmailSignInStatus {
  Success = 'SUCCESS',
  /** No account exists for this email. */
  UserNotFound = 'USER_NOT_FOUND',
  MissingEmail = 'MISSING_EMAIL',
  MissingPassword = 'MISSING_PASSWORD',
  InvalidEmail = 'INVALID_EMAIL',
  /**
   * The account exists but the password is wrong. Also returned when the email
   * belongs to a social account, for which no password will ever match.
   */
  WrongPassword = 'WRONG_PASSWORD',
}

export enum SocialSignInStatus {
  Success = 'SUCCESS',
  /** The user closed or backed out of the provider's sign-in window. */
  Cancelled = 'CANCELLED',
}
