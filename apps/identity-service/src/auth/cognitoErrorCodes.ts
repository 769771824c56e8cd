import { IdentityProviderError } from './errors';

const COGNITO_PROVIDER_NAME = 'cognito';

// Cognito reports both wrong passwords and disabled users as NotAuthorizedException.
const WRONG_PASSWORD_MESSAGE = 'Incorrect username or password.';

// InvalidParameterException covers every malformed field; only email format problems map.
const INVALID_EMAIL_MESSAGE = /invalid email address format|username should be an email/i;

const COGNITO_EXCEPTION_CODES: Readonly<Record<string, string>> = Object.freeze({
  UsernameExistsException: 'ERROR_EMAIL_ALREADY_IN_USE',
  InvalidPasswordException: 'ERROR_WEAK_PASSWORD',
  UserNotFoundException: 'ERROR_USER_NOT_FOUND',
  UserNotConfirmedException: 'ERROR_USER_NOT_CONFIRMED',
  PasswordResetRequiredException: 'ERROR_PASSWORD_RESET_REQUIRED',
});

function nativeCodeFor(error: Error): string | undefined {
  if (error.name === 'NotAuthorizedException') {
    return error.message === WRONG_PASSWORD_MESSAGE ? 'ERROR_WRONG_PASSWORD' : 'ERROR_USER_DISABLED';
  }
  if (error.name === 'InvalidParameterException') {
    return INVALID_EMAIL_MESSAGE.test(error.message) ? 'ERROR_INVALID_EMAIL' : undefined;
  }
  if (Object.prototype.hasOwnProperty.call(COGNITO_EXCEPTION_CODES, error.name)) {
    return COGNITO_EXCEPTION_CODES[error.name];
  }
  return undefined;
}

/**
 * Translates a Cognito service exception into an IdentityProviderError carrying the
 * native code the normalizer understands. Errors Cognito did not name (network,
 * throttling, unknown exceptions) are returned unchanged.
 */
export function translateCognitoError(error: unknown): unknown {
  if (!(error instanceof Error)) {
    return error;
  }
  const code = nativeCodeFor(error);
  if (!code) {
    return error;
  }
  return new IdentityProviderError(code, error.message, { provider: COGNITO_PROVIDER_NAME, cause: error });
}
