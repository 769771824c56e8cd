export { AuthResultNormalizer, AuthResultNormalizerOptions } from './auth/AuthResultNormalizer';
export { CognitoIdentityBackend, CognitoIdentityBackendConfig } from './auth/CognitoIdentityBackend';
export { translateCognitoError } from './auth/cognitoErrorCodes';
export {
  EMAIL_SIGN_IN_ERROR_CODES,
  EMAIL_SIGN_UP_ERROR_CODES,
  DecodedProviderError,
  NativeSignInErrorCode,
  NativeSignUpErrorCode,
  decodeEmailSignInError,
  decodeEmailSignUpError,
} from './auth/errorCodes';
export { AuthOperation, IdentityProviderError, UnexpectedAuthFailureError } from './auth/errors';
export { loadAuthConfigFromEnv } from './config/loadAuthConfig';
export { createAuthFacade, AuthFacadeOptions } from './createAuthFacade';
