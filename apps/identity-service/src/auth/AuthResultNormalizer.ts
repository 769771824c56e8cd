import {
  AuthIdentity,
  EmailSignInStatus,
  EmailSignUpStatus,
  IIdentityBackend,
  ILogger,
  ISocialSignInProvider,
  InteractiveSignInResult,
  MIN_SIGN_UP_PASSWORD_LENGTH,
  SignInFailure,
  SignInOutcome,
  SocialProviderId,
  SocialSignInStatus,
  signInFailure,
  signInSuccess,
} from '@signin-kit/common-types';
import { DecodedProviderError, decodeEmailSignInError, decodeEmailSignUpError } from './errorCodes';
import { AuthOperation, IdentityProviderError, UnexpectedAuthFailureError, describeError } from './errors';

export interface AuthResultNormalizerOptions {
  logger?: ILogger;
}

/**
 * Wraps an identity backend and social sign-in providers, turning each call into a
 * SignInOutcome. Validation problems, recognized provider rejections and user
 * cancellation come back as statuses; anything else is thrown as an
 * UnexpectedAuthFailureError.
 *
 * Operations never retry. Each one awaits its provider calls strictly in sequence.
 */
export class AuthResultNormalizer {
  private readonly backend: IIdentityBackend;
  private readonly socialProviders: ReadonlyMap<SocialProviderId, ISocialSignInProvider>;
  private readonly logger: ILogger;

  constructor(
    backend: IIdentityBackend,
    socialProviders: ISocialSignInProvider[],
    options: AuthResultNormalizerOptions = {}
  ) {
    const providers = new Map<SocialProviderId, ISocialSignInProvider>();
    for (const provider of socialProviders) {
      if (providers.has(provider.providerId)) {
        throw new Error(`Social sign-in provider "${provider.providerId}" was registered more than once.`);
      }
      providers.set(provider.providerId, provider);
    }
    this.backend = backend;
    this.socialProviders = providers;
    this.logger = options.logger ?? console;
  }

  /**
   * Sign a user up with an email address and password.
   *
   * Null or empty input is checked here because the native backends disagree on it:
   * one fails internally, the other reports a code. Email format is left to the backend.
   * @throws UnexpectedAuthFailureError for unrecognized provider codes and any other failure,
   *         network errors included.
   */
  public async signUpWithEmail(
    email: string | null | undefined,
    password: string | null | undefined
  ): Promise<SignInOutcome<EmailSignUpStatus>> {
    if (!email) {
      return signInFailure(EmailSignUpStatus.MissingEmail);
    }
    if (!password || password.length < MIN_SIGN_UP_PASSWORD_LENGTH) {
      return signInFailure(EmailSignUpStatus.WeakPassword);
    }

    let identity: AuthIdentity | null;
    try {
      identity = await this.backend.createAccount(email, password);
    } catch (error: unknown) {
      return this.mapProviderRejection('email sign-up', error, decodeEmailSignUpError);
    }
    return signInSuccess(EmailSignUpStatus.Success, this.requireIdentity('email sign-up', identity));
  }

  /**
   * Sign a user in with an email address and password.
   *
   * Only presence is checked locally; a short password is simply a wrong one.
   * @throws UnexpectedAuthFailureError for unrecognized provider codes and any other failure.
   */
  public async signInWithEmail(
    email: string | null | undefined,
    password: string | null | undefined
  ): Promise<SignInOutcome<EmailSignInStatus>> {
    if (!email) {
      return signInFailure(EmailSignInStatus.MissingEmail);
    }
    if (!password) {
      return signInFailure(EmailSignInStatus.MissingPassword);
    }

    let identity: AuthIdentity | null;
    try {
      identity = await this.backend.signIn(email, password);
    } catch (error: unknown) {
      return this.mapProviderRejection('email sign-in', error, decodeEmailSignInError);
    }
    return signInSuccess(EmailSignInStatus.Success, this.requireIdentity('email sign-in', identity));
  }

  /**
   * Interactive sign-in through a social provider, exchanged for a backend identity.
   *
   * A cached provider session is always signed out first so the user gets the
   * account picker instead of silently reusing the previous account.
   * @returns CANCELLED when the user backs out of the provider flow.
   * @throws UnexpectedAuthFailureError for provider errors and failed credential exchanges.
   */
  public async signInWithSocial(providerId: SocialProviderId): Promise<SignInOutcome<SocialSignInStatus>> {
    const operation: AuthOperation = `${providerId} sign-in`;
    const provider = this.socialProviders.get(providerId);
    if (!provider) {
      throw this.unexpectedFailure(operation, `no sign-in provider is registered for "${providerId}"`);
    }

    let result: InteractiveSignInResult | null;
    try {
      if (await provider.hasActiveSession()) {
        await provider.signOut();
      }
      result = await provider.interactiveSignIn();
    } catch (error: unknown) {
      throw this.unexpectedFailure(operation, describeError(error), error);
    }

    if (result === null || result.status === 'cancelled') {
      this.logger.info(`[AuthResultNormalizer] ${operation} cancelled by user`);
      return signInFailure(SocialSignInStatus.Cancelled);
    }
    if (result.status === 'error') {
      throw this.unexpectedFailure(operation, `provider reported an error: ${result.message}`);
    }

    let identity: AuthIdentity | null;
    try {
      identity = await this.backend.exchangeSocialCredential(result.credential);
    } catch (error: unknown) {
      throw this.unexpectedFailure(operation, `credential exchange failed: ${describeError(error)}`, error);
    }
    return signInSuccess(SocialSignInStatus.Success, this.requireIdentity(operation, identity));
  }

  public signInWithGoogle(): Promise<SignInOutcome<SocialSignInStatus>> {
    return this.signInWithSocial('google');
  }

  public signInWithFacebook(): Promise<SignInOutcome<SocialSignInStatus>> {
    return this.signInWithSocial('facebook');
  }

  /**
   * @returns The signed-in identity's token, or null when nobody is signed in.
   */
  public async getIdentityToken(): Promise<string | null> {
    const identity = await this.backend.currentIdentity();
    return identity ? identity.idToken : null;
  }

  /**
   * Sign out of a single social provider. The backend session is left alone.
   */
  public async signOutOfProvider(providerId: SocialProviderId): Promise<void> {
    const provider = this.socialProviders.get(providerId);
    if (!provider) {
      this.logger.debug(`[AuthResultNormalizer] No ${providerId} provider registered, nothing to sign out`);
      return;
    }
    if (await provider.hasActiveSession()) {
      await provider.signOut();
    }
  }

  public signOutOfGoogle(): Promise<void> {
    return this.signOutOfProvider('google');
  }

  public signOutOfFacebook(): Promise<void> {
    return this.signOutOfProvider('facebook');
  }

  /**
   * Sign out of every social provider, then out of the backend.
   * The backend goes last so no social session is left behind once it is signed out.
   */
  public async signOutOfAll(): Promise<void> {
    for (const providerId of this.socialProviders.keys()) {
      await this.signOutOfProvider(providerId);
    }
    await this.backend.signOut();
  }

  private mapProviderRejection<S>(
    operation: AuthOperation,
    error: unknown,
    decode: (code: string) => DecodedProviderError<S>
  ): SignInFailure<S> {
    if (!(error instanceof IdentityProviderError)) {
      throw this.unexpectedFailure(operation, describeError(error), error);
    }

    const decoded = decode(error.code);
    if (decoded.kind === 'unmapped') {
      throw this.unexpectedFailure(operation, `unrecognized ${error.provider} error code ${decoded.code}`, error);
    }
    this.logger.info(`[AuthResultNormalizer] ${operation} rejected by ${error.provider} with ${error.code}`);
    return signInFailure(decoded.status);
  }

  private requireIdentity(operation: AuthOperation, identity: AuthIdentity | null | undefined): AuthIdentity {
    if (!identity) {
      throw this.unexpectedFailure(operation, 'provider reported success without an identity');
    }
    return identity;
  }

  private unexpectedFailure(operation: AuthOperation, detail: string, cause?: unknown): UnexpectedAuthFailureError {
    const failure = new UnexpectedAuthFailureError(operation, detail, cause);
    this.logger.error(`[AuthResultNormalizer] ${failure.message}`);
    return failure;
  }
}
