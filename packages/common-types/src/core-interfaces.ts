export type SocialProviderId = 'google' | 'facebook';

export type IdentityProviderKind = 'password' | SocialProviderId;

/**
 * Authenticated user as produced by an identity backend.
 * Sign-in operations forward it to callers without modification.
 */
export interface AuthIdentity {
  userId: string;
  provider: IdentityProviderKind;
  idToken: string;
  email?: string;
  displayName?: string;
}

/**
 * Token material handed back by a social provider after an interactive sign-in,
 * to be exchanged with the identity backend.
 */
export interface SocialCredential {
  provider: SocialProviderId;
  accessToken: string;
  idToken?: string; // Google issues one, Facebook does not
}

export type InteractiveSignInResult =
  | { status: 'signed-in'; credential: SocialCredential }
  | { status: 'cancelled' }
  | { status: 'error'; message: string };

export interface ISocialSignInProvider {
  readonly providerId: SocialProviderId;

  /**
   * Whether the provider currently holds a cached session for this device or client.
   */
  hasActiveSession(): Promise<boolean>;

  signOut(): Promise<void>;

  /**
   * Runs the provider's interactive sign-in flow.
   * @returns The outcome reported by the provider. Some providers report a
   *          cancelled flow by resolving null instead of a `cancelled` status.
   */
  interactiveSignIn(): Promise<InteractiveSignInResult | null>;
}

export interface IIdentityBackend {
  /**
   * Creates an email/password account and signs it in.
   * Recognized rejections are thrown as IdentityProviderError carrying the native code.
   */
  createAccount(email: string, password: string): Promise<AuthIdentity | null>;

  signIn(email: string, password: string): Promise<AuthIdentity | null>;

  /**
   * Exchanges a social provider credential for a backend identity.
   */
  exchangeSocialCredential(credential: SocialCredential): Promise<AuthIdentity | null>;

  currentIdentity(): Promise<AuthIdentity | null>;

  signOut(): Promise<void>;
}

export interface ILogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  log(message: string, ...args: unknown[]): void;
}
