import {
  AttributeType,
  CognitoIdentityProviderClient,
  GetUserCommand,
  GlobalSignOutCommand,
  InitiateAuthCommand,
  SignUpCommand,
} from '@aws-sdk/client-cognito-identity-provider';
import { CognitoIdentityClient, GetIdCommand, GetOpenIdTokenCommand } from '@aws-sdk/client-cognito-identity';
import { AuthIdentity, IIdentityBackend, SocialCredential } from '@signin-kit/common-types';
import { translateCognitoError } from './cognitoErrorCodes';

export interface CognitoIdentityBackendConfig {
  region: string;
  userPoolId: string;
  clientId: string;
  identityPoolId?: string;
}

interface CognitoSession {
  identity: AuthIdentity;
  accessToken?: string; // Only user pool sessions have one
}

// Login keys expected by Cognito identity pools for each social provider
const GOOGLE_LOGIN_KEY = 'accounts.google.com';
const FACEBOOK_LOGIN_KEY = 'graph.facebook.com';

function attributeMap(attributes: AttributeType[] | undefined): Map<string, string> {
  const map = new Map<string, string>();
  for (const attribute of attributes ?? []) {
    if (attribute.Name && attribute.Value !== undefined) {
      map.set(attribute.Name, attribute.Value);
    }
  }
  return map;
}

function buildLogins(credential: SocialCredential): Record<string, string> {
  switch (credential.provider) {
    case 'google':
      if (!credential.idToken) {
        throw new Error('Google credential is missing an id token.');
      }
      return { [GOOGLE_LOGIN_KEY]: credential.idToken };
    case 'facebook':
      return { [FACEBOOK_LOGIN_KEY]: credential.accessToken };
  }
}

/**
 * Identity backend on Amazon Cognito: email/password accounts live in a user pool,
 * social credentials are federated through an identity pool.
 *
 * Sign-up expects a pool that auto-confirms new users (e.g. with a pre sign-up
 * trigger); otherwise the follow-up sign-in fails with ERROR_USER_NOT_CONFIRMED.
 */
export class CognitoIdentityBackend implements IIdentityBackend {
  private readonly clientId: string;
  private readonly identityPoolId?: string;
  private readonly userPoolClient: CognitoIdentityProviderClient;
  private readonly identityPoolClient: CognitoIdentityClient;
  private session: CognitoSession | null = null;

  constructor(
    config: CognitoIdentityBackendConfig,
    userPoolClient?: CognitoIdentityProviderClient,
    identityPoolClient?: CognitoIdentityClient
  ) {
    if (!config.userPoolId || !config.clientId) {
      throw new Error('Cognito User Pool ID and Client ID must be provided.');
    }
    this.clientId = config.clientId;
    this.identityPoolId = config.identityPoolId;
    this.userPoolClient = userPoolClient ?? new CognitoIdentityProviderClient({ region: config.region });
    this.identityPoolClient = identityPoolClient ?? new CognitoIdentityClient({ region: config.region });
  }

  public async createAccount(email: string, password: string): Promise<AuthIdentity | null> {
    try {
      await this.userPoolClient.send(
        new SignUpCommand({
          ClientId: this.clientId,
          Username: email,
          Password: password,
          UserAttributes: [{ Name: 'email', Value: email }],
        })
      );
    } catch (error: unknown) {
      throw translateCognitoError(error);
    }
    return this.signIn(email, password);
  }

  public async signIn(email: string, password: string): Promise<AuthIdentity | null> {
    try {
      const output = await this.userPoolClient.send(
        new InitiateAuthCommand({
          ClientId: this.clientId,
          AuthFlow: 'USER_PASSWORD_AUTH',
          AuthParameters: { USERNAME: email, PASSWORD: password },
        })
      );

      const tokens = output.AuthenticationResult;
      if (!tokens || !tokens.IdToken || !tokens.AccessToken) {
        const challenge = output.ChallengeName ? ` (challenge ${output.ChallengeName})` : '';
        throw new Error(`Cognito returned no tokens for the sign-in${challenge}.`);
      }

      const user = await this.userPoolClient.send(new GetUserCommand({ AccessToken: tokens.AccessToken }));
      const attributes = attributeMap(user.UserAttributes);
      const userId = attributes.get('sub') ?? user.Username;
      if (!userId) {
        throw new Error('Cognito user has no subject identifier.');
      }

      const identity: AuthIdentity = {
        userId,
        provider: 'password',
        idToken: tokens.IdToken,
        email: attributes.get('email'),
        displayName: attributes.get('name'),
      };
      this.session = { identity, accessToken: tokens.AccessToken };
      return identity;
    } catch (error: unknown) {
      throw translateCognitoError(error);
    }
  }

  public async exchangeSocialCredential(credential: SocialCredential): Promise<AuthIdentity | null> {
    if (!this.identityPoolId) {
      throw new Error('Cognito Identity Pool ID must be provided to exchange social credentials.');
    }
    const logins = buildLogins(credential);

    const { IdentityId } = await this.identityPoolClient.send(
      new GetIdCommand({ IdentityPoolId: this.identityPoolId, Logins: logins })
    );
    if (!IdentityId) {
      throw new Error('Cognito returned no identity id for the social credential.');
    }

    const { Token } = await this.identityPoolClient.send(
      new GetOpenIdTokenCommand({ IdentityId, Logins: logins })
    );
    if (!Token) {
      throw new Error(`Cognito returned no OpenID token for identity ${IdentityId}.`);
    }

    const identity: AuthIdentity = { userId: IdentityId, provider: credential.provider, idToken: Token };
    this.session = { identity };
    return identity;
  }

  public async currentIdentity(): Promise<AuthIdentity | null> {
    return this.session ? this.session.identity : null;
  }

  public async signOut(): Promise<void> {
    const session = this.session;
    this.session = null;
    if (session && session.accessToken) {
      await this.userPoolClient.send(new GlobalSignOutCommand({ AccessToken: session.accessToken }));
    }
  }
}
