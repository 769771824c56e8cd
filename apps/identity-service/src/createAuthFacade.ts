import { CognitoIdentityProviderClient } from '@aws-sdk/client-cognito-identity-provider';
import { CognitoIdentityClient } from '@aws-sdk/client-cognito-identity';
import {
  AuthServiceConfiguration,
  ILogger,
  ISocialSignInProvider,
  validateAuthServiceConfiguration,
} from '@signin-kit/common-types';
import { AuthResultNormalizer } from './auth/AuthResultNormalizer';
import { CognitoIdentityBackend } from './auth/CognitoIdentityBackend';

export interface AuthFacadeOptions {
  logger?: ILogger;
  userPoolClient?: CognitoIdentityProviderClient;
  identityPoolClient?: CognitoIdentityClient;
}

/**
 * Wires a Cognito-backed AuthResultNormalizer from configuration.
 * Only providers listed in `config.socialProviders` are registered, in that order.
 */
export function createAuthFacade(
  config: AuthServiceConfiguration,
  socialProviders: ISocialSignInProvider[],
  options: AuthFacadeOptions = {}
): AuthResultNormalizer {
  const logger = options.logger ?? console;

  const errors = validateAuthServiceConfiguration(config);
  if (errors.length > 0) {
    throw new Error(`Invalid auth service configuration: ${errors.join(' ')}`);
  }

  const enabled = config.socialProviders.map(providerId => {
    const provider = socialProviders.find(candidate => candidate.providerId === providerId);
    if (!provider) {
      throw new Error(`No sign-in provider supplied for configured social provider "${providerId}".`);
    }
    return provider;
  });
  socialProviders
    .filter(provider => !config.socialProviders.includes(provider.providerId))
    .forEach(provider => logger.warn(`[createAuthFacade] Ignoring ${provider.providerId} provider: not enabled in configuration`));

  const backend = new CognitoIdentityBackend(config, options.userPoolClient, options.identityPoolClient);
  return new AuthResultNormalizer(backend, enabled, { logger });
}
