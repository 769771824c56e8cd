import * as dotenv from 'dotenv';
import {
  AuthServiceConfiguration,
  SocialProviderId,
  isSocialProviderId,
  validateAuthServiceConfiguration,
} from '@signin-kit/common-types';

const DEFAULT_SOCIAL_PROVIDERS = 'google,facebook';

function parseSocialProviders(raw: string, errors: string[]): SocialProviderId[] {
  const providers: SocialProviderId[] = [];
  raw
    .split(',')
    .map(name => name.trim())
    .filter(name => name.length > 0)
    .forEach(name => {
      if (isSocialProviderId(name)) {
        providers.push(name);
      } else {
        errors.push(`SOCIAL_PROVIDERS contains unsupported provider "${name}".`);
      }
    });
  return providers;
}

/**
 * Builds the auth service configuration from environment variables:
 * AWS_REGION, COGNITO_USER_POOL_ID, COGNITO_CLIENT_ID, COGNITO_IDENTITY_POOL_ID and
 * SOCIAL_PROVIDERS (comma separated, defaults to "google,facebook").
 *
 * When no environment is passed, a local .env file is loaded into process.env first.
 * Throws listing every problem found.
 */
export function loadAuthConfigFromEnv(env?: NodeJS.ProcessEnv): AuthServiceConfiguration {
  if (!env) {
    dotenv.config();
  }
  const source = env ?? process.env;

  const errors: string[] = [];
  const config: AuthServiceConfiguration = {
    region: source.AWS_REGION || '',
    userPoolId: source.COGNITO_USER_POOL_ID || '',
    clientId: source.COGNITO_CLIENT_ID || '',
    identityPoolId: source.COGNITO_IDENTITY_POOL_ID || undefined,
    socialProviders: parseSocialProviders(source.SOCIAL_PROVIDERS ?? DEFAULT_SOCIAL_PROVIDERS, errors),
  };
  errors.push(...validateAuthServiceConfiguration(config));

  if (errors.length > 0) {
    throw new Error(`Invalid auth service configuration: ${errors.join(' ')}`);
  }
  return config;
}
