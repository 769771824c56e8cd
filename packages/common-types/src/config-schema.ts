/**
 * Auth service configuration schema
 * Describes the Cognito user pool, identity pool and enabled social providers.
 */

import { SocialProviderId } from './core-interfaces';

export interface AuthServiceConfiguration {
  region: string;          // AWS region hosting the pools, e.g. "us-east-2"
  userPoolId: string;      // "<region>_<id>"
  clientId: string;        // User pool app client (must allow USER_PASSWORD_AUTH)
  identityPoolId?: string; // "<region>:<uuid>", needed to federate social credentials
  socialProviders: SocialProviderId[]; // Enabled social providers, in sign-out order
}

export const SUPPORTED_SOCIAL_PROVIDERS: readonly SocialProviderId[] = ['google', 'facebook'];

export function isSocialProviderId(value: string): value is SocialProviderId {
  return SUPPORTED_SOCIAL_PROVIDERS.some(providerId => providerId === value);
}

export function validateAuthServiceConfiguration(config: AuthServiceConfiguration): string[] {
  const errors: string[] = [];

  if (!config.region) {
    errors.push('region is required.');
  }

  if (!config.userPoolId) {
    errors.push('userPoolId is required.');
  } else if (config.region && !config.userPoolId.startsWith(`${config.region}_`)) {
    errors.push(`userPoolId "${config.userPoolId}" does not belong to region "${config.region}".`);
  }

  if (!config.clientId) {
    errors.push('clientId is required.');
  }

  if (config.identityPoolId && config.region && !config.identityPoolId.startsWith(`${config.region}:`)) {
    errors.push(`identityPoolId "${config.identityPoolId}" does not belong to region "${config.region}".`);
  }

  const seen = new Set<string>();
  config.socialProviders.forEach(providerId => {
    if (!isSocialProviderId(providerId)) {
      errors.push(`Unsupported social provider "${providerId}".`);
    }
    if (seen.has(providerId)) {
      errors.push(`Social provider "${providerId}" is listed more than once.`);
    }
    seen.add(providerId);
  });

  if (config.socialProviders.length > 0 && !config.identityPoolId) {
    errors.push('identityPoolId is required when social providers are enabled.');
  }

  return errors;
}
