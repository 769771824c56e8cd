import { loadAuthConfigFromEnv } from './loadAuthConfig';

const baseEnv: NodeJS.ProcessEnv = {
  AWS_REGION: 'us-east-2',
  COGNITO_USER_POOL_ID: 'us-east-2_TestPool',
  COGNITO_CLIENT_ID: 'test-client-id',
  COGNITO_IDENTITY_POOL_ID: 'us-east-2:00000000-0000-0000-0000-000000000000',
};

describe('loadAuthConfigFromEnv', () => {
  it('should build the configuration with both social providers by default', () => {
    expect(loadAuthConfigFromEnv(baseEnv)).toEqual({
      region: 'us-east-2',
      userPoolId: 'us-east-2_TestPool',
      clientId: 'test-client-id',
      identityPoolId: 'us-east-2:00000000-0000-0000-0000-000000000000',
      socialProviders: ['google', 'facebook'],
    });
  });

  it('should parse a comma separated provider list', () => {
    const config = loadAuthConfigFromEnv({ ...baseEnv, SOCIAL_PROVIDERS: ' facebook , google,' });
    expect(config.socialProviders).toEqual(['facebook', 'google']);
  });

  it('should allow disabling social sign-in without an identity pool', () => {
    const config = loadAuthConfigFromEnv({ ...baseEnv, SOCIAL_PROVIDERS: '', COGNITO_IDENTITY_POOL_ID: '' });
    expect(config.socialProviders).toEqual([]);
    expect(config.identityPoolId).toBeUndefined();
  });

  it('should report unsupported providers and validation errors together', () => {
    expect(() =>
      loadAuthConfigFromEnv({ ...baseEnv, COGNITO_CLIENT_ID: '', SOCIAL_PROVIDERS: 'google,twitter' })
    ).toThrow(
      'Invalid auth service configuration: SOCIAL_PROVIDERS contains unsupported provider "twitter". clientId is required.'
    );
  });

  it('should read process.env when no environment is passed', () => {
    const originalEnv = process.env;
    process.env = { ...originalEnv, ...baseEnv, SOCIAL_PROVIDERS: 'google' };
    try {
      expect(loadAuthConfigFromEnv().socialProviders).toEqual(['google']);
    } finally {
      process.env = originalEnv;
    }
  });
});
