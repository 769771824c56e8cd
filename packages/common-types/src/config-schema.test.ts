import {
  AuthServiceConfiguration,
  isSocialProviderId,
  validateAuthServiceConfiguration,
} from './config-schema';

const validConfig: AuthServiceConfiguration = {
  region: 'us-east-2',
  userPoolId: 'us-east-2_TestPool',
  clientId: 'test-client-id',
  identityPoolId: 'us-east-2:00000000-0000-0000-0000-000000000000',
  socialProviders: ['google', 'facebook'],
};

describe('validateAuthServiceConfiguration', () => {
  it('should accept a complete configuration', () => {
    expect(validateAuthServiceConfiguration(validConfig)).toEqual([]);
  });

  it('should accept a configuration without social providers or identity pool', () => {
    const config: AuthServiceConfiguration = {
      region: 'us-east-2',
      userPoolId: 'us-east-2_TestPool',
      clientId: 'test-client-id',
      socialProviders: [],
    };
    expect(validateAuthServiceConfiguration(config)).toEqual([]);
  });

  it('should report every missing required field', () => {
    const errors = validateAuthServiceConfiguration({
      region: '',
      userPoolId: '',
      clientId: '',
      socialProviders: [],
    });
    expect(errors).toEqual(['region is required.', 'userPoolId is required.', 'clientId is required.']);
  });

  it('should reject pools from another region', () => {
    const errors = validateAuthServiceConfiguration({
      ...validConfig,
      userPoolId: 'eu-west-1_TestPool',
      identityPoolId: 'eu-west-1:00000000-0000-0000-0000-000000000000',
    });
    expect(errors).toEqual([
      'userPoolId "eu-west-1_TestPool" does not belong to region "us-east-2".',
      'identityPoolId "eu-west-1:00000000-0000-0000-0000-000000000000" does not belong to region "us-east-2".',
    ]);
  });

  it('should require an identity pool when social providers are enabled', () => {
    const errors = validateAuthServiceConfiguration({ ...validConfig, identityPoolId: undefined });
    expect(errors).toEqual(['identityPoolId is required when social providers are enabled.']);
  });

  it('should reject duplicate social providers', () => {
    const errors = validateAuthServiceConfiguration({ ...validConfig, socialProviders: ['google', 'google'] });
    expect(errors).toEqual(['Social provider "google" is listed more than once.']);
  });
});

describe('isSocialProviderId', () => {
  it('should recognize only supported providers', () => {
    expect(isSocialProviderId('google')).toBe(true);
    expect(isSocialProviderId('facebook')).toBe(true);
    expect(isSocialProviderId('twitter')).toBe(false);
    expect(isSocialProviderId('')).toBe(false);
  });
});
