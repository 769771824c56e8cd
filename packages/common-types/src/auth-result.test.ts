import { AuthIdentity } from './core-interfaces';
import { EmailSignInStatus } from './auth-status';
import { isSignInSuccess, signInFailure, signInSuccess, SignInOutcome } from './auth-result';

const identity: AuthIdentity = {
  userId: 'user-123',
  provider: 'password',
  idToken: 'id-token-123',
  email: 'reader@example.com',
};

describe('SignInOutcome', () => {
  it('signInSuccess carries the identity under an ok tag', () => {
    expect(signInSuccess(EmailSignInStatus.Success, identity)).toEqual({
      ok: true,
      status: 'SUCCESS',
      identity,
    });
  });

  it('signInFailure carries only the status', () => {
    const outcome = signInFailure(EmailSignInStatus.WrongPassword);
    expect(outcome).toEqual({ ok: false, status: 'WRONG_PASSWORD' });
    expect(Object.keys(outcome)).toEqual(['ok', 'status']);
  });

  it('isSignInSuccess narrows on the tag', () => {
    const outcomes: SignInOutcome<EmailSignInStatus>[] = [
      signInSuccess(EmailSignInStatus.Success, identity),
      signInFailure(EmailSignInStatus.UserNotFound),
    ];

    const identities = outcomes.filter(isSignInSuccess).map(outcome => outcome.identity.userId);
    expect(identities).toEqual(['user-123']);
  });
});
