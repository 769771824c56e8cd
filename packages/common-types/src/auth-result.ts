import { AuthIdentity } from './core-interfaces';

export interface SignInSuccess<S> {
  ok: true;
  status: S;
  identity: AuthIdentity;
}

export interface SignInFailure<S> {
  ok: false;
  status: S;
}

/**
 * Result of a sign-up or sign-in operation, generic over the operation's status enum.
 * Narrow on `ok` to reach the identity.
 */
export type SignInOutcome<S> = SignInSuccess<S> | SignInFailure<S>;

export function signInSuccess<S>(status: S, identity: AuthIdentity): SignInSuccess<S> {
  return { ok: true, status, identity };
}

export function signInFailure<S>(status: S): SignInFailure<S> {
  return { ok: false, status };
}

export function isSignInSuccess<S>(outcome: SignInOutcome<S>): outcome is SignInSuccess<S> {
  return outcome.ok;
}
