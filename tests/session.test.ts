import jwt from 'jsonwebtoken';
import { describe, expect, it } from 'vitest';
import { ANONYMOUS_SESSION, readSession, sessionCookieOptions, signSession } from '../lib/session';

const SECRET = 'test-secret';

describe('staff session', () => {
  it('round-trips a signed-in username', () => {
    const token = signSession('alice', { secret: SECRET, hours: 1 });
    expect(readSession(token, { secret: SECRET })).toEqual({ loggedIn: true, username: 'alice' });
  });

  it('treats missing or tampered cookies as anonymous', () => {
    expect(readSession(undefined, { secret: SECRET })).toBe(ANONYMOUS_SESSION);
    expect(readSession('', { secret: SECRET })).toBe(ANONYMOUS_SESSION);
    expect(readSession('not-a-token', { secret: SECRET })).toBe(ANONYMOUS_SESSION);
    expect(readSession(signSession('alice', { secret: 'other-secret' }), { secret: SECRET })).toBe(ANONYMOUS_SESSION);
  });

  it('expires sessions', () => {
    const expired = signSession('alice', { secret: SECRET, hours: -1 });
    expect(readSession(expired, { secret: SECRET })).toBe(ANONYMOUS_SESSION);
  });

  it('requires a username claim', () => {
    const token = jwt.sign({ role: 'teacher' }, SECRET, { algorithm: 'HS256' });
    expect(readSession(token, { secret: SECRET })).toBe(ANONYMOUS_SESSION);
  });

  it('issues http-only cookies for the session lifetime', () => {
    expect(sessionCookieOptions(2)).toEqual({
      httpOnly: true,
      secure: false,
      sameSite: 'lax',
      path: '/',
      maxAge: 7200
    });
  });
});
