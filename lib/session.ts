import jwt from 'jsonwebtoken';
import { config } from './config';

export const SESSION_COOKIE = 'lostfound_session';

export interface StaffSession {
  loggedIn: boolean;
  username: string | null;
}

export const ANONYMOUS_SESSION: StaffSession = Object.freeze({ loggedIn: false, username: null });

interface SessionOptions {
  secret?: string;
  hours?: number;
}

export function signSession(username: string, { secret = config.sessionSecret, hours = config.sessionHours }: SessionOptions = {}) {
  return jwt.sign({ username }, secret, { algorithm: 'HS256', expiresIn: Math.round(hours * 60 * 60) });
}

/** Reads a session cookie. Missing, tampered or expired tokens yield the anonymous session. */
export function readSession(token: string | null | undefined, { secret = config.sessionSecret }: SessionOptions = {}): StaffSession {
  if (!token) return ANONYMOUS_SESSION;
  let payload: string | jwt.JwtPayload;
  try {
    payload = jwt.verify(token, secret, { algorithms: ['HS256'] });
  } catch (error) {
    if (error instanceof jwt.JsonWebTokenError) {
      return ANONYMOUS_SESSION;
    }
    throw error;
  }
  if (typeof payload === 'string' || typeof payload.username !== 'string' || !payload.username) {
    return ANONYMOUS_SESSION;
  }
  return { loggedIn: true, username: payload.username };
}

export function sessionCookieOptions(hours: number = config.sessionHours) {
  return {
    httpOnly: true,
    secure: config.environment === 'production',
    sameSite: 'lax' as const,
    path: '/',
    maxAge: hours * 60 * 60
  };
}
