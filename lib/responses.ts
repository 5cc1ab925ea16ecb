import { NextResponse, type NextRequest } from 'next/server';
import { isDatabaseUnavailableError } from './db';
import { outcomeLocation, type ActionOutcome } from './staff-actions';
import { SESSION_COOKIE, readSession, sessionCookieOptions, signSession, type StaffSession } from './session';

export function sessionFromRequest(request: NextRequest): StaffSession {
  return readSession(request.cookies.get(SESSION_COOKIE)?.value);
}

/** 303 back to a page, writing or clearing the session cookie when the outcome changes it. */
export function redirectWithOutcome(request: NextRequest, outcome: ActionOutcome): NextResponse {
  const response = NextResponse.redirect(new URL(outcomeLocation(outcome), request.url), 303);
  if (outcome.session) {
    if (outcome.session.loggedIn && outcome.session.username) {
      response.cookies.set(SESSION_COOKIE, signSession(outcome.session.username), sessionCookieOptions());
    } else {
      response.cookies.delete(SESSION_COOKIE);
    }
  }
  return response;
}

export function storageErrorResponse(error: unknown): NextResponse {
  if (isDatabaseUnavailableError(error)) {
    return NextResponse.json({ error: error.message, troubleshooting: error.troubleshooting }, { status: 503 });
  }
  throw error;
}
