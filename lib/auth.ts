import { cookies } from 'next/headers';
import { redirect } from 'next/navigation';
import { SESSION_COOKIE, readSession, type StaffSession } from './session';

export function getSession(): StaffSession {
  return readSession(cookies().get(SESSION_COOKIE)?.value);
}

export function requireStaff(): StaffSession {
  const session = getSession();
  if (!session.loggedIn) {
    redirect('/staff?error=Please%20sign%20in%20first.');
  }
  return session;
}
