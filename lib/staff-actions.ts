import { accountExists, createAccount, verify, type HashOptions } from './credentials';
import type { Db } from './db';
import { UnsupportedImageError, saveImage } from './images';
import { archiveItem, addItem, deleteItem, getItemById, markCollected, restoreItem, type TransitionResult } from './items';
import { ANONYMOUS_SESSION, type StaffSession } from './session';
import {
  CredentialsSchema,
  ItemFormSchema,
  ItemIntentSchema,
  NewAccountSchema,
  firstIssue,
  formFields
} from './validation';

export interface ActionOutcome {
  redirectTo: string;
  notice?: string;
  error?: string;
  /** Set when the session changes; the route handler writes or clears the cookie. */
  session?: StaffSession;
}

export interface AddItemOptions {
  imageDirectory?: string;
  now?: Date;
}

const SIGN_IN_FIRST: ActionOutcome = { redirectTo: '/staff', error: 'Please sign in first.' };

export async function createAccountAction(
  db: Db,
  form: FormData,
  session: StaffSession,
  options: HashOptions = {}
): Promise<ActionOutcome> {
  const bootstrap = !accountExists(db);
  if (!bootstrap && !session.loggedIn) {
    return SIGN_IN_FIRST;
  }
  const back = bootstrap ? '/staff' : '/staff/account';

  const parsed = NewAccountSchema.safeParse(formFields(form, ['username', 'password', 'confirmPassword']));
  if (!parsed.success) {
    return { redirectTo: back, error: firstIssue(parsed.error) };
  }

  const result = await createAccount(db, parsed.data.username, parsed.data.password, options);
  if (!result.ok) {
    return { redirectTo: back, error: 'Username already exists' };
  }
  return { redirectTo: back, notice: bootstrap ? 'Teacher created. Please login below.' : 'Teacher created.' };
}

export async function loginAction(db: Db, form: FormData, options: HashOptions = {}): Promise<ActionOutcome> {
  const parsed = CredentialsSchema.safeParse(formFields(form, ['username', 'password']));
  if (!parsed.success) {
    return { redirectTo: '/staff', error: firstIssue(parsed.error) };
  }
  const { username, password } = parsed.data;
  if (!(await verify(db, username, password, options))) {
    return { redirectTo: '/staff', error: 'Invalid credentials.' };
  }
  return {
    redirectTo: '/staff/items',
    notice: `Logged in as ${username}`,
    session: { loggedIn: true, username }
  };
}

export function logoutAction(): ActionOutcome {
  return { redirectTo: '/staff', notice: 'Signed out.', session: ANONYMOUS_SESSION };
}

export async function addItemAction(
  db: Db,
  form: FormData,
  session: StaffSession,
  options: AddItemOptions = {}
): Promise<ActionOutcome> {
  if (!session.loggedIn) {
    return SIGN_IN_FIRST;
  }
  const parsed = ItemFormSchema.safeParse(formFields(form, ['description', 'foundLocation', 'collectLocation']));
  if (!parsed.success) {
    return { redirectTo: '/staff/items', error: firstIssue(parsed.error) };
  }

  let imagePath: string | null = null;
  const image = form.get('image');
  if (image !== null && typeof image !== 'string' && image.size > 0) {
    try {
      imagePath = await saveImage(Buffer.from(await image.arrayBuffer()), image.name, {
        directory: options.imageDirectory,
        now: options.now
      });
    } catch (error) {
      if (error instanceof UnsupportedImageError) {
        console.warn('Rejected item photo upload:', error.message);
        return { redirectTo: '/staff/items', error: 'Photos must be PNG or JPEG images.' };
      }
      throw error;
    }
  }

  const id = addItem(db, { ...parsed.data, imagePath }, options.now);
  return { redirectTo: '/staff/items', notice: `Item added successfully (ID ${id}).` };
}

export function itemAction(db: Db, form: FormData, session: StaffSession, now: Date = new Date()): ActionOutcome {
  if (!session.loggedIn) {
    return SIGN_IN_FIRST;
  }
  const parsed = ItemIntentSchema.safeParse(formFields(form, ['id', 'intent']));
  if (!parsed.success) {
    return { redirectTo: '/staff/items', error: firstIssue(parsed.error) };
  }
  const { id, intent } = parsed.data;

  switch (intent) {
    case 'collect':
      return transitionOutcome(markCollected(db, id, now), '/staff/items', 'Marked as collected.');
    case 'archive':
      return transitionOutcome(archiveItem(db, id), '/staff/items', 'Item archived.');
    case 'restore':
      return transitionOutcome(restoreItem(db, id), '/staff/history?view=archived', 'Restored to lost.');
    case 'delete': {
      const existing = getItemById(db, id);
      deleteItem(db, id);
      const view = existing && existing.status !== 'lost' ? existing.status : 'collected';
      return { redirectTo: `/staff/history?view=${view}`, notice: 'Deleted (if ID existed).' };
    }
  }
}

function transitionOutcome(result: TransitionResult, redirectTo: string, notice: string): ActionOutcome {
  if (result.ok) {
    return { redirectTo, notice };
  }
  if (result.error === 'NotFound') {
    return { redirectTo, error: 'Item not found.' };
  }
  return { redirectTo, error: `Item is ${result.from} and cannot be moved to ${result.to}.` };
}

/** Redirect target with the outcome's message carried in the query string. */
export function outcomeLocation(outcome: ActionOutcome): string {
  const url = new URL(outcome.redirectTo, 'http://localhost');
  if (outcome.notice) url.searchParams.set('notice', outcome.notice);
  if (outcome.error) url.searchParams.set('error', outcome.error);
  return `${url.pathname}${url.search}`;
}
