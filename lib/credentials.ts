import bcrypt from 'bcryptjs';
import Database from 'better-sqlite3';
import crypto from 'node:crypto';
import { config } from './config';
import type { Db } from './db';

export type CreateAccountResult = { ok: true } | { ok: false; error: 'DuplicateUsername' };

export interface HashOptions {
  rounds?: number;
}

const LEGACY_DIGEST = /^[a-f0-9]{64}$/i;

let placeholderHash: Promise<string> | null = null;

export function accountExists(db: Db): boolean {
  const row = db.prepare('SELECT COUNT(*) AS count FROM teachers').get() as { count: number };
  return row.count > 0;
}

export async function createAccount(
  db: Db,
  username: string,
  password: string,
  options: HashOptions = {}
): Promise<CreateAccountResult> {
  const passwordHash = await bcrypt.hash(password, options.rounds ?? config.bcryptRounds);
  try {
    db.prepare('INSERT INTO teachers (username, password_hash) VALUES (?, ?)').run(username, passwordHash);
  } catch (error) {
    if (isUniqueViolation(error)) {
      return { ok: false, error: 'DuplicateUsername' };
    }
    throw error;
  }
  return { ok: true };
}

export async function verify(db: Db, username: string, password: string, options: HashOptions = {}): Promise<boolean> {
  const rounds = options.rounds ?? config.bcryptRounds;
  const row = db.prepare('SELECT id, password_hash AS passwordHash FROM teachers WHERE username = ?').get(username) as
    | { id: number; passwordHash: string }
    | undefined;

  if (!row) {
    // Burn a comparison so unknown usernames cost about as much as known ones.
    await bcrypt.compare(password, await getPlaceholderHash(rounds));
    return false;
  }

  if (LEGACY_DIGEST.test(row.passwordHash)) {
    if (!matchesLegacyDigest(password, row.passwordHash)) {
      return false;
    }
    const upgraded = await bcrypt.hash(password, rounds);
    db.prepare('UPDATE teachers SET password_hash = ? WHERE id = ?').run(upgraded, row.id);
    return true;
  }

  return bcrypt.compare(password, row.passwordHash);
}

function matchesLegacyDigest(password: string, stored: string) {
  const candidate = crypto.createHash('sha256').update(password, 'utf-8').digest();
  return crypto.timingSafeEqual(candidate, Buffer.from(stored, 'hex'));
}

function getPlaceholderHash(rounds: number) {
  if (!placeholderHash) {
    placeholderHash = bcrypt.hash(crypto.randomBytes(16).toString('hex'), rounds);
  }
  return placeholderHash;
}

function isUniqueViolation(error: unknown) {
  return error instanceof Database.SqliteError && error.code.startsWith('SQLITE_CONSTRAINT_UNIQUE');
}
