import path from 'node:path';
import { z } from 'zod';

const optionalNumber = z.preprocess((value) => {
  if (value === undefined || value === null || value === '') return undefined;
  return value;
}, z.coerce.number().positive().optional());

const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  LOSTFOUND_DB_PATH: z.string().trim().min(1).default(path.join('data', 'lostfound.db')),
  LOSTFOUND_IMAGES_DIR: z.string().trim().min(1).default(path.join('data', 'images')),
  AUTO_ARCHIVE_DAYS: z.coerce.number({ invalid_type_error: 'AUTO_ARCHIVE_DAYS must be a number' }).positive().default(30),
  SWEEP_INTERVAL_MINUTES: optionalNumber,
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(12),
  SESSION_SECRET: z.string().optional(),
  SESSION_HOURS: z.coerce.number().positive().default(8)
});

export interface AppConfig {
  environment: string;
  dbPath: string;
  imagesDir: string;
  autoArchiveDays: number;
  sweepIntervalMs: number | null;
  bcryptRounds: number;
  sessionSecret: string;
  sessionHours: number;
}

export function loadConfig(env: Partial<NodeJS.ProcessEnv> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid configuration (${issue.path.join('.')}): ${issue.message}`);
  }
  const values = parsed.data;

  // Production deployments must provide their own signing secret.
  const secret = values.SESSION_SECRET ?? '';
  if (values.NODE_ENV === 'production' && !secret) {
    throw new Error('SESSION_SECRET is required in production');
  }

  return {
    environment: values.NODE_ENV,
    dbPath: resolvePath(values.LOSTFOUND_DB_PATH),
    imagesDir: resolvePath(values.LOSTFOUND_IMAGES_DIR),
    autoArchiveDays: values.AUTO_ARCHIVE_DAYS,
    sweepIntervalMs: values.SWEEP_INTERVAL_MINUTES ? values.SWEEP_INTERVAL_MINUTES * 60_000 : null,
    bcryptRounds: values.BCRYPT_ROUNDS,
    sessionSecret: secret || 'change-this-secret',
    sessionHours: values.SESSION_HOURS
  };
}

function resolvePath(candidate: string) {
  if (candidate === ':memory:') return candidate;
  return path.isAbsolute(candidate) ? candidate : path.join(process.cwd(), candidate);
}

export const config = loadConfig();
