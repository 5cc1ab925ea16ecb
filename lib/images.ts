import fs from 'node:fs';
import path from 'node:path';
import sharp from 'sharp';
import { config } from './config';

export class UnsupportedImageError extends Error {
  constructor(fileName: string, options?: ErrorOptions) {
    super(`${fileName} is not a PNG or JPEG image.`, options);
    this.name = 'UnsupportedImageError';
  }
}

const EXTENSIONS = new Map<string, string>([
  ['png', 'png'],
  ['jpeg', 'jpg']
]);

export const CONTENT_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg'
};

interface SaveImageOptions {
  directory?: string;
  now?: Date;
}

/** Writes an uploaded photo and returns the path to store on the item. */
export async function saveImage(
  bytes: Buffer,
  suggestedName: string,
  { directory = config.imagesDir, now }: SaveImageOptions = {}
): Promise<string> {
  let format: string | undefined;
  try {
    ({ format } = await sharp(bytes).metadata());
  } catch (error) {
    throw new UnsupportedImageError(suggestedName, { cause: error });
  }
  const extension = format ? EXTENSIONS.get(format) : undefined;
  if (!extension) {
    throw new UnsupportedImageError(suggestedName);
  }

  fs.mkdirSync(directory, { recursive: true });
  const target = path.join(directory, imageFileName(suggestedName, extension, now));
  await fs.promises.writeFile(target, bytes, { flag: 'wx' });
  return target;
}

export function imageFileName(suggestedName: string, extension: string, now: Date = new Date()): string {
  const base = path
    .basename(suggestedName, path.extname(suggestedName))
    .replace(/[^A-Za-z0-9_-]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, 60);
  return `${uploadTimestamp(now)}_${base || 'photo'}.${extension}`;
}

let lastMicros = 0n;

/** `yyyyMMddHHmmss` plus six microsecond digits (UTC), strictly increasing per process. */
export function uploadTimestamp(now: Date = new Date()): string {
  const subMillisecond = (process.hrtime.bigint() / 1000n) % 1000n;
  let micros = BigInt(now.getTime()) * 1000n + subMillisecond;
  if (micros <= lastMicros) {
    micros = lastMicros + 1n;
  }
  lastMicros = micros;
  const seconds = new Date(Number(micros / 1000n)).toISOString().slice(0, 19).replace(/[-:T]/g, '');
  return `${seconds}${(micros % 1_000_000n).toString().padStart(6, '0')}`;
}

/** Maps a requested file name to a stored image, refusing anything outside the image directory. */
export function resolveStoredImage(name: string, directory: string = config.imagesDir): string | null {
  if (!/^[A-Za-z0-9_.-]+$/.test(name) || name.startsWith('.')) {
    return null;
  }
  const filePath = path.join(directory, name);
  return fs.existsSync(filePath) ? filePath : null;
}
