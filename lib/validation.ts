import { z } from 'zod';
import { ITEM_STATUSES } from './lifecycle';

const requiredText = (message: string) => z.string({ required_error: message, invalid_type_error: message }).trim().min(1, message);

const FILL_ALL = 'Please fill all text fields.';

export const ItemFormSchema = z.object({
  description: requiredText(FILL_ALL),
  foundLocation: requiredText(FILL_ALL),
  collectLocation: requiredText(FILL_ALL)
});

export const CredentialsSchema = z.object({
  username: requiredText('Provide username and password.'),
  password: z.string({ required_error: 'Provide username and password.' }).min(1, 'Provide username and password.')
});

export const NewAccountSchema = CredentialsSchema.extend({
  confirmPassword: z.string().optional()
}).refine((value) => value.confirmPassword === undefined || value.confirmPassword === value.password, {
  message: 'Passwords do not match.',
  path: ['confirmPassword']
});

export const ItemIntentSchema = z.object({
  id: z.coerce.number({ invalid_type_error: 'Item id must be a number' }).int().positive('Item id must be positive'),
  intent: z.enum(['collect', 'archive', 'restore', 'delete'])
});

export type ItemIntent = z.infer<typeof ItemIntentSchema>['intent'];

const IsoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Dates must use YYYY-MM-DD')
  .optional()
  .catch(undefined);

export const BrowseFilterSchema = z.object({
  view: z.enum(ITEM_STATUSES).catch('lost'),
  from: IsoDate,
  to: IsoDate
});

/** Upload-date bounds for the browse page; either side may be left open. */
export function browseDateRange({ from, to }: { from?: string; to?: string }): readonly [string | null, string | null] | undefined {
  if (!from && !to) return undefined;
  return [from ?? null, to ?? null];
}

/** First validation message, for redirect notices. */
export function firstIssue(error: z.ZodError): string {
  return error.issues[0]?.message ?? 'Invalid input.';
}

/** Reads string fields from submitted form data; files and missing fields become undefined. */
export function formFields(form: FormData, names: readonly string[]): Record<string, string | undefined> {
  const fields: Record<string, string | undefined> = {};
  for (const name of names) {
    const value = form.get(name);
    fields[name] = typeof value === 'string' ? value : undefined;
  }
  return fields;
}

/** Picks single-valued query parameters, as Next.js passes `searchParams`. */
export function singleParams(searchParams: Record<string, string | string[] | undefined>): Record<string, string> {
  const params: Record<string, string> = {};
  for (const [key, value] of Object.entries(searchParams)) {
    if (typeof value === 'string' && value.length) {
      params[key] = value;
    }
  }
  return params;
}
