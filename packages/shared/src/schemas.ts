import { isMatch } from 'date-fns';
import { z } from 'zod';

import { isKnownZone } from './utils/time';

export const SUPPORTED_LOCALES = ['en-US', 'en-GB', 'de', 'fr'] as const;

export const zoneIdentifierSchema = z
  .string()
  .trim()
  .min(1)
  .refine(isKnownZone, { message: 'Unknown time zone' })
  .brand<'ZoneIdentifier'>();

export const calendarDateSchema = z
  .string()
  .trim()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be YYYY-MM-DD')
  // Checked on the string: Date-based checks read years 0-99 as 1900-1999
  .refine((value) => isMatch(value, 'yyyy-MM-dd'), { message: 'Date does not exist' })
  .transform((value) => {
    const [year, month, day] = value.split('-').map(Number);
    return { year, month, day };
  });

export const wallTimeSchema = z
  .string()
  .trim()
  .regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Time must be HH:MM (24-hour)')
  .transform((value) => {
    const [hour, minute] = value.split(':').map(Number);
    return { hour, minute };
  });

export const durationHoursSchema = z
  .string()
  .trim()
  .regex(/^\d+(\.\d+)?$/, 'Duration must be a number of hours')
  .transform(Number)
  .pipe(z.number().positive().max(48));

export const formatPresetSchema = z.object({
  pattern: z.string().min(1),
  locale: z.enum(SUPPORTED_LOCALES).default('en-US'),
  description: z.string().optional(),
});

export const presetFileSchema = z.record(
  z.string().regex(/^[A-Za-z0-9_-]+$/, 'Preset names are letters, digits, _ or -'),
  formatPresetSchema,
);

export const citySchema = z.object({
  name: z.string().min(1),
  zone: zoneIdentifierSchema,
  preset: z.string().min(1),
});

export const cityFileSchema = z.array(citySchema).min(1);

export function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}
