import { z } from 'zod';
import { InvalidInputError } from '@/utils/errors';
import { preferenceProfileSchema, type PreferenceProfile } from '@/services/destinations/types';

export type PreferenceProfileInput = z.input<typeof preferenceProfileSchema>;

function toFieldErrors(error: z.ZodError, prefix?: string): Array<{ path: string; message: string }> {
  return error.errors.map((e) => ({
    path: [prefix, ...e.path].filter((p) => p !== undefined).join('.') || 'root',
    message: e.message,
  }));
}

export function resolveProfile(input: PreferenceProfileInput): PreferenceProfile {
  const result = preferenceProfileSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidInputError('Invalid preference profile', toFieldErrors(result.error, 'profile'));
  }
  return result.data;
}

export function assertPositiveInteger(value: number, field: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidInputError(`${field} must be a positive integer`, [
      { path: field, message: 'Must be a positive integer' },
    ]);
  }
}
