import { z } from 'zod';
import { preferenceProfileSchema } from '@/services/destinations/types';

const airportCode = z
  .string()
  .trim()
  .transform((v) => v.toUpperCase())
  .pipe(z.string().regex(/^[A-Z]{3}$/, 'Must be a 3-letter airport code'));

export const flightSearchQuerySchema = z.object({
  origin: airportCode,
  destination: airportCode,
  months: z.coerce.number().int().min(1).max(6).default(3),
});

export type FlightSearchQuery = z.infer<typeof flightSearchQuerySchema>;

export const destinationRequestSchema = preferenceProfileSchema.extend({
  budget: z.number().int().positive('Budget must be a positive whole number of USD'),
  topN: z.number().int().positive().max(20).default(6),
});

export type DestinationRequestBody = z.infer<typeof destinationRequestSchema>;

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: Array<{ path: string; message: string }> };

export function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    return {
      success: false,
      error: result.error.errors.map((e) => ({
        path: e.path.join('.') || 'root',
        message: e.message,
      })),
    };
  }
  return { success: true, data: result.data };
}
