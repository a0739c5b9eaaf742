// Traveler preferences and scoreable destinations.
import { z } from 'zod';

export const CLIMATES = ['Tropical', 'Mediterranean', 'Temperate', 'Desert', 'Arctic', 'Mountain'] as const;
export const COST_BRACKETS = ['Low', 'Medium', 'High'] as const;

export type Climate = (typeof CLIMATES)[number];
export type CostBracket = (typeof COST_BRACKETS)[number];

export const preferenceProfileSchema = z.object({
  /** Omitted or "Any" means no climate preference. */
  climate: z.union([z.enum(CLIMATES), z.literal('Any')]).optional(),
  visaFree: z.boolean().default(false),
  safetyImportance: z.number().int().min(1).max(10).default(5),
  costPreference: z.enum(COST_BRACKETS).default('Medium'),
  interests: z.array(z.string().trim().min(1)).default([]),
  region: z.string().trim().min(1).optional(),
});

export type PreferenceProfile = z.infer<typeof preferenceProfileSchema>;

export interface DestinationCandidate {
  city: string;
  country: string;
  flightCost: number;
  dailyCost: number;
  /** Free text from a generative source; compared verbatim with the profile's climate. */
  climate: string;
  visaFree: boolean;
  /** 0–100. */
  safetyScore: number;
  highlights: string[];
  costOfLiving?: CostBracket;
  whyRecommended?: string;
  bestTime?: string;
  insiderTip?: string;
}

export interface RankedDestination extends DestinationCandidate {
  totalEstimatedCost: number;
  /** Integer in [0, 100]. */
  matchScore: number;
}
