// Built-in destination tables: the curated fallback for recommendations and the
// budget explorer's catalog. Both are validated once at load.
import { z } from 'zod';
import fallbackData from '@/data/fallback-destinations.json';
import catalogData from '@/data/budget-catalog.json';
import { COST_BRACKETS, type CostBracket, type DestinationCandidate } from '@/services/destinations/types';

/** Per-day spend assumed for each cost-of-living bracket in the budget explorer. */
export const DAILY_COST_BY_BRACKET: Readonly<Record<CostBracket, number>> = Object.freeze({
  Low: 50,
  Medium: 100,
  High: 200,
});

const baseRecord = {
  city: z.string().min(1),
  country: z.string().min(1),
  flightCost: z.number().nonnegative(),
  climate: z.string().min(1),
  visaFree: z.boolean(),
  safetyScore: z.number().min(0).max(100),
  costOfLiving: z.enum(COST_BRACKETS),
  highlights: z.array(z.string()),
};

const fallbackRecordSchema = z.object({
  ...baseRecord,
  dailyCost: z.number().nonnegative(),
  whyRecommended: z.string().optional(),
  bestTime: z.string().optional(),
  insiderTip: z.string().optional(),
});

const catalogRecordSchema = z.object(baseRecord);

export const FALLBACK_DESTINATIONS: readonly DestinationCandidate[] = Object.freeze(
  z.array(fallbackRecordSchema).min(6).parse(fallbackData),
);

export const BUDGET_CATALOG: readonly DestinationCandidate[] = Object.freeze(
  z
    .array(catalogRecordSchema)
    .parse(catalogData)
    .map((entry) => ({ ...entry, dailyCost: DAILY_COST_BY_BRACKET[entry.costOfLiving] })),
);
