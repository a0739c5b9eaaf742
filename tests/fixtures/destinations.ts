import type { DestinationCandidate } from '@/services/destinations/types';

export function makeDestination(overrides: Partial<DestinationCandidate> & { city: string }): DestinationCandidate {
  return {
    country: 'Testland',
    flightCost: 300,
    dailyCost: 50,
    climate: 'Temperate',
    visaFree: true,
    safetyScore: 80,
    highlights: [],
    ...overrides,
  };
}

/** A provider answer in the snake_case shape the prompt asks for. */
export function providerRecord(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    city: 'Porto',
    country: 'Portugal',
    estimated_flight_cost: 300,
    daily_budget: 60,
    total_estimated_cost: 540,
    climate: 'Mediterranean',
    visa_free: true,
    safety_score: 90,
    match_score: 12,
    highlights: ['Food', 'Wine'],
    why_recommended: 'Riverside food scene',
    best_time: 'May-September',
    insider_tip: 'Cross the bridge on foot',
    ...overrides,
  };
}
