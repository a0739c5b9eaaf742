import type { DestinationCandidate, PreferenceProfile, RankedDestination } from '@/services/destinations/types';
import { scoreDestination } from '@/services/destinations/preference-scorer';
import { AI_ASSISTED_WEIGHTS, type ScoringWeights } from '@/services/destinations/scoring-weights';

export const DEFAULT_TOP_N = 6;

export interface RankOptions {
  topN?: number;
  weights?: ScoringWeights;
}

export function estimateTotalCost(destination: DestinationCandidate, tripDays: number): number {
  return destination.flightCost + destination.dailyCost * tripDays;
}

/**
 * Drops candidates whose estimated trip cost exceeds the budget, scores the rest
 * and returns the best `topN` by descending match score. Equal scores keep their
 * input order. An empty list is a valid answer.
 */
export function rankDestinations(
  candidates: DestinationCandidate[],
  budget: number,
  profile: PreferenceProfile,
  options: RankOptions = {},
): RankedDestination[] {
  const weights = options.weights ?? AI_ASSISTED_WEIGHTS;
  const topN = options.topN ?? DEFAULT_TOP_N;

  const survivors: RankedDestination[] = [];
  for (const candidate of candidates) {
    const totalEstimatedCost = estimateTotalCost(candidate, weights.tripDays);
    if (totalEstimatedCost > budget) continue;
    survivors.push({
      ...candidate,
      totalEstimatedCost,
      matchScore: scoreDestination(candidate, profile, weights),
    });
  }

  // Array.prototype.sort is stable.
  survivors.sort((a, b) => b.matchScore - a.matchScore);
  return survivors.slice(0, Math.max(0, topN));
}
