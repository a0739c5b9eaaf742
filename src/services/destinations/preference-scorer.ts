import type { DestinationCandidate, PreferenceProfile } from '@/services/destinations/types';
import { AI_ASSISTED_WEIGHTS, type ScoringWeights } from '@/services/destinations/scoring-weights';

export const MIN_MATCH_SCORE = 0;
export const MAX_MATCH_SCORE = 100;

function countSharedInterests(interests: string[], highlights: string[]): number {
  const wanted = new Set(interests);
  return new Set(highlights.filter((h) => wanted.has(h))).size;
}

/**
 * How well one destination fits a profile, as an integer in [0, 100]. Every term
 * is added independently; clamping is the only normalization.
 */
export function scoreDestination(
  destination: DestinationCandidate,
  profile: PreferenceProfile,
  weights: ScoringWeights = AI_ASSISTED_WEIGHTS,
): number {
  let score = weights.baseScore;

  if (profile.climate && profile.climate !== 'Any' && destination.climate === profile.climate) {
    score += weights.climateBonus;
  }
  if (profile.visaFree && destination.visaFree) {
    score += weights.visaBonus;
  }
  score += (destination.safetyScore * profile.safetyImportance * weights.safetyScale) / 100;
  if (destination.costOfLiving !== undefined && destination.costOfLiving === profile.costPreference) {
    score += weights.costMatchBonus;
  }
  score += weights.interestWeight * countSharedInterests(profile.interests, destination.highlights);

  const clamped = Math.min(MAX_MATCH_SCORE, Math.max(MIN_MATCH_SCORE, score));
  return Math.floor(clamped);
}
