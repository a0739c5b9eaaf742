/** Weight table behind every match score. */
export interface ScoringWeights {
  baseScore: number;
  climateBonus: number;
  visaBonus: number;
  /** Safety term is `safetyScore / 100 * safetyImportance * safetyScale`. */
  safetyScale: number;
  costMatchBonus: number;
  /** Per highlight shared with the traveler's interests. */
  interestWeight: number;
  /** Days of daily cost added to the flight cost for the budget test. */
  tripDays: number;
}

/** Budget explorer: plain filter over the built-in catalog. */
export const STRICT_BUDGET_WEIGHTS: Readonly<ScoringWeights> = Object.freeze({
  baseScore: 0,
  climateBonus: 30,
  visaBonus: 20,
  safetyScale: 10,
  costMatchBonus: 25,
  interestWeight: 15,
  tripDays: 3,
});

/** Generative recommendations and their curated fallback. */
export const AI_ASSISTED_WEIGHTS: Readonly<ScoringWeights> = Object.freeze({
  baseScore: 50,
  climateBonus: 25,
  visaBonus: 20,
  safetyScale: 2.5,
  costMatchBonus: 0,
  interestWeight: 10,
  tripDays: 4,
});
