import type { RankedDestination } from '@/services/destinations/types';
import { BUDGET_CATALOG } from '@/services/destinations/catalog';
import { DEFAULT_TOP_N, rankDestinations } from '@/services/destinations/destination-ranker';
import { STRICT_BUDGET_WEIGHTS } from '@/services/destinations/scoring-weights';
import {
  assertPositiveInteger,
  resolveProfile,
  type PreferenceProfileInput,
} from '@/services/destinations/request-validation';

/**
 * Budget-first discovery over the built-in catalog: flight plus three days at the
 * catalog's cost-of-living rate must fit the budget.
 */
export function exploreByBudget(
  budget: number,
  profileInput: PreferenceProfileInput,
  topN: number = DEFAULT_TOP_N,
): RankedDestination[] {
  assertPositiveInteger(budget, 'budget');
  assertPositiveInteger(topN, 'topN');
  return rankDestinations([...BUDGET_CATALOG], budget, resolveProfile(profileInput), {
    topN,
    weights: STRICT_BUDGET_WEIGHTS,
  });
}
