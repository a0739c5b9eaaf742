// Destination recommendations. Candidates come from the generative provider when it
// answers with something usable, otherwise from the curated fallback table; either
// way they are re-scored and budget-filtered here, so provider-supplied match
// scores never reach the caller.
import { logger } from '@/services/logger';
import { RecommendationProviderError, errorMessage } from '@/utils/errors';
import type { GenerativeTextProvider } from '@/services/llm/generative-provider';
import type { DestinationCandidate, PreferenceProfile, RankedDestination } from '@/services/destinations/types';
import { FALLBACK_DESTINATIONS } from '@/services/destinations/catalog';
import { parseCandidateResponse } from '@/services/destinations/candidate-parser';
import { DEFAULT_TOP_N, rankDestinations } from '@/services/destinations/destination-ranker';
import { AI_ASSISTED_WEIGHTS, type ScoringWeights } from '@/services/destinations/scoring-weights';
import {
  TRAVEL_EXPERT_SYSTEM_PROMPT,
  buildRecommendationPrompt,
} from '@/services/destinations/recommendation-prompt';
import {
  assertPositiveInteger,
  resolveProfile,
  type PreferenceProfileInput,
} from '@/services/destinations/request-validation';

const log = logger.getSubLogger({ name: 'recommendations' });

export type RecommendationOrigin = 'ai' | 'fallback';

export interface RecommendationResult {
  /** Which path served the list: the generative provider or the curated table. */
  source: RecommendationOrigin;
  destinations: RankedDestination[];
}

export interface RecommendationServiceOptions {
  weights?: ScoringWeights;
  fallback?: readonly DestinationCandidate[];
  timeoutMs?: number;
}

export class RecommendationService {
  private readonly weights: ScoringWeights;
  private readonly fallback: readonly DestinationCandidate[];

  constructor(
    private readonly provider: GenerativeTextProvider | null,
    private readonly options: RecommendationServiceOptions = {},
  ) {
    this.weights = options.weights ?? AI_ASSISTED_WEIGHTS;
    this.fallback = options.fallback ?? FALLBACK_DESTINATIONS;
  }

  async getRecommendations(
    budget: number,
    profileInput: PreferenceProfileInput,
    topN: number = DEFAULT_TOP_N,
  ): Promise<RecommendationResult> {
    assertPositiveInteger(budget, 'budget');
    assertPositiveInteger(topN, 'topN');
    const profile = resolveProfile(profileInput);

    let source: RecommendationOrigin = 'ai';
    let candidates: readonly DestinationCandidate[];
    try {
      candidates = await this.fetchProviderCandidates(budget, profile);
    } catch (err) {
      if (!(err instanceof RecommendationProviderError)) throw err;
      log.warn('recommendations:fallback', { reason: err.message });
      source = 'fallback';
      candidates = this.fallback;
    }

    const destinations = rankDestinations([...candidates], budget, profile, { topN, weights: this.weights });
    log.info('recommendations:ranked', {
      source,
      candidates: candidates.length,
      returned: destinations.length,
      budget,
    });
    return { source, destinations };
  }

  private async fetchProviderCandidates(
    budget: number,
    profile: PreferenceProfile,
  ): Promise<DestinationCandidate[]> {
    if (!this.provider) {
      throw new RecommendationProviderError('generative provider is not configured');
    }

    const prompt = buildRecommendationPrompt(budget, profile);
    let text: string;
    try {
      text = await this.provider.generate(prompt, {
        system: TRAVEL_EXPERT_SYSTEM_PROMPT,
        timeoutMs: this.options.timeoutMs,
      });
    } catch (err) {
      throw new RecommendationProviderError(`${this.provider.name} call failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const parsed = parseCandidateResponse(text);
    if (parsed.kind === 'unparsable') {
      throw new RecommendationProviderError(`unusable ${this.provider.name} response: ${parsed.reason}`);
    }
    if (parsed.skipped > 0) {
      log.warn('recommendations:records_skipped', { skipped: parsed.skipped });
    }
    return parsed.candidates;
  }
}
