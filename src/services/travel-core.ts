// The two operations the HTTP layer exposes, behind one object.
import type { FlightAggregator, SearchOptions } from '@/services/flights/flight-aggregator';
import type { AggregationResult } from '@/services/flights/flight-offer';
import type { RecommendationResult, RecommendationService } from '@/services/destinations/recommendation-source';
import type { RankedDestination } from '@/services/destinations/types';
import type { PreferenceProfileInput } from '@/services/destinations/request-validation';
import { exploreByBudget } from '@/services/destinations/budget-explorer';
import { DEFAULT_TOP_N } from '@/services/destinations/destination-ranker';

export class TravelCore {
  constructor(
    private readonly flights: FlightAggregator,
    private readonly recommendations: RecommendationService,
  ) {}

  /** Cheapest and shortest offers over `months` months of weekly departures. */
  searchFlights(
    origin: string,
    destination: string,
    months: number,
    options?: SearchOptions,
  ): Promise<AggregationResult> {
    return this.flights.search(origin, destination, months, options);
  }

  recommendDestinations(
    budget: number,
    profile: PreferenceProfileInput,
    topN: number = DEFAULT_TOP_N,
  ): Promise<RecommendationResult> {
    return this.recommendations.getRecommendations(budget, profile, topN);
  }

  exploreDestinations(
    budget: number,
    profile: PreferenceProfileInput,
    topN: number = DEFAULT_TOP_N,
  ): RankedDestination[] {
    return exploreByBudget(budget, profile, topN);
  }
}
