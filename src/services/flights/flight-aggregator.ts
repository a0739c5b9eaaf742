// Multi-date flight search: fan out one query per candidate date, merge, and pick
// the cheapest and the shortest offer over the whole window.
import { logger } from '@/services/logger';
import { AuthFailureError, InvalidInputError, NoFlightsFoundError, SearchAbortedError } from '@/utils/errors';
import type { TokenProvider } from '@/services/flights/amadeus-auth';
import type { FlightOfferClient } from '@/services/flights/flight-offer-client';
import { generateCandidateDates } from '@/services/flights/candidate-dates';
import { formatDuration, parseDurationMinutes } from '@/services/flights/duration';
import {
  offerPrice,
  type AggregationResult,
  type DatedFlightOffer,
  type FlightOffer,
  type FlightOfferSummary,
} from '@/services/flights/flight-offer';

const log = logger.getSubLogger({ name: 'flight-aggregator' });

export const MIN_MONTHS = 1;
export const MAX_MONTHS = 6;
const AIRPORT_CODE = /^[A-Z]{3}$/;

/** Overall time budget for one search: 30s plus 10s per month, capped at 90s. */
export function searchBudgetMs(months: number): number {
  return Math.min(90_000, Math.max(30_000, 30_000 + 10_000 * months));
}

export interface FlightAggregatorOptions {
  /** Dates queried at once. 1 queries them one after another. */
  concurrency?: number;
  /** Overrides the month-scaled budget from `searchBudgetMs`. */
  timeoutMs?: number;
  now?: () => Date;
}

export interface SearchOptions {
  signal?: AbortSignal;
}

export class FlightAggregator {
  private readonly concurrency: number;
  private readonly now: () => Date;

  constructor(
    private readonly client: FlightOfferClient,
    private readonly tokens: TokenProvider,
    private readonly options: FlightAggregatorOptions = {},
  ) {
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? 4));
    this.now = options.now ?? (() => new Date());
  }

  async search(
    origin: string,
    destination: string,
    months: number,
    options: SearchOptions = {},
  ): Promise<AggregationResult> {
    const from = origin.trim().toUpperCase();
    const to = destination.trim().toUpperCase();
    validateSearch(from, to, months);

    log.info('flight-aggregator:search_started', { origin: from, destination: to, months });
    const dates = generateCandidateDates(months, this.now());

    const controller = new AbortController();
    const aborted: { error?: SearchAbortedError } = {};
    const abort = (err: SearchAbortedError) => {
      aborted.error ??= err;
      controller.abort();
    };
    const budgetMs = this.options.timeoutMs ?? searchBudgetMs(months);
    const timer = setTimeout(
      () => abort(new SearchAbortedError(`Flight search exceeded its ${budgetMs}ms budget`)),
      budgetMs,
    );
    const onCallerAbort = () => abort(new SearchAbortedError('Flight search was cancelled'));
    if (options.signal?.aborted) onCallerAbort();
    options.signal?.addEventListener('abort', onCallerAbort, { once: true });

    let perDate: FlightOffer[][];
    try {
      perDate = await this.fetchWithFreshToken(from, to, dates, controller.signal);
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onCallerAbort);
    }
    if (aborted.error) {
      log.warn('flight-aggregator:search_aborted', { origin: from, destination: to, reason: aborted.error.message });
      throw aborted.error;
    }

    // Folded in date order so the first-encountered offer wins ties.
    const merged: DatedFlightOffer[] = [];
    perDate.forEach((offers, i) => {
      for (const offer of offers) merged.push({ ...offer, searchDate: dates[i] });
    });

    if (merged.length === 0) {
      log.warn('flight-aggregator:no_results', { origin: from, destination: to, dates: dates.length });
      throw new NoFlightsFoundError();
    }

    const { cheapest, shortest } = selectExtremes(merged);
    const result: AggregationResult = {
      totalOffersFound: merged.length,
      searchPeriod: `${months} ${months === 1 ? 'month' : 'months'}`,
      datesSearched: dates.length,
      datesWithOffers: perDate.filter((offers) => offers.length > 0).length,
      cheapest: summarizeOffer(cheapest),
      shortest: summarizeOffer(shortest),
    };
    log.info('flight-aggregator:search_complete', {
      offers: result.totalOffersFound,
      cheapest: `${result.cheapest.price} ${result.cheapest.currency}`,
      shortest: result.shortest.duration,
    });
    return result;
  }

  /**
   * A token the upstream rejects is dropped and the dates are queried once more
   * with a new one. A second rejection fails the search.
   */
  private async fetchWithFreshToken(
    origin: string,
    destination: string,
    dates: string[],
    signal: AbortSignal,
  ): Promise<FlightOffer[][]> {
    for (let attempt = 1; ; attempt++) {
      const token = await this.tokens.getToken();
      const auth = { rejected: false };
      const perDate = await this.fetchAllDates(origin, destination, dates, token, signal, () => {
        auth.rejected = true;
      });
      if (!auth.rejected || signal.aborted) return perDate;

      this.tokens.invalidate();
      log.warn('flight-aggregator:token_rejected', { attempt });
      if (attempt >= 2) {
        throw new AuthFailureError('Flight API rejected a freshly issued access token');
      }
    }
  }

  private async fetchAllDates(
    origin: string,
    destination: string,
    dates: string[],
    token: string,
    signal: AbortSignal,
    onUnauthorized: () => void,
  ): Promise<FlightOffer[][]> {
    const results: FlightOffer[][] = [];
    for (let i = 0; i < dates.length; i += this.concurrency) {
      if (signal.aborted) break;
      const batch = dates.slice(i, i + this.concurrency);
      const batchResults = await Promise.all(
        batch.map((date) =>
          this.client.fetchOffersForDate(origin, destination, date, token, { signal, onUnauthorized }),
        ),
      );
      results.push(...batchResults);
    }
    return results;
  }
}

function validateSearch(origin: string, destination: string, months: number): void {
  const errors: Array<{ path: string; message: string }> = [];
  if (!AIRPORT_CODE.test(origin)) errors.push({ path: 'origin', message: 'Must be a 3-letter airport code' });
  if (!AIRPORT_CODE.test(destination)) {
    errors.push({ path: 'destination', message: 'Must be a 3-letter airport code' });
  }
  if (!Number.isInteger(months) || months < MIN_MONTHS || months > MAX_MONTHS) {
    errors.push({ path: 'months', message: `Must be an integer between ${MIN_MONTHS} and ${MAX_MONTHS}` });
  }
  if (errors.length > 0) throw new InvalidInputError('Invalid flight search', errors);
}

/**
 * Cheapest by total price and shortest by the first itinerary's duration. Strict
 * comparisons keep the earliest offer on ties.
 */
export function selectExtremes<T extends FlightOffer>(offers: T[]): { cheapest: T; shortest: T } {
  if (offers.length === 0) throw new NoFlightsFoundError();
  let cheapest = offers[0];
  let shortest = offers[0];
  let lowestPrice = offerPrice(cheapest);
  let fewestMinutes = parseDurationMinutes(shortest.itineraries[0].duration);

  for (const offer of offers.slice(1)) {
    const price = offerPrice(offer);
    if (price < lowestPrice) {
      cheapest = offer;
      lowestPrice = price;
    }
    const minutes = parseDurationMinutes(offer.itineraries[0].duration);
    if (minutes < fewestMinutes) {
      shortest = offer;
      fewestMinutes = minutes;
    }
  }
  return { cheapest, shortest };
}

export function summarizeOffer(offer: DatedFlightOffer): FlightOfferSummary {
  const itinerary = offer.itineraries[0];
  const first = itinerary.segments[0];
  const last = itinerary.segments[itinerary.segments.length - 1];
  return {
    price: offerPrice(offer),
    currency: offer.price.currency,
    departureDate: offer.searchDate,
    duration: itinerary.duration,
    durationMinutes: parseDurationMinutes(itinerary.duration),
    durationDisplay: formatDuration(itinerary.duration),
    segments: itinerary.segments.length,
    airline: offer.validatingAirlineCodes[0] ?? first.carrierCode,
    route: `${first.departure.iataCode} → ${last.arrival.iataCode}`,
    offer,
  };
}
