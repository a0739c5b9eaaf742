// One flight-offer query per candidate date. Failures never escape: a date that
// cannot be queried simply contributes no offers.
import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { logger } from '@/services/logger';
import { UpstreamQueryError } from '@/utils/errors';
import { flightOfferSchema, type FlightOffer } from '@/services/flights/flight-offer';
import { describeHttpError, httpStatusOf } from '@/services/flights/http-error';

const log = logger.getSubLogger({ name: 'flight-offers' });

export const MAX_OFFERS_PER_DATE = 10;
export const DEFAULT_QUERY_TIMEOUT_MS = 10_000;

const responseSchema = z.object({ data: z.array(z.unknown()) });

export interface FetchOptions {
  signal?: AbortSignal;
  /** Called when the upstream rejects the bearer token (401). */
  onUnauthorized?: () => void;
}

export interface FlightOfferClient {
  fetchOffersForDate(
    origin: string,
    destination: string,
    date: string,
    token: string,
    options?: FetchOptions,
  ): Promise<FlightOffer[]>;
}

export interface AmadeusFlightOfferClientOptions {
  baseUrl: string;
  timeoutMs?: number;
}

export class AmadeusFlightOfferClient implements FlightOfferClient {
  constructor(
    private readonly http: AxiosInstance,
    private readonly options: AmadeusFlightOfferClientOptions,
  ) {}

  async fetchOffersForDate(
    origin: string,
    destination: string,
    date: string,
    token: string,
    options: FetchOptions = {},
  ): Promise<FlightOffer[]> {
    try {
      const offers = await this.query(origin, destination, date, token, options.signal);
      if (offers.length === 0) {
        log.info('flight-offers:none_for_date', { date });
      } else {
        log.info('flight-offers:found', { date, count: offers.length });
      }
      return offers;
    } catch (err) {
      const failure =
        err instanceof UpstreamQueryError
          ? err
          : new UpstreamQueryError(`API error for date ${date}: ${describeHttpError(err)}`, date, httpStatusOf(err), {
              cause: err,
            });
      log.error('flight-offers:query_failed', { date, status: failure.status, message: failure.message });
      if (failure.status === 401) options.onUnauthorized?.();
      return [];
    }
  }

  private async query(
    origin: string,
    destination: string,
    date: string,
    token: string,
    signal?: AbortSignal,
  ): Promise<FlightOffer[]> {
    const res = await this.http.get(`${this.options.baseUrl}/v2/shopping/flight-offers`, {
      params: {
        originLocationCode: origin,
        destinationLocationCode: destination,
        departureDate: date,
        adults: 1,
        nonStop: false,
        currencyCode: 'USD',
        max: MAX_OFFERS_PER_DATE,
      },
      headers: { Authorization: `Bearer ${token}` },
      timeout: this.options.timeoutMs ?? DEFAULT_QUERY_TIMEOUT_MS,
      signal,
    });

    const body = responseSchema.safeParse(res.data);
    if (!body.success) {
      throw new UpstreamQueryError(`Unreadable flight-offer response for date ${date}`, date, res.status);
    }

    const offers: FlightOffer[] = [];
    for (const raw of body.data.data) {
      const parsed = flightOfferSchema.safeParse(raw);
      if (parsed.success) {
        offers.push(parsed.data);
      } else {
        log.warn('flight-offers:invalid_offer_skipped', {
          date,
          issues: parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
        });
      }
    }
    return offers;
  }
}
