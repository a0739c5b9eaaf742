import { afterAll, beforeAll, describe, it, expect, vi } from 'vitest';
import express, { type ErrorRequestHandler } from 'express';
import type { Server } from 'node:http';
import { FlightAggregator } from '@/services/flights/flight-aggregator';
import type { FetchOptions, FlightOfferClient } from '@/services/flights/flight-offer-client';
import type { FlightOffer } from '@/services/flights/flight-offer';
import { RecommendationService } from '@/services/destinations/recommendation-source';
import { TravelCore } from '@/services/travel-core';
import { createFlightRoutes } from '@/routes/flights';
import { errorHandler } from '@/middleware/errorHandler';
import { requestTimeout } from '@/stability/errorHandlers';

/** Answers only once the search is abandoned. */
class StalledOfferClient implements FlightOfferClient {
  private notifyAbandoned: () => void = () => undefined;
  readonly abandoned = new Promise<void>((resolve) => {
    this.notifyAbandoned = resolve;
  });

  fetchOffersForDate(
    _origin: string,
    _destination: string,
    _date: string,
    _token: string,
    options?: FetchOptions,
  ): Promise<FlightOffer[]> {
    return new Promise((resolve) => {
      options?.signal?.addEventListener(
        'abort',
        () => {
          this.notifyAbandoned();
          resolve([]);
        },
        { once: true },
      );
    });
  }
}

const client = new StalledOfferClient();
const routeErrors = vi.fn();
let server: Server;
let baseUrl: string;

beforeAll(async () => {
  const flights = new FlightAggregator(client, { getToken: async () => 'test-token', invalidate: () => undefined });
  const travel = new TravelCore(flights, new RecommendationService(null));
  const recordError: ErrorRequestHandler = (err, req, res, next) => {
    routeErrors(err);
    errorHandler(err, req, res, next);
  };

  const app = express();
  app.use(requestTimeout(1_000, 30));
  app.use('/api/flights', createFlightRoutes(travel));
  app.use(recordError);

  await new Promise<void>((resolve) => {
    server = app.listen(0, () => resolve());
  });
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('server is not listening on a TCP port');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

describe('request timeout on a flight search', () => {
  it('answers 408, abandons the search and writes nothing afterwards', async () => {
    const res = await fetch(`${baseUrl}/api/flights/search?origin=JFK&destination=LHR&months=1`);
    const body = await res.json();

    expect(res.status).toBe(408);
    expect(body).toEqual({ success: false, message: 'Request exceeded 30ms timeout', code: 'REQUEST_TIMEOUT' });

    await client.abandoned;
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(routeErrors).not.toHaveBeenCalled();
  });
});
