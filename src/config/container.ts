/**
 * Builds the service graph from configuration.
 */
import axios from 'axios';
import type { AppConfig } from '@/config/app.config';
import { logger } from '@/services/logger';
import { AmadeusTokenProvider } from '@/services/flights/amadeus-auth';
import { AmadeusFlightOfferClient } from '@/services/flights/flight-offer-client';
import { FlightAggregator } from '@/services/flights/flight-aggregator';
import { OpenAiTextProvider } from '@/services/llm/openai-provider';
import { RecommendationService } from '@/services/destinations/recommendation-source';
import { TravelCore } from '@/services/travel-core';

export interface Container {
  travel: TravelCore;
}

export function createContainer(config: AppConfig): Container {
  if (!config.amadeus.clientId || !config.amadeus.clientSecret) {
    logger.warn('config:missing_flight_credentials', {
      hint: 'Set AMADEUS_CLIENT_ID and AMADEUS_CLIENT_SECRET; flight searches will fail until then',
    });
  }
  if (!config.openai.apiKey) {
    logger.warn('config:missing_openai_key', { hint: 'Recommendations will use the curated table' });
  }

  const http = axios.create();
  const tokens = new AmadeusTokenProvider(http, config.amadeus);
  const offerClient = new AmadeusFlightOfferClient(http, {
    baseUrl: config.amadeus.baseUrl,
    timeoutMs: config.flightQueryTimeoutMs,
  });
  const flightAggregator = new FlightAggregator(offerClient, tokens, {
    concurrency: config.flightSearchConcurrency,
  });

  const provider = config.openai.apiKey
    ? new OpenAiTextProvider({
        apiKey: config.openai.apiKey,
        model: config.openai.model,
        timeoutMs: config.recommendationTimeoutMs,
      })
    : null;
  const recommendations = new RecommendationService(provider, {
    timeoutMs: config.recommendationTimeoutMs,
  });

  return { travel: new TravelCore(flightAggregator, recommendations) };
}
