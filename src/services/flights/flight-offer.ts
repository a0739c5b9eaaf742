// Flight-offer shapes as returned by the Amadeus flight-offers search, plus the
// summaries the aggregator derives from them.
import { z } from 'zod';

const endpointSchema = z
  .object({
    iataCode: z.string(),
    at: z.string(),
    terminal: z.string().optional(),
  })
  .passthrough();

export const flightSegmentSchema = z
  .object({
    departure: endpointSchema,
    arrival: endpointSchema,
    carrierCode: z.string(),
    number: z.string(),
    aircraft: z.object({ code: z.string() }).passthrough().optional(),
    duration: z.string().optional(),
    numberOfStops: z.number().optional(),
  })
  .passthrough();

export const itinerarySchema = z
  .object({
    duration: z.string(),
    segments: z.array(flightSegmentSchema).min(1),
  })
  .passthrough();

export const flightOfferSchema = z
  .object({
    id: z.string(),
    price: z
      .object({
        total: z
          .string()
          .refine((v) => v.trim() !== '' && Number.isFinite(Number(v)) && Number(v) >= 0, {
            message: 'price.total must be a non-negative number',
          }),
        currency: z.string(),
        grandTotal: z.string().optional(),
      })
      .passthrough(),
    itineraries: z.array(itinerarySchema).min(1),
    validatingAirlineCodes: z.array(z.string()).default([]),
    numberOfBookableSeats: z.number().optional(),
    lastTicketingDate: z.string().optional(),
  })
  .passthrough();

export type FlightSegment = z.infer<typeof flightSegmentSchema>;
export type Itinerary = z.infer<typeof itinerarySchema>;
export type FlightOffer = z.infer<typeof flightOfferSchema>;

/** An offer tagged with the candidate date whose query produced it. */
export type DatedFlightOffer = FlightOffer & { searchDate: string };

export interface FlightOfferSummary {
  price: number;
  currency: string;
  departureDate: string;
  duration: string;
  durationMinutes: number;
  durationDisplay: string;
  segments: number;
  airline: string;
  route: string;
  offer: DatedFlightOffer;
}

export interface AggregationResult {
  totalOffersFound: number;
  searchPeriod: string;
  datesSearched: number;
  datesWithOffers: number;
  cheapest: FlightOfferSummary;
  shortest: FlightOfferSummary;
}

export function offerPrice(offer: FlightOffer): number {
  return Number(offer.price.total);
}
