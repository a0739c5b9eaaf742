// Turns free text from the generative provider into destination candidates.
// Nothing in the response is trusted: each record is validated on its own and
// malformed ones are skipped.
import { z } from 'zod';
import { COST_BRACKETS, type DestinationCandidate } from '@/services/destinations/types';

export type CandidateParseResult =
  | { kind: 'parsed'; candidates: DestinationCandidate[]; skipped: number }
  | { kind: 'unparsable'; reason: string };

const providerDestinationSchema = z.object({
  city: z.string().trim().min(1),
  country: z.string().trim().min(1),
  estimated_flight_cost: z.number().nonnegative(),
  daily_budget: z.number().nonnegative(),
  climate: z.string().trim().min(1),
  visa_free: z.boolean(),
  safety_score: z.number().min(0).max(100),
  highlights: z.array(z.string()).default([]),
  cost_of_living: z.enum(COST_BRACKETS).optional().catch(undefined),
  why_recommended: z.string().optional().catch(undefined),
  best_time: z.string().optional().catch(undefined),
  insider_tip: z.string().optional().catch(undefined),
});

const envelopeSchema = z.object({ destinations: z.array(z.unknown()) });

function stripFences(raw: string): string {
  const txt = raw.trim();
  if (!txt.startsWith('```')) return txt;
  const firstNewline = txt.indexOf('\n');
  const lastFence = txt.lastIndexOf('```');
  if (firstNewline !== -1 && lastFence > firstNewline) {
    return txt.slice(firstNewline + 1, lastFence).trim();
  }
  return txt.replace(/^```\w*\n?/, '').replace(/\n?```$/, '').trim();
}

export function parseCandidateResponse(text: string): CandidateParseResult {
  if (!text.includes('destinations')) {
    return { kind: 'unparsable', reason: 'response has no destinations marker' };
  }

  const txt = stripFences(text);
  const start = txt.indexOf('{');
  const end = txt.lastIndexOf('}');
  if (start === -1 || end <= start) {
    return { kind: 'unparsable', reason: 'response contains no JSON object' };
  }

  let json: unknown;
  try {
    json = JSON.parse(txt.slice(start, end + 1));
  } catch (err) {
    return { kind: 'unparsable', reason: `invalid JSON: ${err instanceof Error ? err.message : String(err)}` };
  }

  const envelope = envelopeSchema.safeParse(json);
  if (!envelope.success) {
    return { kind: 'unparsable', reason: 'JSON has no destinations array' };
  }

  const candidates: DestinationCandidate[] = [];
  for (const raw of envelope.data.destinations) {
    const record = providerDestinationSchema.safeParse(raw);
    if (!record.success) continue;
    const d = record.data;
    candidates.push({
      city: d.city,
      country: d.country,
      flightCost: d.estimated_flight_cost,
      dailyCost: d.daily_budget,
      climate: d.climate,
      visaFree: d.visa_free,
      safetyScore: d.safety_score,
      highlights: d.highlights,
      costOfLiving: d.cost_of_living,
      whyRecommended: d.why_recommended,
      bestTime: d.best_time,
      insiderTip: d.insider_tip,
    });
  }

  const skipped = envelope.data.destinations.length - candidates.length;
  if (candidates.length === 0) {
    return { kind: 'unparsable', reason: `no valid destination records (${skipped} skipped)` };
  }
  return { kind: 'parsed', candidates, skipped };
}
