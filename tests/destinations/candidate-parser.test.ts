import { describe, it, expect } from 'vitest';
import { parseCandidateResponse } from '@/services/destinations/candidate-parser';
import { providerRecord } from '../fixtures/destinations';

function body(destinations: unknown[]): string {
  return JSON.stringify({ destinations }, null, 2);
}

describe('parseCandidateResponse', () => {
  it('maps provider records to candidates and drops provider scores', () => {
    const result = parseCandidateResponse(body([providerRecord()]));

    expect(result).toEqual({
      kind: 'parsed',
      skipped: 0,
      candidates: [
        {
          city: 'Porto',
          country: 'Portugal',
          flightCost: 300,
          dailyCost: 60,
          climate: 'Mediterranean',
          visaFree: true,
          safetyScore: 90,
          highlights: ['Food', 'Wine'],
          whyRecommended: 'Riverside food scene',
          bestTime: 'May-September',
          insiderTip: 'Cross the bridge on foot',
        },
      ],
    });
  });

  it('reads JSON inside a fenced block', () => {
    const result = parseCandidateResponse('```json\n' + body([providerRecord()]) + '\n```');

    expect(result.kind).toBe('parsed');
  });

  it('reads JSON surrounded by prose', () => {
    const text = `Here are my picks for you:\n${body([providerRecord()])}\nEnjoy the trip!`;

    const result = parseCandidateResponse(text);

    expect(result.kind === 'parsed' && result.candidates.map((c) => c.city)).toEqual(['Porto']);
  });

  it('skips malformed records and keeps the rest', () => {
    const { safety_score: _dropped, ...noSafety } = providerRecord({ city: 'Nowhere' });
    const result = parseCandidateResponse(
      body([noSafety, providerRecord(), providerRecord({ city: 'Faro', estimated_flight_cost: -1 })]),
    );

    expect(result.kind === 'parsed' && result.candidates.map((c) => c.city)).toEqual(['Porto']);
    expect(result.kind === 'parsed' && result.skipped).toBe(2);
  });

  it('keeps a record whose cost bracket is not recognised', () => {
    const result = parseCandidateResponse(
      body([providerRecord({ cost_of_living: 'Cheap' }), providerRecord({ city: 'Braga', cost_of_living: 'Low' })]),
    );

    expect(result.kind === 'parsed' && result.candidates.map((c) => c.costOfLiving)).toEqual([undefined, 'Low']);
  });

  it('rejects text without the destinations marker', () => {
    expect(parseCandidateResponse('Sorry, I cannot help with that.')).toEqual({
      kind: 'unparsable',
      reason: 'response has no destinations marker',
    });
  });

  it('rejects text with the marker but no object', () => {
    expect(parseCandidateResponse('No destinations match.')).toEqual({
      kind: 'unparsable',
      reason: 'response contains no JSON object',
    });
  });

  it('rejects invalid JSON', () => {
    const result = parseCandidateResponse('{"destinations": [ {"city": } ]}');

    expect(result.kind).toBe('unparsable');
    expect(result.kind === 'unparsable' && result.reason).toMatch(/^invalid JSON: /);
  });

  it('rejects a destinations field that is not a list', () => {
    expect(parseCandidateResponse('{"destinations": "none"}')).toEqual({
      kind: 'unparsable',
      reason: 'JSON has no destinations array',
    });
  });

  it('treats a list without one valid record as unparsable', () => {
    expect(parseCandidateResponse(body([{ city: 'Nowhere' }, 'Porto']))).toEqual({
      kind: 'unparsable',
      reason: 'no valid destination records (2 skipped)',
    });
    expect(parseCandidateResponse(body([]))).toEqual({
      kind: 'unparsable',
      reason: 'no valid destination records (0 skipped)',
    });
  });
});
