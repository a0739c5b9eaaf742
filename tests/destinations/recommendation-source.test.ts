import { describe, it, expect, vi } from 'vitest';
import { RecommendationService } from '@/services/destinations/recommendation-source';
import { TRAVEL_EXPERT_SYSTEM_PROMPT } from '@/services/destinations/recommendation-prompt';
import type { GenerateOptions, GenerativeTextProvider } from '@/services/llm/generative-provider';
import { InvalidInputError } from '@/utils/errors';
import { makeDestination, providerRecord } from '../fixtures/destinations';

function providerAnswering(text: string) {
  const generate = vi.fn(async (_prompt: string, _options?: GenerateOptions) => text);
  const provider: GenerativeTextProvider = { name: 'fake', generate };
  return { provider, generate };
}

function failingProvider(): GenerativeTextProvider {
  return {
    name: 'fake',
    generate: async () => {
      throw new Error('503 Service Unavailable');
    },
  };
}

const reykjavik = providerRecord({
  city: 'Reykjavik',
  country: 'Iceland',
  estimated_flight_cost: 900,
  daily_budget: 200,
  climate: 'Arctic',
  safety_score: 99,
  highlights: ['Nature'],
});

describe('RecommendationService', () => {
  it('ranks the curated table when no provider is configured', async () => {
    const service = new RecommendationService(null);

    const result = await service.getRecommendations(800, {
      visaFree: true,
      safetyImportance: 7,
      costPreference: 'Medium',
      interests: ['Food', 'Culture'],
    });

    expect(result.source).toBe('fallback');
    expect(result.destinations.map((d) => [d.city, d.matchScore, d.totalEstimatedCost])).toEqual([
      ['Lisbon', 100, 640],
      ['Krakow', 95, 620],
      ['Prague', 86, 730],
      ['Budapest', 85, 660],
      ['Istanbul', 83, 620],
    ]);
  });

  it('returns an empty fallback list when the budget covers nothing', async () => {
    const service = new RecommendationService(null);

    await expect(service.getRecommendations(300, {})).resolves.toEqual({ source: 'fallback', destinations: [] });
  });

  it('re-scores and budget-filters provider candidates', async () => {
    const { provider } = providerAnswering(JSON.stringify({ destinations: [providerRecord(), reykjavik] }));
    const service = new RecommendationService(provider);

    const result = await service.getRecommendations(1000, { visaFree: true, safetyImportance: 4, interests: ['Food'] });

    expect(result.source).toBe('ai');
    expect(result.destinations).toHaveLength(1);
    expect(result.destinations[0]).toMatchObject({ city: 'Porto', matchScore: 89, totalEstimatedCost: 540 });
  });

  it('sends the traveler profile and the system prompt to the provider', async () => {
    const { provider, generate } = providerAnswering(JSON.stringify({ destinations: [providerRecord()] }));
    const service = new RecommendationService(provider, { timeoutMs: 12_000 });

    await service.getRecommendations(800, { interests: ['Food', 'Culture'], region: 'Europe' });

    expect(generate).toHaveBeenCalledTimes(1);
    const [prompt, options] = generate.mock.calls[0];
    expect(prompt.split('\n')).toEqual(
      expect.arrayContaining([
        '- Budget: $800 USD (total trip cost including flights and 3-7 days)',
        '- Focus on destinations in/around: Europe',
        '- Climate preference: Any',
        '- Visa requirements: Any',
        '- Safety priority: 5/10',
        '- Cost preference: Medium cost destinations',
        '- Interests: Food, Culture',
      ]),
    );
    expect(options).toEqual({ system: TRAVEL_EXPERT_SYSTEM_PROMPT, timeoutMs: 12_000 });
  });

  it('falls back when the provider call fails', async () => {
    const service = new RecommendationService(failingProvider());

    const result = await service.getRecommendations(800, { visaFree: true, safetyImportance: 7, interests: ['Food', 'Culture'] });

    expect(result.source).toBe('fallback');
    expect(result.destinations[0].city).toBe('Lisbon');
  });

  it('falls back when the provider answers in prose', async () => {
    const { provider } = providerAnswering('I would suggest Lisbon in the spring.');
    const service = new RecommendationService(provider);

    await expect(service.getRecommendations(800, {})).resolves.toMatchObject({ source: 'fallback' });
  });

  it('falls back when the provider lists no usable destination', async () => {
    const { provider } = providerAnswering('{"destinations": []}');
    const service = new RecommendationService(provider);

    await expect(service.getRecommendations(800, {})).resolves.toMatchObject({ source: 'fallback' });
  });

  it('answers from the provider even when nothing fits the budget', async () => {
    const { provider } = providerAnswering(JSON.stringify({ destinations: [reykjavik] }));
    const service = new RecommendationService(provider);

    await expect(service.getRecommendations(1000, {})).resolves.toEqual({ source: 'ai', destinations: [] });
  });

  it('uses an injected fallback table', async () => {
    const service = new RecommendationService(null, {
      fallback: [makeDestination({ city: 'Testville', flightCost: 100, dailyCost: 10 })],
    });

    const result = await service.getRecommendations(500, {});

    expect(result.destinations.map((d) => d.city)).toEqual(['Testville']);
  });

  it('truncates to topN', async () => {
    const service = new RecommendationService(null);

    const result = await service.getRecommendations(5000, {}, 2);

    expect(result.destinations).toHaveLength(2);
  });

  it.each([
    [0, 6, 'budget'],
    [-50, 6, 'budget'],
    [12.5, 6, 'budget'],
    [800, 0, 'topN'],
  ])('rejects budget %s with topN %s', async (budget, topN, path) => {
    const { provider, generate } = providerAnswering('{"destinations": []}');
    const service = new RecommendationService(provider);

    const err = await service.getRecommendations(budget, {}, topN).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(InvalidInputError);
    expect(err instanceof InvalidInputError && err.errors[0].path).toBe(path);
    expect(generate).not.toHaveBeenCalled();
  });

  it('rejects an out-of-range safety importance', async () => {
    const service = new RecommendationService(null);

    const err = await service.getRecommendations(800, { safetyImportance: 11 }).catch((e: unknown) => e);

    expect(err instanceof InvalidInputError && err.errors.map((e) => e.path)).toEqual(['profile.safetyImportance']);
  });
});
