import { describe, it, expect } from 'vitest';
import { exploreByBudget } from '@/services/destinations/budget-explorer';
import { BUDGET_CATALOG, DAILY_COST_BY_BRACKET } from '@/services/destinations/catalog';
import { InvalidInputError } from '@/utils/errors';

describe('exploreByBudget', () => {
  it('ranks the catalog with the strict budget weights', () => {
    const result = exploreByBudget(1000, {
      climate: 'Temperate',
      visaFree: true,
      safetyImportance: 5,
      costPreference: 'High',
      interests: ['Culture'],
    });

    expect(result.map((d) => [d.city, d.matchScore, d.totalEstimatedCost])).toEqual([
      ['Buenos Aires', 100, 900],
      ['Amsterdam', 100, 940],
      ['Prague', 96, 750],
      ['Reykjavik', 94, 950],
      ['Lisbon', 79, 680],
      ['Bali', 75, 830],
    ]);
  });

  it('scores interests against the catalog highlights', () => {
    const result = exploreByBudget(
      3000,
      { climate: 'Tropical', safetyImportance: 2, costPreference: 'Low', interests: ['Food', 'Nightlife'] },
      3,
    );

    expect(result.map((d) => [d.city, d.matchScore])).toEqual([
      ['Bangkok', 87],
      ['Bali', 71],
      ['Buenos Aires', 70],
    ]);
  });

  it('returns nothing when no trip fits', () => {
    expect(exploreByBudget(500, {})).toEqual([]);
  });

  it('rejects a non-positive budget', () => {
    expect(() => exploreByBudget(0, {})).toThrow(InvalidInputError);
  });
});

describe('BUDGET_CATALOG', () => {
  it('derives the daily cost from the cost-of-living bracket', () => {
    for (const entry of BUDGET_CATALOG) {
      expect(entry.costOfLiving).toBeDefined();
      if (entry.costOfLiving) expect(entry.dailyCost).toBe(DAILY_COST_BY_BRACKET[entry.costOfLiving]);
    }
    expect(BUDGET_CATALOG.find((d) => d.city === 'Dubai')?.dailyCost).toBe(200);
  });
});
