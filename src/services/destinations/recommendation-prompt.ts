import type { PreferenceProfile } from '@/services/destinations/types';

export const TRAVEL_EXPERT_SYSTEM_PROMPT = `You are an expert travel assistant with deep knowledge of global destinations,
flight pricing, budget optimization, climate, visa requirements and safety.
Give concrete, realistic recommendations with estimated costs. Respond with JSON only.`;

export function buildRecommendationPrompt(budget: number, profile: PreferenceProfile): string {
  const lines = [
    'As a travel expert, recommend destinations for a traveler with:',
    `- Budget: $${budget} USD (total trip cost including flights and 3-7 days)`,
  ];
  if (profile.region) {
    lines.push(`- Focus on destinations in/around: ${profile.region}`);
  }
  lines.push(
    `- Climate preference: ${profile.climate ?? 'Any'}`,
    `- Visa requirements: ${profile.visaFree ? 'Visa-free only' : 'Any'}`,
    `- Safety priority: ${profile.safetyImportance}/10`,
    `- Cost preference: ${profile.costPreference} cost destinations`,
    `- Interests: ${profile.interests.length > 0 ? profile.interests.join(', ') : 'Any'}`,
    '',
    'Provide 6-8 specific destination recommendations in this JSON format:',
    JSON.stringify(
      {
        destinations: [
          {
            city: 'City Name',
            country: 'Country',
            estimated_flight_cost: 500,
            daily_budget: 80,
            total_estimated_cost: 740,
            climate: 'Mediterranean',
            visa_free: true,
            safety_score: 85,
            match_score: 92,
            highlights: ['Culture', 'Food', 'History'],
            why_recommended: 'Brief explanation of why this matches their preferences',
            best_time: 'October-March',
            insider_tip: 'Local secret or money-saving tip',
          },
        ],
      },
      null,
      2,
    ),
    '',
    'Focus on realistic, achievable destinations that truly match their preferences and budget.',
  );
  return lines.join('\n');
}
