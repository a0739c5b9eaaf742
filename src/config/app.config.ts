/** App configuration, read once from the environment. */
import { z } from 'zod';

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  CORS_ORIGIN: z.string().default('http://localhost:3000'),
  AMADEUS_BASE_URL: z.string().url().default('https://test.api.amadeus.com'),
  AMADEUS_CLIENT_ID: optionalString,
  AMADEUS_CLIENT_SECRET: optionalString,
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  FLIGHT_QUERY_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  FLIGHT_SEARCH_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(4),
  RECOMMENDATION_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
});

export interface AppConfig {
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  corsOrigins: string[];
  amadeus: {
    baseUrl: string;
    clientId?: string;
    clientSecret?: string;
  };
  openai: {
    apiKey?: string;
    model: string;
  };
  flightQueryTimeoutMs: number;
  flightSearchConcurrency: number;
  recommendationTimeoutMs: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.errors
      .map((e) => `${e.path.join('.') || 'root'}: ${e.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  const e = result.data;
  return {
    port: e.PORT,
    nodeEnv: e.NODE_ENV,
    corsOrigins: e.CORS_ORIGIN.split(',').map((o) => o.trim()).filter(Boolean),
    amadeus: {
      baseUrl: e.AMADEUS_BASE_URL.replace(/\/+$/, ''),
      clientId: e.AMADEUS_CLIENT_ID,
      clientSecret: e.AMADEUS_CLIENT_SECRET,
    },
    openai: {
      apiKey: e.OPENAI_API_KEY,
      model: e.OPENAI_MODEL,
    },
    flightQueryTimeoutMs: e.FLIGHT_QUERY_TIMEOUT_MS,
    flightSearchConcurrency: e.FLIGHT_SEARCH_CONCURRENCY,
    recommendationTimeoutMs: e.RECOMMENDATION_TIMEOUT_MS,
  };
}
