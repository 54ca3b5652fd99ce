import { z } from 'zod';

const optionalString = z
  .string()
  .trim()
  .transform(value => (value.length > 0 ? value : undefined))
  .optional();

const EnvSchema = z.object({
  GOOGLE_MAPS_API_KEY: optionalString,
  SERPAPI_API_KEY: optionalString,
  SCRAPER_PROXY_URL: optionalString.refine(
    value => value === undefined || value.includes('{url}'),
    'SCRAPER_PROXY_URL must contain a {url} placeholder'
  ),
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: z.string().trim().min(1).default('claude-sonnet-4-5-20250929'),
  ANTHROPIC_FALLBACK_MODEL: z.string().trim().min(1).default('claude-3-5-haiku-20241022'),
  DEFAULT_SEARCH_RADIUS_METERS: z.coerce.number().int().min(100).max(50000).default(1500),
  DEFAULT_AVERAGE_ORDER_VALUE: z.coerce.number().nonnegative().default(25),
  DEFAULT_MONTHLY_SEARCH_VOLUME: z.coerce.number().int().nonnegative().default(1000),
});

export type AppConfig = {
  googleMapsApiKey: string | null;
  serpApiKey: string | null;
  scraperProxyUrl: string | null;
  anthropicApiKey: string | null;
  anthropicModel: string;
  anthropicFallbackModel: string;
  defaultSearchRadiusMeters: number;
  defaultAverageOrderValue: number;
  defaultMonthlySearchVolume: number;
};

let cachedConfig: AppConfig | null = null;

export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid environment configuration: ${message}`);
  }

  const e = parsed.data;
  return {
    googleMapsApiKey: e.GOOGLE_MAPS_API_KEY ?? null,
    serpApiKey: e.SERPAPI_API_KEY ?? null,
    scraperProxyUrl: e.SCRAPER_PROXY_URL ?? null,
    anthropicApiKey: e.ANTHROPIC_API_KEY ?? null,
    anthropicModel: e.ANTHROPIC_MODEL,
    anthropicFallbackModel: e.ANTHROPIC_FALLBACK_MODEL,
    defaultSearchRadiusMeters: e.DEFAULT_SEARCH_RADIUS_METERS,
    defaultAverageOrderValue: e.DEFAULT_AVERAGE_ORDER_VALUE,
    defaultMonthlySearchVolume: e.DEFAULT_MONTHLY_SEARCH_VOLUME,
  };
}

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig(process.env);
  }
  return cachedConfig;
}

export function resetConfig() {
  cachedConfig = null;
}
