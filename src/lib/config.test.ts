import { afterEach, describe, expect, it, vi } from 'vitest';
import { getConfig, loadConfig, resetConfig } from './config';

afterEach(() => {
  vi.unstubAllEnvs();
  resetConfig();
});

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      googleMapsApiKey: null,
      serpApiKey: null,
      scraperProxyUrl: null,
      anthropicApiKey: null,
      anthropicModel: 'claude-sonnet-4-5-20250929',
      anthropicFallbackModel: 'claude-3-5-haiku-20241022',
      defaultSearchRadiusMeters: 1500,
      defaultAverageOrderValue: 25,
      defaultMonthlySearchVolume: 1000,
    });
  });

  it('treats blank keys as unset', () => {
    const config = loadConfig({ GOOGLE_MAPS_API_KEY: '  ', SERPAPI_API_KEY: '' });
    expect(config.googleMapsApiKey).toBeNull();
    expect(config.serpApiKey).toBeNull();
  });

  it('coerces numeric settings', () => {
    const config = loadConfig({ DEFAULT_SEARCH_RADIUS_METERS: '2500', DEFAULT_AVERAGE_ORDER_VALUE: '32.5' });
    expect(config.defaultSearchRadiusMeters).toBe(2500);
    expect(config.defaultAverageOrderValue).toBe(32.5);
  });

  it('requires a {url} placeholder in the proxy template', () => {
    expect(() => loadConfig({ SCRAPER_PROXY_URL: 'https://render.test/' })).toThrow(
      'Invalid environment configuration: SCRAPER_PROXY_URL: SCRAPER_PROXY_URL must contain a {url} placeholder'
    );
    expect(loadConfig({ SCRAPER_PROXY_URL: 'https://render.test/?target={url}' }).scraperProxyUrl)
      .toBe('https://render.test/?target={url}');
  });

  it('rejects an out-of-range radius', () => {
    expect(() => loadConfig({ DEFAULT_SEARCH_RADIUS_METERS: '20' })).toThrow(/DEFAULT_SEARCH_RADIUS_METERS/);
  });
});

describe('getConfig', () => {
  it('caches until reset', () => {
    vi.stubEnv('SERPAPI_API_KEY', 'test-secret');
    expect(getConfig().serpApiKey).toBe('test-secret');

    vi.stubEnv('SERPAPI_API_KEY', 'other-secret');
    expect(getConfig().serpApiKey).toBe('test-secret');

    resetConfig();
    expect(getConfig().serpApiKey).toBe('other-secret');
  });
});
