import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { resetConfig } from '@/lib/config';
import { ProviderError, describeError } from '@/lib/errors';
import { distanceMeters, findPlace, geocodeAddress, mapDetailsToPlaceRecord, searchNearby } from './google';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('Google Places client', () => {
  const fetchMock = vi.fn<(input: string | URL | Request) => Promise<Response>>();

  beforeEach(() => {
    vi.stubEnv('GOOGLE_MAPS_API_KEY', 'test-key');
    resetConfig();
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.unstubAllGlobals();
    resetConfig();
  });

  it('resolves a text query to a place', async () => {
    fetchMock.mockResolvedValue(jsonResponse({
      status: 'OK',
      candidates: [{ place_id: 'abc', name: 'Golden Dumpling House', geometry: { location: { lat: 40.1, lng: -75.2 } } }],
    }));

    await expect(findPlace('golden dumpling springfield')).resolves.toEqual({
      placeId: 'abc',
      name: 'Golden Dumpling House',
      location: { lat: 40.1, lng: -75.2 },
    });

    const url = new URL(String(fetchMock.mock.calls[0][0]));
    expect(url.pathname).toBe('/maps/api/place/findplacefromtext/json');
    expect(url.searchParams.get('input')).toBe('golden dumpling springfield');
    expect(url.searchParams.get('key')).toBe('test-key');
  });

  it('returns null when there are no candidates', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ status: 'ZERO_RESULTS', candidates: [] }));

    await expect(findPlace('nowhere')).resolves.toBeNull();
  });

  it('surfaces API errors from the status field', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ status: 'REQUEST_DENIED', error_message: 'The provided API key is invalid.' }));

    await expect(findPlace('golden dumpling')).rejects.toThrow(
      'Google Maps error: REQUEST_DENIED - The provided API key is invalid.'
    );
  });

  it('wraps HTTP failures with the status code', async () => {
    fetchMock.mockResolvedValue(jsonResponse({}, 500));

    const error = await geocodeAddress('12 Market St').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ProviderError);
    expect(describeError(error)).toBe('Google Maps request to /geocode/json failed (HTTP 500)');
  });

  it('fails fast without an API key', async () => {
    vi.stubEnv('GOOGLE_MAPS_API_KEY', '');
    resetConfig();

    await expect(findPlace('golden dumpling')).rejects.toThrow('GOOGLE_MAPS_API_KEY is not configured');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('maps nearby results and measures their distance', async () => {
    fetchMock.mockResolvedValue(jsonResponse({
      status: 'OK',
      results: [
        { place_id: 'n1', name: 'Noodle Bar', vicinity: '14 Market St', rating: 4.3, user_ratings_total: 88, geometry: { location: { lat: 40, lng: -75 } } },
        { name: 'No id' },
      ],
    }));

    const results = await searchNearby({ location: { lat: 40, lng: -75 }, radiusMeters: 1500 });

    expect(results).toEqual([
      { placeId: 'n1', name: 'Noodle Bar', address: '14 Market St', rating: 4.3, reviews: 88, distanceMeters: 0 },
    ]);
    const url = new URL(String(fetchMock.mock.calls[0][0]));
    expect(url.searchParams.get('radius')).toBe('1500');
    expect(url.searchParams.get('type')).toBe('restaurant');
  });
});

describe('mapDetailsToPlaceRecord', () => {
  it('normalises blank and missing fields', () => {
    const record = mapDetailsToPlaceRecord({
      name: ' Golden Dumpling House ',
      formatted_address: '12 Market St',
      formatted_phone_number: ' ',
      rating: 4.6,
      types: ['restaurant'],
      opening_hours: { weekday_text: [] },
      website: 'https://golden-dumpling.test',
      photos: [{ photo_reference: 'ref-1' }, {}],
    }, 'fallback-id');

    expect(record).toEqual({
      placeId: 'fallback-id',
      name: 'Golden Dumpling House',
      formattedAddress: '12 Market St',
      formattedPhoneNumber: null,
      rating: 4.6,
      userRatingsTotal: null,
      priceLevel: null,
      types: ['restaurant'],
      openingHours: null,
      website: 'https://golden-dumpling.test',
      photos: ['ref-1'],
      location: null,
    });
  });
});

describe('distanceMeters', () => {
  it('measures great-circle distance', () => {
    expect(distanceMeters({ lat: 10, lng: 20 }, { lat: 10, lng: 20 })).toBe(0);
    expect(distanceMeters({ lat: 0, lng: 0 }, { lat: 1, lng: 0 })).toBeCloseTo(111195, -1);
  });
});
