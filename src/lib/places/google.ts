import { z } from 'zod';
import { getConfig } from '../config';
import { ProviderError } from '../errors';
import type { CompetitorRecord, GeoPoint, PlaceRecord } from '../types';

const GOOGLE_MAPS_BASE_URL = 'https://maps.googleapis.com/maps/api';
const GOOGLE_TIMEOUT_MS = 10000;

const DETAILS_FIELDS = [
  'place_id',
  'name',
  'formatted_address',
  'formatted_phone_number',
  'rating',
  'user_ratings_total',
  'price_level',
  'types',
  'opening_hours',
  'website',
  'photos',
  'geometry',
].join(',');

const GeometrySchema = z.object({
  location: z.object({ lat: z.number().optional(), lng: z.number().optional() }).optional(),
});

type GoogleGeometry = z.infer<typeof GeometrySchema>;

const EnvelopeSchema = z.object({
  status: z.string().optional(),
  error_message: z.string().optional(),
});

type GoogleEnvelope = z.infer<typeof EnvelopeSchema>;

const FindPlaceResponseSchema = EnvelopeSchema.extend({
  candidates: z.array(z.object({
    place_id: z.string().optional(),
    name: z.string().optional(),
    formatted_address: z.string().optional(),
    geometry: GeometrySchema.optional(),
  })).optional(),
});

const GeocodeResponseSchema = EnvelopeSchema.extend({
  results: z.array(z.object({
    formatted_address: z.string().optional(),
    geometry: GeometrySchema.optional(),
  })).optional(),
});

const NearbySearchResponseSchema = EnvelopeSchema.extend({
  results: z.array(z.object({
    place_id: z.string().optional(),
    name: z.string().optional(),
    vicinity: z.string().optional(),
    rating: z.number().optional(),
    user_ratings_total: z.number().optional(),
    geometry: GeometrySchema.optional(),
  })).optional(),
});

const PlaceDetailsResultSchema = z.object({
  place_id: z.string().optional(),
  name: z.string().optional(),
  formatted_address: z.string().optional(),
  formatted_phone_number: z.string().optional(),
  rating: z.number().optional(),
  user_ratings_total: z.number().optional(),
  price_level: z.number().optional(),
  types: z.array(z.string()).optional(),
  opening_hours: z.object({
    open_now: z.boolean().optional(),
    weekday_text: z.array(z.string()).optional(),
  }).optional(),
  website: z.string().optional(),
  photos: z.array(z.object({ photo_reference: z.string().optional() })).optional(),
  geometry: GeometrySchema.optional(),
});

export type GooglePlaceDetailsResult = z.infer<typeof PlaceDetailsResultSchema>;

const PlaceDetailsResponseSchema = EnvelopeSchema.extend({
  result: PlaceDetailsResultSchema.optional(),
});

export interface ResolvedPlace {
  placeId: string;
  name: string;
  location: GeoPoint | null;
}

export interface GeocodedAddress {
  formattedAddress: string;
  location: GeoPoint;
}

export interface NearbySearchOptions {
  location: GeoPoint;
  radiusMeters: number;
  type?: string;
  keyword?: string;
}

function getGoogleKey(): string {
  const key = getConfig().googleMapsApiKey;
  if (!key) {
    throw new ProviderError('google', 'not_configured', 'GOOGLE_MAPS_API_KEY is not configured');
  }
  return key;
}

async function getGoogleJson<T extends GoogleEnvelope>(
  path: string,
  params: Record<string, string>,
  schema: z.ZodType<T>
): Promise<T> {
  const search = new URLSearchParams({ ...params, key: getGoogleKey() });
  const response = await fetch(`${GOOGLE_MAPS_BASE_URL}${path}?${search.toString()}`, {
    signal: AbortSignal.timeout(GOOGLE_TIMEOUT_MS),
  });

  if (!response.ok) {
    throw new ProviderError('google', 'http', `Google Maps request to ${path} failed`, response.status);
  }

  const parsed = schema.safeParse(await response.json());
  if (!parsed.success) {
    throw new ProviderError('google', 'upstream', `Unexpected Google Maps response from ${path}`);
  }

  const data = parsed.data;
  if (data.status && data.status !== 'OK' && data.status !== 'ZERO_RESULTS') {
    throw new ProviderError(
      'google',
      'upstream',
      `Google Maps error: ${data.status} - ${data.error_message ?? 'Unknown error'}`
    );
  }
  return data;
}

function toGeoPoint(geometry: GoogleGeometry | undefined): GeoPoint | null {
  const lat = geometry?.location?.lat;
  const lng = geometry?.location?.lng;
  if (typeof lat !== 'number' || typeof lng !== 'number') return null;
  return { lat, lng };
}

export async function findPlace(query: string): Promise<ResolvedPlace | null> {
  const data = await getGoogleJson('/place/findplacefromtext/json', {
    input: query,
    inputtype: 'textquery',
    fields: 'place_id,name,formatted_address,geometry',
  }, FindPlaceResponseSchema);

  const candidate = data.candidates?.find(c => c.place_id);
  if (!candidate?.place_id) return null;

  return {
    placeId: candidate.place_id,
    name: candidate.name ?? '',
    location: toGeoPoint(candidate.geometry),
  };
}

export async function geocodeAddress(address: string): Promise<GeocodedAddress | null> {
  const data = await getGoogleJson('/geocode/json', { address }, GeocodeResponseSchema);
  const first = data.results?.[0];
  const location = toGeoPoint(first?.geometry);
  if (!first || !location) return null;
  return { formattedAddress: first.formatted_address ?? address, location };
}

export async function searchNearby(options: NearbySearchOptions): Promise<CompetitorRecord[]> {
  const params: Record<string, string> = {
    location: `${options.location.lat},${options.location.lng}`,
    radius: String(options.radiusMeters),
    type: options.type ?? 'restaurant',
  };
  if (options.keyword) params.keyword = options.keyword;

  const data = await getGoogleJson('/place/nearbysearch/json', params, NearbySearchResponseSchema);

  return (data.results ?? [])
    .filter(result => result.place_id && result.name)
    .map(result => {
      const point = toGeoPoint(result.geometry);
      return {
        placeId: result.place_id ?? '',
        name: result.name ?? '',
        address: result.vicinity ?? null,
        rating: result.rating ?? null,
        reviews: result.user_ratings_total ?? 0,
        distanceMeters: point ? Math.round(distanceMeters(options.location, point)) : null,
      };
    });
}

export async function fetchPlaceDetails(placeId: string): Promise<PlaceRecord | null> {
  const data = await getGoogleJson('/place/details/json', {
    place_id: placeId,
    fields: DETAILS_FIELDS,
  }, PlaceDetailsResponseSchema);
  if (!data.result) return null;
  return mapDetailsToPlaceRecord(data.result, placeId);
}

function nonEmpty(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function mapDetailsToPlaceRecord(result: GooglePlaceDetailsResult, fallbackPlaceId = ''): PlaceRecord {
  const weekdayText = result.opening_hours?.weekday_text;
  return {
    placeId: result.place_id ?? fallbackPlaceId,
    name: result.name?.trim() ?? '',
    formattedAddress: nonEmpty(result.formatted_address),
    formattedPhoneNumber: nonEmpty(result.formatted_phone_number),
    rating: typeof result.rating === 'number' ? result.rating : null,
    userRatingsTotal: typeof result.user_ratings_total === 'number' ? result.user_ratings_total : null,
    priceLevel: typeof result.price_level === 'number' ? result.price_level : null,
    types: result.types ?? [],
    openingHours: weekdayText && weekdayText.length > 0 ? weekdayText : null,
    website: nonEmpty(result.website),
    photos: (result.photos ?? [])
      .map(photo => photo.photo_reference ?? '')
      .filter(ref => ref.length > 0),
    location: toGeoPoint(result.geometry),
  };
}

const EARTH_RADIUS_METERS = 6371000;

export function distanceMeters(a: GeoPoint, b: GeoPoint): number {
  const toRad = (deg: number) => (deg * Math.PI) / 180;
  const dLat = toRad(b.lat - a.lat);
  const dLng = toRad(b.lng - a.lng);
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRad(a.lat)) * Math.cos(toRad(b.lat)) * Math.sin(dLng / 2) ** 2;
  return 2 * EARTH_RADIUS_METERS * Math.asin(Math.sqrt(h));
}
