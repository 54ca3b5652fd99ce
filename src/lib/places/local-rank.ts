import { z } from 'zod';
import { getConfig } from '../config';
import { ProviderError } from '../errors';
import type { GeoPoint, PlaceRecord, RankBucket } from '../types';

const SERPAPI_URL = 'https://serpapi.com/search.json';
const SERPAPI_TIMEOUT_MS = 20000;
const MAP_ZOOM = 14;

const SerpApiMapsResponseSchema = z.object({
  error: z.string().optional(),
  local_results: z.array(z.object({
    position: z.number().optional(),
    title: z.string().optional(),
    place_id: z.string().optional(),
    rating: z.number().optional(),
    reviews: z.number().optional(),
  })).optional(),
});

export interface LocalResult {
  position: number;
  placeId: string | null;
  title: string;
  rating: number | null;
  reviews: number | null;
}

export async function fetchLocalResults(options: { keyword: string; location: GeoPoint }): Promise<LocalResult[]> {
  const apiKey = getConfig().serpApiKey;
  if (!apiKey) {
    throw new ProviderError('serpapi', 'not_configured', 'SERPAPI_API_KEY is not configured');
  }

  const params = new URLSearchParams({
    engine: 'google_maps',
    type: 'search',
    q: options.keyword,
    ll: `@${options.location.lat},${options.location.lng},${MAP_ZOOM}z`,
    api_key: apiKey,
  });

  const response = await fetch(`${SERPAPI_URL}?${params.toString()}`, {
    signal: AbortSignal.timeout(SERPAPI_TIMEOUT_MS),
  });
  if (!response.ok) {
    throw new ProviderError('serpapi', 'http', 'Local search request failed', response.status);
  }

  const parsed = SerpApiMapsResponseSchema.safeParse(await response.json());
  if (!parsed.success) {
    throw new ProviderError('serpapi', 'upstream', 'Unexpected local search response');
  }

  const data = parsed.data;
  if (data.error) {
    throw new ProviderError('serpapi', 'upstream', `Local search error: ${data.error}`);
  }

  return (data.local_results ?? []).map((result, index) => ({
    position: typeof result.position === 'number' ? result.position : index + 1,
    placeId: result.place_id ?? null,
    title: result.title ?? '',
    rating: result.rating ?? null,
    reviews: result.reviews ?? null,
  }));
}

export function normalizeBusinessName(name: string): string {
  return name
    .toLowerCase()
    .replace(/&/g, ' and ')
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function findRankPosition(results: LocalResult[], place: Pick<PlaceRecord, 'placeId' | 'name'>): number | null {
  const byId = results.find(r => r.placeId !== null && r.placeId === place.placeId);
  if (byId) return byId.position;

  const target = normalizeBusinessName(place.name);
  if (!target) return null;
  const byName = results.find(r => normalizeBusinessName(r.title) === target);
  return byName ? byName.position : null;
}

export function classifyRankBucket(position: number | null): RankBucket {
  if (position === null || !Number.isInteger(position) || position < 1) return 'none';
  if (position <= 3) return 'top3';
  if (position <= 10) return '4-10';
  return 'none';
}
