import { getConfig, type AppConfig } from '../config';
import { ProviderError, describeError } from '../errors';
import {
  fetchPlaceDetails, findPlace, geocodeAddress, searchNearby,
  type GeocodedAddress, type NearbySearchOptions, type ResolvedPlace,
} from '../places/google';
import {
  classifyRankBucket, fetchLocalResults, findRankPosition, type LocalResult,
} from '../places/local-rank';
import { detectDeliveryPlatform, discoverRestaurantLinks, fetchPageWithFallback, type RestaurantLinks } from '../crawler';
import { normalizeUrl } from '../crawler/network-guard';
import { extractMenuItems } from '../menu/extract';
import { scoreGbpProfile } from '../analyzers/profile';
import { scoreWebsiteBasic } from '../analyzers/website';
import { computeMenuStructureScore, computePricingScore } from '../analyzers/menu';
import { estimateRevenueLoss } from '../analyzers/revenue';
import { benchmarkCompetitors, selectCompetitors } from '../analyzers/competitors';
import { buildDiagnosis } from '../analyzers/scoring';
import { buildDeepAnalysisRequest, generateDeepAnalysis, type CompletionClient } from '../analyzers/deep-analysis';
import type {
  CompetitorRecord, DeliveryMenuSource, Diagnosis, GeoPoint, LocalRank, MenuItem, PageSnapshot, PlaceRecord,
} from '../types';
import type { DiagnosisRequest } from './schema';
import { DiagnosisSession, type PageFetcher } from './session';
import type { DiagnosisPhase } from './stream';

export type { DiagnosisPhase };

// Radius used to pin a geocoded address to the listing at that spot.
const ADDRESS_MATCH_RADIUS_METERS = 150;
const GOOD_MENU_SIZE = 15;


export interface PlacesProvider {
  findPlace(query: string): Promise<ResolvedPlace | null>;
  geocodeAddress(address: string): Promise<GeocodedAddress | null>;
  searchNearby(options: NearbySearchOptions): Promise<CompetitorRecord[]>;
  fetchPlaceDetails(placeId: string): Promise<PlaceRecord | null>;
}

export interface LocalRankProvider {
  fetchLocalResults(options: { keyword: string; location: GeoPoint }): Promise<LocalResult[]>;
}

export interface DiagnosisDeps {
  config: AppConfig;
  places: PlacesProvider;
  localRank: LocalRankProvider;
  fetchPage: PageFetcher;
  completion?: CompletionClient;
  onPhase?: (phase: DiagnosisPhase, detail: string) => void;
  now?: () => Date;
}

export function createDefaultDeps(config: AppConfig = getConfig()): DiagnosisDeps {
  return {
    config,
    places: { findPlace, geocodeAddress, searchNearby, fetchPlaceDetails },
    localRank: { fetchLocalResults },
    fetchPage: url => fetchPageWithFallback(url, { proxyUrl: config.scraperProxyUrl }),
  };
}

function emptyPlace(resolved: ResolvedPlace): PlaceRecord {
  return {
    placeId: resolved.placeId,
    name: resolved.name,
    formattedAddress: null,
    formattedPhoneNumber: null,
    rating: null,
    userRatingsTotal: null,
    priceLevel: null,
    types: [],
    openingHours: null,
    website: null,
    photos: [],
    location: resolved.location,
  };
}

async function resolvePlace(query: string, places: PlacesProvider, session: DiagnosisSession): Promise<ResolvedPlace> {
  let lastError: unknown = null;

  try {
    const found = await places.findPlace(query);
    if (found) return found;
  } catch (error) {
    // Without a key the address lookup fails the same way
    if (error instanceof ProviderError && error.code === 'not_configured') throw error;
    lastError = error;
    session.warn('Place search', error);
  }

  try {
    const geocoded = await places.geocodeAddress(query);
    if (geocoded) {
      const nearby = await places.searchNearby({
        location: geocoded.location,
        radiusMeters: ADDRESS_MATCH_RADIUS_METERS,
      });
      const closest = [...nearby].sort((a, b) => (a.distanceMeters ?? Infinity) - (b.distanceMeters ?? Infinity))[0];
      if (closest) {
        return { placeId: closest.placeId, name: closest.name, location: geocoded.location };
      }
    }
  } catch (error) {
    lastError = error;
    session.warn('Address lookup', error);
  }

  const cause = lastError ? ` (${describeError(lastError)})` : '';
  throw new ProviderError('google', 'not_found', `Could not find a restaurant matching "${query}"${cause}`);
}

async function loadDineInMenu(
  homepage: PageSnapshot | null,
  links: RestaurantLinks,
  session: DiagnosisSession
): Promise<{ items: MenuItem[]; url: string | null }> {
  let best: { items: MenuItem[]; url: string | null } = { items: [], url: null };
  if (homepage) {
    const items = extractMenuItems(homepage.html, 'dine-in');
    if (items.length > 0) best = { items, url: homepage.finalUrl };
  }

  for (const link of links.menuLinks) {
    if (best.items.length >= GOOD_MENU_SIZE) break;
    const page = await session.attempt(`Menu page ${link}`, null, () => session.fetchPage(link));
    if (!page) continue;
    const items = extractMenuItems(page.html, 'dine-in');
    if (items.length > best.items.length) best = { items, url: page.finalUrl };
  }

  return best;
}

export async function runDiagnosis(request: DiagnosisRequest, deps: DiagnosisDeps): Promise<Diagnosis> {
  const { config, places } = deps;
  const session = new DiagnosisSession(deps.fetchPage);
  const phase = (name: DiagnosisPhase, detail: string) => deps.onPhase?.(name, detail);

  // Resolve the business
  phase('resolving', `Looking up "${request.query}"`);
  const resolved = await resolvePlace(request.query, places, session);
  const details = await session.attempt('Place details', null, () => places.fetchPlaceDetails(resolved.placeId));
  if (!details) session.note('Place details: listing details unavailable, profile scored from search data only');
  const place: PlaceRecord = details ?? emptyPlace(resolved);
  const location = place.location ?? resolved.location;

  // Competitors
  phase('competitors', `Finding restaurants near ${place.name || request.query}`);
  let competitors: CompetitorRecord[] = [];
  if (location) {
    const nearby = await session.attempt('Competitor search', [], () => places.searchNearby({
      location,
      radiusMeters: request.radiusMeters ?? config.defaultSearchRadiusMeters,
    }));
    competitors = selectCompetitors(nearby, place);
  } else {
    session.note('Competitor search: the listing has no coordinates');
  }

  // Local rank
  phase('ranking', `Checking local results for "${request.keyword}"`);
  let results: LocalResult[] | null = null;
  if (location) {
    results = await session.attempt('Local rank', null, () => deps.localRank.fetchLocalResults({
      keyword: request.keyword,
      location,
    }));
  } else {
    session.note('Local rank: the listing has no coordinates');
  }
  const position = results ? findRankPosition(results, place) : null;
  const localRank: LocalRank = {
    keyword: request.keyword,
    position,
    bucket: classifyRankBucket(position),
    resultsChecked: results?.length ?? 0,
  };

  // Website and menus
  phase('crawling', place.website ? `Fetching ${place.website}` : 'No website on the listing');
  let homepage: PageSnapshot | null = null;
  if (place.website) {
    const website = place.website;
    homepage = await session.attempt('Website', null, () => session.fetchPage(normalizeUrl(website)));
    if (!homepage) session.note(`Website: could not fetch ${website}`);
  }

  const links: RestaurantLinks = homepage
    ? discoverRestaurantLinks(homepage.finalUrl, homepage.html)
    : { menuLinks: [], deliveryLinks: [], orderingLinks: [] };

  const dineIn = await loadDineInMenu(homepage, links, session);
  if (dineIn.items.length === 0) session.note('Menu: no dine-in menu items found');

  const delivery: DeliveryMenuSource | null = request.deliveryUrl
    ? { url: request.deliveryUrl, platform: detectDeliveryPlatform(request.deliveryUrl) }
    : links.deliveryLinks[0] ?? null;

  let deliveryItems: MenuItem[] = [];
  if (delivery) {
    phase('crawling', `Fetching delivery menu from ${delivery.platform ?? delivery.url}`);
    const page = await session.attempt('Delivery menu', null, () => session.fetchPage(delivery.url));
    deliveryItems = page ? extractMenuItems(page.html, 'delivery') : [];
    if (deliveryItems.length === 0) session.note(`Delivery menu: no items found at ${delivery.url}`);
  } else {
    session.note('Delivery menu: no delivery storefront found');
  }

  // Scoring
  phase('scoring', 'Scoring checklists');
  const revenue = estimateRevenueLoss({
    monthlySearchVolume: request.monthlySearchVolume ?? config.defaultMonthlySearchVolume,
    rankBucket: localRank.bucket,
    averageOrderValue: request.averageOrderValue ?? config.defaultAverageOrderValue,
  });

  const diagnosis = buildDiagnosis({
    query: request.query,
    diagnosedAt: (deps.now?.() ?? new Date()).toISOString(),
    place,
    competitors,
    reputation: benchmarkCompetitors(place, competitors),
    localRank,
    revenue,
    website: {
      url: place.website,
      reachable: homepage !== null && homepage.statusCode < 400,
      via: homepage?.via ?? null,
    },
    menu: {
      dineInItems: dineIn.items,
      deliveryItems,
      menuUrl: dineIn.url,
      delivery,
    },
    checklists: {
      profile: scoreGbpProfile(place),
      website: scoreWebsiteBasic(homepage),
      menu: computeMenuStructureScore(dineIn.items),
      pricing: computePricingScore(dineIn.items, deliveryItems),
    },
    deepAnalysis: null,
    warnings: session.warnings,
  });

  if (!request.includeDeepAnalysis) return diagnosis;

  phase('deep-analysis', 'Writing the deep analysis');
  const deepAnalysis = await generateDeepAnalysis(buildDeepAnalysisRequest(diagnosis), {
    config,
    client: deps.completion,
  });
  return { ...diagnosis, deepAnalysis };
}
