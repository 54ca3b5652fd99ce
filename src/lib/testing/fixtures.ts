import { scoreCheck, summarizeChecklist } from '../analyzers/checklist';
import { buildDiagnosis, type DiagnosisParts } from '../analyzers/scoring';
import type { CompetitorRecord, Diagnosis, PlaceRecord, PricingScore } from '../types';

// Shared test data for the diagnosis pipeline.

export function makePlace(overrides: Partial<PlaceRecord> = {}): PlaceRecord {
  return {
    placeId: 'place-golden',
    name: 'Golden Dumpling House',
    formattedAddress: '12 Market St, Springfield',
    formattedPhoneNumber: '(555) 555-0100',
    rating: 4.1,
    userRatingsTotal: 12,
    priceLevel: 2,
    types: ['restaurant', 'point_of_interest'],
    openingHours: ['Monday: 11:00 AM - 9:00 PM'],
    website: null,
    photos: ['photo-ref-1'],
    location: { lat: 40, lng: -75 },
    ...overrides,
  };
}

export function makeCompetitor(placeId: string, rating: number | null, reviews: number): CompetitorRecord {
  return { placeId, name: `Competitor ${placeId}`, address: null, rating, reviews, distanceMeters: 300 };
}

/**
 * Five failing checks across the four checklists:
 * Website link (-6), Review volume (-3), Meta description (-4), Menu size (-3), Delivery markup (-12).
 */
export function makeChecklists(): DiagnosisParts['checklists'] {
  const pricing: PricingScore = {
    ...summarizeChecklist([
      scoreCheck({
        check: 'Delivery markup',
        points: 0,
        maxPoints: 12,
        details: 'Average delivery markup 50% is too high and hurts delivery conversion',
        recommendation: 'Bring delivery prices within 10-35% of dine-in prices. Large markups push diners to competitors on the same app.',
      }),
    ]),
    averageMarkup: 0.5,
    matchedItems: 4,
    markupBand: 'too-high',
  };

  return {
    profile: summarizeChecklist([
      scoreCheck({ check: 'Business name', points: 4, maxPoints: 4, details: 'Listed as "Golden Dumpling House"', recommendation: 'Set the business name.' }),
      scoreCheck({
        check: 'Website link',
        points: 0,
        maxPoints: 6,
        details: 'No website linked from the listing',
        recommendation: 'Link your website from the profile. Listings without a website lose clicks to competitors that have one.',
      }),
      scoreCheck({
        check: 'Review volume',
        points: 2,
        maxPoints: 5,
        details: '12 review(s)',
        recommendation: 'Ask satisfied guests for reviews. 20+ reviews makes a listing look established.',
      }),
    ]),
    website: summarizeChecklist([
      scoreCheck({ check: 'Website reachable', points: 6, maxPoints: 6, details: 'HTTP 200 via direct fetch', recommendation: 'Make sure the website loads.' }),
      scoreCheck({
        check: 'Meta description',
        points: 0,
        maxPoints: 4,
        details: 'No meta description',
        recommendation: 'Add a 50-160 character meta description.',
      }),
    ]),
    menu: summarizeChecklist([
      scoreCheck({
        check: 'Menu size',
        points: 3,
        maxPoints: 6,
        details: '8 item(s) found',
        recommendation: 'List the full menu online. Thin menus look closed or incomplete.',
      }),
    ]),
    pricing,
  };
}

export function makeDiagnosis(overrides: Partial<DiagnosisParts> = {}): Diagnosis {
  const place = makePlace();
  return buildDiagnosis({
    query: 'golden dumpling springfield',
    diagnosedAt: '2026-03-14T12:00:00.000Z',
    place,
    competitors: [makeCompetitor('c1', 4.4, 300), makeCompetitor('c2', 4.2, 150)],
    reputation: {
      yourRating: 4.1,
      yourReviews: 12,
      competitorMedianRating: 4.3,
      competitorMedianReviews: 225,
      competitorTopRating: 4.4,
      competitorTopReviews: 300,
      ratingGap: -0.2,
      reviewsGap: -213,
      status: 'behind',
    },
    localRank: { keyword: 'dumplings', position: 6, bucket: '4-10', resultsChecked: 20 },
    revenue: {
      rankBucket: '4-10',
      monthlySearchVolume: 1000,
      averageOrderValue: 25,
      clickThroughRate: 0.3,
      conversionRate: 0.1,
      idealCustomers: 30,
      currentCustomers: 12,
      lostCustomers: 18,
      monthlyLoss: 450,
      annualLoss: 5400,
    },
    website: { url: null, reachable: false, via: null },
    menu: {
      dineInItems: [
        { name: 'Pork Dumplings', price: 10, category: 'Dumplings', channel: 'dine-in' },
        { name: 'Noodle Soup', price: 14, category: 'Noodles', channel: 'dine-in' },
      ],
      deliveryItems: [{ name: 'Pork Dumplings', price: 15, category: 'Menu', channel: 'delivery' }],
      menuUrl: 'https://golden-dumpling.test/menu',
      delivery: { url: 'https://www.doordash.com/store/golden-dumpling-123', platform: 'doordash' },
    },
    checklists: makeChecklists(),
    deepAnalysis: null,
    warnings: ['Local rank: SERPAPI_API_KEY is not configured'],
    ...overrides,
  });
}
