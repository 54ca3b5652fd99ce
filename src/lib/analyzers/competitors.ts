import type { CompetitorRecord, PlaceRecord, ReputationGap } from '../types';

export const MAX_COMPETITORS = 5;

function median(values: number[]): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Nearby results minus the business itself, most-reviewed first.
 */
export function selectCompetitors(
  nearby: CompetitorRecord[],
  place: Pick<PlaceRecord, 'placeId'>,
  limit = MAX_COMPETITORS
): CompetitorRecord[] {
  const seen = new Set<string>();
  return nearby
    .filter(c => {
      if (c.placeId === place.placeId || seen.has(c.placeId)) return false;
      seen.add(c.placeId);
      return true;
    })
    .sort((a, b) => b.reviews - a.reviews || (b.rating ?? 0) - (a.rating ?? 0))
    .slice(0, limit);
}

export function benchmarkCompetitors(place: PlaceRecord, competitors: CompetitorRecord[]): ReputationGap {
  const yourRating = place.rating;
  const yourReviews = place.userRatingsTotal ?? 0;

  const ratings = competitors.map(c => c.rating).filter((r): r is number => r !== null);
  const reviews = competitors.map(c => c.reviews);

  const medianRating = median(ratings);
  const medianReviews = median(reviews) ?? 0;
  const topRating = ratings.length > 0 ? Math.max(...ratings) : null;
  const topReviews = reviews.length > 0 ? Math.max(...reviews) : 0;

  const ratingGap = yourRating !== null && medianRating !== null ? round2(yourRating - medianRating) : null;
  const reviewsGap = Math.round(yourReviews - medianReviews);

  let status: ReputationGap['status'];
  if (competitors.length === 0 || ratingGap === null) {
    status = 'unknown';
  } else if (ratingGap <= -0.2 || yourReviews < medianReviews / 2) {
    status = 'behind';
  } else if (ratingGap >= 0.2 && yourReviews >= medianReviews) {
    status = 'ahead';
  } else {
    status = 'competitive';
  }

  return {
    yourRating,
    yourReviews,
    competitorMedianRating: medianRating === null ? null : round2(medianRating),
    competitorMedianReviews: medianReviews,
    competitorTopRating: topRating,
    competitorTopReviews: topReviews,
    ratingGap,
    reviewsGap,
    status,
  };
}
