import type { ChecklistScore, PlaceRecord } from '../types';
import { scoreCheck, summarizeChecklist } from './checklist';

export const PROFILE_MAX_SCORE = 40;

// Every listing carries these; they say nothing about cuisine or format.
const GENERIC_PLACE_TYPES = new Set(['point_of_interest', 'establishment', 'premise', 'store']);

export function scoreGbpProfile(place: PlaceRecord): ChecklistScore {
  const hasName = place.name.trim().length > 0;
  const hasAddress = Boolean(place.formattedAddress);
  const hasPhone = Boolean(place.formattedPhoneNumber);
  const hasWebsite = Boolean(place.website);

  const rating = place.rating;
  const ratingPoints = rating === null ? 0 : rating >= 4.0 ? 5 : rating >= 3.5 ? 3 : 0;

  const reviews = place.userRatingsTotal ?? 0;
  const reviewPoints = reviews >= 20 ? 5 : reviews >= 5 ? 2 : 0;

  const specificTypes = place.types.filter(t => !GENERIC_PLACE_TYPES.has(t));
  const hasPriceLevel = place.priceLevel !== null;
  const photoCount = place.photos.length;

  return summarizeChecklist([
    scoreCheck({
      check: 'Business name',
      points: hasName ? 4 : 0,
      maxPoints: 4,
      details: hasName ? `Listed as "${place.name}"` : 'Listing has no business name',
      recommendation: 'Claim the listing and set the business name exactly as it appears on your storefront.',
    }),
    scoreCheck({
      check: 'Address listed',
      points: hasAddress ? 5 : 0,
      maxPoints: 5,
      details: place.formattedAddress ?? 'No address on the listing',
      recommendation: 'Add the full street address to the profile so maps and diners can find you.',
    }),
    scoreCheck({
      check: 'Phone number listed',
      points: hasPhone ? 5 : 0,
      maxPoints: 5,
      details: place.formattedPhoneNumber ?? 'No phone number on the listing',
      recommendation: 'Add a phone number to the profile. Calls from the listing are a common path to reservations and pickup orders.',
    }),
    scoreCheck({
      check: 'Website link',
      points: hasWebsite ? 6 : 0,
      maxPoints: 6,
      details: place.website ?? 'No website linked from the listing',
      recommendation: 'Link your website from the profile. Listings without a website lose clicks to competitors that have one.',
    }),
    scoreCheck({
      check: 'Rating',
      points: ratingPoints,
      maxPoints: 5,
      details: rating === null ? 'No rating yet' : `Average rating ${rating.toFixed(1)}`,
      recommendation: 'Reply to negative reviews and fix recurring complaints. Many diners filter out places rated under 4.0.',
    }),
    scoreCheck({
      check: 'Review volume',
      points: reviewPoints,
      maxPoints: 5,
      details: `${reviews} review(s)`,
      recommendation: 'Ask satisfied guests for reviews with table cards, receipts and follow-up messages. 20+ reviews makes a listing look established.',
    }),
    scoreCheck({
      check: 'Business categories',
      points: specificTypes.length > 0 ? 3 : 0,
      maxPoints: 3,
      details: specificTypes.length > 0 ? `Categories: ${specificTypes.join(', ')}` : 'Only generic categories set',
      recommendation: 'Set a specific primary category (e.g. "Sichuan restaurant") so the listing shows for cuisine searches.',
    }),
    scoreCheck({
      check: 'Price level',
      points: hasPriceLevel ? 3 : 0,
      maxPoints: 3,
      details: hasPriceLevel ? `Price level ${place.priceLevel}` : 'Price level not set',
      recommendation: 'Set a price range on the profile so diners filtering by budget see you.',
    }),
    scoreCheck({
      check: 'Photos',
      points: photoCount > 0 ? 4 : 0,
      maxPoints: 4,
      details: `${photoCount} photo(s) on the listing`,
      recommendation: 'Upload photos of dishes, the dining room and the storefront.',
    }),
  ]);
}
