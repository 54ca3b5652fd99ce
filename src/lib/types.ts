export type MenuChannel = 'dine-in' | 'delivery';

/** Upper bound on items kept per menu. */
export const MAX_MENU_ITEMS = 2000;

export type RankBucket = 'top3' | '4-10' | 'none';

export type DeliveryPlatform = 'doordash' | 'ubereats' | 'grubhub' | 'postmates' | 'seamless';

export interface GeoPoint {
  lat: number;
  lng: number;
}

export interface PlaceRecord {
  placeId: string;
  name: string;
  formattedAddress: string | null;
  formattedPhoneNumber: string | null;
  rating: number | null;
  userRatingsTotal: number | null;
  priceLevel: number | null;
  types: string[];
  openingHours: string[] | null;
  website: string | null;
  photos: string[];
  location: GeoPoint | null;
}

export interface MenuItem {
  name: string;
  price: number | null;
  category: string;
  channel: MenuChannel;
}

export interface CompetitorRecord {
  placeId: string;
  name: string;
  address: string | null;
  rating: number | null;
  reviews: number;
  distanceMeters: number | null;
}

export interface PageSnapshot {
  url: string;
  finalUrl: string;
  html: string;
  title: string;
  statusCode: number;
  loadTime: number;
  via: 'direct' | 'proxy';
}

export interface Finding {
  check: string;
  status: 'pass' | 'partial' | 'fail';
  details: string;
  points: number;
  maxPoints: number;
  recommendation?: string;
}

export interface ChecklistScore {
  score: number;
  maxScore: number;
  percent: number;
  grade: string;
  findings: Finding[];
  recommendations: string[];
}

export interface PricingScore extends ChecklistScore {
  averageMarkup: number | null;
  matchedItems: number;
  markupBand: 'too-low' | 'healthy' | 'too-high' | 'unknown';
}

export type ChecklistKey = 'profile' | 'website' | 'menu' | 'pricing';

export interface Checklists {
  profile: ChecklistScore;
  website: ChecklistScore;
  menu: ChecklistScore;
  pricing: PricingScore;
}

export interface LocalRank {
  keyword: string;
  position: number | null;
  bucket: RankBucket;
  resultsChecked: number;
}

export interface RevenueLossEstimate {
  rankBucket: RankBucket;
  monthlySearchVolume: number;
  averageOrderValue: number;
  clickThroughRate: number;
  conversionRate: number;
  idealCustomers: number;
  currentCustomers: number;
  lostCustomers: number;
  monthlyLoss: number;
  annualLoss: number;
}

export interface ReputationGap {
  yourRating: number | null;
  yourReviews: number;
  competitorMedianRating: number | null;
  competitorMedianReviews: number;
  competitorTopRating: number | null;
  competitorTopReviews: number;
  ratingGap: number | null;
  reviewsGap: number;
  status: 'ahead' | 'behind' | 'competitive' | 'unknown';
}

export interface Recommendation {
  checklist: ChecklistKey;
  check: string;
  priority: 'critical' | 'high' | 'medium' | 'low';
  effort: 'low' | 'medium' | 'high';
  title: string;
  description: string;
  pointsAvailable: number;
}

export interface DeliveryMenuSource {
  url: string;
  platform: DeliveryPlatform | null;
}

export interface MenuSummary {
  dineInItems: MenuItem[];
  deliveryItems: MenuItem[];
  menuUrl: string | null;
  delivery: DeliveryMenuSource | null;
}

export interface DeepAnalysisAction {
  horizon: 'short_term' | 'mid_term';
  description: string;
}

export interface DeepAnalysis {
  overallSummary: string;
  keyFindings: string[];
  prioritizedActions: DeepAnalysisAction[];
  risks: string[];
  dataGaps: string[];
}

export interface Diagnosis {
  query: string;
  diagnosedAt: string;
  place: PlaceRecord;
  competitors: CompetitorRecord[];
  reputation: ReputationGap;
  localRank: LocalRank;
  revenue: RevenueLossEstimate;
  website: { url: string | null; reachable: boolean; via: PageSnapshot['via'] | null };
  menu: MenuSummary;
  checklists: Checklists;
  overallScore: number;
  overallGrade: string;
  topRecommendations: Recommendation[];
  deepAnalysis: DeepAnalysis | null;
  warnings: string[];
}

export function getGrade(score: number): string {
  if (score >= 90) return 'A+';
  if (score >= 80) return 'A';
  if (score >= 70) return 'B';
  if (score >= 60) return 'C';
  if (score >= 50) return 'D';
  return 'F';
}

export const CHECKLIST_LABELS: Record<ChecklistKey, string> = {
  profile: 'Business Profile',
  website: 'Website Basics',
  menu: 'Menu Structure',
  pricing: 'Delivery Pricing',
};

export const RANK_BUCKET_LABELS: Record<RankBucket, string> = {
  top3: 'Top 3',
  '4-10': 'Positions 4-10',
  none: 'Not in top 10',
};
