import { z } from 'zod';
import { MAX_COMPETITORS } from '../analyzers/competitors';
import { MAX_MENU_ITEMS, type Diagnosis } from '../types';

export const DiagnosisRequestSchema = z.object({
  query: z.string().trim().min(3, 'Enter a restaurant name or address'),
  keyword: z.string().trim().min(1).max(80).default('restaurant'),
  deliveryUrl: z.string().trim().url('Delivery URL must be a valid URL').optional(),
  averageOrderValue: z.coerce.number().positive().max(10000).optional(),
  monthlySearchVolume: z.coerce.number().int().nonnegative().max(10_000_000).optional(),
  radiusMeters: z.coerce.number().int().min(100).max(50000).optional(),
  includeDeepAnalysis: z.boolean().default(false),
});

export type DiagnosisRequest = z.infer<typeof DiagnosisRequestSchema>;

const GeoPointSchema = z.object({ lat: z.number(), lng: z.number() });

const FindingSchema = z.object({
  check: z.string(),
  status: z.enum(['pass', 'partial', 'fail']),
  details: z.string(),
  points: z.number(),
  maxPoints: z.number(),
  recommendation: z.string().optional(),
});

const ChecklistScoreSchema = z.object({
  score: z.number(),
  maxScore: z.number(),
  percent: z.number(),
  grade: z.string(),
  findings: z.array(FindingSchema),
  recommendations: z.array(z.string()),
});

const PricingScoreSchema = ChecklistScoreSchema.extend({
  averageMarkup: z.number().nullable(),
  matchedItems: z.number().int().nonnegative(),
  markupBand: z.enum(['too-low', 'healthy', 'too-high', 'unknown']),
});

const RankBucketSchema = z.enum(['top3', '4-10', 'none']);
const DeliveryPlatformSchema = z.enum(['doordash', 'ubereats', 'grubhub', 'postmates', 'seamless']);

const MenuItemSchema = z.object({
  name: z.string(),
  price: z.number().nullable(),
  category: z.string(),
  channel: z.enum(['dine-in', 'delivery']),
});

const DeepAnalysisSchema = z.object({
  overallSummary: z.string(),
  keyFindings: z.array(z.string()),
  prioritizedActions: z.array(z.object({
    horizon: z.enum(['short_term', 'mid_term']),
    description: z.string(),
  })),
  risks: z.array(z.string()),
  dataGaps: z.array(z.string()),
});

/** Shape of a finished diagnosis as the client posts it back for reports. */
export const DiagnosisSchema = z.object({
  query: z.string(),
  diagnosedAt: z.string(),
  place: z.object({
    placeId: z.string(),
    name: z.string(),
    formattedAddress: z.string().nullable(),
    formattedPhoneNumber: z.string().nullable(),
    rating: z.number().nullable(),
    userRatingsTotal: z.number().nullable(),
    priceLevel: z.number().nullable(),
    types: z.array(z.string()),
    openingHours: z.array(z.string()).nullable(),
    website: z.string().nullable(),
    photos: z.array(z.string()),
    location: GeoPointSchema.nullable(),
  }),
  competitors: z.array(z.object({
    placeId: z.string(),
    name: z.string(),
    address: z.string().nullable(),
    rating: z.number().nullable(),
    reviews: z.number(),
    distanceMeters: z.number().nullable(),
  })).max(MAX_COMPETITORS),
  reputation: z.object({
    yourRating: z.number().nullable(),
    yourReviews: z.number(),
    competitorMedianRating: z.number().nullable(),
    competitorMedianReviews: z.number(),
    competitorTopRating: z.number().nullable(),
    competitorTopReviews: z.number(),
    ratingGap: z.number().nullable(),
    reviewsGap: z.number(),
    status: z.enum(['ahead', 'behind', 'competitive', 'unknown']),
  }),
  localRank: z.object({
    keyword: z.string(),
    position: z.number().nullable(),
    bucket: RankBucketSchema,
    resultsChecked: z.number(),
  }),
  revenue: z.object({
    rankBucket: RankBucketSchema,
    monthlySearchVolume: z.number(),
    averageOrderValue: z.number(),
    clickThroughRate: z.number(),
    conversionRate: z.number(),
    idealCustomers: z.number(),
    currentCustomers: z.number(),
    lostCustomers: z.number(),
    monthlyLoss: z.number(),
    annualLoss: z.number(),
  }),
  website: z.object({
    url: z.string().nullable(),
    reachable: z.boolean(),
    via: z.enum(['direct', 'proxy']).nullable(),
  }),
  menu: z.object({
    dineInItems: z.array(MenuItemSchema).max(MAX_MENU_ITEMS),
    deliveryItems: z.array(MenuItemSchema).max(MAX_MENU_ITEMS),
    menuUrl: z.string().nullable(),
    delivery: z.object({ url: z.string(), platform: DeliveryPlatformSchema.nullable() }).nullable(),
  }),
  checklists: z.object({
    profile: ChecklistScoreSchema,
    website: ChecklistScoreSchema,
    menu: ChecklistScoreSchema,
    pricing: PricingScoreSchema,
  }),
  overallScore: z.number().int(),
  overallGrade: z.string(),
  topRecommendations: z.array(z.object({
    checklist: z.enum(['profile', 'website', 'menu', 'pricing']),
    check: z.string(),
    priority: z.enum(['critical', 'high', 'medium', 'low']),
    effort: z.enum(['low', 'medium', 'high']),
    title: z.string(),
    description: z.string(),
    pointsAvailable: z.number(),
  })),
  deepAnalysis: DeepAnalysisSchema.nullable(),
  warnings: z.array(z.string()),
}) satisfies z.ZodType<Diagnosis>;

export const DiagnosisPayloadSchema = z.object({ diagnosis: DiagnosisSchema });
