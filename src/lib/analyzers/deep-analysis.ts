import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import { getConfig, type AppConfig } from '../config';
import type {
  ChecklistKey, DeepAnalysis, DeepAnalysisAction, Diagnosis, Recommendation, ReputationGap, RankBucket,
} from '../types';

const MAX_TOKENS = 2000;
const MAX_FAILING_CHECKS = 12;
const MAX_RECOMMENDATIONS = 8;

export interface CompletionRequest {
  model: string;
  prompt: string;
  maxTokens: number;
}

export interface CompletionClient {
  complete(request: CompletionRequest): Promise<string>;
}

export function createAnthropicCompletionClient(apiKey: string): CompletionClient {
  const client = new Anthropic({ apiKey });
  return {
    async complete({ model, prompt, maxTokens }) {
      const response = await client.messages.create({
        model,
        max_tokens: maxTokens,
        messages: [{ role: 'user', content: prompt }],
      });
      for (const block of response.content) {
        if (block.type === 'text') return block.text;
      }
      return '';
    },
  };
}

type ScoreLine = { score: number; maxScore: number };

export interface DeepAnalysisRequest {
  restaurant: {
    name: string;
    address: string | null;
    rating: number | null;
    reviews: number | null;
    priceLevel: number | null;
    website: string | null;
    types: string[];
  };
  scores: {
    overall: number;
    grade: string;
    profile: ScoreLine;
    website: ScoreLine;
    menu: ScoreLine;
    pricing: ScoreLine;
  };
  failingChecks: Array<{ checklist: ChecklistKey; check: string; details: string; pointsLost: number }>;
  recommendations: Array<Pick<Recommendation, 'title' | 'priority' | 'effort'>>;
  localRank: { keyword: string; position: number | null; bucket: RankBucket };
  revenue: { monthlyLoss: number; annualLoss: number; lostCustomers: number; averageOrderValue: number };
  reputation: ReputationGap;
  competitors: Array<{ name: string; rating: number | null; reviews: number }>;
  menu: {
    dineInItems: number;
    deliveryItems: number;
    deliveryPlatform: string | null;
    averageMarkup: number | null;
    markupBand: string;
  };
  warnings: string[];
}

export function buildDeepAnalysisRequest(diagnosis: Diagnosis): DeepAnalysisRequest {
  const { place, checklists } = diagnosis;
  const keys: ChecklistKey[] = ['profile', 'website', 'menu', 'pricing'];

  const failingChecks = keys
    .flatMap(key => checklists[key].findings
      .filter(f => f.status !== 'pass')
      .map(f => ({ checklist: key, check: f.check, details: f.details, pointsLost: f.maxPoints - f.points })))
    .sort((a, b) => b.pointsLost - a.pointsLost)
    .slice(0, MAX_FAILING_CHECKS);

  const line = (key: ChecklistKey): ScoreLine => ({ score: checklists[key].score, maxScore: checklists[key].maxScore });

  return {
    restaurant: {
      name: place.name,
      address: place.formattedAddress,
      rating: place.rating,
      reviews: place.userRatingsTotal,
      priceLevel: place.priceLevel,
      website: place.website,
      types: place.types,
    },
    scores: {
      overall: diagnosis.overallScore,
      grade: diagnosis.overallGrade,
      profile: line('profile'),
      website: line('website'),
      menu: line('menu'),
      pricing: line('pricing'),
    },
    failingChecks,
    recommendations: diagnosis.topRecommendations
      .slice(0, MAX_RECOMMENDATIONS)
      .map(({ title, priority, effort }) => ({ title, priority, effort })),
    localRank: {
      keyword: diagnosis.localRank.keyword,
      position: diagnosis.localRank.position,
      bucket: diagnosis.localRank.bucket,
    },
    revenue: {
      monthlyLoss: diagnosis.revenue.monthlyLoss,
      annualLoss: diagnosis.revenue.annualLoss,
      lostCustomers: diagnosis.revenue.lostCustomers,
      averageOrderValue: diagnosis.revenue.averageOrderValue,
    },
    reputation: diagnosis.reputation,
    competitors: diagnosis.competitors.map(c => ({ name: c.name, rating: c.rating, reviews: c.reviews })),
    menu: {
      dineInItems: diagnosis.menu.dineInItems.length,
      deliveryItems: diagnosis.menu.deliveryItems.length,
      deliveryPlatform: diagnosis.menu.delivery?.platform ?? null,
      averageMarkup: checklists.pricing.averageMarkup,
      markupBand: checklists.pricing.markupBand,
    },
    warnings: diagnosis.warnings,
  };
}

export function buildDeepAnalysisPrompt(request: DeepAnalysisRequest): string {
  return `You are a restaurant marketing consultant. Review this online-health diagnosis of a single restaurant and explain what matters most for its revenue.

The diagnosis below was produced by fixed rule-based checklists (Google Business Profile, website basics, menu structure, delivery pricing), a local search rank lookup, a competitor benchmark and a hypothetical revenue-loss estimate. Treat the numbers as given; do not recompute them. Point out where data is missing instead of guessing.

Diagnosis (JSON):
${JSON.stringify(request, null, 2)}

Reply with a single JSON object and nothing else, using exactly this shape:
{
  "overall_summary": "2-4 sentences",
  "key_findings": ["..."],
  "prioritized_actions": [{ "horizon": "short_term" | "mid_term", "description": "..." }],
  "risks": ["..."],
  "data_gaps": ["..."]
}

Short-term actions should be doable within two weeks by the owner. Mid-term actions take one to three months.`;
}

const TextListSchema = z
  .array(z.unknown())
  .catch([])
  .transform(items => items.filter((item): item is string => typeof item === 'string' && item.trim().length > 0));

const ReplyActionSchema = z.object({
  horizon: z.enum(['short_term', 'mid_term']).catch('mid_term'),
  description: z.string().trim().min(1),
});

const DeepAnalysisReplySchema = z
  .object({
    overall_summary: z.string().min(1),
    key_findings: TextListSchema,
    prioritized_actions: z.array(z.unknown()).catch([]),
    risks: TextListSchema,
    data_gaps: TextListSchema,
  })
  .transform((reply): DeepAnalysis => ({
    overallSummary: reply.overall_summary,
    keyFindings: reply.key_findings,
    // Malformed actions are dropped; unknown horizons count as mid term
    prioritizedActions: reply.prioritized_actions.flatMap(entry => {
      const action = ReplyActionSchema.safeParse(entry);
      return action.success ? [action.data] : [];
    }),
    risks: reply.risks,
    dataGaps: reply.data_gaps,
  }));

function parseJsonReply(text: string): DeepAnalysis | null {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return null;
  }
  const parsed = DeepAnalysisReplySchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

export function parseDeepAnalysis(raw: string): DeepAnalysis {
  const text = raw.trim();
  const direct = parseJsonReply(text);
  if (direct) return direct;

  // Models sometimes wrap the object in prose or a code fence
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start !== -1 && end > start) {
    const embedded = parseJsonReply(text.slice(start, end + 1));
    if (embedded) return embedded;
  }

  return { overallSummary: text, keyFindings: [], prioritizedActions: [], risks: [], dataGaps: [] };
}

export const NOT_CONFIGURED_NOTE = 'AI deep analysis is not configured (set ANTHROPIC_API_KEY), so this summary comes from the checklists only.';
export const UNAVAILABLE_NOTE = 'AI deep analysis was unavailable, so this summary comes from the checklists only.';

export function buildFallbackAnalysis(request: DeepAnalysisRequest, note: string): DeepAnalysis {
  const { restaurant, scores, localRank, reputation, menu } = request;

  const keyFindings = request.failingChecks
    .slice(0, 5)
    .map(f => `${f.check}: ${f.details}`);

  const prioritizedActions: DeepAnalysisAction[] = request.recommendations
    .slice(0, 5)
    .map((r, i): DeepAnalysisAction => ({ horizon: i < 3 && r.effort !== 'high' ? 'short_term' : 'mid_term', description: r.title }));

  const risks: string[] = [];
  if (localRank.bucket === 'none') {
    risks.push(`The listing is not in the top 10 local results for "${localRank.keyword}".`);
  }
  if (reputation.status === 'behind') {
    risks.push('Rating or review volume trails nearby competitors.');
  }
  if (menu.markupBand === 'too-high') {
    risks.push('Delivery prices are marked up far above dine-in prices.');
  } else if (menu.markupBand === 'too-low') {
    risks.push('Delivery prices do not cover typical platform commission.');
  }

  return {
    overallSummary: `${restaurant.name} scores ${scores.overall}/100 (${scores.grade}). ${note}`,
    keyFindings,
    prioritizedActions,
    risks,
    dataGaps: [...request.warnings],
  };
}

export interface DeepAnalysisOptions {
  config?: AppConfig;
  client?: CompletionClient;
}

export async function generateDeepAnalysis(
  request: DeepAnalysisRequest,
  options: DeepAnalysisOptions = {}
): Promise<DeepAnalysis> {
  const config = options.config ?? getConfig();
  const apiKey = config.anthropicApiKey;
  if (!apiKey) {
    return buildFallbackAnalysis(request, NOT_CONFIGURED_NOTE);
  }

  const client = options.client ?? createAnthropicCompletionClient(apiKey);
  const prompt = buildDeepAnalysisPrompt(request);
  const models = [config.anthropicModel, config.anthropicFallbackModel];

  for (const model of new Set(models)) {
    try {
      const text = await client.complete({ model, prompt, maxTokens: MAX_TOKENS });
      if (text.trim()) return parseDeepAnalysis(text);
      console.warn(`[DeepAnalysis] Empty reply from ${model}`);
    } catch (error) {
      console.error(`[DeepAnalysis] ${model} failed:`, error);
    }
  }

  return buildFallbackAnalysis(request, UNAVAILABLE_NOTE);
}
