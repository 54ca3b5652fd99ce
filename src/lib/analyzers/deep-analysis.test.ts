import { afterEach, describe, expect, it, vi } from 'vitest';
import { loadConfig } from '@/lib/config';
import { makeDiagnosis } from '@/lib/testing/fixtures';
import {
  NOT_CONFIGURED_NOTE,
  UNAVAILABLE_NOTE,
  buildDeepAnalysisPrompt,
  buildDeepAnalysisRequest,
  generateDeepAnalysis,
  parseDeepAnalysis,
  type CompletionClient,
  type CompletionRequest,
} from './deep-analysis';

const REPLY = JSON.stringify({
  overall_summary: 'Strong food, weak online presence.',
  key_findings: ['No website on the listing'],
  prioritized_actions: [
    { horizon: 'short_term', description: 'Link the website from the profile' },
    { horizon: 'mid_term', description: 'Grow reviews past 50' },
  ],
  risks: ['Delivery markup'],
  data_gaps: [],
});

function fakeClient(...replies: Array<string | Error>): CompletionClient & { calls: CompletionRequest[] } {
  const calls: CompletionRequest[] = [];
  return {
    calls,
    async complete(request) {
      calls.push(request);
      const reply = replies[calls.length - 1] ?? '';
      if (reply instanceof Error) throw reply;
      return reply;
    },
  };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('buildDeepAnalysisRequest', () => {
  it('summarises the diagnosis with the biggest point losses first', () => {
    const request = buildDeepAnalysisRequest(makeDiagnosis());

    expect(request.scores).toEqual({
      overall: 35,
      grade: 'F',
      profile: { score: 6, maxScore: 15 },
      website: { score: 6, maxScore: 10 },
      menu: { score: 3, maxScore: 6 },
      pricing: { score: 0, maxScore: 12 },
    });
    expect(request.failingChecks.map(f => [f.check, f.pointsLost])).toEqual([
      ['Delivery markup', 12],
      ['Website link', 6],
      ['Meta description', 4],
      ['Review volume', 3],
      ['Menu size', 3],
    ]);
    expect(request.menu).toEqual({
      dineInItems: 2,
      deliveryItems: 1,
      deliveryPlatform: 'doordash',
      averageMarkup: 0.5,
      markupBand: 'too-high',
    });
    expect(request.recommendations[0]).toEqual({ title: 'Link your website from the profile.', priority: 'critical', effort: 'low' });
  });

  it('embeds the request and the reply shape in the prompt', () => {
    const prompt = buildDeepAnalysisPrompt(buildDeepAnalysisRequest(makeDiagnosis()));

    expect(prompt).toContain('"name": "Golden Dumpling House"');
    expect(prompt).toContain('"overall_summary": "2-4 sentences"');
  });
});

describe('parseDeepAnalysis', () => {
  it('maps a JSON reply to camelCase fields', () => {
    expect(parseDeepAnalysis(REPLY)).toEqual({
      overallSummary: 'Strong food, weak online presence.',
      keyFindings: ['No website on the listing'],
      prioritizedActions: [
        { horizon: 'short_term', description: 'Link the website from the profile' },
        { horizon: 'mid_term', description: 'Grow reviews past 50' },
      ],
      risks: ['Delivery markup'],
      dataGaps: [],
    });
  });

  it('finds the object inside a code fence', () => {
    const parsed = parseDeepAnalysis('Here you go:\n```json\n' + REPLY + '\n```');

    expect(parsed.overallSummary).toBe('Strong food, weak online presence.');
    expect(parsed.prioritizedActions).toHaveLength(2);
  });

  it('keeps the reply when some actions or list entries are malformed', () => {
    const reply = JSON.stringify({
      overall_summary: 'Solid listing.',
      key_findings: ['Thin menu', 42],
      prioritized_actions: [
        { horizon: 'long_term', description: 'Open a second location' },
        { horizon: 'short_term', description: '' },
        'Reply to reviews',
        { horizon: 'short_term', description: 'Add a menu page' },
      ],
      risks: 'none',
      data_gaps: ['Local rank unavailable'],
    });

    expect(parseDeepAnalysis(reply)).toEqual({
      overallSummary: 'Solid listing.',
      keyFindings: ['Thin menu'],
      prioritizedActions: [
        { horizon: 'mid_term', description: 'Open a second location' },
        { horizon: 'short_term', description: 'Add a menu page' },
      ],
      risks: [],
      dataGaps: ['Local rank unavailable'],
    });
  });

  it('defaults missing lists', () => {
    expect(parseDeepAnalysis('{"overall_summary":"Short."}')).toEqual({
      overallSummary: 'Short.',
      keyFindings: [],
      prioritizedActions: [],
      risks: [],
      dataGaps: [],
    });
  });

  it('keeps plain prose as the summary', () => {
    expect(parseDeepAnalysis('  The listing needs work.  ')).toEqual({
      overallSummary: 'The listing needs work.',
      keyFindings: [],
      prioritizedActions: [],
      risks: [],
      dataGaps: [],
    });
  });
});

describe('generateDeepAnalysis', () => {
  const request = buildDeepAnalysisRequest(makeDiagnosis());

  it('builds a checklist-only analysis without an API key', async () => {
    const client = fakeClient(REPLY);
    const analysis = await generateDeepAnalysis(request, { config: loadConfig({}), client });

    expect(client.calls).toHaveLength(0);
    expect(analysis).toEqual({
      overallSummary: `Golden Dumpling House scores 35/100 (F). ${NOT_CONFIGURED_NOTE}`,
      keyFindings: [
        'Delivery markup: Average delivery markup 50% is too high and hurts delivery conversion',
        'Website link: No website linked from the listing',
        'Meta description: No meta description',
        'Review volume: 12 review(s)',
        'Menu size: 8 item(s) found',
      ],
      prioritizedActions: [
        { horizon: 'short_term', description: 'Link your website from the profile.' },
        { horizon: 'short_term', description: 'Bring delivery prices within 10-35% of dine-in prices.' },
        { horizon: 'short_term', description: 'Add a 50-160 character meta description.' },
        { horizon: 'mid_term', description: 'Ask satisfied guests for reviews.' },
        { horizon: 'mid_term', description: 'List the full menu online.' },
      ],
      risks: [
        'Rating or review volume trails nearby competitors.',
        'Delivery prices are marked up far above dine-in prices.',
      ],
      dataGaps: ['Local rank: SERPAPI_API_KEY is not configured'],
    });
  });

  it('parses the model reply', async () => {
    const client = fakeClient(REPLY);
    const analysis = await generateDeepAnalysis(request, { config: loadConfig({ ANTHROPIC_API_KEY: 'test-secret' }), client });

    expect(analysis.overallSummary).toBe('Strong food, weak online presence.');
    expect(client.calls).toHaveLength(1);
    expect(client.calls[0].model).toBe('claude-sonnet-4-5-20250929');
    expect(client.calls[0].maxTokens).toBe(2000);
  });

  it('retries with the fallback model', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const client = fakeClient(new Error('overloaded'), REPLY);
    const config = loadConfig({ ANTHROPIC_API_KEY: 'test-secret', ANTHROPIC_MODEL: 'primary-model', ANTHROPIC_FALLBACK_MODEL: 'backup-model' });

    const analysis = await generateDeepAnalysis(request, { config, client });

    expect(client.calls.map(c => c.model)).toEqual(['primary-model', 'backup-model']);
    expect(analysis.overallSummary).toBe('Strong food, weak online presence.');
  });

  it('falls back to the checklists when every model fails', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const client = fakeClient(new Error('overloaded'), '   ');

    const analysis = await generateDeepAnalysis(request, { config: loadConfig({ ANTHROPIC_API_KEY: 'test-secret' }), client });

    expect(client.calls).toHaveLength(2);
    expect(analysis.overallSummary).toBe(`Golden Dumpling House scores 35/100 (F). ${UNAVAILABLE_NOTE}`);
  });

  it('tries a model only once when both settings name it', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const client = fakeClient(new Error('down'));
    const config = loadConfig({ ANTHROPIC_API_KEY: 'test-secret', ANTHROPIC_MODEL: 'same', ANTHROPIC_FALLBACK_MODEL: 'same' });

    await generateDeepAnalysis(request, { config, client });

    expect(client.calls).toHaveLength(1);
  });
});
