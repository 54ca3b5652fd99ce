import { describe, expect, it, vi } from 'vitest';
import { renderDeepAnalysisMarkdown } from './deep-analysis-markdown';

// The renderer ships to the browser, so it must not load the LLM client or server config.
vi.mock('@anthropic-ai/sdk', () => {
  throw new Error('@anthropic-ai/sdk loaded by the markdown renderer');
});
vi.mock('../config', () => {
  throw new Error('config loaded by the markdown renderer');
});

describe('renderDeepAnalysisMarkdown', () => {
  it('renders non-empty sections in order', () => {
    const markdown = renderDeepAnalysisMarkdown({
      overallSummary: 'Good start.',
      keyFindings: ['No website'],
      prioritizedActions: [
        { horizon: 'mid_term', description: 'Grow reviews' },
        { horizon: 'short_term', description: 'Link the website' },
      ],
      risks: [],
      dataGaps: ['No delivery menu'],
    });

    expect(markdown).toBe([
      '## Summary\n\nGood start.',
      '## Key Findings\n\n- No website',
      '## Prioritized Actions\n\n### Short term\n\n1. Link the website\n\n### Mid term\n\n1. Grow reviews',
      '## Data Gaps\n\n- No delivery menu',
    ].join('\n\n'));
  });

  it('renders only the summary for an empty analysis', () => {
    expect(renderDeepAnalysisMarkdown({
      overallSummary: 'Nothing else.',
      keyFindings: [],
      prioritizedActions: [],
      risks: [],
      dataGaps: [],
    })).toBe('## Summary\n\nNothing else.');
  });
});
