import { describe, expect, it } from 'vitest';
import { scoreCheck, summarizeChecklist } from './checklist';

const base = { check: 'Photos', maxPoints: 4, details: '2 photo(s)', recommendation: 'Add more photos.' };

describe('scoreCheck', () => {
  it('derives the status from the points', () => {
    expect(scoreCheck({ ...base, points: 4 })).toEqual({ check: 'Photos', status: 'pass', details: '2 photo(s)', points: 4, maxPoints: 4 });
    expect(scoreCheck({ ...base, points: 2 }).status).toBe('partial');
    expect(scoreCheck({ ...base, points: 0 })).toEqual({
      check: 'Photos', status: 'fail', details: '2 photo(s)', points: 0, maxPoints: 4, recommendation: 'Add more photos.',
    });
  });

  it('clamps points to the allowed range', () => {
    expect(scoreCheck({ ...base, points: 7 }).points).toBe(4);
    expect(scoreCheck({ ...base, points: -3 })).toMatchObject({ points: 0, status: 'fail' });
  });
});

describe('summarizeChecklist', () => {
  it('totals clamped findings', () => {
    const summary = summarizeChecklist([
      scoreCheck({ ...base, points: 9 }),
      scoreCheck({ ...base, check: 'Hours', points: 1 }),
    ]);

    expect(summary).toMatchObject({ score: 5, maxScore: 8, percent: 63, recommendations: ['Add more photos.'] });
  });
});
