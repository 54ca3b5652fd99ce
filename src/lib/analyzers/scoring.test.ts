import { describe, expect, it } from 'vitest';
import { makeChecklists, makeDiagnosis } from '@/lib/testing/fixtures';
import { scoreCheck, summarizeChecklist } from './checklist';
import { calculateOverallScore, generateRecommendations } from './scoring';

describe('scoreCheck', () => {
  it('derives the status from the points and keeps the recommendation only when points are lost', () => {
    const base = { check: 'Photos', maxPoints: 4, details: '', recommendation: 'Upload photos.' };

    expect(scoreCheck({ ...base, points: 4 })).toEqual({ check: 'Photos', status: 'pass', details: '', points: 4, maxPoints: 4 });
    expect(scoreCheck({ ...base, points: 2 }).status).toBe('partial');
    expect(scoreCheck({ ...base, points: 0 })).toMatchObject({ status: 'fail', recommendation: 'Upload photos.' });
  });
});

describe('summarizeChecklist', () => {
  it('totals points and grades the percentage', () => {
    const summary = summarizeChecklist([
      scoreCheck({ check: 'A', points: 3, maxPoints: 4, details: '', recommendation: 'Fix A.' }),
      scoreCheck({ check: 'B', points: 4, maxPoints: 4, details: '', recommendation: 'Fix B.' }),
    ]);

    expect(summary.score).toBe(7);
    expect(summary.maxScore).toBe(8);
    expect(summary.percent).toBe(88);
    expect(summary.grade).toBe('A');
    expect(summary.recommendations).toEqual(['Fix A.']);
  });

  it('scores an empty checklist as zero', () => {
    expect(summarizeChecklist([])).toMatchObject({ score: 0, maxScore: 0, percent: 0, grade: 'F' });
  });
});

describe('calculateOverallScore', () => {
  it('weights checklists by their points', () => {
    // 15 of 43 points
    expect(calculateOverallScore(makeChecklists())).toBe(35);
  });
});

describe('generateRecommendations', () => {
  it('orders by priority, then effort, then points', () => {
    const recs = generateRecommendations(makeChecklists());

    expect(recs.map(r => [r.check, r.priority, r.effort, r.pointsAvailable])).toEqual([
      ['Website link', 'critical', 'low', 6],
      ['Delivery markup', 'critical', 'medium', 12],
      ['Meta description', 'high', 'low', 4],
      ['Review volume', 'medium', 'high', 3],
      ['Menu size', 'medium', 'high', 3],
    ]);
  });

  it('uses the first sentence as the title and keeps the full text', () => {
    const [first] = generateRecommendations(makeChecklists());

    expect(first.checklist).toBe('profile');
    expect(first.title).toBe('Link your website from the profile.');
    expect(first.description).toBe(
      'Link your website from the profile. Listings without a website lose clicks to competitors that have one.'
    );
  });

  it('skips passing checks', () => {
    const recs = generateRecommendations(makeChecklists());

    expect(recs.find(r => r.check === 'Business name')).toBeUndefined();
    expect(recs.find(r => r.check === 'Website reachable')).toBeUndefined();
  });
});

describe('buildDiagnosis', () => {
  it('fills in the overall score, grade and recommendations', () => {
    const diagnosis = makeDiagnosis();

    expect(diagnosis.overallScore).toBe(35);
    expect(diagnosis.overallGrade).toBe('F');
    expect(diagnosis.topRecommendations).toHaveLength(5);
  });
});
