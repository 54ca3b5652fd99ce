import {
  getGrade, type ChecklistKey, type ChecklistScore, type Checklists, type Diagnosis, type Recommendation,
} from '../types';

const CHECKLIST_ORDER: ChecklistKey[] = ['profile', 'website', 'menu', 'pricing'];

const EFFORT_BY_CHECK: Record<string, Recommendation['effort']> = {
  'Business name': 'low',
  'Address listed': 'low',
  'Phone number listed': 'low',
  'Website link': 'low',
  'Business categories': 'low',
  'Price level': 'low',
  'Photos': 'low',
  'Title tag': 'low',
  'Meta description': 'low',
  'Single H1 heading': 'low',
  'Mobile viewport': 'low',
  'Online ordering link': 'low',
  'Phone number on page': 'low',
  'Rating': 'high',
  'Review volume': 'high',
  'Website reachable': 'high',
  'Menu size': 'high',
  'Price ladder': 'high',
};

export function calculateOverallScore(checklists: Checklists): number {
  const lists: ChecklistScore[] = CHECKLIST_ORDER.map(key => checklists[key]);
  const earned = lists.reduce((sum, c) => sum + c.score, 0);
  const possible = lists.reduce((sum, c) => sum + c.maxScore, 0);
  return possible > 0 ? Math.round((earned / possible) * 100) : 0;
}

function priorityFor(pointsLost: number): Recommendation['priority'] {
  if (pointsLost >= 6) return 'critical';
  if (pointsLost >= 4) return 'high';
  if (pointsLost >= 2) return 'medium';
  return 'low';
}

export function generateRecommendations(checklists: Checklists): Recommendation[] {
  const recommendations: Recommendation[] = [];

  for (const key of CHECKLIST_ORDER) {
    for (const finding of checklists[key].findings) {
      if (finding.status === 'pass' || !finding.recommendation) continue;
      const pointsAvailable = finding.maxPoints - finding.points;
      recommendations.push({
        checklist: key,
        check: finding.check,
        priority: priorityFor(pointsAvailable),
        effort: EFFORT_BY_CHECK[finding.check] ?? 'medium',
        title: finding.recommendation.split('. ')[0].replace(/\.$/, '') + '.',
        description: finding.recommendation,
        pointsAvailable,
      });
    }
  }

  const priorityOrder = { critical: 0, high: 1, medium: 2, low: 3 };
  const effortOrder = { low: 0, medium: 1, high: 2 };
  recommendations.sort((a, b) => {
    const pDiff = priorityOrder[a.priority] - priorityOrder[b.priority];
    if (pDiff !== 0) return pDiff;
    const eDiff = effortOrder[a.effort] - effortOrder[b.effort];
    if (eDiff !== 0) return eDiff;
    return b.pointsAvailable - a.pointsAvailable;
  });

  return recommendations;
}

export type DiagnosisParts = Omit<Diagnosis, 'overallScore' | 'overallGrade' | 'topRecommendations'>;

export function buildDiagnosis(parts: DiagnosisParts): Diagnosis {
  const overallScore = calculateOverallScore(parts.checklists);
  return {
    ...parts,
    overallScore,
    overallGrade: getGrade(overallScore),
    topRecommendations: generateRecommendations(parts.checklists),
  };
}
