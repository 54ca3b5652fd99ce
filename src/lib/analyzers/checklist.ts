import { getGrade, type ChecklistScore, type Finding } from '../types';

export interface CheckResult {
  check: string;
  points: number;
  maxPoints: number;
  details: string;
  recommendation: string;
}

/**
 * Points are clamped to [0, maxPoints]. Status follows them: full marks pass,
 * some points are partial, none fail.
 */
export function scoreCheck({ check, points: awarded, maxPoints, details, recommendation }: CheckResult): Finding {
  const points = Math.min(Math.max(awarded, 0), maxPoints);
  const status: Finding['status'] = points >= maxPoints ? 'pass' : points > 0 ? 'partial' : 'fail';
  const finding: Finding = { check, status, details, points, maxPoints };
  if (status !== 'pass') finding.recommendation = recommendation;
  return finding;
}

export function summarizeChecklist(findings: Finding[]): ChecklistScore {
  const score = findings.reduce((s, f) => s + f.points, 0);
  const maxScore = findings.reduce((s, f) => s + f.maxPoints, 0);
  const percent = maxScore > 0 ? Math.round((score / maxScore) * 100) : 0;
  const recommendations = findings
    .map(f => f.recommendation)
    .filter((r): r is string => typeof r === 'string');

  return { score, maxScore, percent, grade: getGrade(percent), findings, recommendations };
}
