import type { DeepAnalysis } from '../types';

// Shared by the results view in the browser and the PDF report.
export function renderDeepAnalysisMarkdown(analysis: DeepAnalysis): string {
  const sections: string[] = [`## Summary\n\n${analysis.overallSummary}`];

  const list = (items: string[]) => items.map(item => `- ${item}`).join('\n');

  if (analysis.keyFindings.length > 0) {
    sections.push(`## Key Findings\n\n${list(analysis.keyFindings)}`);
  }

  const shortTerm = analysis.prioritizedActions.filter(a => a.horizon === 'short_term');
  const midTerm = analysis.prioritizedActions.filter(a => a.horizon === 'mid_term');
  if (shortTerm.length > 0 || midTerm.length > 0) {
    const parts = ['## Prioritized Actions'];
    if (shortTerm.length > 0) {
      parts.push(`### Short term\n\n${shortTerm.map((a, i) => `${i + 1}. ${a.description}`).join('\n')}`);
    }
    if (midTerm.length > 0) {
      parts.push(`### Mid term\n\n${midTerm.map((a, i) => `${i + 1}. ${a.description}`).join('\n')}`);
    }
    sections.push(parts.join('\n\n'));
  }

  if (analysis.risks.length > 0) {
    sections.push(`## Risks\n\n${list(analysis.risks)}`);
  }
  if (analysis.dataGaps.length > 0) {
    sections.push(`## Data Gaps\n\n${list(analysis.dataGaps)}`);
  }

  return sections.join('\n\n');
}
