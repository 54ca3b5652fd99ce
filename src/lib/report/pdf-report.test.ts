import { describe, expect, it } from 'vitest';
import { PDFDocument } from 'pdf-lib';
import { makeDiagnosis, makePlace } from '@/lib/testing/fixtures';
import { buildReportFilename, generateDiagnosisReportPdf } from './pdf-report';

describe('generateDiagnosisReportPdf', () => {
  it('creates a valid pdf payload', async () => {
    const bytes = await generateDiagnosisReportPdf(makeDiagnosis());
    expect(bytes.length).toBeGreaterThan(2000);

    const loaded = await PDFDocument.load(bytes);
    expect(loaded.getPageCount()).toBeGreaterThanOrEqual(1);
    expect(loaded.getTitle()).toBe('Dinerscope Restaurant Health Report - Golden Dumpling House');
  });

  it('falls back to the query when the listing has no name', async () => {
    const bytes = await generateDiagnosisReportPdf(makeDiagnosis({ place: makePlace({ name: '' }) }));

    const loaded = await PDFDocument.load(bytes);
    expect(loaded.getTitle()).toBe('Dinerscope Restaurant Health Report - golden dumpling springfield');
  });

  it('handles unicode content without failing PDF encoding', async () => {
    const diagnosis = makeDiagnosis({
      place: makePlace({ name: 'Café Ōsaka 🍜' }),
      deepAnalysis: {
        overallSummary: 'Reviews ↑ and menu depth → more covers 🚀',
        keyFindings: ['Delivery markup ≈ 50%'],
        prioritizedActions: [{ horizon: 'short_term', description: 'Reply to reviews ✓' }],
        risks: [],
        dataGaps: [],
      },
    });

    const bytes = await generateDiagnosisReportPdf(diagnosis);

    const loaded = await PDFDocument.load(bytes);
    expect(loaded.getPageCount()).toBeGreaterThan(0);
  });
});

describe('buildReportFilename', () => {
  it('builds a stable filename from the restaurant name and diagnosis date', () => {
    expect(buildReportFilename('Golden Dumpling House', '2026-03-14T12:00:00.000Z'))
      .toBe('dinerscope-report-golden-dumpling-house-2026-03-14.pdf');
  });

  it('strips accents and punctuation', () => {
    expect(buildReportFilename("Café Olé's Tacos!", '2026-03-14T12:00:00.000Z'))
      .toBe('dinerscope-report-cafe-ole-s-tacos-2026-03-14.pdf');
  });

  it('handles missing names and bad dates', () => {
    expect(buildReportFilename('', 'not a date')).toBe('dinerscope-report-restaurant-unknown-date.pdf');
  });
});
